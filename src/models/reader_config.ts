export interface ReaderConfig {
  protocolVersion: number;
  pageSize: number;
  /** When true the server must honor paging or the search fails. */
  pagingCritical: boolean;
  maxAttributes: number;
}

export const DEFAULT_READER_CONFIG: Readonly<ReaderConfig> = {
  protocolVersion: 3,
  pageSize: 1000,
  pagingCritical: true,
  maxAttributes: 50,
};

export type Environment = Record<string, string | undefined>;

export function loadReaderConfig(env: Environment = process.env): ReaderConfig {
  return {
    protocolVersion: parsePositiveInt(env, "LDAPREADER_PROTOCOL_VERSION", DEFAULT_READER_CONFIG.protocolVersion),
    pageSize: parsePositiveInt(env, "LDAPREADER_PAGE_SIZE", DEFAULT_READER_CONFIG.pageSize),
    pagingCritical: parseBoolean(env, "LDAPREADER_PAGING_CRITICAL", DEFAULT_READER_CONFIG.pagingCritical),
    maxAttributes: parsePositiveInt(env, "LDAPREADER_MAX_ATTRIBUTES", DEFAULT_READER_CONFIG.maxAttributes),
  };
}

export function assertPageSize(size: number): void {
  if (!Number.isInteger(size) || size < 1 || size > 0x7fffffff) {
    throw new RangeError(`Page size must be a positive integer, got ${size}`);
  }
}

function parsePositiveInt(env: Environment, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseBoolean(env: Environment, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new Error(`Environment variable ${name} must be true or false, got "${raw}"`);
  }
}
