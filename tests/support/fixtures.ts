// Shared test fixtures

import { LogLevel, StructuredLogger } from "../../src/services/logger.ts";
import { LDAPReader, ReaderOptions } from "../../src/services/ldap_reader.ts";
import { PrometheusMetricsService } from "../../src/services/metrics.ts";
import { memoryTransports, MemoryTransport } from "./memory_transport.ts";
import { StubDirectory, StubDirectoryOptions, StubEntry } from "./stub_directory.ts";

export const BASE_DN = "ou=users,dc=example,dc=org";
export const ADMIN_DN = "cn=admin,dc=example,dc=org";
export const ADMIN_SECRET = "test-secret";

export function quietLogger(): StructuredLogger {
  return new StructuredLogger({ level: LogLevel.FATAL, service: "test", enableConsole: false, redactSensitive: true });
}

export function user(name: string, extra: Record<string, string[]> = {}): StubEntry {
  return {
    dn: `cn=${name},${BASE_DN}`,
    attributes: {
      objectClass: ["top", "person", "user"],
      cn: [name],
      sAMAccountName: [name.toLowerCase()],
      ...extra,
    },
  };
}

/** `count` users named user1..userN. */
export function users(count: number): StubEntry[] {
  return Array.from({ length: count }, (_, i) => user(`User${i + 1}`));
}

export interface StubSession {
  reader: LDAPReader;
  directory: StubDirectory;
  transports: MemoryTransport[];
  metrics: PrometheusMetricsService;
}

/**
 * Open a reader against an in-process stub directory.
 */
export async function openStubReader(
  directoryOptions: Partial<StubDirectoryOptions> = {},
  readerOptions: ReaderOptions = {},
): Promise<StubSession> {
  const directory = new StubDirectory({
    entries: users(3),
    accounts: { [ADMIN_DN]: ADMIN_SECRET },
    ...directoryOptions,
  });
  const { factory, opened } = memoryTransports(directory);
  const metrics = new PrometheusMetricsService();
  const reader = await LDAPReader.open("ldap://directory.example.org", {
    logger: quietLogger(),
    metrics,
    transportFactory: factory,
    env: {},
    ...readerOptions,
  });
  return { reader, directory, transports: opened, metrics };
}
