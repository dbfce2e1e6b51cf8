// LDAP Reader
// Session object wiring connection, credentials, paged search and cursor for one consumer

import { AttributeValueSet, Entry } from "../models/entry.ts";
import { BindError } from "../models/errors.ts";
import { Environment, loadReaderConfig, ReaderConfig } from "../models/reader_config.ts";
import { ConnectionManager } from "./connection_manager.ts";
import { CredentialStore } from "./credential_store.ts";
import { CursorState, EntryCursor } from "./entry_cursor.ts";
import { createLogger, Logger } from "./logger.ts";
import { MetricsCollector, PrometheusMetricsService } from "./metrics.ts";
import { PagedSearchEngine, PageState, SearchPhase } from "./paged_search.ts";
import { TransportFactory } from "./transport.ts";

export interface ReaderCredentials {
  user: string;
  secret: string | Uint8Array;
}

export interface ReaderOptions extends Partial<ReaderConfig> {
  /** Bind right after connecting. */
  credentials?: ReaderCredentials;
  logger?: Logger;
  metrics?: MetricsCollector;
  transportFactory?: TransportFactory;
  /** Source of LDAPREADER_* settings; defaults to process.env. */
  env?: Environment;
}

export class LDAPReader {
  readonly config: Readonly<ReaderConfig>;
  readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly connections: ConnectionManager;
  private readonly credentials: CredentialStore;
  private readonly engine: PagedSearchEngine;
  private readonly cursor: EntryCursor;

  private constructor(config: ReaderConfig, logger: Logger, metrics: MetricsCollector, factory?: TransportFactory) {
    this.config = Object.freeze({ ...config });
    this.logger = logger;
    this.metrics = metrics;
    this.connections = new ConnectionManager({
      protocolVersion: config.protocolVersion,
      ...(factory ? { transportFactory: factory } : {}),
      logger,
      metrics,
    });
    this.credentials = new CredentialStore(logger, metrics);
    this.engine = new PagedSearchEngine({
      connections: this.connections,
      logger,
      metrics,
      pageSize: config.pageSize,
      pagingCritical: config.pagingCritical,
      maxAttributes: config.maxAttributes,
    });
    this.cursor = new EntryCursor(this.engine);
  }

  /**
   * Connect to `ldap://host[:port]` or `ldaps://host[:port]`, binding when credentials are given.
   */
  static async open(uri: string, options: ReaderOptions = {}): Promise<LDAPReader> {
    const env = options.env ?? process.env;
    const defaults = loadReaderConfig(env);
    const config: ReaderConfig = {
      protocolVersion: options.protocolVersion ?? defaults.protocolVersion,
      pageSize: options.pageSize ?? defaults.pageSize,
      pagingCritical: options.pagingCritical ?? defaults.pagingCritical,
      maxAttributes: options.maxAttributes ?? defaults.maxAttributes,
    };
    const logger = options.logger ?? createLogger("ldap-reader", env);
    const metrics = options.metrics ?? new PrometheusMetricsService();

    const reader = new LDAPReader(config, logger, metrics, options.transportFactory);
    await reader.connections.initialize(uri);

    if (options.credentials) {
      try {
        await reader.bind(options.credentials.user, options.credentials.secret);
      } catch (err) {
        await reader.close();
        throw err;
      }
    }
    return reader;
  }

  static release(set: AttributeValueSet | null | undefined): void {
    set?.release();
  }

  get protocolVersion(): number {
    return this.connections.protocolVersion;
  }

  get bound(): boolean {
    return this.connections.connection?.bound ?? false;
  }

  get boundIdentity(): string | null {
    return this.connections.connection?.boundIdentity ?? null;
  }

  get pageSize(): number {
    return this.engine.pageSize;
  }

  get pagingCritical(): boolean {
    return this.engine.pagingCritical;
  }

  get pageState(): PageState {
    return this.engine.pageState;
  }

  get phase(): SearchPhase {
    return this.engine.phase;
  }

  get cursorState(): CursorState {
    return this.cursor.state;
  }

  setProtocolVersion(version: number): void {
    this.connections.setProtocolVersion(version);
  }

  setPageSize(size: number): void {
    this.engine.setPageSize(size);
  }

  setPagingCritical(critical: boolean): void {
    this.engine.setPagingCritical(critical);
  }

  setCredentials(user: string, secret: string | Uint8Array): void {
    this.credentials.setCredentials(user, secret);
  }

  /** Bind with the stored credentials. */
  bind(rebind?: boolean): Promise<void>;
  /** Store new credentials and bind with them. */
  bind(user: string, secret: string | Uint8Array, rebind?: boolean): Promise<void>;
  async bind(userOrRebind?: string | boolean, secret?: string | Uint8Array, rebind = false): Promise<void> {
    const connection = this.connections.requireConnection();

    if (typeof userOrRebind !== "string") {
      return this.credentials.bind(connection, userOrRebind ?? false);
    }

    // A refused rebind leaves the stored credentials untouched
    if (connection.bound && !rebind) {
      throw new BindError(`Already bound as ${connection.boundIdentity}`, "already_bound");
    }
    if (secret === undefined) {
      throw new BindError("No bind credentials set", "no_credentials");
    }
    this.credentials.setCredentials(userOrRebind, secret);
    return this.credentials.bind(connection, rebind);
  }

  /**
   * Start a subtree search under `base` and fetch its first page. With no attribute names
   * the server returns all user attributes.
   */
  query(filter: string, base: string, ...attributeNames: string[]): Promise<void> {
    return this.engine.query(filter, base, attributeNames);
  }

  fetch(): Promise<boolean> {
    return this.cursor.fetch();
  }

  currentEntry(): Entry {
    return this.cursor.current;
  }

  getAttribute(name: string): AttributeValueSet;
  getAttribute(entry: Entry, name: string): AttributeValueSet;
  getAttribute(entryOrName: Entry | string, name?: string): AttributeValueSet {
    if (typeof entryOrName === "string") {
      return this.cursor.current.getAttribute(entryOrName);
    }
    return entryOrName.getAttribute(name ?? "");
  }

  /** Iterate the remaining entries of the current query, fetching pages as needed. */
  async *entries(): AsyncGenerator<Entry, void, undefined> {
    while (await this.cursor.fetch()) {
      yield this.cursor.current;
    }
  }

  async close(): Promise<void> {
    this.credentials.clear();
    await this.connections.close();
    this.logger.debug("Reader closed", { queries: this.engine.queryId });
  }
}

export default LDAPReader;
