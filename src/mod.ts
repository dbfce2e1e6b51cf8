// Public entry point
export { LDAPReader } from "./services/ldap_reader.ts";
export type { ReaderCredentials, ReaderOptions } from "./services/ldap_reader.ts";
export { AttributeValueSet, Entry, ResultSet } from "./models/entry.ts";
export {
  BindError,
  ConnectError,
  LDAPReaderError,
  NoCurrentEntryError,
  SearchError,
  TooManyAttributesError,
} from "./models/errors.ts";
export type { BindFailureReason } from "./models/errors.ts";
export { DEFAULT_READER_CONFIG, loadReaderConfig } from "./models/reader_config.ts";
export type { Environment, ReaderConfig } from "./models/reader_config.ts";
export { Connection, ConnectionManager, formatServerAddress, parseServerUri } from "./services/connection_manager.ts";
export { CredentialStore } from "./services/credential_store.ts";
export { CursorState, EntryCursor } from "./services/entry_cursor.ts";
export { PagedSearchEngine, SearchPhase } from "./services/paged_search.ts";
export type { FrozenSearch, PageState } from "./services/paged_search.ts";
export { SocketTransport, socketTransportFactory, tlsOptions } from "./services/transport.ts";
export type { LDAPTransport, ServerAddress, TransportFactory } from "./services/transport.ts";
export { ContextLogger, createLogger, LogLevel, StructuredLogger } from "./services/logger.ts";
export type { Logger, LoggerConfig, LogEntry } from "./services/logger.ts";
export { PrometheusMetricsService } from "./services/metrics.ts";
export type { MetricsCollector, MetricsSnapshot } from "./services/metrics.ts";
export { formatFilter, FilterSyntaxError, parseFilter } from "./protocol/filter.ts";
export { LDAPProtocolError, LDAPResultCode, PAGED_RESULTS_OID } from "./protocol/ldap.ts";
