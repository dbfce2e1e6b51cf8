// Connection Manager
// Parses server URIs, opens the transport and tracks one connection's protocol state

import {
  LDAP_PORT,
  LDAP_VERSION,
  LDAPControl,
  LDAPMessage,
  LDAPMessageType,
  LDAPRequestOp,
  LDAPS_PORT,
  NOTICE_OF_DISCONNECTION_OID,
  isFinalResponse,
} from "../protocol/ldap.ts";
import { ConnectError } from "../models/errors.ts";
import { Logger } from "./logger.ts";
import { MetricsCollector } from "./metrics.ts";
import { LDAPTransport, ServerAddress, socketTransportFactory, TransportFactory } from "./transport.ts";

export const SUPPORTED_PROTOCOL_VERSIONS: readonly number[] = [2, 3];

/**
 * Parse `scheme://host[:port][/]`. An empty host means localhost.
 */
export function parseServerUri(uri: string): ServerAddress {
  let url: URL;
  try {
    url = new URL(uri.trim());
  } catch (err) {
    throw new ConnectError(`Invalid server URI "${uri}"`, { cause: err });
  }

  const scheme = url.protocol.slice(0, -1);
  if (scheme !== "ldap" && scheme !== "ldaps") {
    throw new ConnectError(`Unsupported URI scheme "${scheme}" in "${uri}"; expected ldap or ldaps`);
  }
  if (url.pathname !== "" && url.pathname !== "/") {
    throw new ConnectError(`Server URI "${uri}" must not contain a path`);
  }
  if (url.username || url.password || url.search || url.hash) {
    throw new ConnectError(`Server URI "${uri}" must only name a host and port`);
  }

  const port = url.port === "" ? (scheme === "ldaps" ? LDAPS_PORT : LDAP_PORT) : Number(url.port);
  if (port < 1 || port > 65535) {
    throw new ConnectError(`Invalid port in server URI "${uri}"`);
  }

  const host = url.hostname.replace(/^\[(.*)\]$/, "$1") || "localhost";
  return { scheme, host, port };
}

export function formatServerAddress(address: ServerAddress): string {
  const host = address.host.includes(":") ? `[${address.host}]` : address.host;
  return `${address.scheme}://${host}:${address.port}`;
}

/**
 * One open channel to a directory server: protocol version, bind state and message IDs.
 */
export class Connection {
  private nextMessageId = 1;
  private boundDN: string | null = null;

  constructor(
    readonly address: ServerAddress,
    private readonly transport: LDAPTransport,
    private version: number,
    private readonly logger: Logger,
  ) {}

  get protocolVersion(): number {
    return this.version;
  }

  get isOpen(): boolean {
    return this.transport.isOpen;
  }

  get bound(): boolean {
    return this.boundDN !== null;
  }

  get boundIdentity(): string | null {
    return this.boundDN;
  }

  useProtocolVersion(version: number): void {
    this.version = version;
  }

  markBound(dn: string): void {
    this.boundDN = dn;
  }

  markUnbound(): void {
    this.boundDN = null;
  }

  /**
   * Send one request and collect every response carrying its message ID, up to and
   * including the final response.
   */
  async exchange(op: LDAPRequestOp, controls?: LDAPControl[]): Promise<LDAPMessage[]> {
    const messageID = await this.send(op, controls);
    const responses: LDAPMessage[] = [];

    while (true) {
      const message = await this.transport.read();
      const notice = message.protocolOp;

      if (message.messageID === 0 && notice.type === LDAPMessageType.ExtendedResponse) {
        if (notice.responseName === NOTICE_OF_DISCONNECTION_OID || notice.responseName === undefined) {
          await this.transport.close();
          throw new ConnectError(
            `Server ${formatServerAddress(this.address)} ended the session: ${notice.diagnosticMessage || "notice of disconnection"}`,
          );
        }
      }

      if (message.messageID !== messageID) {
        this.logger.warn("Ignoring response with unexpected message ID", {
          expected: messageID,
          received: message.messageID,
          operation: LDAPMessageType[message.protocolOp.type],
        });
        continue;
      }

      responses.push(message);
      if (isFinalResponse(message.protocolOp)) {
        return responses;
      }
    }
  }

  /** Write a request without waiting for a response; returns its message ID. */
  async send(op: LDAPRequestOp, controls?: LDAPControl[]): Promise<number> {
    const messageID = this.nextMessageId;
    this.nextMessageId = this.nextMessageId >= 0x7fffffff ? 1 : this.nextMessageId + 1;
    await this.transport.write({
      messageID,
      protocolOp: op,
      ...(controls && controls.length > 0 ? { controls } : {}),
    });
    return messageID;
  }

  async close(): Promise<void> {
    this.boundDN = null;
    await this.transport.close();
  }
}

export interface ConnectionManagerOptions {
  protocolVersion?: number;
  transportFactory?: TransportFactory;
  logger: Logger;
  metrics?: MetricsCollector;
}

export class ConnectionManager {
  private version: number;
  private current: Connection | null = null;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: ConnectionManagerOptions) {
    this.transportFactory = options.transportFactory ?? socketTransportFactory;
    this.logger = options.logger.child({ component: "connection" });
    this.metrics = options.metrics;
    this.version = LDAP_VERSION;
    if (options.protocolVersion !== undefined) {
      this.setProtocolVersion(options.protocolVersion);
    }
  }

  get protocolVersion(): number {
    return this.version;
  }

  get connection(): Connection | null {
    return this.current;
  }

  setProtocolVersion(version: number): void {
    if (!SUPPORTED_PROTOCOL_VERSIONS.includes(version)) {
      throw new ConnectError(
        `Unsupported protocol version ${version}; supported: ${SUPPORTED_PROTOCOL_VERSIONS.join(", ")}`,
      );
    }
    this.version = version;
    this.current?.useProtocolVersion(version);
  }

  async initialize(uri: string): Promise<Connection> {
    if (this.current) {
      throw new ConnectError(`Already connected to ${formatServerAddress(this.current.address)}`);
    }

    const address = parseServerUri(uri);
    const label = formatServerAddress(address);

    let transport: LDAPTransport;
    try {
      transport = await this.transportFactory(address);
    } catch (err) {
      this.metrics?.recordError("connect");
      this.logger.error("Connection failed", err, { server: label });
      if (err instanceof ConnectError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectError(`Cannot connect to ${label}: ${reason}`, { cause: err });
    }

    this.current = new Connection(address, transport, this.version, this.logger.child({ server: label }));
    this.metrics?.recordConnection();
    this.logger.info("Connected", { server: label, protocolVersion: this.version });
    return this.current;
  }

  /**
   * The initialized connection, or ConnectError when there is none or it has failed.
   */
  requireConnection(): Connection {
    if (!this.current) {
      throw new ConnectError("Connection not initialized");
    }
    if (!this.current.isOpen) {
      throw new ConnectError(`Connection to ${formatServerAddress(this.current.address)} is no longer usable`);
    }
    return this.current;
  }

  async close(): Promise<void> {
    const connection = this.current;
    if (!connection) return;
    this.current = null;

    try {
      if (connection.isOpen) {
        await connection.send({ type: LDAPMessageType.UnbindRequest });
      }
    } catch (err) {
      this.logger.warn("Unbind request failed", { reason: err instanceof Error ? err.message : String(err) });
    } finally {
      await connection.close();
      this.metrics?.recordDisconnection();
      this.logger.info("Disconnected", { server: formatServerAddress(connection.address) });
    }
  }
}

export default ConnectionManager;
