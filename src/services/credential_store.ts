// Credential Store
// Holds the simple-bind identity and secret and performs the bind handshake

import { BindResponse, LDAPMessageType, LDAPResultCode, resultCodeName, utf8 } from "../protocol/ldap.ts";
import { BindError } from "../models/errors.ts";
import { Connection } from "./connection_manager.ts";
import { Logger } from "./logger.ts";
import { MetricsCollector } from "./metrics.ts";

interface Credentials {
  user: string;
  secret: Uint8Array;
}

export class CredentialStore {
  private credentials: Credentials | null = null;
  private readonly logger: Logger;

  constructor(logger: Logger, private readonly metrics?: MetricsCollector) {
    this.logger = logger.child({ component: "credentials" });
  }

  get user(): string | null {
    return this.credentials?.user ?? null;
  }

  hasCredentials(): boolean {
    return this.credentials !== null;
  }

  /** Replace the stored credentials. The previous secret is zero-filled first. */
  setCredentials(user: string, secret: string | Uint8Array): void {
    this.clear();
    this.credentials = {
      user,
      secret: typeof secret === "string" ? utf8(secret) : secret.slice(),
    };
  }

  clear(): void {
    if (this.credentials) {
      this.credentials.secret.fill(0);
      this.credentials = null;
    }
  }

  async bind(connection: Connection, rebind = false): Promise<void> {
    if (connection.bound && !rebind) {
      throw new BindError(`Already bound as ${connection.boundIdentity}`, "already_bound");
    }
    if (!this.credentials) {
      throw new BindError("No bind credentials set", "no_credentials");
    }

    const { user, secret } = this.credentials;

    let response: BindResponse;
    try {
      const messages = await connection.exchange({
        type: LDAPMessageType.BindRequest,
        version: connection.protocolVersion,
        name: user,
        authentication: { type: "simple", password: secret },
      });
      const final = messages[messages.length - 1]?.protocolOp;
      if (!final || final.type !== LDAPMessageType.BindResponse) {
        throw new Error("Server did not answer with a BindResponse");
      }
      response = final;
    } catch (err) {
      connection.markUnbound();
      this.metrics?.recordBind(false);
      this.metrics?.recordError("bind");
      this.logger.error("Bind failed", err, { user });
      const reason = err instanceof Error ? err.message : String(err);
      throw new BindError(`Bind failed: ${reason}`, "rejected", undefined, { cause: err });
    }

    if (response.resultCode !== LDAPResultCode.Success) {
      connection.markUnbound();
      this.metrics?.recordBind(false);
      this.metrics?.recordError("bind");
      this.logger.warn("Bind rejected", { user, resultCode: resultCodeName(response.resultCode) });
      throw new BindError(
        response.diagnosticMessage || `Bind rejected: ${resultCodeName(response.resultCode)}`,
        "rejected",
        response.resultCode,
      );
    }

    connection.markBound(user);
    this.metrics?.recordBind(true);
    this.logger.info("Bound", { user, rebind });
  }
}

export default CredentialStore;
