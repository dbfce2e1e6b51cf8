// Reader Errors
// One class per failure kind; operations reject with these and never retry

import { LDAPResultCode } from "../protocol/ldap.ts";

export class LDAPReaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** URI, initialize, protocol version or missing-connection problems. Fatal to the session. */
export class ConnectError extends LDAPReaderError {}

export type BindFailureReason = "already_bound" | "no_credentials" | "rejected";

export class BindError extends LDAPReaderError {
  constructor(
    message: string,
    readonly reason: BindFailureReason,
    readonly resultCode?: LDAPResultCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Protocol or server-side search failure; the query's state is discarded. */
export class SearchError extends LDAPReaderError {
  constructor(message: string, readonly resultCode?: LDAPResultCode, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TooManyAttributesError extends LDAPReaderError {
  constructor(readonly requested: number, readonly maximum: number) {
    super(`Too many attributes requested: ${requested} (maximum ${maximum})`);
  }
}

export class NoCurrentEntryError extends LDAPReaderError {}
