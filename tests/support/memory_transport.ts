// In-memory transport
// Hands every request to a StubDirectory, passing both directions through the BER codec

import { LDAPCodec, LDAPMessage } from "../../src/protocol/ldap.ts";
import { ConnectError } from "../../src/models/errors.ts";
import { LDAPTransport, ServerAddress, TransportFactory } from "../../src/services/transport.ts";
import { StubDirectory } from "./stub_directory.ts";

export class MemoryTransport implements LDAPTransport {
  readonly written: LDAPMessage[] = [];
  /** Requests exactly as the client handed them over, before encoding. */
  readonly sent: LDAPMessage[] = [];
  private inbox: LDAPMessage[] = [];
  private open = true;

  constructor(private readonly directory: StubDirectory, readonly address: ServerAddress) {}

  get isOpen(): boolean {
    return this.open;
  }

  write(message: LDAPMessage): Promise<void> {
    if (!this.open) {
      return Promise.reject(new ConnectError("Transport is closed"));
    }
    this.sent.push(message);
    const request = LDAPCodec.decode(LDAPCodec.encode(message));
    this.written.push(request);
    for (const response of this.directory.handle(request)) {
      this.inbox.push(LDAPCodec.decode(LDAPCodec.encode(response)));
    }
    return Promise.resolve();
  }

  read(): Promise<LDAPMessage> {
    const next = this.inbox.shift();
    if (!next) {
      return Promise.reject(new ConnectError("Connection closed by server"));
    }
    return Promise.resolve(next);
  }

  close(): Promise<void> {
    this.open = false;
    return Promise.resolve();
  }
}

/**
 * Factory that connects to `directory`, keeping every transport it opens.
 */
export function memoryTransports(directory: StubDirectory): {
  factory: TransportFactory;
  opened: MemoryTransport[];
} {
  const opened: MemoryTransport[] = [];
  const factory: TransportFactory = (address) => {
    const transport = new MemoryTransport(directory, address);
    opened.push(transport);
    return Promise.resolve(transport);
  };
  return { factory, opened };
}
