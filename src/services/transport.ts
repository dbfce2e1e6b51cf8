// LDAP Transport
// Socket transport that writes encoded LDAPMessages and reads framed, decoded ones

import { connect as netConnect, isIP, Socket } from "node:net";
import { ConnectionOptions, connect as tlsConnect } from "node:tls";
import { frameLength, LDAPCodec, LDAPMessage } from "../protocol/ldap.ts";
import { ConnectError } from "../models/errors.ts";

export type Scheme = "ldap" | "ldaps";

export interface ServerAddress {
  scheme: Scheme;
  host: string;
  port: number;
}

/**
 * Message-level channel to one directory server.
 */
export interface LDAPTransport {
  write(message: LDAPMessage): Promise<void>;
  /** Next message from the server; rejects once the channel has failed or closed. */
  read(): Promise<LDAPMessage>;
  close(): Promise<void>;
  readonly isOpen: boolean;
}

export type TransportFactory = (address: ServerAddress) => Promise<LDAPTransport>;

interface Waiter {
  resolve: (message: LDAPMessage) => void;
  reject: (error: Error) => void;
}

/** SNI carries host names only, so an IP literal is sent without one. */
export function tlsOptions(address: ServerAddress): ConnectionOptions {
  return {
    host: address.host,
    port: address.port,
    ...(isIP(address.host) === 0 ? { servername: address.host } : {}),
  };
}

export class SocketTransport implements LDAPTransport {
  private buffer = new Uint8Array(0);
  private inbox: LDAPMessage[] = [];
  private waiters: Waiter[] = [];
  private failure: Error | null = null;
  private closing = false;

  private constructor(private readonly socket: Socket, private readonly label: string) {
    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("error", (err) => this.fail(new ConnectError(`Connection to ${label} failed: ${err.message}`, { cause: err })));
    socket.on("close", () => this.fail(new ConnectError(`Connection to ${label} closed`)));
  }

  static connect(address: ServerAddress): Promise<SocketTransport> {
    const label = `${address.scheme}://${address.host}:${address.port}`;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(new ConnectError(`Cannot connect to ${label}: ${err.message}`, { cause: err }));

      const socket = address.scheme === "ldaps"
        ? tlsConnect(tlsOptions(address), () => ready())
        : netConnect({ host: address.host, port: address.port }, () => ready());

      const ready = () => {
        socket.off("error", onError);
        resolve(new SocketTransport(socket, label));
      };

      socket.once("error", onError);
    });
  }

  get isOpen(): boolean {
    return !this.closing && this.failure === null;
  }

  write(message: LDAPMessage): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(this.failure ?? new ConnectError(`Connection to ${this.label} is closed`));
    }
    const data = LDAPCodec.encode(message);
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new ConnectError(`Write to ${this.label} failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  read(): Promise<LDAPMessage> {
    const next = this.inbox.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): Promise<void> {
    if (this.closing) return Promise.resolve();
    this.closing = true;
    if (this.socket.destroyed) return Promise.resolve();

    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.end(() => this.socket.destroy());
    });
  }

  private onData(chunk: Uint8Array): void {
    // Append incoming bytes to buffer
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer, 0);
    merged.set(chunk, this.buffer.length);
    this.buffer = merged;

    try {
      let length = frameLength(this.buffer);
      while (length !== null) {
        const message = LDAPCodec.decode(this.buffer.slice(0, length));
        this.buffer = this.buffer.slice(length);
        this.deliver(message);
        length = frameLength(this.buffer);
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.fail(new ConnectError(`Malformed data from ${this.label}: ${reason}`, { cause: err }));
      this.socket.destroy();
    }
  }

  private deliver(message: LDAPMessage): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }
}

export const socketTransportFactory: TransportFactory = (address) => SocketTransport.connect(address);

export default SocketTransport;
