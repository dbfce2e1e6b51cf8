// Loopback stub server
// Serves a StubDirectory over a real TCP socket on 127.0.0.1

import { createServer, Server, Socket } from "node:net";
import { frameLength, LDAPCodec, LDAPMessageType } from "../../src/protocol/ldap.ts";
import { StubDirectory } from "./stub_directory.ts";

export class StubLDAPServer {
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();
  private closedConnections = 0;
  private closeWaiters: Array<{ count: number; resolve: () => void }> = [];

  private constructor(private readonly directory: StubDirectory) {
    this.server = createServer((socket) => this.handleConnection(socket));
  }

  static async start(directory: StubDirectory): Promise<StubLDAPServer> {
    const stub = new StubLDAPServer(directory);
    await new Promise<void>((resolve, reject) => {
      stub.server.once("error", reject);
      stub.server.listen(0, "127.0.0.1", () => resolve());
    });
    return stub;
  }

  get port(): number {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Stub server is not listening on TCP");
    }
    return address.port;
  }

  get uri(): string {
    return `ldap://127.0.0.1:${this.port}`;
  }

  /**
   * Resolves once `count` client connections have closed on the server side,
   * after every request they carried has been handled.
   */
  disconnected(count = 1): Promise<void> {
    if (this.closedConnections >= count) return Promise.resolve();
    return new Promise((resolve) => this.closeWaiters.push({ count, resolve }));
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    socket.on("close", () => {
      this.sockets.delete(socket);
      this.closedConnections++;
      const ready = this.closeWaiters.filter((w) => w.count <= this.closedConnections);
      this.closeWaiters = this.closeWaiters.filter((w) => w.count > this.closedConnections);
      for (const waiter of ready) waiter.resolve();
    });
    socket.on("error", () => socket.destroy());

    let buffer = new Uint8Array(0);
    socket.on("data", (chunk: Buffer) => {
      const merged = new Uint8Array(buffer.length + chunk.length);
      merged.set(buffer, 0);
      merged.set(chunk, buffer.length);
      buffer = merged;

      let length = frameLength(buffer);
      while (length !== null) {
        const request = LDAPCodec.decode(buffer.slice(0, length));
        buffer = buffer.slice(length);

        for (const response of this.directory.handle(request)) {
          socket.write(LDAPCodec.encode(response));
        }
        if (request.protocolOp.type === LDAPMessageType.UnbindRequest) {
          socket.end();
          return;
        }
        length = frameLength(buffer);
      }
    });
  }
}
