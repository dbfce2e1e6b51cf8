import { beforeEach, describe, expect, test } from "vitest";
import { Connection, ConnectionManager } from "../src/services/connection_manager.ts";
import { CredentialStore } from "../src/services/credential_store.ts";
import { LDAPReader } from "../src/services/ldap_reader.ts";
import { PrometheusMetricsService } from "../src/services/metrics.ts";
import { BindError } from "../src/models/errors.ts";
import { LDAPMessageType, LDAPResultCode, utf8 } from "../src/protocol/ldap.ts";
import { memoryTransports, MemoryTransport } from "./support/memory_transport.ts";
import { StubDirectory } from "./support/stub_directory.ts";
import { ADMIN_DN, ADMIN_SECRET, openStubReader, quietLogger, users } from "./support/fixtures.ts";

const READER_DN = "cn=reader,dc=example,dc=org";

describe("CredentialStore", () => {
  let directory: StubDirectory;
  let transports: MemoryTransport[];
  let connection: Connection;
  let metrics: PrometheusMetricsService;
  let store: CredentialStore;

  beforeEach(async () => {
    directory = new StubDirectory({
      entries: users(1),
      accounts: { [ADMIN_DN]: ADMIN_SECRET, [READER_DN]: "reader-secret" },
    });
    const memory = memoryTransports(directory);
    transports = memory.opened;
    metrics = new PrometheusMetricsService();
    const connections = new ConnectionManager({ transportFactory: memory.factory, logger: quietLogger(), metrics });
    connection = await connections.initialize("ldap://dc1.example.org");
    store = new CredentialStore(quietLogger(), metrics);
  });

  test("bind without credentials fails before contacting the server", async () => {
    await expect(store.bind(connection)).rejects.toMatchObject({ reason: "no_credentials", message: "No bind credentials set" });
    expect(directory.binds).toEqual([]);
  });

  function sentPassword(): Uint8Array {
    const op = transports[0].sent[0].protocolOp;
    if (op.type !== LDAPMessageType.BindRequest) throw new Error("first request is not a bind");
    const auth = op.authentication;
    if (auth.type !== "simple") throw new Error("bind is not simple");
    return auth.password;
  }

  test("replacing credentials zero-fills the previous secret", async () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    const previous = sentPassword();
    expect(previous).toEqual(utf8(ADMIN_SECRET));

    store.setCredentials(READER_DN, "reader-secret");
    expect(previous).toEqual(new Uint8Array(ADMIN_SECRET.length));
    expect(store.user).toBe(READER_DN);
  });

  test("clear zero-fills the secret and forgets the user", async () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    const previous = sentPassword();

    store.clear();
    expect(previous).toEqual(new Uint8Array(ADMIN_SECRET.length));
    expect(store.hasCredentials()).toBe(false);
    expect(store.user).toBeNull();
  });

  test("binds with the stored credentials", async () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    expect(connection.bound).toBe(true);
    expect(connection.boundIdentity).toBe(ADMIN_DN);

    const request = transports[0].written[0].protocolOp;
    expect(request).toEqual({
      type: LDAPMessageType.BindRequest,
      version: 3,
      name: ADMIN_DN,
      authentication: { type: "simple", password: utf8(ADMIN_SECRET) },
    });
  });

  test("a second bind without rebind is refused", async () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    await expect(store.bind(connection)).rejects.toMatchObject({
      reason: "already_bound",
      message: `Already bound as ${ADMIN_DN}`,
    });
    expect(directory.binds).toHaveLength(1);
  });

  test("rebind replaces the bound identity", async () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    store.setCredentials(READER_DN, "reader-secret");
    await store.bind(connection, true);
    expect(connection.boundIdentity).toBe(READER_DN);
    expect(directory.binds).toEqual([ADMIN_DN, READER_DN]);
  });

  test("a rejected bind carries the server's message and result code", async () => {
    store.setCredentials(ADMIN_DN, "wrong-secret");
    let caught: unknown;
    try {
      await store.bind(connection);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BindError);
    expect(caught).toMatchObject({
      reason: "rejected",
      resultCode: LDAPResultCode.InvalidCredentials,
      message: "Invalid credentials",
    });
    expect(connection.bound).toBe(false);
  });

  test("a failed rebind leaves the connection unbound", async () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    store.setCredentials(READER_DN, "wrong-secret");
    await expect(store.bind(connection, true)).rejects.toBeInstanceOf(BindError);
    expect(connection.bound).toBe(false);
  });

  test("keeps its own copy of a byte secret", async () => {
    const secret = utf8(ADMIN_SECRET);
    store.setCredentials(ADMIN_DN, secret);
    secret.fill(0);
    await store.bind(connection);
    expect(connection.bound).toBe(true);
  });

  test("clear forgets the credentials", () => {
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    expect(store.hasCredentials()).toBe(true);
    expect(store.user).toBe(ADMIN_DN);
    store.clear();
    expect(store.hasCredentials()).toBe(false);
    expect(store.user).toBeNull();
  });

  test("counts bind attempts and successes", async () => {
    store.setCredentials(ADMIN_DN, "wrong-secret");
    await expect(store.bind(connection)).rejects.toBeInstanceOf(BindError);
    store.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await store.bind(connection);
    const snapshot = metrics.getSnapshot();
    expect(snapshot.bindRequestsTotal).toBe(2);
    expect(snapshot.bindSuccessTotal).toBe(1);
    expect(snapshot.errors).toEqual({ bind: 1 });
  });
});

describe("LDAPReader.bind", () => {
  test("binds during open when credentials are given", async () => {
    const { reader } = await openStubReader({}, { credentials: { user: ADMIN_DN, secret: ADMIN_SECRET } });
    expect(reader.bound).toBe(true);
    expect(reader.boundIdentity).toBe(ADMIN_DN);
  });

  test("open fails and closes when the bind is rejected", async () => {
    const directory = new StubDirectory({ entries: [], accounts: { [ADMIN_DN]: ADMIN_SECRET } });
    const { factory, opened } = memoryTransports(directory);
    await expect(LDAPReader.open("ldap://dc1.example.org", {
      credentials: { user: ADMIN_DN, secret: "wrong-secret" },
      transportFactory: factory,
      logger: quietLogger(),
      env: {},
    })).rejects.toMatchObject({ reason: "rejected" });
    expect(opened[0].isOpen).toBe(false);
    expect(directory.unbinds).toBe(1);
  });

  test("checks for an active bind before replacing credentials", async () => {
    const { reader, directory } = await openStubReader({}, { credentials: { user: ADMIN_DN, secret: ADMIN_SECRET } });
    await expect(reader.bind(READER_DN, "reader-secret")).rejects.toMatchObject({ reason: "already_bound" });
    expect(reader.boundIdentity).toBe(ADMIN_DN);

    // The stored credentials are still the administrator's
    await reader.bind(true);
    expect(directory.binds).toEqual([ADMIN_DN, ADMIN_DN]);
  });

  test("bind() without stored credentials fails", async () => {
    const { reader } = await openStubReader();
    await expect(reader.bind()).rejects.toMatchObject({ reason: "no_credentials" });
  });

  test("setCredentials followed by bind", async () => {
    const { reader } = await openStubReader();
    reader.setCredentials(ADMIN_DN, ADMIN_SECRET);
    await reader.bind();
    expect(reader.boundIdentity).toBe(ADMIN_DN);
  });
});
