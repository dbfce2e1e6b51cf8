import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger, LogLevel, parseLogLevel, StructuredLogger } from "../src/services/logger.ts";
import { PrometheusMetricsService } from "../src/services/metrics.ts";
import { DEFAULT_READER_CONFIG, loadReaderConfig } from "../src/models/reader_config.ts";
import { ADMIN_DN, ADMIN_SECRET, BASE_DN, openStubReader } from "./support/fixtures.ts";

function logger(level = LogLevel.DEBUG, redactSensitive = true): StructuredLogger {
  return new StructuredLogger({ level, service: "ldap-reader", enableConsole: true, redactSensitive });
}

describe("StructuredLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("redacts sensitive keys at any depth", () => {
    const entry = logger().format(LogLevel.INFO, "bind", {
      user: ADMIN_DN,
      password: ADMIN_SECRET,
      nested: { clientSecret: "test-secret", pageSize: 2 },
    });
    expect(entry.data).toEqual({
      user: ADMIN_DN,
      password: "[REDACTED]",
      nested: { clientSecret: "[REDACTED]", pageSize: 2 },
    });
    expect(entry.level).toBe("INFO");
    expect(entry.service).toBe("ldap-reader");
  });

  test("redaction can be turned off", () => {
    const entry = logger(LogLevel.DEBUG, false).format(LogLevel.DEBUG, "bind", { password: "test-secret" });
    expect(entry.data).toEqual({ password: "test-secret" });
  });

  test("extra sensitive fields can be added", () => {
    const log = logger();
    log.addSensitiveFields("Cookie");
    expect(log.format(LogLevel.INFO, "page", { cookieBytes: 4 }).data).toEqual({ cookieBytes: "[REDACTED]" });
  });

  test("the FATAL threshold silences every level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const quiet = logger(LogLevel.FATAL);
    quiet.warn("Unbind request failed");
    quiet.error("Connection failed", new Error("refused"));

    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  test("child loggers add component and query context", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    logger().child({ component: "search" }).child({ queryId: 3 }).info("Page received", { entries: 2 });

    expect(info).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(info.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: "INFO",
      service: "ldap-reader",
      message: "Page received",
      component: "search",
      queryId: 3,
      data: { entries: 2 },
    });
  });

  test("entries below the level are dropped", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = logger(LogLevel.WARN);
    log.info("hidden");
    log.warn("shown");
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test("errors are logged with their name and message", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    logger().error("Bind failed", new TypeError("boom"));
    const line: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "ERROR", error: { name: "TypeError", message: "boom" } });
  });

  test("createLogger reads the environment", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    createLogger("ldap-reader", { LDAPREADER_LOG_LEVEL: "error" }).debug("hidden");
    expect(debug).not.toHaveBeenCalled();
    createLogger("ldap-reader", { LDAPREADER_LOG_LEVEL: "error", LDAPREADER_VERBOSE: "true" }).debug("shown");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  test("writes JSON lines to LDAPREADER_LOG_FILE", () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const dir = mkdtempSync(join(tmpdir(), "ldap-reader-"));
    const file = join(dir, "reader.log");
    try {
      const log = createLogger("ldap-reader", { LDAPREADER_LOG_FILE: file });
      log.info("first", { secret: "test-secret" });
      log.info("second");
      const lines = readFileSync(file, "utf8").trim().split("\n").map((l): unknown => JSON.parse(l));
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatchObject({ message: "first", data: { secret: "[REDACTED]" } });
      expect(lines[1]).toMatchObject({ message: "second" });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("parseLogLevel", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("WARNING")).toBe(LogLevel.WARN);
    expect(parseLogLevel("fatal")).toBe(LogLevel.FATAL);
    expect(parseLogLevel("chatty")).toBe(LogLevel.INFO);
  });
});

describe("PrometheusMetricsService", () => {
  test("renders counters and gauges", () => {
    const metrics = new PrometheusMetricsService();
    metrics.recordConnection();
    metrics.recordBind(true);
    metrics.recordSearchQuery();
    metrics.recordSearchPage(2, 1);
    metrics.recordSearchPage(1, 0);
    metrics.recordError("search");

    const lines = metrics.formatPrometheus().split("\n");
    expect(lines).toContain("# TYPE ldapreader_search_pages_total counter");
    expect(lines).toContain("ldapreader_connections_current 1");
    expect(lines).toContain("ldapreader_bind_success_total 1");
    expect(lines).toContain("ldapreader_search_pages_total 2");
    expect(lines).toContain("ldapreader_search_entries_total 3");
    expect(lines).toContain("ldapreader_search_references_total 1");
    expect(lines).toContain("ldapreader_search_last_page_entries 1");
    expect(lines).toContain('ldapreader_errors_total{operation="search"} 1');
  });

  test("omits the error family until something fails", () => {
    const output = new PrometheusMetricsService().formatPrometheus();
    expect(output.split("\n")).not.toContain("# TYPE ldapreader_errors_total counter");
  });

  test("disconnections never go below zero", () => {
    const metrics = new PrometheusMetricsService();
    metrics.recordDisconnection();
    expect(metrics.getSnapshot().connectionsCurrent).toBe(0);
  });

  test("the reader reports its activity", async () => {
    const { reader, metrics } = await openStubReader({}, {
      pageSize: 2,
      credentials: { user: ADMIN_DN, secret: ADMIN_SECRET },
    });
    await reader.query("(objectClass=user)", BASE_DN);
    while (await reader.fetch()) {
      // drain
    }
    await reader.close();
    expect(metrics.getSnapshot()).toEqual({
      connectionsTotal: 1,
      connectionsCurrent: 0,
      bindRequestsTotal: 1,
      bindSuccessTotal: 1,
      searchQueriesTotal: 1,
      searchPagesTotal: 2,
      searchEntriesTotal: 3,
      searchReferencesTotal: 0,
      lastPageEntries: 1,
      errors: {},
    });
  });
});

describe("configuration", () => {
  test("defaults", () => {
    expect(loadReaderConfig({})).toEqual(DEFAULT_READER_CONFIG);
    expect(DEFAULT_READER_CONFIG).toEqual({ protocolVersion: 3, pageSize: 1000, pagingCritical: true, maxAttributes: 50 });
  });

  test("environment overrides", () => {
    expect(loadReaderConfig({
      LDAPREADER_PROTOCOL_VERSION: "2",
      LDAPREADER_PAGE_SIZE: "250",
      LDAPREADER_PAGING_CRITICAL: "no",
      LDAPREADER_MAX_ATTRIBUTES: "10",
    })).toEqual({ protocolVersion: 2, pageSize: 250, pagingCritical: false, maxAttributes: 10 });
  });

  test("invalid values name the variable", () => {
    expect(() => loadReaderConfig({ LDAPREADER_PAGE_SIZE: "abc" })).toThrow(
      'Environment variable LDAPREADER_PAGE_SIZE must be a positive integer, got "abc"',
    );
    expect(() => loadReaderConfig({ LDAPREADER_MAX_ATTRIBUTES: "0" })).toThrow("LDAPREADER_MAX_ATTRIBUTES");
    expect(() => loadReaderConfig({ LDAPREADER_PAGING_CRITICAL: "maybe" })).toThrow(
      'Environment variable LDAPREADER_PAGING_CRITICAL must be true or false, got "maybe"',
    );
  });

  test("explicit options win over the environment", async () => {
    const fromEnv = await openStubReader({}, { env: { LDAPREADER_PAGE_SIZE: "2", LDAPREADER_MAX_ATTRIBUTES: "5" } });
    expect(fromEnv.reader.pageSize).toBe(2);
    expect(fromEnv.reader.config.maxAttributes).toBe(5);

    const explicit = await openStubReader({}, { env: { LDAPREADER_PAGE_SIZE: "2" }, pageSize: 7 });
    expect(explicit.reader.pageSize).toBe(7);
  });

  test("an invalid protocol version in the environment is refused", async () => {
    await expect(openStubReader({}, { env: { LDAPREADER_PROTOCOL_VERSION: "4" } })).rejects.toThrow(
      "Unsupported protocol version 4",
    );
  });
});
