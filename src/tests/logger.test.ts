import {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  formatLogLine,
  memoryLogger,
  parseLogLevel,
  type LogEntry,
} from "../logger.js";

describe("logger", () => {
  test("memoryLogger keeps entries at or above its level", () => {
    const { logger, entries } = memoryLogger("info");
    logger.debug("quiet");
    logger.info("hello", { n: 1 });
    logger.error("boom", {});
    expect(entries.map((e) => [e.level, e.message, e.meta])).toEqual([
      ["info", "hello", { n: 1 }],
      ["error", "boom", undefined],
    ]);
  });

  test("the sink sees timestamped entries", () => {
    const seen: LogEntry[] = [];
    const before = Date.now();
    new StructuredLogger((e) => seen.push(e), "warn").warn("slow", { files: 3 });
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ level: "warn", message: "slow", meta: { files: 3 } });
    expect(seen[0].ts).toBeGreaterThanOrEqual(before);
  });

  test("log lines put the fields after the message", () => {
    expect(
      formatLogLine({
        ts: 0,
        level: "warn",
        message: "skipping catalog",
        meta: { catalog: "/t/.dir.db", error: "not a database", files: 2, ok: false },
      }),
    ).toBe(
      'dirplan warn: skipping catalog catalog=/t/.dir.db error="not a database" files=2 ok=false',
    );
    expect(formatLogLine({ ts: 0, level: "info", message: "done" })).toBe(
      "dirplan info: done",
    );
    expect(
      formatLogLine({ ts: 0, level: "debug", message: "m", meta: { list: ["a", 1] } }),
    ).toBe("dirplan debug: m list=[ 'a', 1 ]");
  });

  test("ConsoleLogger writes to stderr unless echo is disabled", () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => {});
    const saved = process.env.DIRPLAN_DISABLE_LOG_ECHO;
    try {
      delete process.env.DIRPLAN_DISABLE_LOG_ECHO;
      const logger = new ConsoleLogger("warn");
      logger.info("hidden");
      logger.warn("shown", { root: "/t" });
      process.env.DIRPLAN_DISABLE_LOG_ECHO = "1";
      logger.error("muted");
      expect(spy.mock.calls).toEqual([["dirplan warn: shown root=/t"]]);
    } finally {
      if (saved === undefined) delete process.env.DIRPLAN_DISABLE_LOG_ECHO;
      else process.env.DIRPLAN_DISABLE_LOG_ECHO = saved;
      spy.mockRestore();
    }
  });

  test("NullLogger drops everything", () => {
    expect(() => new NullLogger().error("ignored", { a: 1 })).not.toThrow();
  });

  test("parseLogLevel", () => {
    expect(parseLogLevel("WARN")).toBe("warn");
    expect(parseLogLevel(" debug ")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined, "error")).toBe("error");
  });
});
