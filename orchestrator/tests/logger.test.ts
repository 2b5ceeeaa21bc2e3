import { describe, expect, it } from "vitest";
import { LogRecord, Logger, formatLogLine, isLogLevel } from "../src/logging/logger";

describe("Logger", () => {
  it("shares sinks and level with its children", () => {
    const records: LogRecord[] = [];
    const root = Logger.create({ level: "info", sinks: [(record) => records.push(record)] });
    const worker = root.child("worker:emulator-5554");

    worker.debug("hidden");
    worker.info("Run started", { commands: 2 });
    root.setLevel("debug");
    worker.child("adb").debug("tap");

    expect(records.map((record) => [record.level, record.scope, record.message])).toEqual([
      ["info", "worker:emulator-5554", "Run started"],
      ["debug", "worker:emulator-5554:adb", "tap"],
    ]);
    expect(records[0].fields).toEqual({ commands: 2 });
  });

  it("stops delivering to a removed sink", () => {
    const records: LogRecord[] = [];
    const logger = Logger.silent();
    const remove = logger.addSink((record) => records.push(record));

    logger.warn("first");
    remove();
    logger.warn("second");

    expect(records.map((record) => record.message)).toEqual(["first"]);
  });

  it("formats scope, message and fields on one line", () => {
    expect(
      formatLogLine({ time: "t", level: "info", scope: "run:demo", message: "Starting", fields: { targets: 1 } }),
    ).toBe('[run:demo] Starting {"targets":1}');
    expect(formatLogLine({ time: "t", level: "info", scope: "", message: "bare" })).toBe("bare");
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
