import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { parseArgs, requireArg } from "../src/cli/args";
import { checkScript, runScript } from "../src/cli/commands";
import { defaultConfig, loadConfig, parseConfig } from "../src/config/defaults";
import { Logger } from "../src/logging/logger";
import { ConfigurationError } from "../src/runtime/errors";
import { FakeDevice, FrameProvider, solidImage } from "./fakes";

function writeJson(dir: string, name: string, value: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(value));
  return filePath;
}

const twoKeys = {
  sequence: [
    { type: "KeyPress", id: "a", name: "home", key: "HOME" },
    { type: "KeyPress", id: "b", name: "enter", key: "ENTER" },
  ],
};

describe("cli args", () => {
  it("parses script, targets, out and config flags", () => {
    const args = parseArgs([
      "--script",
      "flow.script.json",
      "--targets",
      "emulator-5554, emulator-5556,",
      "--out",
      "runs",
      "--config",
      "tapflow.json",
      "--verbose",
    ]);
    expect(args).toEqual({
      script: "flow.script.json",
      targets: ["emulator-5554", "emulator-5556"],
      out: "runs",
      config: "tapflow.json",
      verbose: true,
    });
  });

  it("requires the script flag", () => {
    expect(() => requireArg(parseArgs(["--script"]).script, "script")).toThrow(
      "Missing required argument: --script",
    );
  });
});

describe("config", () => {
  it("merges file overrides over the defaults", () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-config-"));
    const configPath = writeJson(tempDir, "tapflow.json", {
      adb: { executable: "/opt/platform-tools/adb" },
      runtime: { pollIntervalMs: 50 },
      targets: [{ id: "emulator-5554", resolution: { width: 1080, height: 1920 } }],
    });

    const config = loadConfig(configPath);

    expect(config.adb).toEqual({ executable: "/opt/platform-tools/adb", commandTimeoutMs: 10_000 });
    expect(config.runtime).toEqual({ pollIntervalMs: 50, actionTimeoutMs: 10_000, defaultMaxIterations: 10_000 });
    expect(config.targets).toEqual([{ id: "emulator-5554", resolution: { width: 1080, height: 1920 } }]);
    expect(config.capture).toEqual(defaultConfig.capture);
  });

  it("returns the defaults without a config path", () => {
    expect(loadConfig()).toEqual(defaultConfig);
  });

  it("rejects invalid values and unknown sections", () => {
    try {
      parseConfig({ runtime: { pollIntervalMs: 0 }, extra: true });
      throw new Error("expected a ConfigurationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          "runtime.pollIntervalMs: Number must be greater than 0",
          "(root): Unrecognized key(s) in object: 'extra'",
        ]);
      }
    }
  });

  it("reports unreadable config files", () => {
    expect(() => loadConfig(path.join(os.tmpdir(), "tapflow-missing", "none.json"))).toThrow(ConfigurationError);
  });
});

describe("runScript", () => {
  it("runs every target and writes report.json and events.jsonl", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-run-"));
    const scriptPath = writeJson(tempDir, "keys.script.json", twoKeys);
    const device = new FakeDevice();

    const result = await runScript({
      scriptPath,
      outDir: path.join(tempDir, "runs"),
      targets: ["emulator-5554"],
      config: parseConfig({ targets: [{ id: "emulator-5554", resolution: { width: 100, height: 100 } }] }),
      logger: Logger.create({ level: "debug", sinks: [] }),
      stack: { device, probes: [], providers: [new FrameProvider(solidImage(10, 10, [0, 0, 0]))] },
    });

    expect(result.ok).toBe(true);
    expect(result.artifacts.runId).toBe("keys.script");
    expect(device.keys).toEqual(["HOME", "ENTER"]);

    const report = JSON.parse(fs.readFileSync(result.artifacts.reportPath, "utf-8"));
    expect(report.script).toBe(path.resolve(scriptPath));
    expect(report.workers).toEqual([
      {
        targetId: "emulator-5554",
        status: "Completed",
        iterations: 2,
        elapsedMs: result.reports[0].elapsedMs,
        lastCommand: { id: "b", name: "enter" },
      },
    ]);

    const entries: Array<{ type: string; event?: { type: string }; record?: { message: string } }> = fs
      .readFileSync(result.artifacts.eventsPath, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(entries.filter((entry) => entry.type === "worker").map((entry) => entry.event?.type)).toEqual([
      "status",
      "command",
      "command",
      "status",
      "report",
    ]);
    expect(entries.some((entry) => entry.type === "log" && entry.record?.message === "Starting")).toBe(true);
  });

  it("discovers targets from the device when none are given", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-run-"));
    const device = new FakeDevice({ x: 0, y: 0, width: 100, height: 100 }, ["emulator-5554", "emulator-5556"]);

    const result = await runScript({
      scriptPath: writeJson(tempDir, "keys.script.json", twoKeys),
      outDir: tempDir,
      config: defaultConfig,
      logger: Logger.silent(),
      stack: { device, probes: [], providers: [new FrameProvider(solidImage(10, 10, [0, 0, 0]))] },
    });

    expect(result.reports.map((report) => report.targetId)).toEqual(["emulator-5554", "emulator-5556"]);
  });

  it("refuses to run without targets", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-run-"));

    await expect(
      runScript({
        scriptPath: writeJson(tempDir, "keys.script.json", twoKeys),
        outDir: tempDir,
        config: defaultConfig,
        logger: Logger.silent(),
        stack: { device: new FakeDevice(undefined, []), probes: [], providers: [new FrameProvider(solidImage(1, 1, [0, 0, 0]))] },
      }),
    ).rejects.toThrow("No targets to run against");
  });
});

describe("checkScript", () => {
  it("summarises labels, outputs and the error handler", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-check-"));
    const scriptPath = writeJson(tempDir, "flow.script.json", {
      sequence: [
        { type: "Click", id: "c1", name: "tap", x: 10, y: 20, variables_out: ["x"] },
        { type: "Goto", id: "g1", name: "again", target_label: "tap" },
      ],
      on_error_handler: { type: "KeyPress", id: "h1", name: "recover", key: "HOME" },
    });

    expect(await checkScript(scriptPath)).toEqual({
      ok: true,
      lines: [
        "flow.script.json: 2 top-level commands, 2 total, maxIterations 10000",
        "  tap (Click) -> x",
        "  again (Goto)",
        "  on error: recover (KeyPress)",
      ],
    });
  });

  it("lists validation issues", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-check-"));
    const scriptPath = writeJson(tempDir, "broken.script.json", {
      sequence: [{ type: "Goto", id: "g1", name: "jump", target_label: "missing" }],
    });

    expect(await checkScript(scriptPath)).toEqual({
      ok: false,
      lines: ["Invalid script", '  - label "missing" in "jump" does not resolve'],
    });
  });
});
