import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import {
  decodeScript,
  encodeScript,
  loadScriptFile,
  parseScript,
  saveScriptFile,
} from "../src/script/codec";
import { ConfigurationError } from "../src/runtime/errors";

const legacyDocument = {
  sequence: [
    { type: "Click", id: "c1", name: "tap", x: 10, y: 20 },
    {
      type: "Repeat",
      id: "r1",
      name: "loop",
      count: 2,
      inner_commands: [{ type: "KeyPress", id: "k1", name: "press", key: "ENTER" }],
    },
    {
      type: "Wait",
      id: "w1",
      name: "wait-red",
      wait_type: "PixelColor",
      timeout_sec: 2,
      pixel_x: 5,
      pixel_y: 6,
      pixel_color: [255, 0, 0],
      on_fail: "GotoLabel",
      on_fail_label: "tap",
    },
  ],
};

describe("script codec", () => {
  it("decodes legacy documents with defaults", () => {
    const definition = decodeScript(legacyDocument);

    expect(definition.maxIterations).toBe(10_000);
    expect(definition.sequence[0]).toEqual({
      id: "c1",
      name: "tap",
      enabled: true,
      onFail: { action: "Skip" },
      variablesOut: [],
      kind: "Click",
      button: "Left",
      x: 10,
      y: 20,
      humanizeDelayMs: { min: 50, max: 200 },
    });
    expect(definition.sequence[2]).toMatchObject({
      kind: "Wait",
      mode: "PixelColor",
      onFail: { action: "GotoLabel", label: "tap" },
      pixel: { x: 5, y: 6, color: { r: 255, g: 0, b: 0 }, tolerance: 0 },
    });
  });

  it("assigns parent ids to nested commands", () => {
    const definition = decodeScript(legacyDocument);
    const repeat = definition.sequence[1];
    expect(repeat.kind).toBe("Repeat");
    if (repeat.kind === "Repeat") {
      expect(repeat.innerCommands[0].parentId).toBe("r1");
    }
  });

  it("reproduces an encoded document exactly", () => {
    const script = parseScript(legacyDocument);
    script.setEnabled("k1", false);
    const encoded = encodeScript(script);

    const reencoded = encodeScript(decodeScript(JSON.parse(JSON.stringify(encoded))));

    expect(JSON.stringify(reencoded)).toBe(JSON.stringify(encoded));
    expect(encoded.version).toBe(1);
    expect(encoded.sequence[0]).toEqual({
      type: "Click",
      id: "c1",
      parent_id: null,
      name: "tap",
      enabled: true,
      on_fail: "Skip",
      on_fail_label: null,
      variables_out: [],
      button_type: "Left",
      x: 10,
      y: 20,
      humanize_delay_min_ms: 50,
      humanize_delay_max_ms: 200,
      wheel_delta: null,
    });
  });

  it("rejects unknown format versions", () => {
    expect(() => decodeScript({ ...legacyDocument, version: 2 })).toThrow(
      "Unsupported script format version 2 (expected 1)",
    );
  });

  it("reports schema problems as configuration issues", () => {
    try {
      decodeScript({ sequence: [{ type: "Click", id: "c1", name: "tap", x: "10" }] });
      throw new Error("expected a ConfigurationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual(["sequence.0.x: Expected number, received string"]);
      }
    }
  });

  it("saves and loads script files", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-codec-"));
    const filePath = path.join(tempDir, "demo.script.json");

    await saveScriptFile(filePath, decodeScript(legacyDocument));
    const loaded = await loadScriptFile(filePath);

    expect(loaded.labelMap.get("wait-red")).toBe("w1");
    expect(fs.readFileSync(filePath, "utf-8").endsWith("}\n")).toBe(true);
  });

  it("rejects files that are not JSON", async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tapflow-codec-"));
    const filePath = path.join(tempDir, "broken.script.json");
    fs.writeFileSync(filePath, "{ not json");

    await expect(loadScriptFile(filePath)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
