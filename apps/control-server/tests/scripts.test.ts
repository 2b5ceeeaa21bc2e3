import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { findScriptFiles, loadScripts, resolveScriptPath } from "../src/scripts";

function setupFixture(structure: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "control-server-"));
  for (const [relativePath, content] of Object.entries(structure)) {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, "utf-8");
  }
  return root;
}

const keys = JSON.stringify({
  sequence: [{ type: "KeyPress", id: "a", name: "home", key: "HOME" }],
});

describe("script discovery", () => {
  it("finds *.script.json files recursively", async () => {
    const root = setupFixture({
      "scripts/login.script.json": keys,
      "scripts/daily/collect.script.json": keys,
      "scripts/daily/notes.json": "{}",
    });

    const files = await findScriptFiles(path.join(root, "scripts"));
    expect(files.map((file) => path.relative(root, file).split(path.sep).join("/"))).toEqual([
      "scripts/daily/collect.script.json",
      "scripts/login.script.json",
    ]);
  });

  it("returns nothing for a missing directory", async () => {
    expect(await findScriptFiles(path.join(os.tmpdir(), "tapflow-no-such-dir"))).toEqual([]);
  });

  it("summarises valid scripts and reports invalid ones", async () => {
    const root = setupFixture({
      "login.script.json": keys,
      "broken.script.json": JSON.stringify({
        sequence: [{ type: "Goto", id: "g", name: "jump", target_label: "missing" }],
      }),
    });

    expect(await loadScripts(root, 500)).toEqual([
      { path: "broken.script.json", valid: false, issues: ['label "missing" in "jump" does not resolve'] },
      {
        path: "login.script.json",
        valid: true,
        topLevelCommands: 1,
        totalCommands: 1,
        labels: ["home"],
        maxIterations: 500,
      },
    ]);
  });

  it("keeps script paths inside the scripts directory", () => {
    const root = path.join(os.tmpdir(), "tapflow-scripts");
    expect(resolveScriptPath(root, "daily/collect.script.json")).toBe(path.join(root, "daily", "collect.script.json"));
    expect(() => resolveScriptPath(root, "../escape.script.json")).toThrow(
      "Script path must stay inside the scripts directory",
    );
    expect(() => resolveScriptPath(root, "/etc/passwd")).toThrow("Script path must stay inside the scripts directory");
  });
});
