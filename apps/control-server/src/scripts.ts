import fs from "fs/promises";
import path from "path";
import { ConfigurationError, loadScriptFile } from "@tapflow/orchestrator";
import { ScriptSummary } from "./types";

const SCRIPT_SUFFIX = ".script.json";

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const paths: string[] = [];

  for (const entry of entries) {
    const resolved = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      paths.push(...(await walk(resolved)));
      continue;
    }
    if (entry.isFile() && entry.name.endsWith(SCRIPT_SUFFIX)) {
      paths.push(resolved);
    }
  }

  return paths;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function findScriptFiles(rootDir: string): Promise<string[]> {
  try {
    const files = await walk(rootDir);
    return files.sort();
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
}

/** Resolves a client-supplied path, refusing anything outside the scripts directory. */
export function resolveScriptPath(scriptsDir: string, scriptPath: string): string {
  const root = path.resolve(scriptsDir);
  const resolved = path.resolve(root, scriptPath);
  const relative = path.relative(root, resolved);
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new ConfigurationError("Script path must stay inside the scripts directory", [scriptPath]);
  }
  return resolved;
}

export async function loadScripts(scriptsDir: string, defaultMaxIterations?: number): Promise<ScriptSummary[]> {
  const scriptPaths = await findScriptFiles(scriptsDir);
  const scripts: ScriptSummary[] = [];

  for (const scriptPath of scriptPaths) {
    const relativePath = path.relative(scriptsDir, scriptPath).split(path.sep).join("/");
    try {
      const script = await loadScriptFile(scriptPath, { defaultMaxIterations });
      scripts.push({
        path: relativePath,
        valid: true,
        topLevelCommands: script.sequence.length,
        totalCommands: script.commands().length,
        labels: [...script.labelMap.keys()],
        maxIterations: script.maxIterations,
      });
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      scripts.push({
        path: relativePath,
        valid: false,
        issues: error.issues.length > 0 ? error.issues : [error.message],
      });
    }
  }

  return scripts;
}
