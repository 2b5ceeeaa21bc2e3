import { spawn } from "child_process";
import { Readable } from "stream";
import Jimp from "jimp";
import keycodeTable from "./keycodes.json";
import {
  ActionOutcome,
  ClickParams,
  DeviceCollaborator,
  HotkeyParams,
  KeyParams,
  TextParams,
} from "./contracts";
import { CaptureProvider } from "../runtime/captureCache";
import { Size, SurfaceRect } from "../runtime/coordinates";
import { CapabilityError, TimeoutError, errorMessage } from "../runtime/errors";
import { RgbaImage } from "../runtime/pixels";
import { ResolutionProbe } from "../runtime/resolution";
import { Logger } from "../logging/logger";

export interface AdbProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: "close", listener: (code: number | null) => void): this;
  on(event: "error", listener: (error: Error) => void): this;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnAdb = (executable: string, args: string[]) => AdbProcess;

export interface AdbClientOptions {
  executable?: string;
  commandTimeoutMs?: number;
  /** Known surfaces by device id; others are read from `wm size`. */
  surfaces?: Record<string, SurfaceRect>;
  spawn?: SpawnAdb;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export class AdbCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stderr: string) {
    super(`adb ${args.join(" ")} exited with code ${exitCode ?? "unknown"}${stderr ? `: ${stderr}` : ""}`);
    this.name = "AdbCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

const LONG_PRESS_MS = 800;
const DOUBLE_TAP_GAP_MS = 80;
const DEFAULT_SCROLL_DISTANCE = 300;
const SCROLL_DURATION_MS = 300;

const KEYCODES = new Map<string, number>(Object.entries(keycodeTable.keycodes));
const KEY_ALIASES = new Map<string, string>(Object.entries(keycodeTable.aliases));

export function resolveKeycode(key: string): number | null {
  const trimmed = key.trim();
  if (/^[0-9]+$/.test(trimmed) && trimmed.length > 1) {
    return Number(trimmed);
  }
  const name = trimmed.toUpperCase().replace(/^KEYCODE_/, "");
  return KEYCODES.get(KEY_ALIASES.get(name) ?? name) ?? null;
}

/** Escapes text for `input text`, which runs through the device shell. */
export function escapeInputText(text: string): string {
  return text.replace(/[\\'"`$&|;<>()*?!#~[\]{}]/g, (char) => `\\${char}`).replace(/ /g, "%s");
}

export function parseDevices(output: string): string[] {
  return output
    .split(/\r?\n/)
    .slice(1)
    .map((line) => line.trim().split(/\s+/))
    .filter((parts) => parts.length >= 2 && parts[1] === "device")
    .map((parts) => parts[0]);
}

export function parseWmSize(output: string): Size | null {
  const match =
    /Override size:\s*(\d+)\s*x\s*(\d+)/.exec(output) ??
    /Physical size:\s*(\d+)\s*x\s*(\d+)/.exec(output) ??
    /(\d+)x(\d+)/.exec(output);
  return match ? { width: Number(match[1]), height: Number(match[2]) } : null;
}

export function parseDumpsysDisplay(output: string): Size | null {
  const match = /(\d{3,4})\s*x\s*(\d{3,4})/.exec(output);
  return match ? { width: Number(match[1]), height: Number(match[2]) } : null;
}

/**
 * Raw `screencap` output: width, height and pixel format as little-endian
 * u32, an optional colour-space word, then RGBA rows.
 */
export function decodeRawScreencap(buffer: Buffer): RgbaImage {
  if (buffer.length < 12) {
    throw new Error(`Raw screencap too short (${buffer.length} bytes)`);
  }
  const width = buffer.readUInt32LE(0);
  const height = buffer.readUInt32LE(4);
  const format = buffer.readUInt32LE(8);
  const pixelBytes = width * height * 4;
  const header = buffer.length - pixelBytes;
  if (format !== 1 && format !== 2) {
    throw new Error(`Unsupported raw screencap pixel format ${format}`);
  }
  if (header !== 12 && header !== 16) {
    throw new Error(`Raw screencap size mismatch for ${width}x${height} (${buffer.length} bytes)`);
  }
  return { width, height, data: Uint8Array.from(buffer.subarray(header)) };
}

export async function decodePngScreencap(buffer: Buffer): Promise<RgbaImage> {
  const image = await Jimp.read(buffer);
  const { width, height, data } = image.bitmap;
  return { width, height, data: Uint8Array.from(data) };
}

function defaultSpawn(executable: string, args: string[]): AdbProcess {
  return spawn(executable, args, { stdio: "pipe" });
}

function toBuffer(chunk: unknown): Buffer {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
}

/** Device collaborator backed by the `adb` executable, one child process per call. */
export class AdbClient implements DeviceCollaborator {
  private readonly executable: string;
  private readonly commandTimeoutMs: number;
  private readonly surfaces: Record<string, SurfaceRect>;
  private readonly spawnAdb: SpawnAdb;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options: AdbClientOptions = {}) {
    this.executable = options.executable ?? "adb";
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10_000;
    this.surfaces = options.surfaces ?? {};
    this.spawnAdb = options.spawn ?? defaultSpawn;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? Logger.silent()).child("adb");
  }

  run(args: string[], timeoutMs = this.commandTimeoutMs): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const child = this.spawnAdb(this.executable, args);
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const settle = (finish: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        finish();
      };

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        settle(() =>
          reject(new TimeoutError(`adb ${args.join(" ")} timed out after ${timeoutMs}ms`, timeoutMs)),
        );
      }, timeoutMs);

      child.stdout.on("data", (chunk: unknown) => stdout.push(toBuffer(chunk)));
      child.stderr.on("data", (chunk: unknown) => stderr.push(toBuffer(chunk)));
      child.on("error", (error) => settle(() => reject(error)));
      child.on("close", (code) =>
        settle(() => {
          if (code === 0) {
            resolve(Buffer.concat(stdout));
          } else {
            reject(new AdbCommandError(args, code, Buffer.concat(stderr).toString("utf-8").trim()));
          }
        }),
      );
    });
  }

  async shell(targetId: string, args: string[], timeoutMs?: number): Promise<string> {
    const output = await this.run(["-s", targetId, "shell", ...args], timeoutMs);
    return output.toString("utf-8");
  }

  async listTargets(): Promise<string[]> {
    const output = await this.run(["devices"]);
    return parseDevices(output.toString("utf-8"));
  }

  async connect(address: string): Promise<boolean> {
    const output = (await this.run(["connect", address])).toString("utf-8");
    const connected = /connected to/i.test(output);
    this.logger.info(connected ? "Connected" : "Connect failed", { address, output: output.trim() });
    return connected;
  }

  async getSurface(targetId: string): Promise<SurfaceRect> {
    const configured = this.surfaces[targetId];
    if (configured) {
      return { ...configured };
    }
    const size = parseWmSize(await this.shell(targetId, ["wm", "size"]));
    if (!size) {
      throw new CapabilityError(`Cannot determine the display size of ${targetId}`);
    }
    return { x: 0, y: 0, width: size.width, height: size.height };
  }

  sendClick(targetId: string, params: ClickParams): Promise<ActionOutcome> {
    return this.outcome(async () => {
      if (params.delayMs > 0) {
        await this.sleep(params.delayMs);
      }
      const x = String(params.x);
      const y = String(params.y);
      switch (params.button) {
        case "Left":
          await this.shell(targetId, ["input", "tap", x, y]);
          break;
        case "Double":
          await this.shell(targetId, ["input", "tap", x, y]);
          await this.sleep(DOUBLE_TAP_GAP_MS);
          await this.shell(targetId, ["input", "tap", x, y]);
          break;
        case "Right":
          await this.shell(targetId, ["input", "swipe", x, y, x, y, String(LONG_PRESS_MS)]);
          break;
        case "WheelUp":
        case "WheelDown": {
          const distance = params.wheelDelta ?? DEFAULT_SCROLL_DISTANCE;
          const endY = params.button === "WheelUp" ? params.y + distance : Math.max(0, params.y - distance);
          await this.shell(targetId, [
            "input",
            "swipe",
            x,
            y,
            x,
            String(endY),
            String(SCROLL_DURATION_MS),
          ]);
          break;
        }
      }
    });
  }

  sendKey(targetId: string, params: KeyParams): Promise<ActionOutcome> {
    return this.outcome(async () => {
      const keycode = this.requireKeycode(params.key);
      for (let press = 0; press < params.repeat; press += 1) {
        if (press > 0 && params.delayBetweenMs > 0) {
          await this.sleep(params.delayBetweenMs);
        }
        await this.shell(targetId, ["input", "keyevent", String(keycode)]);
      }
    });
  }

  sendHotkey(targetId: string, params: HotkeyParams): Promise<ActionOutcome> {
    return this.outcome(async () => {
      const keycodes = params.keys.map((key) => String(this.requireKeycode(key)));
      if (params.order === "Simultaneous") {
        await this.shell(targetId, ["input", "keycombination", ...keycodes]);
        return;
      }
      for (const keycode of keycodes) {
        await this.shell(targetId, ["input", "keyevent", keycode]);
      }
    });
  }

  sendText(targetId: string, params: TextParams): Promise<ActionOutcome> {
    return this.outcome(async () => {
      if (params.focus) {
        await this.shell(targetId, ["input", "tap", String(params.focus.x), String(params.focus.y)]);
      }
      if (params.mode === "Paste") {
        await this.shell(targetId, ["input", "text", escapeInputText(params.content)]);
        return;
      }
      for (const char of params.content) {
        await this.shell(targetId, ["input", "text", escapeInputText(char)]);
        const cps = params.speedCps.min + this.random() * (params.speedCps.max - params.speedCps.min);
        await this.sleep(Math.round(1000 / cps));
      }
    });
  }

  resolutionProbes(): ResolutionProbe[] {
    return [
      {
        name: "wm size",
        query: async (deviceId) => parseWmSize(await this.shell(deviceId, ["wm", "size"])),
      },
      {
        name: "dumpsys display",
        query: async (deviceId) =>
          parseDumpsysDisplay(await this.shell(deviceId, ["dumpsys", "display"])),
      },
    ];
  }

  captureProviders(): CaptureProvider[] {
    return [
      {
        name: "raw screencap",
        capture: async (targetId) =>
          decodeRawScreencap(await this.run(["-s", targetId, "exec-out", "screencap"])),
      },
      {
        name: "png screencap",
        capture: async (targetId) =>
          decodePngScreencap(await this.run(["-s", targetId, "exec-out", "screencap", "-p"])),
      },
    ];
  }

  private requireKeycode(key: string): number {
    const keycode = resolveKeycode(key);
    if (keycode === null) {
      throw new Error(`Unknown key "${key}"`);
    }
    return keycode;
  }

  private async outcome(action: () => Promise<void>): Promise<ActionOutcome> {
    try {
      await action();
      return { ok: true };
    } catch (error) {
      this.logger.warn("adb action failed", { error: errorMessage(error) });
      return { ok: false, error: errorMessage(error) };
    }
  }
}
