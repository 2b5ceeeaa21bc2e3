import { CaptureProvider } from "../src/runtime/captureCache";
import { SurfaceRect } from "../src/runtime/coordinates";
import { RgbaImage } from "../src/runtime/pixels";
import { Clock } from "../src/runtime/worker";
import {
  ActionOutcome,
  ClickParams,
  DeviceCollaborator,
  HotkeyParams,
  KeyParams,
  TextParams,
} from "../src/rpc/contracts";

/** In-memory device that records every action it receives. */
export class FakeDevice implements DeviceCollaborator {
  actions: string[] = [];
  clicks: ClickParams[] = [];
  texts: TextParams[] = [];
  refusedKeys = new Set<string>();
  throwOnKey?: string;
  /** Real milliseconds each sendText takes. */
  textDelayMs = 0;
  onKey?: (targetId: string, key: string) => void;

  constructor(
    private readonly surface: SurfaceRect = { x: 0, y: 0, width: 100, height: 100 },
    private readonly targets: string[] = ["emulator-5554"],
  ) {}

  get keys(): string[] {
    return this.actions
      .filter((action) => action.includes(" key "))
      .map((action) => action.slice(action.lastIndexOf(" ") + 1));
  }

  async listTargets(): Promise<string[]> {
    return [...this.targets];
  }

  async getSurface(): Promise<SurfaceRect> {
    return { ...this.surface };
  }

  async sendClick(targetId: string, params: ClickParams): Promise<ActionOutcome> {
    this.actions.push(`${targetId} click ${params.x},${params.y}`);
    this.clicks.push(params);
    return { ok: true };
  }

  async sendKey(targetId: string, params: KeyParams): Promise<ActionOutcome> {
    this.actions.push(`${targetId} key ${params.key}`);
    this.onKey?.(targetId, params.key);
    if (this.throwOnKey === params.key) {
      throw new Error("boom");
    }
    if (this.refusedKeys.has(params.key)) {
      return { ok: false, error: `device refused ${params.key}` };
    }
    return { ok: true };
  }

  async sendText(targetId: string, params: TextParams): Promise<ActionOutcome> {
    this.actions.push(`${targetId} text ${params.content}`);
    this.texts.push(params);
    if (this.textDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.textDelayMs));
      this.actions.push(`${targetId} text done`);
    }
    return { ok: true };
  }

  async sendHotkey(targetId: string, params: HotkeyParams): Promise<ActionOutcome> {
    this.actions.push(`${targetId} hotkey ${params.keys.join("+")}`);
    return { ok: true };
  }
}

/** Sleeping advances time instantly. */
export class FakeClock implements Clock {
  current = 0;

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.current += ms;
  }
}

export function solidImage(width: number, height: number, rgb: [number, number, number]): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let offset = 0; offset < data.length; offset += 4) {
    data[offset] = rgb[0];
    data[offset + 1] = rgb[1];
    data[offset + 2] = rgb[2];
    data[offset + 3] = 255;
  }
  return { width, height, data };
}

export function paintPixel(image: RgbaImage, x: number, y: number, rgb: [number, number, number]): void {
  const offset = (y * image.width + x) * 4;
  image.data[offset] = rgb[0];
  image.data[offset + 1] = rgb[1];
  image.data[offset + 2] = rgb[2];
}

/** Serves the frames in order, repeating the last one. */
export class FrameProvider implements CaptureProvider {
  readonly name = "frames";
  calls = 0;
  onCapture?: (call: number) => void;
  private readonly frames: RgbaImage[];

  constructor(...frames: RgbaImage[]) {
    this.frames = frames;
  }

  async capture(): Promise<RgbaImage> {
    const frame = this.frames[Math.min(this.calls, this.frames.length - 1)];
    this.calls += 1;
    this.onCapture?.(this.calls);
    return frame;
  }
}

export async function flushImmediates(rounds = 10): Promise<void> {
  for (let round = 0; round < rounds; round += 1) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}
