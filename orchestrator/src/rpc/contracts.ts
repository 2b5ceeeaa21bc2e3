import { SurfaceRect } from "../runtime/coordinates";
import { ClickButton, HotKeyOrder, Point, Range, TextMode } from "../types/script";

export interface ActionOutcome {
  ok: boolean;
  error?: string;
}

/** Physical parameters: coordinates are already mapped onto the surface. */
export interface ClickParams {
  x: number;
  y: number;
  button: ClickButton;
  delayMs: number;
  wheelDelta?: number;
}

export interface KeyParams {
  key: string;
  repeat: number;
  delayBetweenMs: number;
}

export interface TextParams {
  content: string;
  mode: TextMode;
  speedCps: Range;
  focus?: Point;
}

export interface HotkeyParams {
  keys: string[];
  order: HotKeyOrder;
}

/** Transport boundary between the engine and a physical target. */
export interface DeviceCollaborator {
  listTargets(): Promise<string[]>;
  getSurface(targetId: string): Promise<SurfaceRect>;
  sendClick(targetId: string, params: ClickParams): Promise<ActionOutcome>;
  sendKey(targetId: string, params: KeyParams): Promise<ActionOutcome>;
  sendText(targetId: string, params: TextParams): Promise<ActionOutcome>;
  sendHotkey(targetId: string, params: HotkeyParams): Promise<ActionOutcome>;
}
