export type VariableValue =
  | string
  | number
  | boolean
  | null
  | VariableValue[]
  | { [key: string]: VariableValue };

export type Variables = Record<string, VariableValue>;

export type OnFail =
  | { action: "Skip" }
  | { action: "Stop" }
  | { action: "GotoLabel"; label: string };

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Point {
  x: number;
  y: number;
}

/** Rectangle in logical coordinates; `x2` and `y2` are exclusive. */
export interface Region {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Range {
  min: number;
  max: number;
}

export type ClickButton = "Left" | "Right" | "Double" | "WheelUp" | "WheelDown";
export type ScanMode = "Exact" | "MaxMatch" | "Grid";
export type HotKeyOrder = "Simultaneous" | "Sequence";
export type TextMode = "Paste" | "Humanize";
export type WaitMode = "Timeout" | "PixelColor" | "ScreenChange";

export interface CommandBase {
  id: string;
  parentId?: string;
  name: string;
  enabled: boolean;
  onFail: OnFail;
  variablesOut: string[];
}

export interface ClickCommand extends CommandBase {
  kind: "Click";
  button: ClickButton;
  x: number;
  y: number;
  humanizeDelayMs: Range;
  wheelDelta?: number;
}

export interface CropImageCommand extends CommandBase {
  kind: "CropImage";
  region: Region;
  targetColor: Rgb;
  tolerance: number;
  scanMode: ScanMode;
  outputVar: string;
}

export interface KeyPressCommand extends CommandBase {
  kind: "KeyPress";
  key: string;
  repeat: number;
  delayBetweenMs: number;
}

export interface HotKeyCommand extends CommandBase {
  kind: "HotKey";
  keys: string[];
  order: HotKeyOrder;
}

export interface TextCommand extends CommandBase {
  kind: "Text";
  content: string;
  mode: TextMode;
  speedCps: Range;
  focus?: Point;
}

export interface PixelTarget {
  x: number;
  y: number;
  color: Rgb;
  tolerance: number;
}

export interface ScreenChangeTarget {
  region: Region;
  threshold: number;
}

export interface WaitCommand extends CommandBase {
  kind: "Wait";
  mode: WaitMode;
  timeoutSec: number;
  pixel?: PixelTarget;
  screen?: ScreenChangeTarget;
}

export interface RepeatCommand extends CommandBase {
  kind: "Repeat";
  /** 0 repeats until `until` holds or the script's iteration cap is hit. */
  count: number;
  until?: string;
  innerCommands: Command[];
}

export interface GotoCommand extends CommandBase {
  kind: "Goto";
  targetLabel: string;
  condition?: string;
}

export interface ConditionCommand extends CommandBase {
  kind: "Condition";
  expr: string;
  thenLabel?: string;
  elseLabel?: string;
  nestedThen: Command[];
  nestedElse: Command[];
}

export type ActionCommand =
  | ClickCommand
  | CropImageCommand
  | KeyPressCommand
  | HotKeyCommand
  | TextCommand;

export type LogicCommand = WaitCommand | RepeatCommand | GotoCommand | ConditionCommand;

export type Command = ActionCommand | LogicCommand;

export type CommandKind = Command["kind"];

export interface ScriptDefinition {
  sequence: Command[];
  variablesGlobal?: Variables;
  maxIterations?: number;
  onErrorHandler?: Command | null;
}
