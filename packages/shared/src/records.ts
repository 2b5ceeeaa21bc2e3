export const SCRIPT_FORMAT_VERSION = 1;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type RgbRecord = [number, number, number];

export type CommandType =
  | "Click"
  | "CropImage"
  | "KeyPress"
  | "HotKey"
  | "Text"
  | "Wait"
  | "Repeat"
  | "Goto"
  | "Condition";

export interface CommandRecordBase {
  id: string;
  parent_id?: string | null;
  name: string;
  enabled?: boolean;
  on_fail?: "Skip" | "Stop" | "GotoLabel";
  on_fail_label?: string | null;
  variables_out?: string[];
}

export interface ClickRecord extends CommandRecordBase {
  type: "Click";
  button_type?: "Left" | "Right" | "Double" | "WheelUp" | "WheelDown";
  x?: number;
  y?: number;
  humanize_delay_min_ms?: number;
  humanize_delay_max_ms?: number;
  wheel_delta?: number | null;
}

export interface CropImageRecord extends CommandRecordBase {
  type: "CropImage";
  x1?: number;
  y1?: number;
  x2?: number;
  y2?: number;
  target_color?: RgbRecord;
  tolerance?: number;
  scan_mode?: "Exact" | "MaxMatch" | "Grid";
  output_var?: string;
}

export interface KeyPressRecord extends CommandRecordBase {
  type: "KeyPress";
  key?: string;
  repeat?: number;
  delay_between_ms?: number;
}

export interface HotKeyRecord extends CommandRecordBase {
  type: "HotKey";
  keys?: string[];
  hotkey_order?: "Simultaneous" | "Sequence";
}

export interface TextRecord extends CommandRecordBase {
  type: "Text";
  content?: string;
  text_mode?: "Paste" | "Humanize";
  speed_min_cps?: number;
  speed_max_cps?: number;
  focus_x?: number | null;
  focus_y?: number | null;
}

export interface WaitRecord extends CommandRecordBase {
  type: "Wait";
  wait_type?: "Timeout" | "PixelColor" | "ScreenChange";
  timeout_sec?: number;
  pixel_x?: number | null;
  pixel_y?: number | null;
  pixel_color?: RgbRecord | null;
  pixel_tolerance?: number | null;
  screen_threshold?: number;
  region_x1?: number | null;
  region_y1?: number | null;
  region_x2?: number | null;
  region_y2?: number | null;
}

export interface RepeatRecord extends CommandRecordBase {
  type: "Repeat";
  count?: number;
  until_condition_expr?: string | null;
  inner_commands?: CommandRecord[];
}

export interface GotoRecord extends CommandRecordBase {
  type: "Goto";
  target_label?: string;
  condition_expr?: string | null;
}

export interface ConditionRecord extends CommandRecordBase {
  type: "Condition";
  expr?: string;
  then_label?: string | null;
  else_label?: string | null;
  nested_then?: CommandRecord[];
  nested_else?: CommandRecord[];
}

export type CommandRecord =
  | ClickRecord
  | CropImageRecord
  | KeyPressRecord
  | HotKeyRecord
  | TextRecord
  | WaitRecord
  | RepeatRecord
  | GotoRecord
  | ConditionRecord;

export interface ScriptDocument {
  version?: number;
  sequence: CommandRecord[];
  variables_global?: { [key: string]: JsonValue };
  max_iterations?: number;
  on_error_handler?: CommandRecord | null;
}
