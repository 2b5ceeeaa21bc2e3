import fs from "fs/promises";
import {
  CommandRecord,
  CommandRecordBase,
  RgbRecord,
  SCRIPT_FORMAT_VERSION,
  ScriptDocument,
  ScriptDocumentSchema,
  formatSchemaIssues,
} from "@tapflow/shared";
import { ConfigurationError, errorMessage } from "../runtime/errors";
import {
  ClickCommand,
  Command,
  CommandBase,
  ConditionCommand,
  GotoCommand,
  OnFail,
  Region,
  RepeatCommand,
  Rgb,
  ScriptDefinition,
  TextCommand,
  WaitCommand,
} from "../types/script";
import { DEFAULT_MAX_ITERATIONS, Script } from "./script";

const DEFAULT_SCREEN_THRESHOLD = 0.9;

function toRgb(record: RgbRecord | null | undefined, fallback: Rgb = { r: 0, g: 0, b: 0 }): Rgb {
  return record ? { r: record[0], g: record[1], b: record[2] } : fallback;
}

function fromRgb(color: Rgb): RgbRecord {
  return [color.r, color.g, color.b];
}

function decodeOnFail(record: CommandRecordBase): OnFail {
  switch (record.on_fail) {
    case "Stop":
      return { action: "Stop" };
    case "GotoLabel":
      return { action: "GotoLabel", label: record.on_fail_label ?? "" };
    default:
      return { action: "Skip" };
  }
}

function decodeBase(record: CommandRecordBase, parentId: string | undefined): CommandBase {
  const base: CommandBase = {
    id: record.id,
    name: record.name,
    enabled: record.enabled ?? true,
    onFail: decodeOnFail(record),
    variablesOut: record.variables_out ?? [],
  };
  const declaredParent = record.parent_id ?? parentId;
  if (declaredParent !== undefined) {
    base.parentId = declaredParent;
  }
  return base;
}

function decodeRegion(
  x1: number | null | undefined,
  y1: number | null | undefined,
  x2: number | null | undefined,
  y2: number | null | undefined,
): Region | undefined {
  if (x1 == null || y1 == null || x2 == null || y2 == null) {
    return undefined;
  }
  return { x1, y1, x2, y2 };
}

export function decodeCommand(record: CommandRecord, parentId?: string): Command {
  const base = decodeBase(record, parentId);
  const nested = (records: CommandRecord[] | undefined): Command[] =>
    (records ?? []).map((child) => decodeCommand(child, record.id));

  switch (record.type) {
    case "Click": {
      const command: ClickCommand = {
        ...base,
        kind: "Click",
        button: record.button_type ?? "Left",
        x: record.x ?? 0,
        y: record.y ?? 0,
        humanizeDelayMs: {
          min: record.humanize_delay_min_ms ?? 50,
          max: record.humanize_delay_max_ms ?? 200,
        },
      };
      if (record.wheel_delta != null) {
        command.wheelDelta = record.wheel_delta;
      }
      return command;
    }
    case "CropImage":
      return {
        ...base,
        kind: "CropImage",
        region: { x1: record.x1 ?? 0, y1: record.y1 ?? 0, x2: record.x2 ?? 0, y2: record.y2 ?? 0 },
        targetColor: toRgb(record.target_color),
        tolerance: record.tolerance ?? 10,
        scanMode: record.scan_mode ?? "Exact",
        outputVar: record.output_var ?? "crop_result",
      };
    case "KeyPress":
      return {
        ...base,
        kind: "KeyPress",
        key: record.key ?? "",
        repeat: record.repeat ?? 1,
        delayBetweenMs: record.delay_between_ms ?? 100,
      };
    case "HotKey":
      return {
        ...base,
        kind: "HotKey",
        keys: record.keys ?? [],
        order: record.hotkey_order ?? "Simultaneous",
      };
    case "Text": {
      const command: TextCommand = {
        ...base,
        kind: "Text",
        content: record.content ?? "",
        mode: record.text_mode ?? "Paste",
        speedCps: { min: record.speed_min_cps ?? 10, max: record.speed_max_cps ?? 30 },
      };
      if (record.focus_x != null && record.focus_y != null) {
        command.focus = { x: record.focus_x, y: record.focus_y };
      }
      return command;
    }
    case "Wait": {
      const command: WaitCommand = {
        ...base,
        kind: "Wait",
        mode: record.wait_type ?? "Timeout",
        timeoutSec: record.timeout_sec ?? 30,
      };
      if (record.pixel_x != null && record.pixel_y != null && record.pixel_color != null) {
        command.pixel = {
          x: record.pixel_x,
          y: record.pixel_y,
          color: toRgb(record.pixel_color),
          tolerance: record.pixel_tolerance ?? 0,
        };
      }
      const region = decodeRegion(
        record.region_x1,
        record.region_y1,
        record.region_x2,
        record.region_y2,
      );
      if (region) {
        command.screen = {
          region,
          threshold: record.screen_threshold ?? DEFAULT_SCREEN_THRESHOLD,
        };
      }
      return command;
    }
    case "Repeat": {
      const command: RepeatCommand = {
        ...base,
        kind: "Repeat",
        count: record.count ?? 0,
        innerCommands: nested(record.inner_commands),
      };
      if (record.until_condition_expr) {
        command.until = record.until_condition_expr;
      }
      return command;
    }
    case "Goto": {
      const command: GotoCommand = {
        ...base,
        kind: "Goto",
        targetLabel: record.target_label ?? "",
      };
      if (record.condition_expr) {
        command.condition = record.condition_expr;
      }
      return command;
    }
    case "Condition": {
      const command: ConditionCommand = {
        ...base,
        kind: "Condition",
        expr: record.expr ?? "",
        nestedThen: nested(record.nested_then),
        nestedElse: nested(record.nested_else),
      };
      if (record.then_label) command.thenLabel = record.then_label;
      if (record.else_label) command.elseLabel = record.else_label;
      return command;
    }
  }
}

function encodeBase(command: Command): CommandRecordBase {
  return {
    id: command.id,
    parent_id: command.parentId ?? null,
    name: command.name,
    enabled: command.enabled,
    on_fail: command.onFail.action,
    on_fail_label: command.onFail.action === "GotoLabel" ? command.onFail.label : null,
    variables_out: [...command.variablesOut],
  };
}

export function encodeCommand(command: Command): CommandRecord {
  const base = encodeBase(command);
  switch (command.kind) {
    case "Click":
      return {
        type: "Click",
        ...base,
        button_type: command.button,
        x: command.x,
        y: command.y,
        humanize_delay_min_ms: command.humanizeDelayMs.min,
        humanize_delay_max_ms: command.humanizeDelayMs.max,
        wheel_delta: command.wheelDelta ?? null,
      };
    case "CropImage":
      return {
        type: "CropImage",
        ...base,
        x1: command.region.x1,
        y1: command.region.y1,
        x2: command.region.x2,
        y2: command.region.y2,
        target_color: fromRgb(command.targetColor),
        tolerance: command.tolerance,
        scan_mode: command.scanMode,
        output_var: command.outputVar,
      };
    case "KeyPress":
      return {
        type: "KeyPress",
        ...base,
        key: command.key,
        repeat: command.repeat,
        delay_between_ms: command.delayBetweenMs,
      };
    case "HotKey":
      return {
        type: "HotKey",
        ...base,
        keys: [...command.keys],
        hotkey_order: command.order,
      };
    case "Text":
      return {
        type: "Text",
        ...base,
        content: command.content,
        text_mode: command.mode,
        speed_min_cps: command.speedCps.min,
        speed_max_cps: command.speedCps.max,
        focus_x: command.focus?.x ?? null,
        focus_y: command.focus?.y ?? null,
      };
    case "Wait":
      return {
        type: "Wait",
        ...base,
        wait_type: command.mode,
        timeout_sec: command.timeoutSec,
        pixel_x: command.pixel?.x ?? null,
        pixel_y: command.pixel?.y ?? null,
        pixel_color: command.pixel ? fromRgb(command.pixel.color) : null,
        pixel_tolerance: command.pixel?.tolerance ?? null,
        screen_threshold: command.screen?.threshold ?? DEFAULT_SCREEN_THRESHOLD,
        region_x1: command.screen?.region.x1 ?? null,
        region_y1: command.screen?.region.y1 ?? null,
        region_x2: command.screen?.region.x2 ?? null,
        region_y2: command.screen?.region.y2 ?? null,
      };
    case "Repeat":
      return {
        type: "Repeat",
        ...base,
        count: command.count,
        until_condition_expr: command.until ?? null,
        inner_commands: command.innerCommands.map(encodeCommand),
      };
    case "Goto":
      return {
        type: "Goto",
        ...base,
        target_label: command.targetLabel,
        condition_expr: command.condition ?? null,
      };
    case "Condition":
      return {
        type: "Condition",
        ...base,
        expr: command.expr,
        then_label: command.thenLabel ?? null,
        else_label: command.elseLabel ?? null,
        nested_then: command.nestedThen.map(encodeCommand),
        nested_else: command.nestedElse.map(encodeCommand),
      };
  }
}

export interface DecodeOptions {
  /** Used when the document has no `max_iterations`. */
  defaultMaxIterations?: number;
}

/** Validates a parsed JSON document and maps it to the in-memory model. */
export function decodeScript(input: unknown, options: DecodeOptions = {}): ScriptDefinition {
  const parsed = ScriptDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid script document", formatSchemaIssues(parsed.error));
  }
  const document = parsed.data;
  if (document.version !== undefined && document.version !== SCRIPT_FORMAT_VERSION) {
    throw new ConfigurationError(
      `Unsupported script format version ${document.version} (expected ${SCRIPT_FORMAT_VERSION})`,
    );
  }

  return {
    sequence: document.sequence.map((record) => decodeCommand(record)),
    variablesGlobal: document.variables_global ?? {},
    maxIterations:
      document.max_iterations ?? options.defaultMaxIterations ?? DEFAULT_MAX_ITERATIONS,
    onErrorHandler: document.on_error_handler ? decodeCommand(document.on_error_handler) : null,
  };
}

export function encodeScript(script: Script | ScriptDefinition): ScriptDocument {
  const definition = script instanceof Script ? script.toDefinition() : script;
  return {
    version: SCRIPT_FORMAT_VERSION,
    sequence: definition.sequence.map(encodeCommand),
    variables_global: definition.variablesGlobal ?? {},
    max_iterations: definition.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    on_error_handler: definition.onErrorHandler ? encodeCommand(definition.onErrorHandler) : null,
  };
}

export function parseScript(input: unknown, options: DecodeOptions = {}): Script {
  return new Script(decodeScript(input, options));
}

export async function loadScriptFile(filePath: string, options: DecodeOptions = {}): Promise<Script> {
  const raw = await fs.readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Script file ${filePath} is not valid JSON`, [errorMessage(error)]);
  }
  return parseScript(parsed, options);
}

export async function saveScriptFile(filePath: string, script: Script | ScriptDefinition): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(encodeScript(script), null, 2)}\n`, "utf-8");
}
