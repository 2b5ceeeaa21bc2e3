import { z } from "zod";
import {
  CommandRecord,
  JsonValue,
  ScriptDocument,
} from "./records";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const RgbSchema = z.tuple([z.number(), z.number(), z.number()]);

const nestedCommands = () => z.array(z.lazy(() => CommandRecordSchema));

const CommandBaseSchema = z.object({
  id: z.string(),
  parent_id: z.string().nullable().optional(),
  name: z.string(),
  enabled: z.boolean().optional(),
  on_fail: z.enum(["Skip", "Stop", "GotoLabel"]).optional(),
  on_fail_label: z.string().nullable().optional(),
  variables_out: z.array(z.string()).optional(),
});

const ClickRecordSchema = CommandBaseSchema.extend({
  type: z.literal("Click"),
  button_type: z.enum(["Left", "Right", "Double", "WheelUp", "WheelDown"]).optional(),
  x: z.number().optional(),
  y: z.number().optional(),
  humanize_delay_min_ms: z.number().optional(),
  humanize_delay_max_ms: z.number().optional(),
  wheel_delta: z.number().nullable().optional(),
});

const CropImageRecordSchema = CommandBaseSchema.extend({
  type: z.literal("CropImage"),
  x1: z.number().optional(),
  y1: z.number().optional(),
  x2: z.number().optional(),
  y2: z.number().optional(),
  target_color: RgbSchema.optional(),
  tolerance: z.number().optional(),
  scan_mode: z.enum(["Exact", "MaxMatch", "Grid"]).optional(),
  output_var: z.string().optional(),
});

const KeyPressRecordSchema = CommandBaseSchema.extend({
  type: z.literal("KeyPress"),
  key: z.string().optional(),
  repeat: z.number().optional(),
  delay_between_ms: z.number().optional(),
});

const HotKeyRecordSchema = CommandBaseSchema.extend({
  type: z.literal("HotKey"),
  keys: z.array(z.string()).optional(),
  hotkey_order: z.enum(["Simultaneous", "Sequence"]).optional(),
});

const TextRecordSchema = CommandBaseSchema.extend({
  type: z.literal("Text"),
  content: z.string().optional(),
  text_mode: z.enum(["Paste", "Humanize"]).optional(),
  speed_min_cps: z.number().optional(),
  speed_max_cps: z.number().optional(),
  focus_x: z.number().nullable().optional(),
  focus_y: z.number().nullable().optional(),
});

const WaitRecordSchema = CommandBaseSchema.extend({
  type: z.literal("Wait"),
  wait_type: z.enum(["Timeout", "PixelColor", "ScreenChange"]).optional(),
  timeout_sec: z.number().optional(),
  pixel_x: z.number().nullable().optional(),
  pixel_y: z.number().nullable().optional(),
  pixel_color: RgbSchema.nullable().optional(),
  pixel_tolerance: z.number().nullable().optional(),
  screen_threshold: z.number().optional(),
  region_x1: z.number().nullable().optional(),
  region_y1: z.number().nullable().optional(),
  region_x2: z.number().nullable().optional(),
  region_y2: z.number().nullable().optional(),
});

const RepeatRecordSchema = CommandBaseSchema.extend({
  type: z.literal("Repeat"),
  count: z.number().optional(),
  until_condition_expr: z.string().nullable().optional(),
  inner_commands: nestedCommands().optional(),
});

const GotoRecordSchema = CommandBaseSchema.extend({
  type: z.literal("Goto"),
  target_label: z.string().optional(),
  condition_expr: z.string().nullable().optional(),
});

const ConditionRecordSchema = CommandBaseSchema.extend({
  type: z.literal("Condition"),
  expr: z.string().optional(),
  then_label: z.string().nullable().optional(),
  else_label: z.string().nullable().optional(),
  nested_then: nestedCommands().optional(),
  nested_else: nestedCommands().optional(),
});

export const CommandRecordSchema: z.ZodType<CommandRecord> = z.lazy(() =>
  z.discriminatedUnion("type", [
    ClickRecordSchema,
    CropImageRecordSchema,
    KeyPressRecordSchema,
    HotKeyRecordSchema,
    TextRecordSchema,
    WaitRecordSchema,
    RepeatRecordSchema,
    GotoRecordSchema,
    ConditionRecordSchema,
  ]),
);

export const ScriptDocumentSchema: z.ZodType<ScriptDocument> = z.object({
  version: z.number().int().optional(),
  sequence: z.array(CommandRecordSchema),
  variables_global: z.record(JsonValueSchema).optional(),
  max_iterations: z.number().optional(),
  on_error_handler: CommandRecordSchema.nullable().optional(),
});

/**
 * Renders zod issues as `path: message` lines, e.g.
 * `sequence.2.x: Expected number, received string`.
 */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}
