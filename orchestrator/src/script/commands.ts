import { randomUUID } from "crypto";
import { ConfigurationError } from "../runtime/errors";
import {
  ActionCommand,
  Command,
  CommandBase,
  CommandKind,
  Range,
  Region,
  Rgb,
} from "../types/script";

/** Result values each kind can hand to `variablesOut`. */
export const COMMAND_OUTPUTS: Record<CommandKind, readonly string[]> = {
  Click: ["x", "y"],
  CropImage: ["x", "y", "confidence"],
  KeyPress: ["key", "presses"],
  HotKey: ["keys"],
  Text: ["length"],
  Wait: ["elapsedMs"],
  Repeat: ["passes"],
  Goto: ["jumped"],
  Condition: ["result"],
};

const ACTION_KINDS: ReadonlySet<CommandKind> = new Set([
  "Click",
  "CropImage",
  "KeyPress",
  "HotKey",
  "Text",
]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

type BaseDefaults = "id" | "enabled" | "onFail" | "variablesOut";

type WithOptionalBase<C> = C extends Command
  ? Omit<C, BaseDefaults> & Partial<Pick<CommandBase, BaseDefaults>>
  : never;

export type CommandInput = WithOptionalBase<Command>;

export function createCommand(input: CommandInput): Command {
  return {
    ...input,
    id: input.id ?? randomUUID(),
    enabled: input.enabled ?? true,
    onFail: input.onFail ?? { action: "Skip" },
    variablesOut: input.variablesOut ?? [],
  };
}

export function isActionCommand(command: Command): command is ActionCommand {
  return ACTION_KINDS.has(command.kind);
}

export function childCommands(command: Command): Command[] {
  switch (command.kind) {
    case "Repeat":
      return command.innerCommands;
    case "Condition":
      return [...command.nestedThen, ...command.nestedElse];
    default:
      return [];
  }
}

/** Visits every command depth-first, passing the enclosing container. */
export function walkCommands(
  commands: readonly Command[],
  visit: (command: Command, parent: Command | null) => void,
  parent: Command | null = null,
): void {
  for (const command of commands) {
    visit(command, parent);
    walkCommands(childCommands(command), visit, command);
  }
}

export function labelReferences(command: Command): string[] {
  const labels: string[] = [];
  if (command.onFail.action === "GotoLabel") {
    labels.push(command.onFail.label);
  }
  if (command.kind === "Goto") {
    labels.push(command.targetLabel);
  }
  if (command.kind === "Condition") {
    if (command.thenLabel !== undefined) labels.push(command.thenLabel);
    if (command.elseLabel !== undefined) labels.push(command.elseLabel);
  }
  return labels;
}

export function expressionSources(command: Command): string[] {
  switch (command.kind) {
    case "Repeat":
      return command.until !== undefined ? [command.until] : [];
    case "Goto":
      return command.condition !== undefined ? [command.condition] : [];
    case "Condition":
      return [command.expr];
    default:
      return [];
  }
}

class IssueCollector {
  readonly issues: string[] = [];

  constructor(private readonly prefix: string) {}

  check(ok: boolean, message: string): void {
    if (!ok) {
      this.issues.push(`${this.prefix}: ${message}`);
    }
  }

  integer(value: number, field: string, min: number, max = Number.MAX_SAFE_INTEGER): void {
    this.check(
      Number.isInteger(value) && value >= min && value <= max,
      max === Number.MAX_SAFE_INTEGER
        ? `${field} must be an integer >= ${min} (got ${value})`
        : `${field} must be an integer in [${min}, ${max}] (got ${value})`,
    );
  }

  range(value: Range, field: string, min: number): void {
    this.check(
      Number.isFinite(value.min) && value.min >= min,
      `${field}.min must be >= ${min} (got ${value.min})`,
    );
    this.check(
      Number.isFinite(value.max) && value.max >= value.min,
      `${field}.max must be >= ${field}.min (got ${value.max} < ${value.min})`,
    );
  }

  color(value: Rgb, field: string): void {
    this.integer(value.r, `${field}.r`, 0, 255);
    this.integer(value.g, `${field}.g`, 0, 255);
    this.integer(value.b, `${field}.b`, 0, 255);
  }

  region(value: Region, field: string): void {
    this.integer(value.x1, `${field}.x1`, 0);
    this.integer(value.y1, `${field}.y1`, 0);
    this.integer(value.x2, `${field}.x2`, 0);
    this.integer(value.y2, `${field}.y2`, 0);
    this.check(value.x2 > value.x1, `${field} must have x2 > x1`);
    this.check(value.y2 > value.y1, `${field} must have y2 > y1`);
  }
}

/**
 * Checks one command's own fields. Cross-command rules (unique names,
 * labels, parent links, expressions) belong to `Script`.
 */
export function commandIssues(command: Command): string[] {
  const issues = new IssueCollector(`${command.kind} "${command.name || command.id}"`);

  issues.check(command.id.trim().length > 0, "id is required");
  issues.check(command.name.trim().length > 0, "name is required");
  if (command.onFail.action === "GotoLabel") {
    issues.check(command.onFail.label.trim().length > 0, "onFail GotoLabel needs a label");
  }

  const outputs = COMMAND_OUTPUTS[command.kind];
  const seenOutputs = new Set<string>();
  for (const key of command.variablesOut) {
    issues.check(
      outputs.includes(key),
      `variablesOut key "${key}" is not produced (available: ${outputs.join(", ")})`,
    );
    issues.check(!seenOutputs.has(key), `variablesOut key "${key}" is listed twice`);
    seenOutputs.add(key);
  }

  switch (command.kind) {
    case "Click":
      issues.integer(command.x, "x", 0);
      issues.integer(command.y, "y", 0);
      issues.range(command.humanizeDelayMs, "humanizeDelayMs", 0);
      if (command.wheelDelta !== undefined) {
        issues.integer(command.wheelDelta, "wheelDelta", 1);
      }
      break;
    case "CropImage":
      issues.region(command.region, "region");
      issues.color(command.targetColor, "targetColor");
      issues.integer(command.tolerance, "tolerance", 0, 255);
      issues.check(
        IDENTIFIER.test(command.outputVar),
        `outputVar "${command.outputVar}" must be an identifier`,
      );
      break;
    case "KeyPress":
      issues.check(command.key.trim().length > 0, "key is required");
      issues.integer(command.repeat, "repeat", 1);
      issues.integer(command.delayBetweenMs, "delayBetweenMs", 0);
      break;
    case "HotKey":
      issues.check(command.keys.length > 0, "keys must not be empty");
      issues.check(
        command.keys.every((key) => key.trim().length > 0),
        "keys must not contain blanks",
      );
      issues.check(
        new Set(command.keys).size === command.keys.length,
        "keys must be distinct",
      );
      break;
    case "Text":
      issues.check(command.content.length > 0, "content is required");
      issues.check(
        command.speedCps.min > 0,
        `speedCps.min must be > 0 (got ${command.speedCps.min})`,
      );
      issues.range(command.speedCps, "speedCps", 0);
      if (command.focus) {
        issues.integer(command.focus.x, "focus.x", 0);
        issues.integer(command.focus.y, "focus.y", 0);
      }
      break;
    case "Wait":
      issues.check(
        Number.isFinite(command.timeoutSec) && command.timeoutSec > 0,
        `timeoutSec must be > 0 (got ${command.timeoutSec})`,
      );
      if (command.mode === "PixelColor") {
        issues.check(command.pixel !== undefined, "PixelColor wait needs a pixel target");
        if (command.pixel) {
          issues.integer(command.pixel.x, "pixel.x", 0);
          issues.integer(command.pixel.y, "pixel.y", 0);
          issues.color(command.pixel.color, "pixel.color");
          issues.integer(command.pixel.tolerance, "pixel.tolerance", 0, 255);
        }
      }
      if (command.mode === "ScreenChange") {
        issues.check(command.screen !== undefined, "ScreenChange wait needs a region");
        if (command.screen) {
          issues.region(command.screen.region, "screen.region");
          issues.check(
            command.screen.threshold >= 0 && command.screen.threshold <= 1,
            `screen.threshold must be in [0, 1] (got ${command.screen.threshold})`,
          );
        }
      }
      break;
    case "Repeat":
      issues.integer(command.count, "count", 0);
      issues.check(command.innerCommands.length > 0, "a Repeat needs inner commands");
      break;
    case "Goto":
      issues.check(command.targetLabel.trim().length > 0, "targetLabel is required");
      break;
    case "Condition":
      issues.check(command.expr.trim().length > 0, "expr is required");
      break;
  }

  return issues.issues;
}

export function validateCommand(command: Command): void {
  const issues = commandIssues(command);
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid command "${command.name}"`, issues);
  }
}
