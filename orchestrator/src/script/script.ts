import { ConfigurationError } from "../runtime/errors";
import { Command, ScriptDefinition, Variables } from "../types/script";
import {
  commandIssues,
  expressionSources,
  labelReferences,
  walkCommands,
} from "./commands";
import { CompiledExpression, compileExpression } from "./expression";

export const DEFAULT_MAX_ITERATIONS = 10_000;

/**
 * Validated, immutable view over a script definition. Holds its own copy of
 * the commands, so toggling `enabled` never reaches the caller's objects.
 */
export class Script {
  readonly sequence: readonly Command[];
  readonly variablesGlobal: Variables;
  readonly maxIterations: number;
  readonly onErrorHandler: Command | null;
  readonly labelMap: ReadonlyMap<string, string>;

  private readonly arena = new Map<string, Command>();
  private readonly topLevelIndex = new Map<string, number>();
  private readonly expressions = new Map<string, CompiledExpression>();

  constructor(definition: ScriptDefinition) {
    const copy = structuredClone(definition);
    this.sequence = copy.sequence;
    this.variablesGlobal = copy.variablesGlobal ?? {};
    this.maxIterations = copy.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.onErrorHandler = copy.onErrorHandler ?? null;

    const issues: string[] = [];
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      issues.push(`maxIterations must be a positive integer (got ${this.maxIterations})`);
    }

    const names = new Map<string, string>();
    walkCommands(this.sequence, (command, parent) => {
      issues.push(...commandIssues(command));
      if (this.arena.has(command.id)) {
        issues.push(`duplicate command id "${command.id}"`);
      }
      this.arena.set(command.id, command);

      const existing = names.get(command.name);
      if (existing !== undefined && command.name.length > 0) {
        issues.push(`duplicate command name "${command.name}"`);
      }
      names.set(command.name, command.id);

      if (command.parentId !== undefined) {
        if (parent === null) {
          issues.push(`"${command.name}" is top-level but declares parentId "${command.parentId}"`);
        } else if (command.parentId !== parent.id) {
          issues.push(
            `"${command.name}" declares parentId "${command.parentId}" but is nested in "${parent.id}"`,
          );
        }
      }
    });

    const labels = new Map<string, string>();
    this.sequence.forEach((command, index) => {
      this.topLevelIndex.set(command.id, index);
      labels.set(command.name, command.id);
    });
    this.labelMap = labels;

    const checkReferences = (command: Command): void => {
      for (const label of labelReferences(command)) {
        if (labels.has(label)) continue;
        issues.push(
          names.has(label)
            ? `label "${label}" in "${command.name}" names a nested command; jumps must target top-level commands`
            : `label "${label}" in "${command.name}" does not resolve`,
        );
      }
      for (const source of expressionSources(command)) {
        try {
          this.expressions.set(source, compileExpression(source));
        } catch (error) {
          if (!(error instanceof ConfigurationError)) throw error;
          issues.push(`"${command.name}": ${error.issues.join("; ")} in "${source}"`);
        }
      }
    };

    walkCommands(this.sequence, (command) => checkReferences(command));

    if (this.onErrorHandler) {
      walkCommands([this.onErrorHandler], (command) => {
        issues.push(...commandIssues(command));
        checkReferences(command);
      });
    }

    if (issues.length > 0) {
      throw new ConfigurationError("Invalid script", issues);
    }
  }

  getCommand(id: string): Command | undefined {
    return this.arena.get(id);
  }

  /** Every command by id, nested ones included. */
  commands(): Command[] {
    return [...this.arena.values()];
  }

  first(): Command | undefined {
    return this.sequence[0];
  }

  /** Natural successor in top-level order; undefined at the end or for nested ids. */
  nextOf(id: string): Command | undefined {
    const index = this.topLevelIndex.get(id);
    return index === undefined ? undefined : this.sequence[index + 1];
  }

  resolveLabel(label: string): Command {
    const id = this.labelMap.get(label);
    const command = id === undefined ? undefined : this.arena.get(id);
    if (!command) {
      throw new ConfigurationError(`Unresolved label "${label}"`);
    }
    return command;
  }

  expression(source: string): CompiledExpression {
    const cached = this.expressions.get(source);
    if (cached) {
      return cached;
    }
    const compiled = compileExpression(source);
    this.expressions.set(source, compiled);
    return compiled;
  }

  isEnabled(id: string): boolean {
    return this.arena.get(id)?.enabled ?? false;
  }

  setEnabled(id: string, enabled: boolean): void {
    const command = this.arena.get(id);
    if (!command) {
      throw new ConfigurationError(`Unknown command id "${id}"`);
    }
    command.enabled = enabled;
  }

  toDefinition(): ScriptDefinition {
    return structuredClone({
      sequence: [...this.sequence],
      variablesGlobal: this.variablesGlobal,
      maxIterations: this.maxIterations,
      onErrorHandler: this.onErrorHandler,
    });
  }
}
