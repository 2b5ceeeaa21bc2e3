export type ErrorKind =
  | "ConfigurationError"
  | "CommandExecutionError"
  | "TimeoutError"
  | "OutOfRangeError"
  | "ExpressionError"
  | "CapabilityError"
  | "IterationLimitExceeded";

/**
 * Raised while building or loading a script, or when a run meets a
 * structural problem (unknown command id, unresolved label). Never handled
 * by a command's OnFail policy.
 */
export class ConfigurationError extends Error {
  readonly kind: ErrorKind = "ConfigurationError";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class CommandExecutionError extends Error {
  readonly kind: ErrorKind = "CommandExecutionError";
  /** Set when the failure must halt the run regardless of OnFail. */
  readonly forceStop: boolean;

  constructor(message: string, options: { cause?: unknown; forceStop?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "CommandExecutionError";
    this.forceStop = options.forceStop ?? false;
  }
}

export class TimeoutError extends CommandExecutionError {
  override readonly kind: ErrorKind = "TimeoutError";
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class OutOfRangeError extends CommandExecutionError {
  override readonly kind: ErrorKind = "OutOfRangeError";

  constructor(message: string) {
    super(message);
    this.name = "OutOfRangeError";
  }
}

export class ExpressionError extends CommandExecutionError {
  override readonly kind: ErrorKind = "ExpressionError";

  constructor(message: string) {
    super(message);
    this.name = "ExpressionError";
  }
}

export class CapabilityError extends Error {
  readonly kind: ErrorKind = "CapabilityError";
  readonly failures: string[];

  constructor(message: string, failures: string[] = []) {
    super(message);
    this.name = "CapabilityError";
    this.failures = failures;
  }
}

export class IterationLimitError extends Error {
  readonly kind: ErrorKind = "IterationLimitExceeded";
  readonly limit: number;

  constructor(limit: number) {
    super(`Iteration limit reached (${limit})`);
    this.name = "IterationLimitError";
    this.limit = limit;
  }
}

export type EngineError =
  | ConfigurationError
  | CommandExecutionError
  | CapabilityError
  | IterationLimitError;

export function isEngineError(error: unknown): error is EngineError {
  return (
    error instanceof ConfigurationError ||
    error instanceof CommandExecutionError ||
    error instanceof CapabilityError ||
    error instanceof IterationLimitError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface TimeoutOptions {
  /**
   * Hold the timeout failure until the task itself settles. Used for calls
   * that cannot be cancelled, so the caller never overlaps them with the next one.
   */
  awaitSettled?: boolean;
}

export async function withTimeout<T>(
  task: () => Promise<T>,
  timeoutMs: number,
  label: string,
  options: TimeoutOptions = {},
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const expired = new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs);
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(expired);
    }, timeoutMs);
  });

  let pending: Promise<T> | undefined;
  try {
    pending = task();
    return await Promise.race([pending, timeoutPromise]);
  } catch (error) {
    if (error === expired && options.awaitSettled && pending) {
      await Promise.allSettled([pending]);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
  }
}
