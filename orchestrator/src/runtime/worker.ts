import { CaptureCache } from "./captureCache";
import { CoordinateMapper, Size } from "./coordinates";
import {
  CommandExecutionError,
  ConfigurationError,
  EngineError,
  ErrorKind,
  IterationLimitError,
  TimeoutError,
  errorMessage,
  isEngineError,
  withTimeout,
} from "./errors";
import { divergence, regionSamples, sampleLogical, scanRegion, withinTolerance } from "./pixels";
import { DeviceResolutionService } from "./resolution";
import { Logger } from "../logging/logger";
import { ActionOutcome, DeviceCollaborator } from "../rpc/contracts";
import { truthy } from "../script/expression";
import { Script } from "../script/script";
import {
  ActionCommand,
  Command,
  ConditionCommand,
  CropImageCommand,
  GotoCommand,
  RepeatCommand,
  VariableValue,
  Variables,
  WaitCommand,
} from "../types/script";
import { isActionCommand } from "../script/commands";

export type WorkerStatus = "Idle" | "Running" | "Paused" | "Stopped" | "Completed" | "Failed";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface WorkerReport {
  targetId: string;
  status: WorkerStatus;
  iterations: number;
  elapsedMs: number;
  lastCommand?: { id: string; name: string };
  error?: { kind: ErrorKind; message: string };
}

export type WorkerEvent =
  | { type: "status"; targetId: string; status: WorkerStatus }
  | {
      type: "command";
      targetId: string;
      iteration: number;
      commandId: string;
      name: string;
      outcome: "ok" | "failed" | "disabled";
      error?: string;
    }
  | { type: "report"; targetId: string; report: WorkerReport };

export type WorkerListener = (event: WorkerEvent) => void;

export interface WorkerOptions {
  targetId: string;
  device: DeviceCollaborator;
  captureCache: CaptureCache;
  resolution?: DeviceResolutionService;
  /** Fixed logical resolution; skips the resolution lookup. */
  logicalResolution?: Size;
  resolutionTimeoutMs?: number;
  pollIntervalMs?: number;
  actionTimeoutMs?: number;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

type Flow = { type: "next" } | { type: "jump"; target: Command };

interface Dispatched {
  values: Variables;
  flow?: Flow;
}

const NEXT: Flow = { type: "next" };

class StopRequested extends Error {
  constructor() {
    super("Stop requested");
    this.name = "StopRequested";
  }
}

/** Carries a failure past every enclosing nested pass to the run loop. */
class RunHalt extends Error {
  constructor(readonly failure: EngineError) {
    super(failure.message);
    this.name = "RunHalt";
  }
}

class PauseGate {
  private closed = false;
  private waiters: Array<() => void> = [];

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.closed = false;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  wait(): Promise<void> {
    if (!this.closed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Runs one script against one target. A worker owns its variables, counters
 * and coordinate mapper; the capture cache and resolution service are shared.
 */
export class Worker {
  readonly targetId: string;

  private readonly device: DeviceCollaborator;
  private readonly captureCache: CaptureCache;
  private readonly resolution?: DeviceResolutionService;
  private readonly logicalResolution?: Size;
  private readonly resolutionTimeoutMs?: number;
  private readonly pollIntervalMs: number;
  private readonly actionTimeoutMs: number;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly mapper = new CoordinateMapper();
  private readonly gate = new PauseGate();
  private readonly listeners = new Set<WorkerListener>();

  private currentStatus: WorkerStatus = "Idle";
  private variables: Variables = {};
  private iterations = 0;
  private stopped = false;
  private cursor: string | null = null;
  private lastCommand?: { id: string; name: string };
  private lastReport?: WorkerReport;

  constructor(options: WorkerOptions) {
    this.targetId = options.targetId;
    this.device = options.device;
    this.captureCache = options.captureCache;
    this.resolution = options.resolution;
    this.logicalResolution = options.logicalResolution;
    this.resolutionTimeoutMs = options.resolutionTimeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.actionTimeoutMs = options.actionTimeoutMs ?? 10_000;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? Logger.silent()).child(`worker:${options.targetId}`);
  }

  get status(): WorkerStatus {
    return this.currentStatus;
  }

  get iterationCount(): number {
    return this.iterations;
  }

  get currentCommandId(): string | null {
    return this.cursor;
  }

  get coordinateMapper(): CoordinateMapper {
    return this.mapper;
  }

  get report(): WorkerReport | undefined {
    return this.lastReport;
  }

  getVariables(): Variables {
    return structuredClone(this.variables);
  }

  onEvent(listener: WorkerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async start(script: Script): Promise<WorkerReport> {
    if (this.currentStatus === "Running" || this.currentStatus === "Paused") {
      throw new ConfigurationError(`Worker ${this.targetId} is already running`);
    }

    this.variables = structuredClone(script.variablesGlobal);
    this.iterations = 0;
    this.stopped = false;
    this.cursor = null;
    this.lastCommand = undefined;
    this.lastReport = undefined;
    this.gate.open();

    const startedAt = this.clock.now();
    this.setStatus("Running");
    this.logger.info("Run started", { commands: script.sequence.length, maxIterations: script.maxIterations });

    let failure: EngineError | null = null;
    try {
      await this.prepareMapper();
      await this.runSequence(script);
      this.setStatus("Completed");
    } catch (error) {
      if (error instanceof StopRequested) {
        this.setStatus("Stopped");
      } else {
        failure = this.toFailure(error);
        this.setStatus("Failed");
        this.logger.error("Run failed", {
          kind: failure.kind,
          error: failure.message,
          command: this.lastCommand?.name,
          iteration: this.iterations,
        });
        await this.runErrorHandler(script);
      }
    }

    const report: WorkerReport = {
      targetId: this.targetId,
      status: this.currentStatus,
      iterations: this.iterations,
      elapsedMs: this.clock.now() - startedAt,
    };
    if (this.lastCommand) {
      report.lastCommand = { ...this.lastCommand };
    }
    if (failure) {
      report.error = { kind: failure.kind, message: failure.message };
    }
    this.lastReport = report;
    this.logger.info("Run finished", {
      status: report.status,
      iterations: report.iterations,
      elapsedMs: report.elapsedMs,
    });
    this.emit({ type: "report", targetId: this.targetId, report });
    return report;
  }

  pause(): void {
    if (this.currentStatus !== "Running") {
      return;
    }
    this.gate.close();
    this.setStatus("Paused");
  }

  resume(): void {
    if (this.currentStatus !== "Paused") {
      return;
    }
    this.setStatus("Running");
    this.gate.open();
  }

  stop(): void {
    if (this.currentStatus === "Idle") {
      this.stopped = true;
      this.setStatus("Stopped");
      return;
    }
    if (this.currentStatus !== "Running" && this.currentStatus !== "Paused") {
      return;
    }
    this.stopped = true;
    if (this.currentStatus === "Paused") {
      this.setStatus("Running");
    }
    this.gate.open();
  }

  private setStatus(status: WorkerStatus): void {
    if (this.currentStatus === status) {
      return;
    }
    this.currentStatus = status;
    this.emit({ type: "status", targetId: this.targetId, status });
  }

  private emit(event: WorkerEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async prepareMapper(): Promise<void> {
    const surface = await withTimeout(
      () => this.device.getSurface(this.targetId),
      this.actionTimeoutMs,
      `Surface lookup for ${this.targetId}`,
    );

    let logical: Size | null = this.logicalResolution ?? null;
    if (!logical && this.resolution) {
      const record = await this.resolution.queryResolution(this.targetId, {
        timeoutMs: this.resolutionTimeoutMs,
      });
      if (record.kind === "resolved") {
        logical = { width: record.width, height: record.height };
      } else {
        this.logger.warn("Resolution unresolved, using surface size", { reason: record.reason });
      }
    }

    this.mapper.update(logical ?? { width: surface.width, height: surface.height }, surface);
    this.logger.debug("Coordinate mapper ready", {
      logical: this.mapper.logicalSize,
      surface,
      scale: this.mapper.scale,
    });
  }

  private async checkpoint(): Promise<void> {
    await yieldToEventLoop();
    if (this.gate.isClosed) {
      await this.gate.wait();
    }
    if (this.stopped) {
      throw new StopRequested();
    }
  }

  private async runSequence(script: Script): Promise<void> {
    let current = script.first();
    while (current) {
      const flow = await this.step(current.id, script);
      current = flow.type === "jump" ? flow.target : script.nextOf(current.id);
    }
  }

  /** Nested pass: a jump ends it and is handed up to the top-level loop. */
  private async runPass(commands: Command[], script: Script): Promise<Flow> {
    for (const command of commands) {
      const flow = await this.step(command.id, script);
      if (flow.type === "jump") {
        return flow;
      }
    }
    return NEXT;
  }

  private async step(commandId: string, script: Script): Promise<Flow> {
    await this.checkpoint();

    if (this.iterations >= script.maxIterations) {
      throw new IterationLimitError(script.maxIterations);
    }
    this.iterations += 1;
    this.cursor = commandId;

    const command = script.getCommand(commandId);
    if (!command) {
      throw new ConfigurationError(`Unknown command id "${commandId}"`);
    }
    this.lastCommand = { id: command.id, name: command.name };

    if (!script.isEnabled(command.id)) {
      this.emitCommand(command, "disabled");
      return NEXT;
    }

    try {
      const result = await this.dispatch(command, script);
      for (const key of command.variablesOut) {
        if (Object.prototype.hasOwnProperty.call(result.values, key)) {
          this.variables[key] = result.values[key];
        }
      }
      this.emitCommand(command, "ok");
      return result.flow ?? NEXT;
    } catch (error) {
      if (error instanceof StopRequested || error instanceof RunHalt) {
        throw error;
      }
      if (error instanceof CommandExecutionError && !error.forceStop) {
        this.emitCommand(command, "failed", error.message);
        return this.applyOnFail(command, error, script);
      }
      if (isEngineError(error)) {
        throw error;
      }
      this.logger.error("Unexpected command failure", {
        commandId: command.id,
        name: command.name,
        iteration: this.iterations,
        error: errorMessage(error),
      });
      throw new CommandExecutionError(`Command "${command.name}" failed: ${errorMessage(error)}`, {
        cause: error,
        forceStop: true,
      });
    }
  }

  private applyOnFail(command: Command, error: CommandExecutionError, script: Script): Flow {
    switch (command.onFail.action) {
      case "Skip":
        this.logger.warn("Command failed, skipping", { name: command.name, error: error.message });
        return NEXT;
      case "Stop":
        throw new RunHalt(error);
      case "GotoLabel":
        this.logger.warn("Command failed, jumping", {
          name: command.name,
          label: command.onFail.label,
          error: error.message,
        });
        return { type: "jump", target: script.resolveLabel(command.onFail.label) };
    }
  }

  private emitCommand(
    command: Command,
    outcome: "ok" | "failed" | "disabled",
    error?: string,
  ): void {
    const event: WorkerEvent = {
      type: "command",
      targetId: this.targetId,
      iteration: this.iterations,
      commandId: command.id,
      name: command.name,
      outcome,
    };
    if (error !== undefined) {
      event.error = error;
    }
    this.emit(event);
  }

  private toFailure(error: unknown): EngineError {
    if (error instanceof RunHalt) {
      return error.failure;
    }
    if (isEngineError(error)) {
      return error;
    }
    return new CommandExecutionError(errorMessage(error), { cause: error, forceStop: true });
  }

  private async runErrorHandler(script: Script): Promise<void> {
    const handler = script.onErrorHandler;
    if (!handler) {
      return;
    }
    this.logger.info("Running error handler", { name: handler.name });
    try {
      await this.dispatch(handler, script);
    } catch (error) {
      const cause = error instanceof RunHalt ? error.failure : error;
      this.logger.error("Error handler failed", { name: handler.name, error: errorMessage(cause) });
    }
  }

  private evaluate(source: string, script: Script): VariableValue {
    return script.expression(source).evaluate(this.variables);
  }

  private async dispatch(command: Command, script: Script): Promise<Dispatched> {
    if (isActionCommand(command)) {
      return this.dispatchAction(command);
    }
    switch (command.kind) {
      case "Wait":
        return this.runWait(command);
      case "Repeat":
        return this.runRepeat(command, script);
      case "Goto":
        return this.runGoto(command, script);
      case "Condition":
        return this.runCondition(command, script);
    }
  }

  private async sendAction(label: string, call: () => Promise<ActionOutcome>): Promise<void> {
    const outcome = await withTimeout(call, this.actionTimeoutMs, label, { awaitSettled: true });
    if (!outcome.ok) {
      throw new CommandExecutionError(`${label} failed: ${outcome.error ?? "device reported failure"}`);
    }
  }

  private sampleDelay(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private async dispatchAction(command: ActionCommand): Promise<Dispatched> {
    switch (command.kind) {
      case "Click": {
        const point = this.mapper.localToScreen(command.x, command.y);
        const params = {
          x: point.x,
          y: point.y,
          button: command.button,
          delayMs: this.sampleDelay(command.humanizeDelayMs.min, command.humanizeDelayMs.max),
          ...(command.wheelDelta !== undefined ? { wheelDelta: command.wheelDelta } : {}),
        };
        await this.sendAction(`Click "${command.name}"`, () =>
          this.device.sendClick(this.targetId, params),
        );
        return { values: { x: point.x, y: point.y } };
      }
      case "CropImage":
        return this.runCropImage(command);
      case "KeyPress":
        await this.sendAction(`KeyPress "${command.name}"`, () =>
          this.device.sendKey(this.targetId, {
            key: command.key,
            repeat: command.repeat,
            delayBetweenMs: command.delayBetweenMs,
          }),
        );
        return { values: { key: command.key, presses: command.repeat } };
      case "HotKey":
        await this.sendAction(`HotKey "${command.name}"`, () =>
          this.device.sendHotkey(this.targetId, { keys: [...command.keys], order: command.order }),
        );
        return { values: { keys: command.keys.join("+") } };
      case "Text": {
        const focus = command.focus
          ? this.mapper.localToScreen(command.focus.x, command.focus.y)
          : undefined;
        await this.sendAction(`Text "${command.name}"`, () =>
          this.device.sendText(this.targetId, {
            content: command.content,
            mode: command.mode,
            speedCps: { ...command.speedCps },
            ...(focus ? { focus } : {}),
          }),
        );
        return { values: { length: command.content.length } };
      }
    }
  }

  private async runCropImage(command: CropImageCommand): Promise<Dispatched> {
    this.mapper.assertRegion(command.region);
    const capture = await this.captureCache.get(this.targetId);
    const match = scanRegion(
      capture.image,
      this.mapper.logicalSize,
      command.region,
      command.targetColor,
      command.tolerance,
      command.scanMode,
    );
    this.variables[command.outputVar] = match ? { ...match } : null;
    if (!match) {
      throw new CommandExecutionError(
        `No pixel within ${command.tolerance} of (${command.targetColor.r}, ${command.targetColor.g}, ${command.targetColor.b}) in "${command.name}"`,
      );
    }
    return { values: { x: match.x, y: match.y, confidence: match.confidence } };
  }

  private async runWait(command: WaitCommand): Promise<Dispatched> {
    const timeoutMs = command.timeoutSec * 1000;
    const logical = this.mapper.logicalSize;
    const pixel = command.mode === "PixelColor" ? command.pixel : undefined;
    const screen = command.mode === "ScreenChange" ? command.screen : undefined;

    if (command.mode === "PixelColor" && !pixel) {
      throw new ConfigurationError(`Wait "${command.name}" has no pixel target`);
    }
    if (command.mode === "ScreenChange" && !screen) {
      throw new ConfigurationError(`Wait "${command.name}" has no region`);
    }
    if (pixel) {
      this.mapper.assertInside(pixel.x, pixel.y);
    }

    let baseline: Uint8Array | null = null;
    if (screen) {
      this.mapper.assertRegion(screen.region);
      const capture = await this.captureCache.get(this.targetId, { forceRefresh: true });
      baseline = regionSamples(capture.image, logical, screen.region);
    }

    let elapsed = 0;
    let last = this.clock.now();

    for (;;) {
      if (this.gate.isClosed) {
        elapsed += this.clock.now() - last;
        await this.gate.wait();
        last = this.clock.now();
      }
      if (this.stopped) {
        throw new StopRequested();
      }

      const now = this.clock.now();
      elapsed += now - last;
      last = now;

      if (pixel) {
        const capture = await this.captureCache.get(this.targetId, { forceRefresh: true });
        const color = sampleLogical(capture.image, { x: pixel.x, y: pixel.y }, logical);
        if (withinTolerance(color, pixel.color, pixel.tolerance)) {
          return { values: { elapsedMs: elapsed } };
        }
      } else if (screen && baseline) {
        const capture = await this.captureCache.get(this.targetId, { forceRefresh: true });
        const change = divergence(baseline, regionSamples(capture.image, logical, screen.region));
        if (change > 1 - screen.threshold) {
          return { values: { elapsedMs: elapsed } };
        }
      }

      if (elapsed >= timeoutMs) {
        if (command.mode === "Timeout") {
          return { values: { elapsedMs: elapsed } };
        }
        throw new TimeoutError(`Wait "${command.name}" timed out after ${command.timeoutSec}s`, timeoutMs);
      }

      await this.clock.sleep(Math.min(this.pollIntervalMs, timeoutMs - elapsed));
    }
  }

  private async runRepeat(command: RepeatCommand, script: Script): Promise<Dispatched> {
    const hadIndex = Object.prototype.hasOwnProperty.call(this.variables, "_loop_index");
    const previousIndex = this.variables._loop_index;
    let passes = 0;

    try {
      while (command.count === 0 || passes < command.count) {
        passes += 1;
        this.variables._loop_index = passes;
        const flow = await this.runPass(command.innerCommands, script);
        if (flow.type === "jump") {
          return { values: { passes }, flow };
        }
        if (command.until !== undefined && truthy(this.evaluate(command.until, script))) {
          break;
        }
      }
    } finally {
      if (hadIndex) {
        this.variables._loop_index = previousIndex;
      } else {
        delete this.variables._loop_index;
      }
    }

    return { values: { passes } };
  }

  private async runGoto(command: GotoCommand, script: Script): Promise<Dispatched> {
    const jumped = command.condition === undefined || truthy(this.evaluate(command.condition, script));
    if (!jumped) {
      return { values: { jumped } };
    }
    return { values: { jumped }, flow: { type: "jump", target: script.resolveLabel(command.targetLabel) } };
  }

  private async runCondition(command: ConditionCommand, script: Script): Promise<Dispatched> {
    const result = truthy(this.evaluate(command.expr, script));
    const label = result ? command.thenLabel : command.elseLabel;
    if (label !== undefined) {
      return { values: { result }, flow: { type: "jump", target: script.resolveLabel(label) } };
    }
    const flow = await this.runPass(result ? command.nestedThen : command.nestedElse, script);
    return { values: { result }, flow };
  }
}
