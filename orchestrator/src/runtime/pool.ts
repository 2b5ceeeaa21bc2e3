import { CaptureCache } from "./captureCache";
import { Size } from "./coordinates";
import { ConfigurationError } from "./errors";
import { DeviceResolutionService } from "./resolution";
import { Clock, Worker, WorkerListener, WorkerReport, WorkerStatus } from "./worker";
import { Logger } from "../logging/logger";
import { DeviceCollaborator } from "../rpc/contracts";
import { Script } from "../script/script";

export interface WorkerPoolOptions {
  device: DeviceCollaborator;
  captureCache: CaptureCache;
  resolution?: DeviceResolutionService;
  /** Per-target logical resolutions that bypass the resolution service. */
  logicalResolutions?: Record<string, Size>;
  resolutionTimeoutMs?: number;
  pollIntervalMs?: number;
  actionTimeoutMs?: number;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

export interface WorkerSummary {
  targetId: string;
  status: WorkerStatus;
  iterations: number;
  currentCommandId: string | null;
  report?: WorkerReport;
}

export class WorkerPool {
  private readonly options: WorkerPoolOptions;
  private readonly workers = new Map<string, Worker>();
  private readonly listeners = new Set<WorkerListener>();

  constructor(options: WorkerPoolOptions) {
    this.options = options;
  }

  worker(targetId: string): Worker {
    const existing = this.workers.get(targetId);
    if (existing) {
      return existing;
    }
    const worker = new Worker({
      targetId,
      device: this.options.device,
      captureCache: this.options.captureCache,
      resolution: this.options.resolution,
      logicalResolution: this.options.logicalResolutions?.[targetId],
      resolutionTimeoutMs: this.options.resolutionTimeoutMs,
      pollIntervalMs: this.options.pollIntervalMs,
      actionTimeoutMs: this.options.actionTimeoutMs,
      clock: this.options.clock,
      random: this.options.random,
      logger: this.options.logger,
    });
    worker.onEvent((event) => {
      for (const listener of this.listeners) {
        listener(event);
      }
    });
    this.workers.set(targetId, worker);
    return worker;
  }

  has(targetId: string): boolean {
    return this.workers.has(targetId);
  }

  start(targetId: string, script: Script): Promise<WorkerReport> {
    return this.worker(targetId).start(script);
  }

  runAll(script: Script, targets: string[]): Promise<WorkerReport[]> {
    return Promise.all(targets.map((targetId) => this.start(targetId, script)));
  }

  pause(targetId: string): void {
    this.require(targetId).pause();
  }

  resume(targetId: string): void {
    this.require(targetId).resume();
  }

  stop(targetId: string): void {
    this.require(targetId).stop();
  }

  stopAll(): void {
    for (const worker of this.workers.values()) {
      worker.stop();
    }
  }

  statuses(): WorkerSummary[] {
    return [...this.workers.values()].map((worker) => {
      const summary: WorkerSummary = {
        targetId: worker.targetId,
        status: worker.status,
        iterations: worker.iterationCount,
        currentCommandId: worker.currentCommandId,
      };
      if (worker.report) {
        summary.report = worker.report;
      }
      return summary;
    });
  }

  onEvent(listener: WorkerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private require(targetId: string): Worker {
    const worker = this.workers.get(targetId);
    if (!worker) {
      throw new ConfigurationError(`No worker for target "${targetId}"`);
    }
    return worker;
  }
}
