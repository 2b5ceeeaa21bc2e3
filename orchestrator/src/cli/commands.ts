import path from "path";
import { TapflowConfig, loadConfig } from "../config/defaults";
import { Logger } from "../logging/logger";
import { AdbClient } from "../rpc/adbClient";
import { DeviceCollaborator } from "../rpc/contracts";
import { ArtifactManager, EventLog, RunArtifacts } from "../runtime/artifacts";
import { CaptureCache, CaptureProvider } from "../runtime/captureCache";
import { Size, SurfaceRect } from "../runtime/coordinates";
import { ConfigurationError } from "../runtime/errors";
import { WorkerPool } from "../runtime/pool";
import { DeviceResolutionService, ResolutionProbe } from "../runtime/resolution";
import { WorkerReport } from "../runtime/worker";
import { loadScriptFile } from "../script/codec";

export interface DeviceStack {
  device: DeviceCollaborator;
  probes: ResolutionProbe[];
  providers: CaptureProvider[];
}

export interface RunScriptOptions {
  scriptPath: string;
  outDir: string;
  targets?: string[];
  configPath?: string;
  config?: TapflowConfig;
  logger?: Logger;
  /** Replaces the adb-backed device, probes and capture providers. */
  stack?: DeviceStack;
}

export interface RunScriptResult {
  artifacts: RunArtifacts;
  reports: WorkerReport[];
  ok: boolean;
}

export function createAdbStack(config: TapflowConfig, logger?: Logger): DeviceStack {
  const surfaces: Record<string, SurfaceRect> = {};
  for (const target of config.targets) {
    if (target.surface) {
      surfaces[target.id] = target.surface;
    }
  }
  const adb = new AdbClient({
    executable: config.adb.executable,
    commandTimeoutMs: config.adb.commandTimeoutMs,
    surfaces,
    logger,
  });
  return { device: adb, probes: adb.resolutionProbes(), providers: adb.captureProviders() };
}

export function createWorkerPool(config: TapflowConfig, stack: DeviceStack, logger: Logger): WorkerPool {
  const logicalResolutions: Record<string, Size> = {};
  for (const target of config.targets) {
    if (target.resolution) {
      logicalResolutions[target.id] = target.resolution;
    }
  }
  return new WorkerPool({
    device: stack.device,
    captureCache: new CaptureCache({
      providers: stack.providers,
      ttlMs: config.capture.ttlMs,
      providerTimeoutMs: config.capture.providerTimeoutMs,
      logger,
    }),
    resolution: new DeviceResolutionService(stack.probes, {
      timeoutMs: config.resolution.queryTimeoutMs,
      logger,
    }),
    logicalResolutions,
    resolutionTimeoutMs: config.resolution.queryTimeoutMs,
    pollIntervalMs: config.runtime.pollIntervalMs,
    actionTimeoutMs: config.runtime.actionTimeoutMs,
    logger,
  });
}

export async function discoverTargets(
  config: TapflowConfig,
  device: DeviceCollaborator,
  requested?: string[],
): Promise<string[]> {
  if (requested && requested.length > 0) {
    return requested;
  }
  if (config.targets.length > 0) {
    return config.targets.map((target) => target.id);
  }
  return device.listTargets();
}

export async function runScript(options: RunScriptOptions): Promise<RunScriptResult> {
  const config = options.config ?? loadConfig(options.configPath);
  const logger = options.logger ?? Logger.create({ level: config.logging.level });
  const script = await loadScriptFile(options.scriptPath, {
    defaultMaxIterations: config.runtime.defaultMaxIterations,
  });
  const stack = options.stack ?? createAdbStack(config, logger);
  const targets = await discoverTargets(config, stack.device, options.targets);
  if (targets.length === 0) {
    throw new ConfigurationError("No targets to run against");
  }

  const scriptName = path.basename(options.scriptPath).replace(/\.json$/, "");
  const artifactManager = new ArtifactManager(options.outDir);
  const artifacts = await artifactManager.createRunFolder(scriptName);
  const events = new EventLog(artifacts.eventsPath);
  const removeSink = logger.addSink((record) => events.append({ type: "log", record }));

  const pool = createWorkerPool(config, stack, logger);
  const unsubscribe = pool.onEvent((event) => events.append({ type: "worker", event }));
  const runLogger = logger.child(`run:${artifacts.runId}`);
  runLogger.info("Starting", { targets, script: options.scriptPath });

  let reports: WorkerReport[];
  try {
    reports = await pool.runAll(script, targets);
  } finally {
    unsubscribe();
    removeSink();
    await events.close();
  }

  await artifactManager.writeReport(artifacts, {
    runId: artifacts.runId,
    script: path.resolve(options.scriptPath),
    createdAt: artifacts.createdAt,
    finishedAt: new Date().toISOString(),
    workers: reports,
  });

  const ok = reports.every((report) => report.status === "Completed");
  runLogger.info(ok ? "All workers completed" : "Some workers did not complete", {
    report: artifacts.reportPath,
  });
  return { artifacts, reports, ok };
}

export interface CheckResult {
  ok: boolean;
  lines: string[];
}

export async function checkScript(scriptPath: string): Promise<CheckResult> {
  try {
    const script = await loadScriptFile(scriptPath);
    const commands = script.commands();
    const lines = [
      `${path.basename(scriptPath)}: ${script.sequence.length} top-level commands, ${commands.length} total, maxIterations ${script.maxIterations}`,
    ];
    for (const [label, id] of script.labelMap) {
      const command = script.getCommand(id);
      const kind = command ? command.kind : "?";
      const outputs =
        command && command.variablesOut.length > 0 ? ` -> ${command.variablesOut.join(", ")}` : "";
      lines.push(`  ${label} (${kind})${outputs}`);
    }
    if (script.onErrorHandler) {
      lines.push(`  on error: ${script.onErrorHandler.name} (${script.onErrorHandler.kind})`);
    }
    return { ok: true, lines };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { ok: false, lines: error.message.split("\n") };
    }
    throw error;
  }
}
