import cors from "cors";
import express, { Express, Request, Response } from "express";
import { z } from "zod";
import { formatSchemaIssues } from "@tapflow/shared";
import {
  ConfigurationError,
  DeviceCollaborator,
  Logger,
  WorkerEvent,
  WorkerPool,
  errorMessage,
  formatLogLine,
  loadScriptFile,
} from "@tapflow/orchestrator";
import { loadScripts, resolveScriptPath } from "./scripts";
import { StreamStatus } from "./types";

export interface ControlServerOptions {
  pool: WorkerPool;
  device: DeviceCollaborator;
  scriptsDir: string;
  defaultMaxIterations?: number;
  logger?: Logger;
  keepAliveMs?: number;
}

const StartBodySchema = z.object({ scriptPath: z.string().min(1) });

function statusCode(error: unknown): number {
  if (error instanceof ConfigurationError) {
    return 400;
  }
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return 404;
  }
  return 500;
}

function sendError(res: Response, error: unknown): void {
  const body: { error: string; issues?: string[] } = { error: errorMessage(error) };
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    body.error = error.message.split("\n")[0];
    body.issues = error.issues;
  }
  res.status(statusCode(error)).json(body);
}

/** True when a log scope ends in this target's whole `worker:<target>` segment. */
export function isWorkerScope(scope: string, targetId: string): boolean {
  const workerScope = `worker:${targetId}`;
  return scope === workerScope || scope.endsWith(`:${workerScope}`);
}

function writeEvent(res: Response, event: string, payload: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`);
}

export function createApp(options: ControlServerOptions): Express {
  const { pool, device, scriptsDir } = options;
  const logger = (options.logger ?? Logger.silent()).child("control");
  const keepAliveMs = options.keepAliveMs ?? 15_000;

  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());

  const streamStatus = (targetId: string): StreamStatus => {
    const worker = pool.worker(targetId);
    return {
      targetId,
      status: worker.status,
      iterations: worker.iterationCount,
      currentCommandId: worker.currentCommandId,
    };
  };

  const isBusy = (targetId: string): boolean => {
    const status = pool.has(targetId) ? pool.worker(targetId).status : "Idle";
    return status === "Running" || status === "Paused";
  };

  const rejectBusy = (targetId: string, res: Response): void => {
    res.status(409).json({ error: `Worker ${targetId} is already running` });
  };

  const requireWorker = (targetId: string, res: Response): boolean => {
    if (pool.has(targetId)) {
      return true;
    }
    res.status(404).json({ error: `No worker for target "${targetId}"` });
    return false;
  };

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get("/api/targets", async (_req: Request, res: Response) => {
    try {
      res.json({ targets: await device.listTargets() });
    } catch (error) {
      logger.warn("Target listing failed", { error: errorMessage(error) });
      sendError(res, error);
    }
  });

  app.get("/api/scripts", async (_req: Request, res: Response) => {
    try {
      res.json({ scripts: await loadScripts(scriptsDir, options.defaultMaxIterations) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/api/workers", (_req: Request, res: Response) => {
    res.json({ workers: pool.statuses() });
  });

  app.post("/api/workers/:target/start", async (req, res) => {
    const targetId = req.params.target;
    const body = StartBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "scriptPath is required", issues: formatSchemaIssues(body.error) });
      return;
    }

    if (isBusy(targetId)) {
      rejectBusy(targetId, res);
      return;
    }

    try {
      const scriptPath = resolveScriptPath(scriptsDir, body.data.scriptPath);
      const script = await loadScriptFile(scriptPath, { defaultMaxIterations: options.defaultMaxIterations });
      // Another request may have started the worker while the script loaded.
      if (isBusy(targetId)) {
        rejectBusy(targetId, res);
        return;
      }
      pool.start(targetId, script).then(
        (report) => logger.info("Worker finished", { target: targetId, status: report.status }),
        (error: unknown) => logger.error("Worker start failed", { target: targetId, error: errorMessage(error) }),
      );
      logger.info("Worker started", { target: targetId, script: body.data.scriptPath });
      res.status(202).json(streamStatus(targetId));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/api/workers/:target/pause", (req, res) => {
    if (requireWorker(req.params.target, res)) {
      pool.pause(req.params.target);
      res.json(streamStatus(req.params.target));
    }
  });

  app.post("/api/workers/:target/resume", (req, res) => {
    if (requireWorker(req.params.target, res)) {
      pool.resume(req.params.target);
      res.json(streamStatus(req.params.target));
    }
  });

  app.post("/api/workers/:target/stop", (req, res) => {
    if (requireWorker(req.params.target, res)) {
      pool.stop(req.params.target);
      res.json(streamStatus(req.params.target));
    }
  });

  app.get("/api/workers/:target/stream", (req, res) => {
    const targetId = req.params.target;
    if (!pool.has(targetId)) {
      res.status(404).end();
      return;
    }
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    writeEvent(res, "status", streamStatus(targetId));

    const unsubscribe = pool.onEvent((event: WorkerEvent) => {
      if (event.targetId !== targetId) {
        return;
      }
      if (event.type === "command") {
        writeEvent(res, "command", event);
        return;
      }
      const status = streamStatus(targetId);
      writeEvent(res, "status", event.type === "report" ? { ...status, report: event.report } : status);
    });
    const removeSink = logger.addSink((record) => {
      if (isWorkerScope(record.scope, targetId)) {
        writeEvent(res, "log", { level: record.level, line: formatLogLine(record) });
      }
    });
    const keepAlive = setInterval(() => {
      res.write(":\n\n");
    }, keepAliveMs);

    req.on("close", () => {
      clearInterval(keepAlive);
      unsubscribe();
      removeSink();
    });
  });

  return app;
}
