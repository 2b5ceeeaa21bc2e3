import path from "path";
import { Logger, createAdbStack, createWorkerPool, loadConfig } from "@tapflow/orchestrator";
import { createApp } from "./app";

const repoRoot = path.resolve(__dirname, "..", "..", "..");
const scriptsDir = path.resolve(process.env.TAPFLOW_SCRIPTS_DIR ?? path.join(repoRoot, "scripts"));

const config = loadConfig(process.env.TAPFLOW_CONFIG);
const logger = Logger.create({ level: config.logging.level });
const stack = createAdbStack(config, logger);
const pool = createWorkerPool(config, stack, logger);

const app = createApp({
  pool,
  device: stack.device,
  scriptsDir,
  defaultMaxIterations: config.runtime.defaultMaxIterations,
  logger,
});

const port = Number(process.env.PORT ?? 8787);
app.listen(port, () => {
  logger.info(`Control server listening on http://localhost:${port}`, { scriptsDir });
});
