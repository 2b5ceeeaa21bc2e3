import { parseArgs, requireArg } from "./args";
import { runScript } from "./commands";
import { loadConfig } from "../config/defaults";
import { Logger } from "../logging/logger";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const scriptPath = requireArg(args.script, "script");
  const config = loadConfig(args.config);
  const logger = Logger.create({ level: args.verbose ? "debug" : config.logging.level });

  const result = await runScript({
    scriptPath,
    outDir: args.out ?? "runs",
    targets: args.targets,
    config,
    logger,
  });

  for (const report of result.reports) {
    const detail = report.error ? ` ${report.error.kind}: ${report.error.message}` : "";
    console.log(
      `[${report.targetId}] ${report.status} after ${report.iterations} iterations in ${report.elapsedMs}ms${detail}`,
    );
  }
  console.log(`Report written to ${result.artifacts.reportPath}`);

  if (!result.ok) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
