import { parseArgs, requireArg } from "./args";
import { checkScript } from "./commands";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const result = await checkScript(requireArg(args.script, "script"));
  for (const line of result.lines) {
    (result.ok ? console.log : console.error)(line);
  }
  if (!result.ok) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
