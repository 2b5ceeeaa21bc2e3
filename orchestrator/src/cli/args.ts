export interface CliArgs {
  script?: string;
  targets?: string[];
  out?: string;
  config?: string;
  verbose?: boolean;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  let index = 0;

  while (index < argv.length) {
    const token = argv[index];
    if (!token.startsWith("--")) {
      index += 1;
      continue;
    }

    const key = token.slice(2);
    if (key === "verbose") {
      args.verbose = true;
      index += 1;
      continue;
    }

    const next = argv[index + 1];
    const value = next !== undefined && !next.startsWith("--") ? next : "";
    index += value ? 2 : 1;

    switch (key) {
      case "script":
        args.script = value;
        break;
      case "targets":
        args.targets = splitList(value);
        break;
      case "out":
        args.out = value;
        break;
      case "config":
        args.config = value;
        break;
      default:
        break;
    }
  }

  return args;
}

export function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`Missing required argument: --${name}`);
  }
  return value;
}
