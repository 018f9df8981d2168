export type CliArgs = Record<string, string | boolean>;

/** Accepts `--key value`, `--key=value` and bare `--flag`. */
export function parseArgs(argv: string[]): CliArgs {
  const output: CliArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }

    const body = token.slice(2);
    const equals = body.indexOf("=");
    if (equals > 0) {
      output[body.slice(0, equals)] = body.slice(equals + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      output[body] = true;
      continue;
    }

    output[body] = next;
    i += 1;
  }

  return output;
}

export function optionalArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function requireArg(args: CliArgs, key: string): string {
  const value = optionalArg(args, key);
  if (value === undefined) {
    throw new Error(`Missing required argument --${key}`);
  }
  return value;
}

export function hasFlag(args: CliArgs, key: string): boolean {
  return args[key] === true || args[key] === "true";
}
