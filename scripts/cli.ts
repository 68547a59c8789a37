export type FlagValue = string | boolean;

export interface ParsedArgs {
  flags: Record<string, FlagValue>;
  positional: string[];
}

export interface ParseArgsOptions {
  shortBooleanFlags?: string[];
}

export function parseArgs(
  argv: string[],
  options?: ParseArgsOptions
): ParsedArgs {
  const flags: Record<string, FlagValue> = {};
  const positional: string[] = [];
  const shortBooleanFlags = new Set(options?.shortBooleanFlags ?? []);

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (arg.startsWith("--")) {
      const eqIndex = arg.indexOf("=");
      if (eqIndex !== -1) {
        flags[arg.slice(2, eqIndex)] = arg.slice(eqIndex + 1);
        continue;
      }
      const key = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[key] = next;
        i += 1;
      } else {
        flags[key] = true;
      }
      continue;
    }
    if (arg.startsWith("-") && arg.length === 2 && shortBooleanFlags.has(arg.slice(1))) {
      flags[arg.slice(1)] = true;
      continue;
    }
    positional.push(arg);
  }

  return { flags, positional };
}

export function assertKnownFlags(
  flags: Record<string, FlagValue>,
  allowed: Iterable<string>
): void {
  const allowedFlags = new Set(allowed);
  const unknown = Object.keys(flags).filter((key) => !allowedFlags.has(key));
  if (unknown.length > 0) {
    throw new Error(`Unknown option(s): ${unknown.map((item) => `--${item}`).join(", ")}`);
  }
}

export interface IntegerBounds {
  min?: number;
  max?: number;
}

function checkInteger(value: number, label: string, bounds?: IntegerBounds): number {
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid value for --${label}: expected an integer`);
  }
  if (bounds?.min !== undefined && value < bounds.min) {
    throw new Error(`Invalid value for --${label}: must be at least ${bounds.min}`);
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    throw new Error(`Invalid value for --${label}: must be at most ${bounds.max}`);
  }
  return value;
}

export function parseIntegerValue(
  raw: FlagValue | undefined,
  fallback: number,
  label: string,
  bounds?: IntegerBounds
): number {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw === "boolean") {
    throw new Error(`Missing value for --${label}`);
  }
  return checkInteger(Number(raw), label, bounds);
}

/** Parses `"1,2, 3"`; returns undefined when the flag was not given. */
export function parseIntegerList(
  raw: FlagValue | undefined,
  label: string,
  bounds?: IntegerBounds
): number[] | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (typeof raw === "boolean") {
    throw new Error(`Missing value for --${label}`);
  }
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new Error(`Missing value for --${label}`);
  }
  return items.map((item) => checkInteger(Number(item), label, bounds));
}
