import { InvalidQueryError } from '../models/Errors';

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

/**
 * Parses `--key=value`, bare `--flag` and positional arguments.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq === -1) {
      flags.set(body, true);
    } else {
      flags.set(body.slice(0, eq), body.slice(eq + 1));
    }
  }

  return { positional, flags };
}

export function getString(args: ParsedArgs, key: string): string | undefined {
  const value = args.flags.get(key);
  if (value === true) {
    throw new InvalidQueryError(`--${key} needs a value (--${key}=...)`);
  }
  return value;
}

export function requireString(args: ParsedArgs, key: string): string {
  const value = getString(args, key);
  if (value === undefined || value === '') {
    throw new InvalidQueryError(`Missing required --${key}=...`);
  }
  return value;
}

export function getInt(args: ParsedArgs, key: string, fallback?: number): number | undefined {
  const raw = getString(args, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidQueryError(`--${key} must be an integer, got "${raw}"`);
  }
  return value;
}

export function requireInt(args: ParsedArgs, key: string): number {
  const value = getInt(args, key);
  if (value === undefined) {
    throw new InvalidQueryError(`Missing required --${key}=...`);
  }
  return value;
}

export function getList(args: ParsedArgs, key: string): string[] | undefined {
  const raw = getString(args, key);
  if (raw === undefined) return undefined;
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}
