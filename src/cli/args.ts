import { ParticleNumericsError } from "../core/errors.js";
import type { Implementation, PositionModel } from "../core/types.js";

export class UsageError extends ParticleNumericsError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedArgs {
  command: string | undefined;
  flags: Record<string, string>;
}

/**
 * `--key value` pairs; a flag followed by another flag (or nothing) is "true".
 * The first bare word is the command.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  let command: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      command ??= a;
      continue;
    }
    const key = a.slice(2);
    const val = argv[i + 1];
    if (!val || val.startsWith("--")) {
      flags[key] = "true";
    } else {
      flags[key] = val;
      i++;
    }
  }
  return { command, flags };
}

export function numberFlag(flags: Record<string, string>, key: string, fallback?: number): number {
  const raw = flags[key];
  if (raw === undefined) {
    if (fallback === undefined) throw new UsageError(`--${key} is required`);
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new UsageError(`--${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function optionalNumberFlag(flags: Record<string, string>, key: string): number | undefined {
  return flags[key] === undefined ? undefined : numberFlag(flags, key);
}

export function implementationFlag(flags: Record<string, string>, key: string): Implementation | undefined {
  const raw = flags[key];
  if (raw === undefined) return undefined;
  if (raw === "library" || raw === "self-contained") return raw;
  throw new UsageError(`--${key} must be "library" or "self-contained", got "${raw}"`);
}

export function modelFlag(flags: Record<string, string>): PositionModel {
  const raw = flags["model"] ?? "uniform";
  if (raw === "uniform" || raw === "shell") return raw;
  throw new UsageError(`--model must be "uniform" or "shell", got "${raw}"`);
}
