/**
 * Helpers reading environment variables with consistent coercion rules.
 * Every reader treats blank values as unset and falls back to the supplied
 * default when a value cannot be interpreted.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvSource = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Interprets `"1" | "true" | "yes" | "on"` and their negations as booleans. */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return defaultValue;
}

/** Returns an optional base-10 integer when {@link name} holds one within bounds. */
export function readOptionalInt(name: string, options?: NumberOptions, env: EnvSource = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe integer range would be silently rounded.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(name: string, defaultValue: number, options?: NumberOptions, env: EnvSource = process.env): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Reads a finite floating-point number, falling back to the default otherwise. */
export function readNumber(name: string, defaultValue: number, options?: NumberOptions, env: EnvSource = process.env): number {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const value = Number(normalised);
  return withinBounds(value, options) ? value : defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/** Reads an enum-like variable, case-insensitively, against an allow-list. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T, env: EnvSource = process.env): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === lower) ?? defaultValue;
}
