/**
 * Helpers reading environment variables with predictable coercion rules.
 * Invalid literals never throw: they resolve to `undefined` (optional readers)
 * or to the supplied default, so operators get the documented behaviour
 * instead of a crash on a typo.
 */

/** Normalises the raw value retrieved from {@link process.env}. */
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
  // `Infinity` and `NaN` are rejected so budgets never become unbounded.
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

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(name: string, defaultValue: number, options?: NumberOptions, env?: NodeJS.ProcessEnv): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns an optional floating-point number when {@link name} contains a finite value. */
export function readOptionalNumber(name: string, options?: NumberOptions, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const value = Number(normalised);
  return withinBounds(value, options) ? value : undefined;
}

export function readNumber(name: string, defaultValue: number, options?: NumberOptions, env?: NodeJS.ProcessEnv): number {
  return readOptionalNumber(name, options, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable, case-insensitively, returning the canonical
 * spelling from {@link allowed}.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: NodeJS.ProcessEnv = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T, env?: NodeJS.ProcessEnv): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}
