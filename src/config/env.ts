/**
 * Typed readers over environment variables. Every reader trims the raw value
 * and treats blank strings as unset (`undefined`). A variable that is set to a
 * literal the reader cannot coerce raises a {@link ConfigurationError} whose
 * issue path is the variable name.
 *
 * Readers take the variable table as an optional trailing argument so config
 * loaders can be exercised against a literal record instead of `process.env`.
 */
import { ConfigurationError } from "./errors.js";

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Shape of the variable table consumed by the readers. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function invalidVariable(name: string, raw: string, expected: string): ConfigurationError {
  return new ConfigurationError(`invalid value for ${name}`, [
    { path: name, message: `expected ${expected}, received '${raw}'` },
  ]);
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  throw invalidVariable(name, normalised, "a boolean (1/0, true/false, yes/no, on/off)");
}

/** Returns an optional integer when {@link name} contains a base-10 literal. */
export function readOptionalInt(name: string, env: EnvSource = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const value = /^[-+]?\d+$/.test(normalised) ? Number.parseInt(normalised, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw invalidVariable(name, normalised, "an integer");
  }
  return value;
}

/** Returns an optional floating-point number when {@link name} contains a finite decimal literal. */
export function readOptionalNumber(name: string, env: EnvSource = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  // Rejects hex, `Infinity` and locale decimals such as `0,5`.
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(normalised)) {
    throw invalidVariable(name, normalised, "a decimal number");
  }
  const value = Number.parseFloat(normalised);
  if (!Number.isFinite(value)) {
    throw invalidVariable(name, normalised, "a finite number");
  }
  return value;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable. Comparison is case-insensitive and the
 * canonical spelling from {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  const match = allowed.find((candidate) => candidate.toLowerCase() === lower);
  if (match === undefined) {
    throw invalidVariable(name, normalised, `one of ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Splits a CSV literal, trimming whitespace and ignoring empty segments.
 * Order and duplicates are preserved: start identifiers legitimately repeat
 * across languages.
 */
export function parseCsvList(value: string): string[] {
  return value
    .split(",")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

/** Reads a CSV variable; `undefined` when unset or when no segment survives. */
export function readOptionalCsv(name: string, env: EnvSource = process.env): string[] | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const items = parseCsvList(normalised);
  return items.length > 0 ? items : undefined;
}
