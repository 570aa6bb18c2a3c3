/**
 * Readers for the `BRIDGE_*` environment variables. Every reader trims the raw
 * value, treats blank strings as unset and falls back to the supplied default
 * when the literal cannot be coerced, so a typo never crashes the bridge at
 * boot.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Parses a human-friendly boolean literal ("yes", "off", "1", ...). */
export function parseBoolLiteral(raw: string | undefined): boolean | undefined {
  const normalised = normaliseEnvValue(raw)?.toLowerCase();
  if (normalised === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return undefined;
}

export function readBool(name: string, defaultValue: boolean): boolean {
  return parseBoolLiteral(process.env[name]) ?? defaultValue;
}

interface IntOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/**
 * Returns the base-10 integer stored in {@link name}. Literals outside the
 * safe integer range or the configured bounds are ignored.
 */
export function readOptionalInt(name: string, options: IntOptions = {}): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (options.min !== undefined && value < options.min) {
    return undefined;
  }
  if (options.max !== undefined && value > options.max) {
    return undefined;
  }
  return value;
}

export function readInt(name: string, defaultValue: number, options?: IntOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}
