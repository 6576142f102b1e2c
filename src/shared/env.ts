export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

const TRUTHY_FLAGS = new Set(["1", "true", "yes", "on"]);
const FALSY_FLAGS = new Set(["0", "false", "no", "off"]);

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (TRUTHY_FLAGS.has(normalised)) {
    return true;
  }
  if (FALSY_FLAGS.has(normalised)) {
    return false;
  }
  return null;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
};

type NumericOptions = {
  min: number;
  max: number;
};

/**
 * Reads a number the operator may tune freely; out-of-range values are
 * clamped and garbage falls back to `null` (caller default).
 */
export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  const parsed = parseStrictNumericEnv(value);
  if (parsed === null || Number.isNaN(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

/**
 * Reads a number that must be taken as written. Unset or blank gives
 * `null`; anything unparseable gives `NaN` so validation can reject it.
 */
export const parseStrictNumericEnv = (
  value: string | null | undefined,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  return Number(trimmed);
};

export const getEnvVar = (key: string): string | undefined => {
  if (typeof process !== "undefined" && process.env[key] !== undefined) {
    return process.env[key];
  }
  return undefined;
};
