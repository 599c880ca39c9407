/**
 * Tolerant readers for the `QA_*` environment variables. Every reader returns
 * `undefined` (or the supplied default) when the variable is unset, blank or
 * unparsable, so a typo never crashes the engine at boot: the zod validation in
 * `engine.ts` is the single place where bad values are rejected.
 */

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Parses {@link name} as a safe base-10 integer, or returns `undefined`. */
function readOptionalInt(name: string): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function readInt(name: string, defaultValue: number): number {
  return readOptionalInt(name) ?? defaultValue;
}

export function readNumber(name: string, defaultValue: number): number {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const value = Number.parseFloat(normalised);
  return Number.isFinite(value) ? value : defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively.
 * Unknown literals resolve to `undefined`.
 */
function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }
  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}

export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
