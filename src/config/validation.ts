import type { FieldError } from "../core/errors.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asBoolean(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** Reads an optional field: absent → fallback, wrong type → error + fallback. */
export function field<T>(
  errors: FieldError[],
  obj: Record<string, unknown>,
  key: string,
  path: string,
  read: (v: unknown) => T | undefined,
  expected: string,
  fallback: T,
): T {
  const raw = obj[key];
  if (raw === undefined) return fallback;
  const value = read(raw);
  if (value === undefined) {
    pushErr(errors, `${path}.${key}`, `must be ${expected}`);
    return fallback;
  }
  return value;
}

export function intInRange(
  errors: FieldError[],
  obj: Record<string, unknown>,
  key: string,
  path: string,
  min: number,
  max: number,
  fallback: number,
): number {
  const expected = `an integer between ${min} and ${max}`;
  const value = field(errors, obj, key, path, asInt, expected, fallback);
  if (value < min || value > max) {
    pushErr(errors, `${path}.${key}`, `must be ${expected}`);
    return fallback;
  }
  return value;
}
