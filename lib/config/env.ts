import { AppError } from "@/lib/errors/app-error";

export type EnvSource = Record<string, string | undefined>;

interface IntegerBounds {
  min?: number;
  max?: number;
}

export function readTrimmed(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function parseIntegerConfig(
  name: string,
  rawValue: string | undefined,
  fallback: number,
  errorCode: string,
  { min = 1, max = Number.MAX_SAFE_INTEGER }: IntegerBounds = {},
): number {
  if (!rawValue || rawValue.trim() === "") {
    return fallback;
  }

  const trimmed = rawValue.trim();
  const parsed = Number(trimmed);
  if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new AppError(`${name} must be an integer ${range}.`, errorCode, 500);
  }

  return parsed;
}

export function parseNumberConfig(
  name: string,
  rawValue: string | undefined,
  fallback: number,
  errorCode: string,
  min: number,
  max: number,
): number {
  if (!rawValue || rawValue.trim() === "") {
    return fallback;
  }

  const parsed = Number(rawValue);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new AppError(`${name} must be a number between ${min} and ${max}.`, errorCode, 500);
  }

  return parsed;
}

export function parseListConfig(rawValue: string | undefined, fallback: string[]): string[] {
  if (!rawValue || rawValue.trim() === "") {
    return [...fallback];
  }

  const unique = rawValue
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean)
    .filter((value, index, all) => all.indexOf(value) === index);

  return unique.length > 0 ? unique : [...fallback];
}
