/**
 * Argument readers shared by the tool definitions. Tool arguments arrive as
 * untyped JSON from the model; these narrow them or throw with the
 * parameter name in the message.
 */

export type RawArgs = Record<string, unknown>;

export function isRecord(value: unknown): value is RawArgs {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readArgs(args: unknown): RawArgs {
  return isRecord(args) ? args : {};
}

export function optionalNumber(params: RawArgs, key: string, label = key): number | undefined {
  const raw = params[key];
  if (raw === undefined || raw === null) return undefined;
  const n = typeof raw === "number" ? raw : typeof raw === "string" && raw.trim() ? Number(raw) : Number.NaN;
  if (!Number.isFinite(n)) {
    throw new Error(`${label} must be a number.`);
  }
  return n;
}

export function optionalPositive(params: RawArgs, key: string, label = key): number | undefined {
  const n = optionalNumber(params, key, label);
  if (n !== undefined && n <= 0) {
    throw new Error(`${label} must be a positive number.`);
  }
  return n;
}

export function requiredPositive(params: RawArgs, key: string, label = key): number {
  const n = optionalPositive(params, key, label);
  if (n === undefined) {
    throw new Error(`${label} is required and must be a positive number.`);
  }
  return n;
}

export function optionalString(params: RawArgs, key: string): string | undefined {
  const raw = params[key];
  return typeof raw === "string" && raw.trim() ? raw.trim() : undefined;
}

export function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}
