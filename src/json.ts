/** Minimal runtime schemas and range checks for untrusted input, without external deps. */

import { InvalidConfigError, toError } from './errors.js';

export interface Schema<T> {
  parse(input: unknown): T;
}

export const isObject = (x: unknown): x is Record<string, unknown> =>
  typeof x === 'object' && x !== null && !Array.isArray(x);

/** JSON.parse + schema enforcement. Malformed JSON is reported with its source label. */
export function parseJsonWithSchema<T>(raw: string, schema: Schema<T>, source = 'input'): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new InvalidConfigError(source, `not valid JSON (${toError(e).message})`);
  }
  return schema.parse(parsed);
}

/** Accept numbers and numeric strings (env vars, CLI flags). */
export function toNumber(key: string, x: unknown): number {
  const n = typeof x === 'string' && x.trim() !== '' ? Number(x) : x;
  if (typeof n !== 'number' || !Number.isFinite(n)) throw new InvalidConfigError(key, `expected a number, got ${JSON.stringify(x)}`);
  return n;
}

export function probability(key: string, x: number): number {
  if (!Number.isFinite(x) || x < 0 || x > 1) throw new InvalidConfigError(key, `must be within [0, 1], got ${x}`);
  return x;
}

export function positiveInt(key: string, x: number): number {
  if (!Number.isInteger(x) || x < 1) throw new InvalidConfigError(key, `must be a positive integer, got ${x}`);
  return x;
}

export function nonNegativeInt(key: string, x: number): number {
  if (!Number.isInteger(x) || x < 0) throw new InvalidConfigError(key, `must be a non-negative integer, got ${x}`);
  return x;
}
