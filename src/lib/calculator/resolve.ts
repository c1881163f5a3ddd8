import type { ResponseSet, ResponseValue } from '@/types/estimator';

/**
 * Return the first response present under `keys`, or `fallback`.
 *
 * Keys are tried in order, so a current field name shadows its legacy name
 * even when the legacy field is also present.
 */
export function resolveResponse(
  responses: ResponseSet,
  keys: readonly string[],
  fallback: ResponseValue
): ResponseValue {
  for (const key of keys) {
    const value = responses[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return fallback;
}

export function resolveNumber(responses: ResponseSet, keys: readonly string[], fallback: number): number {
  const value = resolveResponse(responses, keys, fallback);
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function resolveLabel(responses: ResponseSet, keys: readonly string[], fallback: string): string {
  const value = resolveResponse(responses, keys, fallback);
  return typeof value === 'string' ? value : String(value);
}

export function resolveFlag(responses: ResponseSet, keys: readonly string[]): boolean {
  return Boolean(resolveResponse(responses, keys, false));
}

export function hasResponse(responses: ResponseSet, keys: readonly string[]): boolean {
  return keys.some(key => responses[key] !== undefined && responses[key] !== null);
}

/**
 * Look up a coefficient, trying each table in order
 */
export function lookupCoefficient(
  label: string,
  tables: ReadonlyArray<Readonly<Record<string, number>>>,
  fallback: number
): number {
  for (const table of tables) {
    if (Object.prototype.hasOwnProperty.call(table, label)) {
      return table[label];
    }
  }
  return fallback;
}
