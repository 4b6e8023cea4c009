/**
 * Value coercion helpers for loosely structured evidence.
 *
 * Every helper returns `undefined` instead of throwing; callers pick the
 * neutral default.
 */

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Plain object check (arrays and null excluded)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Own-property lookup; inherited keys such as `constructor` read as absent
 */
export function ownValue(map: Record<string, unknown>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}

/**
 * Copy of a record's own enumerable entries. Keys such as `__proto__` stay
 * ordinary data properties.
 */
export function copyOwnEntries(map: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(map));
}

/**
 * Coerce to an integer.
 *
 * Finite numbers truncate toward zero; strings must hold an optional sign
 * and digits only. Booleans, `null`, decimal strings and everything else fail.
 */
export function coerceInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

/**
 * Coerce to a finite float. Numeric strings are accepted.
 */
export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Normalize a primitive-or-list field into a list of strings.
 *
 * Lists keep their string, number and boolean entries; a single primitive
 * becomes a one-element list; anything else yields an empty list.
 */
export function normalizeStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter(isPrimitive).map((item) => String(item));
  }
  if (isPrimitive(value)) {
    return [String(value)];
  }
  return [];
}

function isPrimitive(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
