/**
 * Type Guards & Field Parsers
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

export function isDefined<T>(value: T | undefined | null): value is T {
  return value !== undefined && value !== null;
}

/**
 * Parse an integer field; blank → null, garbage → null
 */
export function parseOptionalInt(text: string): number | null {
  const raw = text.trim();
  if (!/^[-+]?\d+$/.test(raw)) return null;
  return parseInt(raw, 10);
}

/**
 * Parse a decimal field; blank, garbage or overflow → null
 */
export function parseOptionalFloat(text: string): number | null {
  const raw = text.trim();
  if (!/^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/.test(raw)) return null;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : null;
}
