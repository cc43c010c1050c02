/**
 * Runtime Values
 *
 * The closed set of values a program can produce, plus the value
 * utilities shared by every operation site.
 */

/** Any runtime value (null is nil) */
export type LoxValue = number | string | boolean | null;

/** Kind names used in type errors and host inspection */
export type ValueKind = 'number' | 'string' | 'boolean' | 'nil';

/** Classify a value */
export function inferKind(value: LoxValue): ValueKind {
  if (value === null) return 'nil';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  return 'boolean';
}

/**
 * Truthiness used by if, while, !, and, or.
 * nil, false and 0 are falsy; "" and NaN are truthy.
 */
export function isTruthy(value: LoxValue): boolean {
  switch (inferKind(value)) {
    case 'nil':
      return false;
    case 'boolean':
      return value !== false;
    case 'number':
      return value !== 0;
    case 'string':
      return true;
  }
}

/** Equality for == and !=. Values of different kinds are never equal. */
export function valuesEqual(a: LoxValue, b: LoxValue): boolean {
  if (inferKind(a) !== inferKind(b)) return false;
  return a === b;
}

/**
 * Write a number in positional notation. String() switches to exponent
 * form below 1e-6 and from 1e21 up; the digits it picks are kept.
 */
function formatNumber(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign = '', lead = '', fraction = '', exponent = '0'] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Format a value for print output.
 * Numbers print in positional notation, integral ones without a
 * fractional part; strings print unquoted.
 */
export function formatValue(value: LoxValue): string {
  switch (inferKind(value)) {
    case 'nil':
      return 'nil';
    case 'number':
      return formatNumber(Number(value));
    case 'boolean':
    case 'string':
      return String(value);
  }
}
