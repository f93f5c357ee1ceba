import { ConversionError } from '../interfaces/ConfigurationInterfaces';

/**
 * Text ↔ typed value conversions shared by sections, the facade and events.
 *
 * Parsers take the stored text (or undefined when the variable is unset) and
 * return the type's zero value for undefined. Formatters produce the
 * canonical text that parses back to an equal value.
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_NUMBERS = new Set(['NaN', 'Infinity', '+Infinity', '-Infinity']);

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function isInteger32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function isInteger64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

// ----------------------------------------------------------------------------
// Parsing
// ----------------------------------------------------------------------------

export function parseInteger(text: string | undefined): number {
  if (text === undefined) {
    return 0;
  }
  if (!INTEGER_PATTERN.test(text)) {
    throw new ConversionError(text, 'integer');
  }
  const value = Number(text);
  if (!isInteger32(value)) {
    throw new ConversionError(text, 'integer');
  }
  // Normalizes "-0" to 0
  return value === 0 ? 0 : value;
}

export function parseLong(text: string | undefined): bigint {
  if (text === undefined) {
    return 0n;
  }
  if (!INTEGER_PATTERN.test(text)) {
    throw new ConversionError(text, 'long');
  }
  // BigInt() rejects a leading '+'
  const value = BigInt(text.startsWith('+') ? text.slice(1) : text);
  if (!isInteger64(value)) {
    throw new ConversionError(text, 'long');
  }
  return value;
}

function parseDecimal(text: string, targetType: 'float' | 'double'): number {
  if (SPECIAL_NUMBERS.has(text) || DECIMAL_PATTERN.test(text)) {
    return Number(text);
  }
  throw new ConversionError(text, targetType);
}

export function parseFloat32(text: string | undefined): number {
  if (text === undefined) {
    return 0;
  }
  return Math.fround(parseDecimal(text, 'float'));
}

export function parseDouble(text: string | undefined): number {
  if (text === undefined) {
    return 0;
  }
  return parseDecimal(text, 'double');
}

export function parseBoolean(text: string | undefined): boolean {
  if (text === undefined) {
    return false;
  }
  switch (text.toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new ConversionError(text, 'boolean');
  }
}

// ----------------------------------------------------------------------------
// Formatting
// ----------------------------------------------------------------------------

export function formatInteger(value: number): string {
  if (!isInteger32(value)) {
    throw new RangeError(`${value} is not a 32-bit integer`);
  }
  return String(value === 0 ? 0 : value);
}

export function formatLong(value: bigint): string {
  if (!isInteger64(value)) {
    throw new RangeError(`${value} is not a 64-bit integer`);
  }
  return value.toString();
}

/**
 * Shortest decimal text that rounds to the same single-precision value
 */
export function formatFloat(value: number): string {
  const single = Math.fround(value);
  if (!Number.isFinite(single) || single === 0) {
    return String(single === 0 ? 0 : single);
  }
  for (let precision = 1; precision < 9; precision++) {
    const candidate = Number(single.toPrecision(precision));
    if (Math.fround(candidate) === single) {
      return String(candidate);
    }
  }
  // Nine significant digits always identify a float32
  return String(Number(single.toPrecision(9)));
}

export function formatDouble(value: number): string {
  return String(value === 0 ? 0 : value);
}

export function formatBoolean(value: boolean): string {
  return value ? 'true' : 'false';
}
