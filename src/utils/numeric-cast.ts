import { type Integer, type IntegerType } from '../types.js';

/** Number of value bits, sign bit excluded. */
export function digits(type: IntegerType): number {
  return type.signed ? type.bits - 1 : type.bits;
}

export function minValue(type: IntegerType): bigint {
  return type.signed ? -(1n << BigInt(type.bits - 1)) : 0n;
}

export function maxValue(type: IntegerType): bigint {
  return (1n << BigInt(digits(type))) - 1n;
}

/**
 * Converts an integer to bigint. Numbers must be safe integers, otherwise
 * their exact value is unknown.
 */
export function toBigInt(value: Integer): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${value} is not a safe integer`);
  }
  return BigInt(value);
}

export function toSafeNumber(value: bigint): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new RangeError(`${value} cannot be represented exactly as a number`);
  }
  return Number(value);
}

export function fitsIn(value: bigint, type: IntegerType): boolean {
  return value >= minValue(type) && value <= maxValue(type);
}

/** Checked conversion of `value` into the range of `type`. */
export function numericCast(value: Integer, type: IntegerType): bigint {
  const v = toBigInt(value);
  if (!fitsIn(v, type)) {
    throw new RangeError(`${v} is out of range for ${type.name}`);
  }
  return v;
}
