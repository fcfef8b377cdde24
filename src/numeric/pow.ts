import { type Integer, type MultiplicativeElement } from '../types.js';
import { DomainError } from '../errors.js';
import { binaryAccumulate } from '../utils/integer.js';

function binaryPow<T>(base: T, exponent: Integer, identity: T, multiply: (lhs: T, rhs: T) => T): T {
  // After the n-th bit, `power` is base^(2^n) and `result` covers the first n bits.
  const [result] = binaryAccumulate<[T, T]>(exponent, [identity, base], (bit, [result, power]) => [
    bit ? multiply(result, power) : result,
    multiply(power, power),
  ]);
  return result;
}

function isNegative(exponent: Integer): boolean {
  return typeof exponent === 'bigint' ? exponent < 0n : exponent < 0;
}

/**
 * Raises `base` to `exponent` with O(log |exponent|) multiplications.
 *
 * A negative exponent returns the inverse of the positive power: `1 / x` for
 * numbers, truncating `1n / x` for bigints (exact only for ±1), and
 * `inverse()` for ring elements. A number base with a non-integer exponent is
 * `Math.pow`.
 */
export function pow(base: number, exponent: Integer): number;
export function pow(base: bigint, exponent: Integer): bigint;
export function pow<T extends MultiplicativeElement<T>>(base: T, exponent: Integer): T;
export function pow<T extends MultiplicativeElement<T>>(
  base: number | bigint | T,
  exponent: Integer,
): number | bigint | T {
  if (typeof base === 'number') {
    if (typeof exponent === 'number' && !Number.isSafeInteger(exponent)) {
      return Math.pow(base, exponent);
    }
    const result = binaryPow<number>(base, exponent, 1, (x, y) => x * y);
    return isNegative(exponent) ? 1 / result : result;
  }

  if (typeof exponent === 'number' && !Number.isInteger(exponent)) {
    throw new RangeError(`Non-integer exponent ${exponent} needs a number base`);
  }

  if (typeof base === 'bigint') {
    const result = binaryPow<bigint>(base, exponent, 1n, (x, y) => x * y);
    if (!isNegative(exponent)) return result;
    if (result === 0n) throw new DomainError('Zero has no multiplicative inverse');
    return 1n / result;
  }

  const result = binaryPow<T>(base, exponent, base.one(), (x, y) => x.multiply(y));
  return isNegative(exponent) ? result.inverse() : result;
}
