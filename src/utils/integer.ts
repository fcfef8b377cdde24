import { type Integer } from '../types.js';
import { toBigInt, toSafeNumber } from './numeric-cast.js';

export function sign(x: number): number;
export function sign(x: bigint): bigint;
export function sign(x: Integer): Integer {
  if (typeof x === 'bigint') return x > 0n ? 1n : x < 0n ? -1n : 0n;
  return x > 0 ? 1 : x < 0 ? -1 : 0;
}

/** Magnitude of `x`. Always a bigint, so the most negative value of any width fits. */
export function unsignedAbs(x: Integer): bigint {
  const v = toBigInt(x);
  return v < 0n ? -v : v;
}

/** Bit width of `|x|`; 0 for 0. */
export function bitLength(x: Integer): number {
  const v = unsignedAbs(x);
  return v === 0n ? 0 : v.toString(2).length;
}

/**
 * Folds the bits of `|binary|` through `operation`, from the lowest bit up.
 * With addition as the operation this is a popcount.
 */
export function binaryAccumulate<U>(
  binary: Integer,
  initialValue: U,
  operation: (bit: boolean, acc: U) => U,
): U {
  let current = unsignedAbs(binary);
  let result = initialValue;
  while (current !== 0n) {
    result = operation((current & 1n) === 1n, result);
    current >>= 1n;
  }
  return result;
}

function gcdBig(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function gcd(a: number, b: number): number;
export function gcd(a: bigint, b: bigint): bigint;
export function gcd(a: Integer, b: Integer): Integer {
  if (typeof a === 'bigint' && typeof b === 'bigint') return gcdBig(a, b);
  return Number(gcdBig(toBigInt(a), toBigInt(b)));
}

export function lcm(a: number, b: number): number;
export function lcm(a: bigint, b: bigint): bigint;
export function lcm(a: Integer, b: Integer): Integer {
  const x = unsignedAbs(a);
  const y = unsignedAbs(b);
  const result = x === 0n || y === 0n ? 0n : (x / gcdBig(x, y)) * y;
  if (typeof a === 'bigint' && typeof b === 'bigint') return result;
  return toSafeNumber(result);
}
