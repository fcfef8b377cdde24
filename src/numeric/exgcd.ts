import { type Integer } from '../types.js';
import { toBigInt, toSafeNumber } from '../utils/numeric-cast.js';

function exgcdBig(a: bigint, b: bigint): [bigint, bigint] {
  // xa * |a| + ya * |b| == ta
  // xb * |a| + yb * |b| == tb
  let ta = a < 0n ? -a : a;
  let tb = b < 0n ? -b : b;
  let xa = 1n, ya = 0n;
  let xb = 0n, yb = 1n;

  while (tb !== 0n) {
    const q = ta / tb;
    [ta, tb] = [tb, ta - q * tb];
    [xa, xb] = [xb, xa - q * xb];
    [ya, yb] = [yb, ya - q * yb];
  }

  return [a < 0n ? -xa : xa, b < 0n ? -ya : ya];
}

/**
 * Extended Euclidean algorithm. Returns `[x, y]` with
 * `x*a + y*b == gcd(|a|, |b|)`, `|x| <= |b|` and `|y| <= |a|`.
 * `exgcd(0, 0)` is `[1, 0]`.
 */
export function exgcd(a: number, b: number): [number, number];
export function exgcd(a: bigint, b: bigint): [bigint, bigint];
export function exgcd(a: Integer, b: Integer): [number, number] | [bigint, bigint] {
  if (typeof a === 'bigint' && typeof b === 'bigint') return exgcdBig(a, b);
  const [x, y] = exgcdBig(toBigInt(a), toBigInt(b));
  return [toSafeNumber(x), toSafeNumber(y)];
}
