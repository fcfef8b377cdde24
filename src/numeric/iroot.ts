import { type Integer } from '../types.js';
import { UINT64 } from '../constants.js';
import { DomainError } from '../errors.js';
import { unsignedAbs } from '../utils/integer.js';
import { numericCast, toBigInt, toSafeNumber } from '../utils/numeric-cast.js';
import { pow } from './pow.js';
import rawBounds from './iroot-bounds.json' with { type: 'json' };

// ROOT_BOUNDS[n - 1] is the largest y with y^n <= 2^64 - 1, for n in 1..63.
const ROOT_BOUNDS: readonly bigint[] = Object.freeze(rawBounds.map((bound) => BigInt(bound)));

function rootBound(n: bigint): bigint {
  return n > BigInt(ROOT_BOUNDS.length) ? 1n : ROOT_BOUNDS[Number(n) - 1];
}

function irootBig(x: bigint, n: bigint): bigint {
  if (n <= 0n) throw new DomainError(`Root exponent must be positive, got ${n}`);
  if (x < 0n && n % 2n === 0n) {
    throw new DomainError(`Even root of negative number ${x} does not exist`);
  }

  const target = numericCast(unsignedAbs(x), UINT64);
  const bound = rootBound(n);

  // lo^n <= target < hi^n; hi itself is never raised to the power.
  let lo = 0n;
  let hi = (target < bound ? target : bound) + 1n;
  while (hi - lo > 1n) {
    const mid = (lo + hi) >> 1n;
    if (pow(mid, n) <= target) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  return x < 0n ? -lo : lo;
}

/**
 * Integer n-th root: the largest `y` with `y^n <= |x|`, carrying the sign of
 * `x`. Throws DomainError for `n <= 0` and for even roots of negatives.
 */
export function iroot(x: number, n: Integer): number;
export function iroot(x: bigint, n: Integer): bigint;
export function iroot(x: Integer, n: Integer): Integer {
  if (typeof x === 'bigint') return irootBig(x, toBigInt(n));
  return toSafeNumber(irootBig(toBigInt(x), toBigInt(n)));
}
