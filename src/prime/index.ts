import { type Integer } from '../types.js';
import { toBigInt, toSafeNumber } from '../utils/numeric-cast.js';

export { EulerSieve } from './euler-sieve.js';
export { PrimeSieve } from './sieve.js';

/** Trial division. */
export function isPrime(number: Integer): boolean {
  const n = toBigInt(number);
  if (n < 2n) return false;
  for (let i = 2n; i * i <= n; i++) {
    if (n % i === 0n) return false;
  }
  return true;
}

/**
 * Every pair `[x, y]` with `n >= x >= y >= 0` and `gcd(x, y) == 1`, sorted
 * by `x` then `y`.
 *
 * Besides `[1, 0]` and `[1, 1]`, each such pair with `x > y > 0` appears
 * exactly once in one of the two ternary trees rooted at `[2, 1]` and
 * `[3, 1]`; children always have a larger `x`, so subtrees past `n` are cut.
 */
export function coprimePairs(n: Integer): Array<[number, number]> {
  const limit = toSafeNumber(toBigInt(n));
  if (limit < 0) throw new RangeError(`coprimePairs bound must not be negative, got ${limit}`);

  const pairs: Array<[number, number]> = [];
  if (limit >= 1) pairs.push([1, 0], [1, 1]);

  const stack: Array<[number, number]> = [[2, 1], [3, 1]];
  let top = stack.pop();
  while (top !== undefined) {
    const [m, k] = top;
    if (m <= limit) {
      pairs.push([m, k]);
      stack.push([2 * m - k, m], [2 * m + k, m], [m + 2 * k, k]);
    }
    top = stack.pop();
  }

  return pairs.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
}
