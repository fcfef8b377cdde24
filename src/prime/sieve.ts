import { type Integer } from '../types.js';
import { MAX_SIEVE_LIMIT } from '../constants.js';
import { OutOfRangeError } from '../errors.js';
import { toBigInt } from '../utils/numeric-cast.js';

/** Sieve of Eratosthenes over 0..limit (inclusive). */
export class PrimeSieve {
  readonly limit: number;
  private composite: Uint8Array;

  constructor(limit: Integer) {
    const n = toBigInt(limit);
    if (n < 0n || n > BigInt(MAX_SIEVE_LIMIT)) {
      throw new RangeError(`Sieve limit must be within [0, ${MAX_SIEVE_LIMIT}], got ${n}`);
    }
    this.limit = Number(n);

    this.composite = new Uint8Array(this.limit + 1);
    this.composite[0] = 1;
    if (this.limit >= 1) this.composite[1] = 1;
    for (let i = 2; i * i <= this.limit; i++) {
      if (this.composite[i]) continue;
      for (let j = i * i; j <= this.limit; j += i) {
        this.composite[j] = 1;
      }
    }
  }

  /** Negative numbers are never prime here. */
  isPrime(number: Integer): boolean {
    const n = toBigInt(number);
    if (n > BigInt(this.limit)) {
      throw new OutOfRangeError(`${number} exceeds the sieve limit ${this.limit}`);
    }
    if (n < 0n) return false;
    return this.composite[Number(n)] === 0;
  }
}
