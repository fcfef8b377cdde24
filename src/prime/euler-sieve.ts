import { type Factorization, type Integer, type IntegerType, type SieveOptions } from '../types.js';
import { DEFAULT_SIEVE_OPTIONS, MAX_SIEVE_LIMIT } from '../constants.js';
import { DomainError, OutOfRangeError, OverflowError } from '../errors.js';
import { bitLength, unsignedAbs } from '../utils/integer.js';
import { digits, numericCast, toBigInt } from '../utils/numeric-cast.js';
import { createTable, type FactorTable } from './table.js';

/**
 * Sieve of Euler. Finds every prime up to `limit` (inclusive) in linear
 * time, and records the minimum prime factor of every number in range,
 * which gives the factorization of each of them.
 *
 * The `p * num` products are checked against the accumulator width once,
 * up front: a limit whose square may not fit is rejected with an
 * OverflowError before anything is allocated.
 */
export class EulerSieve {
  readonly limit: number;
  readonly type: IntegerType;
  readonly primes: readonly number[];
  private minFactor: FactorTable;

  constructor(limit: Integer, options: Partial<SieveOptions> = {}) {
    const { type, accumulator } = { ...DEFAULT_SIEVE_OPTIONS, ...options };
    const n = numericCast(limit, type);
    if (n < 0n) throw new RangeError(`Sieve limit must not be negative, got ${n}`);
    if (n > BigInt(MAX_SIEVE_LIMIT)) {
      throw new RangeError(`Sieve limit ${n} exceeds the largest table size ${MAX_SIEVE_LIMIT}`);
    }
    if (bitLength(n) * 2 > digits(accumulator)) {
      throw new OverflowError(
        `Multiplication will overflow ${accumulator.name} when sieving up to ${n}. Please use larger integer types.`,
      );
    }

    this.limit = Number(n);
    this.type = type;

    const minFactor = createTable(this.limit + 1, this.limit);
    const primes: number[] = [];
    for (let num = 2; num <= this.limit; num++) {
      if (minFactor[num] === 0) {
        primes.push(num);
        minFactor[num] = num;
      }
      // Stopping at the minimum factor of num marks each composite exactly once.
      const bound = minFactor[num];
      for (const prime of primes) {
        if (prime > bound) break;
        const composite = prime * num;
        if (composite > this.limit) break;
        minFactor[composite] = prime;
      }
    }

    this.minFactor = minFactor;
    this.primes = Object.freeze(primes);
  }

  /** Smallest prime dividing `|number|`. */
  minPrimeFactor(number: Integer): number {
    const magnitude = unsignedAbs(number);
    if (magnitude <= 1n) {
      throw new DomainError(`Minimum prime factor does not exist for ${number}`);
    }
    if (magnitude > BigInt(this.limit)) {
      throw new OutOfRangeError(`${number} exceeds the sieve limit ${this.limit}`);
    }
    return this.minFactor[Number(magnitude)];
  }

  isPrime(number: Integer): boolean {
    const n = toBigInt(number);
    if (n > BigInt(this.limit)) {
      throw new OutOfRangeError(`${number} exceeds the sieve limit ${this.limit}`);
    }
    if (n < 2n) return false;
    return this.minFactor[Number(n)] === Number(n);
  }

  /** Prime factorization of `|number|` as ascending `[prime, exponent]` pairs. */
  factorize(number: Integer): Factorization {
    let prime = this.minPrimeFactor(number);
    let rest = Number(unsignedAbs(number));
    const factors: Factorization = [];
    while (rest > 1) {
      let exponent = 0;
      while (rest % prime === 0) {
        rest /= prime;
        exponent++;
      }
      factors.push([prime, exponent]);
      prime = this.minFactor[rest];
    }
    return factors;
  }
}
