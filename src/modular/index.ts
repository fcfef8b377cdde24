import { type Integer, type IntegerType, type Result, type RingElement } from '../types.js';
import { DEFAULT_MODULAR_TYPE } from '../constants.js';
import { DomainError, OverflowError } from '../errors.js';
import { exgcd } from '../numeric/exgcd.js';
import { pow } from '../numeric/pow.js';
import { bitLength } from '../utils/integer.js';
import { addMod, mulMod, negMod, normalize, subMod } from '../utils/modular-arithmetic.js';
import { digits, numericCast, toSafeNumber } from '../utils/numeric-cast.js';
import { pred, succ } from './operators.js';

export type Operand<M extends bigint> = Modular<M> | Integer;

const DECIMAL = /^[+-]?\d+$/;

/**
 * The ring of integers modulo `modulus`, backed by an integer type.
 *
 * The modulus is part of the type, so elements of `ModularRing<7n>` and
 * `ModularRing<10n>` cannot be mixed. A modulus too wide for the backing
 * type is rejected here, before any element exists: addition needs one
 * spare bit, multiplication needs twice the modulus width.
 */
export class ModularRing<M extends bigint = bigint> {
  readonly modulus: M;
  readonly type: IntegerType;

  constructor(modulus: M, type: IntegerType = DEFAULT_MODULAR_TYPE) {
    if (modulus <= 0n) {
      throw new RangeError(`Modulus must be a positive integer, got ${modulus}`);
    }
    numericCast(modulus, type);

    const width = bitLength(modulus);
    if (width + 1 > digits(type)) {
      throw new OverflowError(
        `Modular addition may overflow ${type.name} for modulus ${modulus}. Please use larger integer types.`,
      );
    }
    if (width * 2 > digits(type)) {
      throw new OverflowError(
        `Modular multiplication may overflow ${type.name} for modulus ${modulus}. Please use larger integer types.`,
      );
    }

    this.modulus = modulus;
    this.type = type;
  }

  of(value: Integer): Modular<M> {
    return new Modular(this, value);
  }

  fromInt(value: Integer): Modular<M> {
    return this.of(value);
  }

  zero(): Modular<M> {
    return this.of(0n);
  }

  one(): Modular<M> {
    return this.of(1n);
  }

  /** Reads plain decimal text, e.g. "-4" or "123". */
  parse(text: string): Modular<M> {
    const trimmed = text.trim();
    if (!DECIMAL.test(trimmed)) {
      throw new SyntaxError(`Cannot parse "${text}" as a decimal integer`);
    }
    return this.of(BigInt(trimmed));
  }

  lift(value: Operand<M>): Modular<M> {
    if (!(value instanceof Modular)) return this.of(value);
    if (value.modulus !== this.modulus) {
      throw new TypeError(`Cannot mix modulus ${value.modulus} with modulus ${this.modulus}`);
    }
    return value;
  }
}

/** An element of a ModularRing, kept in [0, modulus). */
export class Modular<M extends bigint = bigint> implements RingElement<Modular<M>> {
  readonly ring: ModularRing<M>;
  private value: bigint = 0n;

  constructor(ring: ModularRing<M>, value: Integer = 0n) {
    this.ring = ring;
    this.set(value);
  }

  get modulus(): M {
    return this.ring.modulus;
  }

  get(): bigint {
    return this.value;
  }

  toInt(): bigint {
    return this.value;
  }

  toNumber(): number {
    return toSafeNumber(this.value);
  }

  /** Replaces the residue; `value` must fit the ring's integer type. */
  set(value: Integer): this {
    this.value = normalize(numericCast(value, this.ring.type), this.ring.modulus);
    return this;
  }

  add(rhs: Operand<M>): Modular<M> {
    return this.ring.of(addMod(this.value, this.ring.lift(rhs).value, this.modulus));
  }

  negate(): Modular<M> {
    return this.ring.of(negMod(this.value, this.modulus));
  }

  subtract(rhs: Operand<M>): Modular<M> {
    return this.ring.of(subMod(this.value, this.ring.lift(rhs).value, this.modulus));
  }

  multiply(rhs: Operand<M>): Modular<M> {
    return this.ring.of(mulMod(this.value, this.ring.lift(rhs).value, this.modulus));
  }

  divide(rhs: Operand<M>): Modular<M> {
    return this.multiply(this.ring.lift(rhs).inverse());
  }

  /** Multiplicative inverse; DomainError unless gcd(value, modulus) is 1. */
  inverse(): Modular<M> {
    const result = this.tryInverse();
    if (!result.ok) throw result.error;
    return result.value;
  }

  tryInverse(): Result<Modular<M>, DomainError> {
    const [x, y] = exgcd(this.value, this.modulus);
    if (x * this.value + y * this.modulus !== 1n) {
      return {
        ok: false,
        error: new DomainError(`${this.value} has no inverse modulo ${this.modulus}`),
      };
    }
    return { ok: true, value: this.ring.of(normalize(x, this.modulus)) };
  }

  pow(exponent: Integer): Modular<M> {
    return pow<Modular<M>>(this, exponent);
  }

  equal(rhs: Operand<M>): boolean {
    return this.value === this.ring.lift(rhs).value;
  }

  notEqual(rhs: Operand<M>): boolean {
    return !this.equal(rhs);
  }

  increment(): this {
    return this.set(succ<Modular<M>>(this).value);
  }

  decrement(): this {
    return this.set(pred<Modular<M>>(this).value);
  }

  zero(): Modular<M> {
    return this.ring.zero();
  }

  one(): Modular<M> {
    return this.ring.one();
  }

  clone(): Modular<M> {
    return this.ring.of(this.value);
  }

  toString(): string {
    return this.value.toString();
  }

  toJSON(): string {
    return this.toString();
  }
}

export function isModular(value: unknown): value is Modular {
  return value instanceof Modular;
}
