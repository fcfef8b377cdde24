export type Integer = number | bigint;

export interface IntegerType {
  readonly name: string;
  readonly bits: number;
  readonly signed: boolean;
}

/** Anything with a binary-exponentiation friendly multiplication. */
export interface MultiplicativeElement<T> {
  multiply(rhs: T): T;
  one(): T;
  inverse(): T;
}

export interface RingElement<T> extends MultiplicativeElement<T> {
  add(rhs: T): T;
  subtract(rhs: T): T;
  negate(): T;
  equal(rhs: T): boolean;
  zero(): T;
}

export type Result<T, E extends Error> = { ok: true; value: T } | { ok: false; error: E };

export interface SieveOptions {
  /** Integer type the limit and table entries must fit in. */
  type: IntegerType;
  /** Width used for the `prime * num` products while sieving. */
  accumulator: IntegerType;
}

export type Factorization = Array<[prime: number, exponent: number]>;
