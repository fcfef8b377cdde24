// Number theory
export { exgcd } from './numeric/exgcd.js';
export { pow } from './numeric/pow.js';
export { iroot } from './numeric/iroot.js';
export { EulerSieve, PrimeSieve, isPrime, coprimePairs } from './prime/index.js';

// Modular arithmetic
export { ModularRing, Modular, isModular } from './modular/index.js';
export type { Operand } from './modular/index.js';
export { sum, product, notEqual, succ, pred } from './modular/operators.js';

// Types, constants and errors
export type {
  Integer, IntegerType, MultiplicativeElement, RingElement, Result, SieveOptions, Factorization,
} from './types.js';
export {
  INT8, INT16, INT32, INT64, UINT8, UINT16, UINT32, UINT64, INTEGER_TYPES,
  DEFAULT_MODULAR_TYPE, DEFAULT_SIEVE_OPTIONS, MAX_SIEVE_LIMIT,
} from './constants.js';
export { DomainError, OutOfRangeError, OverflowError } from './errors.js';

// Utilities
export { sign, unsignedAbs, bitLength, binaryAccumulate, gcd, lcm } from './utils/integer.js';
export { numericCast, toBigInt, toSafeNumber, fitsIn, digits, minValue, maxValue } from './utils/numeric-cast.js';
export { addMod, subMod, negMod, mulMod, normalize } from './utils/modular-arithmetic.js';
