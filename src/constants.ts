import { type IntegerType, type SieveOptions } from './types.js';

function integerType(name: string, bits: number, signed: boolean): IntegerType {
  return Object.freeze({ name, bits, signed });
}

export const INT8 = integerType('int8', 8, true);
export const INT16 = integerType('int16', 16, true);
export const INT32 = integerType('int32', 32, true);
export const INT64 = integerType('int64', 64, true);
export const UINT8 = integerType('uint8', 8, false);
export const UINT16 = integerType('uint16', 16, false);
export const UINT32 = integerType('uint32', 32, false);
export const UINT64 = integerType('uint64', 64, false);

export const INTEGER_TYPES: Readonly<Record<string, IntegerType>> = Object.freeze({
  int8: INT8,
  int16: INT16,
  int32: INT32,
  int64: INT64,
  uint8: UINT8,
  uint16: UINT16,
  uint32: UINT32,
  uint64: UINT64,
});

export const DEFAULT_MODULAR_TYPE: IntegerType = INT64;

export const DEFAULT_SIEVE_OPTIONS: Readonly<SieveOptions> = Object.freeze({
  type: INT32,
  accumulator: UINT64,
});

// Sieve tables hold limit + 1 entries.
export const MAX_SIEVE_LIMIT = 2 ** 32 - 2;
