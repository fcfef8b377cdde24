export type FactorTable = Uint8Array | Uint16Array | Uint32Array;

/** Smallest unsigned typed array holding `length` entries of values up to `maxEntry`. */
export function createTable(length: number, maxEntry: number): FactorTable {
  if (maxEntry <= 0xFF) return new Uint8Array(length);
  if (maxEntry <= 0xFFFF) return new Uint16Array(length);
  return new Uint32Array(length);
}
