// All arguments except `value` in normalize() are expected in [0, m).

export function addMod(a: bigint, b: bigint, m: bigint): bigint {
  const sum = a + b;
  return sum >= m ? sum - m : sum;
}

export function subMod(a: bigint, b: bigint, m: bigint): bigint {
  const diff = a - b;
  return diff < 0n ? diff + m : diff;
}

export function negMod(a: bigint, m: bigint): bigint {
  return a === 0n ? 0n : m - a;
}

export function mulMod(a: bigint, b: bigint, m: bigint): bigint {
  return (a * b) % m;
}

/**
 * Representative of `value` in [0, m). The remainder has magnitude below
 * `m`, so one correction suffices for negative inputs.
 */
export function normalize(value: bigint, m: bigint): bigint {
  if (value >= 0n && value < m) return value;
  let v = value % m;
  if (v < 0n) v += m;
  return v;
}
