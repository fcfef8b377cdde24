import { ModularRing, INT16, pow } from '../src/index.js';

const ring = new ModularRing(1_000_000_007n);

const a = ring.of(123456789);
const inv = a.inverse();

console.log(`a       = ${a}`);
console.log(`a^-1    = ${inv}`);
console.log(`a*a^-1  = ${a.multiply(inv)}`);
console.log(`a^(p-2) = ${pow(a, 1_000_000_005n)}`);

const small = new ModularRing(10n, INT16);
const result = small.of(4).tryInverse();
if (!result.ok) {
  console.log(`4 mod 10: ${result.error.message}`);
}
