import { EulerSieve, UINT32 } from '../src/index.js';

const limit = Number(process.argv[2] ?? 1000);
const sieve = new EulerSieve(limit, { type: UINT32 });

console.log(`${sieve.primes.length} primes up to ${sieve.limit}`);
console.log(`Largest: ${sieve.primes[sieve.primes.length - 1]}`);
console.log();

for (const n of [12, 97, 360, limit]) {
  if (n < 2 || n > sieve.limit) continue;
  const factors = sieve.factorize(n).map(([p, e]) => (e === 1 ? `${p}` : `${p}^${e}`));
  console.log(`${n} = ${factors.join(' * ')}`);
}
