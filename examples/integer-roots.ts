import { iroot, exgcd, coprimePairs } from '../src/index.js';

for (const [x, n] of [[125, 3], [-125, 3], [1_000_000, 2], [2 ** 53 - 1, 5]] as const) {
  console.log(`iroot(${x}, ${n}) = ${iroot(x, n)}`);
}
console.log(`iroot(2^64 - 1, 2) = ${iroot(2n ** 64n - 1n, 2)}`);
console.log();

const [x, y] = exgcd(99, 78);
console.log(`${x} * 99 + ${y} * 78 = ${x * 99 + y * 78}`);
console.log();

console.log(`Coprime pairs up to 5: ${coprimePairs(5).map(([a, b]) => `(${a},${b})`).join(' ')}`);
