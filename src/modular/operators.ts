import { type RingElement } from '../types.js';

// Operator helpers written once against RingElement, so any ring type gets them.

export function sum<T extends RingElement<T>>(first: T, ...rest: T[]): T {
  return rest.reduce((acc, x) => acc.add(x), first);
}

export function product<T extends RingElement<T>>(first: T, ...rest: T[]): T {
  return rest.reduce((acc, x) => acc.multiply(x), first);
}

export function notEqual<T extends RingElement<T>>(lhs: T, rhs: T): boolean {
  return !lhs.equal(rhs);
}

export function succ<T extends RingElement<T>>(x: T): T {
  return x.add(x.one());
}

export function pred<T extends RingElement<T>>(x: T): T {
  return x.subtract(x.one());
}
