import { describe, it, expect } from 'vitest';
import { ModularRing, Modular, isModular } from '../../src/modular/index.js';
import { DomainError, OverflowError } from '../../src/errors.js';
import { INT8, INT16, INT64, UINT8, UINT16, UINT64 } from '../../src/constants.js';

describe('Modular', () => {
  const mod10 = new ModularRing(10n);
  const mod13 = new ModularRing(13n);

  it('basic operations', () => {
    const a = mod10.of(123);
    expect(a.get()).toBe(3n);

    const b = a.clone();
    expect(b.get()).toBe(3n);

    a.set(-4);
    expect(a.get()).toBe(6n);
    expect(b.get()).toBe(3n);

    expect(a.add(b).get()).toBe(9n);
    expect(b.negate().get()).toBe(7n);
    expect(b.subtract(a).get()).toBe(7n);
    expect(a.multiply(b).get()).toBe(8n);

    expect(b.equal(mod10.of(3))).toBe(true);
    expect(b.equal(13)).toBe(true);
    expect(a.equal(b)).toBe(false);
    expect(a.notEqual(b)).toBe(true);
  });

  it('normalizes negative values with one correction', () => {
    expect(mod10.of(-4).get()).toBe(6n);
    expect(mod10.of(-10).get()).toBe(0n);
    expect(mod10.of(-123n).get()).toBe(7n);
  });

  it('keeps every residue in [0, m) and congruent to the input', () => {
    for (let m = 1n; m <= 20n; m++) {
      const ring = new ModularRing(m);
      for (let v = -50n; v <= 50n; v++) {
        const r = ring.of(v).get();
        expect(r >= 0n && r < m).toBe(true);
        expect((v - r) % m).toBe(0n);
      }
    }
  });

  it('accepts plain integers as right operands', () => {
    expect(mod10.of(7).add(5).get()).toBe(2n);
    expect(mod10.of(7).subtract(9n).get()).toBe(8n);
    expect(mod10.of(7).multiply(-1).get()).toBe(3n);
  });

  it('converts to and from integers explicitly', () => {
    expect(mod10.fromInt(-4).toInt()).toBe(6n);
    expect(mod10.of(27).toNumber()).toBe(7);
  });

  it('increments and decrements in place', () => {
    const x = mod10.of(9);
    expect(x.increment()).toBe(x);
    expect(x.get()).toBe(0n);
    expect(x.decrement().get()).toBe(9n);
  });

  it('provides zero and one', () => {
    expect(mod10.zero().get()).toBe(0n);
    expect(mod10.of(4).one().get()).toBe(1n);
    expect(mod10.of(4).zero().equal(0)).toBe(true);
  });

  describe('inverse', () => {
    it('computes the inverse through exgcd', () => {
      expect(mod13.of(2).inverse().get()).toBe(7n);
      for (let v = 1n; v < 13n; v++) {
        const x = mod13.of(v);
        expect(x.multiply(x.inverse()).get()).toBe(1n);
      }
    });

    it('normalizes negative coefficients in unsigned rings', () => {
      expect(new ModularRing(13n, UINT16).of(2).inverse().get()).toBe(7n);
    });

    it('throws DomainError when gcd(value, modulus) is not 1', () => {
      expect(() => mod10.of(4).inverse()).toThrow(DomainError);
      expect(() => mod10.of(0).inverse()).toThrow('0 has no inverse modulo 10');
    });

    it('reports the failure as a result with tryInverse', () => {
      const result = mod10.of(4).tryInverse();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DomainError);
        expect(result.error.message).toBe('4 has no inverse modulo 10');
      }
      const ok = mod10.of(3).tryInverse();
      expect(ok.ok && ok.value.get()).toBe(7n);
    });

    it('divides by invertible residues', () => {
      expect(mod13.of(3).divide(2).get()).toBe(8n);
      expect(() => mod10.of(3).divide(5)).toThrow(DomainError);
    });

    it('treats the zero ring consistently', () => {
      const mod1 = new ModularRing(1n);
      expect(mod1.of(5).get()).toBe(0n);
      expect(mod1.of(0).inverse().get()).toBe(0n);
    });
  });

  it('raises to powers', () => {
    expect(mod13.of(2).pow(12).get()).toBe(1n);
    expect(mod13.of(2).pow(-2).get()).toBe(10n);
  });

  describe('text conversion', () => {
    it('parses decimal text', () => {
      expect(mod10.parse('123').get()).toBe(3n);
      expect(mod10.parse(' -4 ').get()).toBe(6n);
      expect(mod10.parse('+7').get()).toBe(7n);
    });

    it('rejects anything but decimal integers', () => {
      expect(() => mod10.parse('0x10')).toThrow(SyntaxError);
      expect(() => mod10.parse('1.5')).toThrow(SyntaxError);
      expect(() => mod10.parse('')).toThrow(SyntaxError);
    });

    it('formats the canonical residue', () => {
      expect(mod10.of(-4).toString()).toBe('6');
      expect(`${mod10.of(123)}`).toBe('3');
      expect(JSON.stringify({ v: mod10.of(123) })).toBe('{"v":"3"}');
    });
  });

  describe('integer type checks', () => {
    it('rejects moduli whose addition may overflow', () => {
      expect(() => new ModularRing(100n, INT8)).toThrow(OverflowError);
      expect(() => new ModularRing(64n, INT8)).toThrow(
        'Modular addition may overflow int8 for modulus 64. Please use larger integer types.',
      );
    });

    it('rejects moduli whose multiplication may overflow', () => {
      expect(() => new ModularRing(10n, INT8)).toThrow(
        'Modular multiplication may overflow int8 for modulus 10. Please use larger integer types.',
      );
      expect(() => new ModularRing(2n ** 31n, INT64)).toThrow(OverflowError);
    });

    it('accepts moduli that fit', () => {
      expect(new ModularRing(7n, INT8).of(20).get()).toBe(6n);
      expect(new ModularRing(2n ** 31n - 1n, INT64).modulus).toBe(2147483647n);
      expect(new ModularRing(2n ** 32n - 1n, UINT64).of(2n ** 32n).get()).toBe(1n);
      expect(new ModularRing(1_000_000_007n).type).toBe(INT64);
    });

    it('rejects moduli that are not positive or do not fit the type', () => {
      expect(() => new ModularRing(0n)).toThrow(RangeError);
      expect(() => new ModularRing(-5n)).toThrow(RangeError);
      expect(() => new ModularRing(300n, UINT8)).toThrow(RangeError);
    });

    it('rejects values outside the backing type', () => {
      const ring = new ModularRing(10n, INT16);
      expect(() => ring.of(40000)).toThrow(RangeError);
      expect(() => new ModularRing(10n, UINT16).of(-4)).toThrow(RangeError);
    });
  });

  describe('distinct moduli', () => {
    it('are rejected at compile time and at run time', () => {
      const a = mod10.of(1);
      const b = new ModularRing(7n).of(1);
      // @ts-expect-error Modular<7n> is not a Modular<10n>
      expect(() => a.add(b)).toThrow(TypeError);
    });

    it('are rejected when the static type is widened', () => {
      const a: Modular = mod10.of(1);
      const b: Modular = mod13.of(1);
      expect(() => a.equal(b)).toThrow('Cannot mix modulus 13 with modulus 10');
    });
  });

  it('isModular recognizes elements', () => {
    expect(isModular(mod10.of(1))).toBe(true);
    expect(isModular(1n)).toBe(false);
  });
});
