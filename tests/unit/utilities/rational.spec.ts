import { describe, it, expect } from 'vitest';
import { Rational, truncDiv } from '@/utilities/rational';

describe('Rational', () => {
    it('reduces and keeps the denominator positive', () => {
        const r = Rational.of(6, -4);
        expect(r.numer).toBe(-3);
        expect(r.denom).toBe(2);
        expect(r.toString()).toBe('-3/2');
    });

    it('normalises zero', () => {
        const r = Rational.of(0, -5);
        expect(r.numer).toBe(0);
        expect(r.denom).toBe(1);
        expect(Object.is(r.numer, 0)).toBe(true);
    });

    it('prints integers without a denominator', () => {
        expect(Rational.of(10, 5).toString()).toBe('2');
    });

    it('multiplies, divides, adds and subtracts exactly', () => {
        const a = Rational.of(6, 5);
        expect(a.mul(2).toString()).toBe('12/5');
        expect(a.mul(Rational.of(5, 6)).equals(Rational.ONE)).toBe(true);
        expect(a.div(Rational.of(3, 10)).toString()).toBe('4');
        expect(a.add(Rational.of(1, 3)).toString()).toBe('23/15');
        expect(a.sub(2).toString()).toBe('-4/5');
    });

    it('computes the pixel aspect ratio as 6/5', () => {
        const ratio = Rational.of(320, 200).div(Rational.of(4, 3));
        expect(ratio.numer).toBe(6);
        expect(ratio.denom).toBe(5);
    });

    it('truncates toward zero', () => {
        expect(Rational.of(7, 2).toInteger()).toBe(3);
        expect(Rational.of(-7, 2).toInteger()).toBe(-3);
        expect(Rational.of(6, 3).toInteger()).toBe(2);
        expect(truncDiv(-9, 4)).toBe(-2);
    });

    it('rounds up with ceil', () => {
        expect(Rational.of(7, 2).ceil()).toBe(4);
        expect(Rational.of(-7, 2).ceil()).toBe(-3);
        expect(Rational.of(12, 5).ceil()).toBe(3);
        expect(Rational.of(4).ceil()).toBe(4);
    });

    it('compares values', () => {
        expect(Rational.of(1, 3).compare(Rational.of(1, 2))).toBe(-1);
        expect(Rational.of(2, 4).compare(Rational.of(1, 2))).toBe(0);
        expect(Rational.of(3, 2).compare(1)).toBe(1);
    });

    it('rejects a zero denominator and division by zero', () => {
        expect(() => Rational.of(1, 0)).toThrow(RangeError);
        expect(() => Rational.of(1, 2).div(0)).toThrow(RangeError);
    });

    it('rejects values outside the safe integer range', () => {
        expect(() => Rational.of(1.5)).toThrow(RangeError);
        const big = Rational.of(Number.MAX_SAFE_INTEGER);
        expect(() => big.mul(3)).toThrow(RangeError);
    });
});
