import { describe, it, expect } from 'vitest';
import { Period, InvalidPeriod } from '../src/index';

describe('Period', () => {
    it('rejects reversed and non-finite bounds', () => {
        expect(() => new Period(10, 0)).toThrow(InvalidPeriod);
        expect(() => new Period(Number.NaN, 1)).toThrow(InvalidPeriod);
        expect(() => new Period(0, Infinity)).toThrow('InvalidPeriod: bounds must be finite numbers, got 0 and Infinity');
    });

    it('allows empty periods', () => {
        expect(new Period(5, 5).duration).toBe(0);
    });

    it('builds from dates and durations', () => {
        const start = new Date('2024-01-01T00:00:00Z');
        const end = new Date('2024-01-02T00:00:00Z');
        const p = Period.fromDates(start, end);
        expect(p.duration).toBe(86_400_000);
        expect(p.startDate.toISOString()).toBe('2024-01-01T00:00:00.000Z');
        expect(p.endDate.getTime()).toBe(end.getTime());
        expect(Period.after(start, 1000).end).toBe(start.getTime() + 1000);
        expect(Period.after(5, 10).equals(new Period(5, 15))).toBe(true);
    });

    it('compares start boundaries', () => {
        expect(new Period(0, 10).compareStart(new Period(5, 6))).toBe(-1);
        expect(new Period(5, 10).compareStart(new Period(5, 6))).toBe(0);
        expect(new Period(7, 10).compareStart(new Period(5, 6))).toBe(1);
    });

    it('uses half-open semantics for overlaps and abuts', () => {
        const a = new Period(0, 10);
        expect(a.overlaps(new Period(5, 15))).toBe(true);
        expect(a.overlaps(new Period(10, 20))).toBe(false);
        expect(a.abuts(new Period(10, 20))).toBe(true);
        expect(new Period(10, 20).abuts(a)).toBe(true);
        expect(a.abuts(new Period(11, 20))).toBe(false);
    });

    it('checks full containment', () => {
        const a = new Period(0, 10);
        expect(a.contains(new Period(0, 10))).toBe(true);
        expect(a.contains(new Period(2, 8))).toBe(true);
        expect(a.contains(new Period(5, 11))).toBe(false);
    });

    it('computes the gap in either direction', () => {
        const early = new Period(0, 10);
        const late = new Period(20, 30);
        expect(early.gap(late).toString()).toBe('[10, 20)');
        expect(late.gap(early).toString()).toBe('[10, 20)');
        expect(() => early.gap(new Period(5, 15))).toThrow(InvalidPeriod);
    });

    it('intersects overlapping periods only', () => {
        expect(new Period(0, 10).intersect(new Period(5, 15)).toString()).toBe('[5, 10)');
        expect(() => new Period(0, 10).intersect(new Period(10, 15))).toThrow('InvalidPeriod: [0, 10) and [10, 15) do not overlap');
    });

    it('merges into the bounding period', () => {
        const a = new Period(5, 10);
        expect(a.merge(new Period(0, 3), new Period(8, 20)).toString()).toBe('[0, 20)');
        expect(a.merge(new Period(6, 7))).toBe(a);
        expect(a.merge()).toBe(a);
    });

    it('is frozen', () => {
        expect(Object.isFrozen(new Period(0, 1))).toBe(true);
    });
});
