import type { Interval } from './interval';
import { InvalidPeriod } from './errors';

/**
 * Immutable half-open interval `[start, end)` over finite numbers.
 *
 * Dates are stored as epoch milliseconds, see `Period.fromDates`.
 * An empty period (`start === end`) is allowed.
 */
export class Period implements Interval<Period> {
    readonly start: number;
    readonly end: number;

    constructor(start: number, end: number) {
        if (!Number.isFinite(start) || !Number.isFinite(end)) {
            throw new InvalidPeriod(`bounds must be finite numbers, got ${start} and ${end}`);
        }
        if (end < start) {
            throw new InvalidPeriod(`end ${end} must not precede start ${start}`);
        }
        this.start = start;
        this.end = end;
        Object.freeze(this);
    }

    /** Period between two instants, stored as epoch milliseconds. */
    static fromDates(start: Date, end: Date): Period {
        return new Period(start.getTime(), end.getTime());
    }

    /** Period of `duration` starting at `start` (a number or a Date). */
    static after(start: number | Date, duration: number): Period {
        const s = typeof start === 'number' ? start : start.getTime();
        return new Period(s, s + duration);
    }

    /** Start bound as a Date. */
    get startDate(): Date { return new Date(this.start); }
    /** End bound as a Date. */
    get endDate(): Date { return new Date(this.end); }
    /** Length of the period; zero when empty. */
    get duration(): number { return this.end - this.start; }

    compareStart(other: Period): number {
        if (this.start === other.start) return 0;
        return this.start < other.start ? -1 : 1;
    }

    equals(other: Period): boolean {
        return this.start === other.start && this.end === other.end;
    }

    overlaps(other: Period): boolean {
        return this.start < other.end && other.start < this.end;
    }

    abuts(other: Period): boolean {
        return this.start === other.end || this.end === other.start;
    }

    contains(other: Period): boolean {
        return this.start <= other.start && other.end <= this.end;
    }

    /** Span between the earlier end and the later start. Throws if the two overlap. */
    gap(other: Period): Period {
        if (this.overlaps(other)) {
            throw new InvalidPeriod(`${this} and ${other} overlap, there is no gap`);
        }
        if (other.start > this.start) return new Period(this.end, other.start);
        return new Period(other.end, this.start);
    }

    /** Throws unless the two overlap. */
    intersect(other: Period): Period {
        if (!this.overlaps(other)) {
            throw new InvalidPeriod(`${this} and ${other} do not overlap`);
        }
        return new Period(Math.max(this.start, other.start), Math.min(this.end, other.end));
    }

    merge(...others: Period[]): Period {
        let start = this.start, end = this.end;
        for (const p of others) {
            if (p.start < start) start = p.start;
            if (p.end > end) end = p.end;
        }
        if (start === this.start && end === this.end) return this;
        return new Period(start, end);
    }

    toString(): string { return `[${this.start}, ${this.end})`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
