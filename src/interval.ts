/**
 * Contract for values stored in an IntervalCollection.
 *
 * Implementations must be immutable. Two intervals are equal when their
 * boundaries are equal; identity plays no role.
 *
 * @template I - The implementing type (F-bounded, so operations return the same type).
 */
export interface Interval<I extends Interval<I>> {
    /** Negative, zero or positive as this start boundary is before, at or after `other`'s. */
    compareStart(other: I): number;
    equals(other: I): boolean;
    overlaps(other: I): boolean;
    /** Shares a boundary with `other`, with neither gap nor overlap. */
    abuts(other: I): boolean;
    /** Full containment of `other`. */
    contains(other: I): boolean;
    /** The space strictly between two non-overlapping intervals. */
    gap(other: I): I;
    /** Only defined when `overlaps(other)` holds. */
    intersect(other: I): I;
    /** Smallest interval enclosing the receiver and every argument. */
    merge(...others: I[]): I;
}

export type Comparator<I> = (a: I, b: I) => number;
export type Predicate<I> = (interval: I, offset: number) => boolean;

/** Orders two intervals by their start boundary. */
export function byStart<I extends Interval<I>>(a: I, b: I): number {
    return a.compareStart(b);
}
