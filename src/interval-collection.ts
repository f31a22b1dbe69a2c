import type { Comparator, Interval, Predicate } from './interval';
import { byStart } from './interval';
import type { Period } from './period';
import { InvalidIndex } from './errors';
import { sweepGaps, sweepIntersections } from './sweep';

/**
 * Ordered, index-addressable collection of intervals.
 *
 * * Storage:
 * - `#slots`: interval per offset (offsets are always `0..n-1`).
 * - `#order`: iteration order as a list of offsets.
 *
 * Keeping the two apart lets `sort()` reorder iteration while every value
 * keeps its offset label. `remove()` compacts the slots in the current
 * iteration order.
 *
 * * Contracts:
 * - Duplicates are allowed.
 * - Values are never mutated; equality is `Interval#equals`.
 * - Mutating while iterating is undefined behavior (not guarded).
 *
 * @template I - Stored interval type.
 */
export class IntervalCollection<I extends Interval<I> = Period> {
    #slots: I[];
    #order: number[];

    /**
     * @param intervals - Initial intervals, offsets assigned in argument order.
     */
    constructor(...intervals: I[]) {
        this.#slots = intervals;
        this.#order = intervals.map((_, offset) => offset);
    }

    /**
     * Builds a collection owning a copy of `intervals`, offsets in array order.
     * Complexity: O(N).
     */
    static fromArray<U extends Interval<U>>(intervals: readonly U[]): IntervalCollection<U> {
        const c = new IntervalCollection<U>();
        c.#slots = intervals.slice();
        c.#order = c.#slots.map((_, offset) => offset);
        return c;
    }

    get size(): number { return this.#slots.length; }
    count(): number { return this.#slots.length; }
    isEmpty(): boolean { return this.#slots.length === 0; }

    /** Lazy `[offset, interval]` pairs in iteration order. Restartable. */
    *iterate(): Generator<[number, I]> {
        for (const offset of this.#order) {
            yield [offset, this.#slots[offset]];
        }
    }

    [Symbol.iterator](): Generator<[number, I]> { return this.iterate(); }

    /** Intervals in iteration order, without offsets. */
    toSequence(): I[] {
        return this.#order.map(offset => this.#slots[offset]);
    }

    clear(): this {
        if (this.#slots.length === 0) return this;
        this.#slots = [];
        this.#order = [];
        return this;
    }

    #checkOffset(offset: number): void {
        if (!Number.isInteger(offset) || offset < 0 || offset >= this.#slots.length) {
            throw new InvalidIndex(offset);
        }
    }

    /** Throws InvalidIndex if the offset is not occupied. */
    get(offset: number): I {
        this.#checkOffset(offset);
        return this.#slots[offset];
    }

    /**
     * Removes and returns the interval at `offset`.
     * Remaining intervals are renumbered from 0 following iteration order.
     * Complexity: O(N).
     */
    remove(offset: number): I {
        const removed = this.get(offset);
        const slots: I[] = [];
        for (const o of this.#order) {
            if (o !== offset) slots.push(this.#slots[o]);
        }
        this.#slots = slots;
        this.#order = slots.map((_, o) => o);
        return removed;
    }

    push(interval: I, ...intervals: I[]): this {
        for (const p of [interval, ...intervals]) {
            this.#order.push(this.#slots.length);
            this.#slots.push(p);
        }
        return this;
    }

    /** Replaces the value at an existing offset. Throws InvalidIndex otherwise. */
    set(offset: number, interval: I): this {
        this.#checkOffset(offset);
        this.#slots[offset] = interval;
        return this;
    }

    /** First offset (in iteration order) holding an equal interval, or null. */
    find(interval: I): number | null {
        for (const offset of this.#order) {
            if (this.#slots[offset].equals(interval)) return offset;
        }
        return null;
    }

    contains(interval: I, ...intervals: I[]): boolean {
        if (this.find(interval) === null) return false;
        return intervals.every(p => this.find(p) !== null);
    }

    /** Smallest interval enclosing every member, or null when empty. */
    getBoundingInterval(): I | null {
        const intervals = this.toSequence();
        if (intervals.length === 0) return null;
        return intervals.reduce((bound, q) => bound.merge(q));
    }

    /**
     * Stable in-place sort of the iteration order. Offsets stay attached to
     * their values. Comparator errors propagate.
     * Complexity: O(N log N).
     */
    sort(compare: Comparator<I>): boolean {
        this.#order.sort((a, b) => compare(this.#slots[a], this.#slots[b]));
        return true;
    }

    /**
     * Sorted, renumbered copy. Returns `this` when sorting would not change
     * anything (same instances, same positions, offsets already `0..n-1`).
     */
    sortedCopy(compare: Comparator<I>): IntervalCollection<I> {
        const sorted = this.toSequence().sort(compare);
        if (this.#isSameLayout(sorted)) return this;
        return IntervalCollection.fromArray(sorted);
    }

    /** Matching intervals in iteration order, renumbered. Returns `this` when all match. */
    filteredCopy(predicate: Predicate<I>): IntervalCollection<I> {
        const kept: I[] = [];
        for (const [offset, interval] of this.iterate()) {
            if (predicate(interval, offset)) kept.push(interval);
        }
        if (kept.length === this.#slots.length) return this;
        return IntervalCollection.fromArray(kept);
    }

    any(predicate: Predicate<I>): boolean {
        for (const [offset, interval] of this.iterate()) {
            if (predicate(interval, offset)) return true;
        }
        return false;
    }

    /**
     * True when every interval matches. An empty collection yields `false`,
     * unlike `Array#every`.
     */
    all(predicate: Predicate<I>): boolean {
        for (const [offset, interval] of this.iterate()) {
            if (!predicate(interval, offset)) return false;
        }
        return this.#slots.length !== 0;
    }

    /** Holes between the intervals, ascending, as a new collection. */
    getGaps(): IntervalCollection<I> {
        return IntervalCollection.fromArray(sweepGaps(this.sortedCopy(byStart).toSequence()));
    }

    /** Overlaps between consecutive non-contained intervals, ascending, as a new collection. */
    getIntersections(): IntervalCollection<I> {
        return IntervalCollection.fromArray(sweepIntersections(this.sortedCopy(byStart).toSequence()));
    }

    #isSameLayout(candidate: I[]): boolean {
        const order = this.#order;
        for (let i = 0; i < order.length; i++) {
            if (order[i] !== i || this.#slots[i] !== candidate[i]) return false;
        }
        return true;
    }

    toString(): string {
        if (this.isEmpty()) return '∅';
        return `{${this.toSequence().join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

export function emptyCollection<I extends Interval<I> = Period>(): IntervalCollection<I> {
    return new IntervalCollection<I>();
}

export function fromIterable<I extends Interval<I>>(iterable: Iterable<I>): IntervalCollection<I> {
    return IntervalCollection.fromArray(Array.from(iterable));
}
