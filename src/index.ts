/**
 * @module interval-sequence
 * @description
 * Ordered, index-addressable collections of intervals with single-pass
 * gap and intersection detection.
 *
 * * Contracts:
 * - Intervals are immutable values compared with `equals`, never by identity.
 * - `getGaps()` / `getIntersections()` never mutate or alias their input.
 */

export type { Interval, Comparator, Predicate } from './interval';
export { byStart } from './interval';
export { Period } from './period';
export { IntervalCollection, emptyCollection, fromIterable } from './interval-collection';
export { sweepGaps, sweepIntersections } from './sweep';
export { InvalidIndex, InvalidPeriod } from './errors';
