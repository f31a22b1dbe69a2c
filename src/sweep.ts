import type { Interval } from './interval';

// ============================================================================
// SINGLE-PASS SWEEPS
// ============================================================================
//
// Both sweeps take intervals already ordered ascending by start boundary and
// only ever rebind their rolling references. The envelope/reference is
// REPLACED by the incoming interval, never merged with it.

/**
 * Gaps between consecutive intervals.
 * Complexity: O(N).
 *
 * @param ordered - Intervals ascending by start boundary.
 */
export function sweepGaps<I extends Interval<I>>(ordered: Iterable<I>): I[] {
    const gaps: I[] = [];
    let envelope: I | null = null;
    for (const current of ordered) {
        if (envelope === null) {
            envelope = current;
            continue;
        }
        if (!envelope.overlaps(current) && !envelope.abuts(current)) {
            gaps.push(envelope.gap(current));
        }
        if (!envelope.contains(current)) {
            envelope = current;
        }
    }
    return gaps;
}

/**
 * Intersections between a rolling reference and the next interval not
 * swallowed by it. At most one entry per reference change; this is not an
 * exhaustive pairwise report.
 * Complexity: O(N).
 *
 * @param ordered - Intervals ascending by start boundary.
 */
export function sweepIntersections<I extends Interval<I>>(ordered: Iterable<I>): I[] {
    const intersections: I[] = [];
    let reference: I | null = null;
    let comparison: I | null = null;
    for (const current of ordered) {
        if (reference === null) {
            reference = current;
            continue;
        }
        if (comparison !== null && reference.contains(current)) continue;

        comparison = current;
        if (reference.overlaps(comparison)) {
            intersections.push(reference.intersect(comparison));
        }
        if (!reference.contains(comparison)) {
            reference = comparison;
            comparison = null;
        }
    }
    return intersections;
}
