/**
 * Raised by `get`, `remove` and `set` when an offset is not occupied.
 * The collection is left untouched.
 */
export class InvalidIndex extends RangeError {
    readonly offset: number;

    constructor(offset: number) {
        super(`InvalidIndex: ${offset} is an invalid offset in the current sequence`);
        this.name = 'InvalidIndex';
        this.offset = offset;
    }
}

/** Raised for malformed bounds or undefined Period operations (gap of overlapping, intersect of disjoint). */
export class InvalidPeriod extends RangeError {
    constructor(message: string) {
        super(`InvalidPeriod: ${message}`);
        this.name = 'InvalidPeriod';
    }
}
