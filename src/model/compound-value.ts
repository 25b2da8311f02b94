import { describeValue } from "../util/describe";

function fieldEquals(left: unknown, right: unknown): boolean {
    if (left instanceof CompoundValue) {
        return left.equals(right);
    }
    // NaN is equal to itself, as in a structural comparison.
    return left === right || (left !== left && right !== right);
}

/**
 * Base class for value classes. Two instances are equal when they have the
 * same class and all their fields are equal.
 */
export abstract class CompoundValue {
    equals(other: unknown): boolean {
        if (this === other) {
            return true;
        }
        if (!(other instanceof CompoundValue) ||
            Object.getPrototypeOf(other) !== Object.getPrototypeOf(this)) {
            return false;
        }
        const mine = Object.entries(this);
        const theirs = new Map(Object.entries(other));
        if (mine.length !== theirs.size) {
            return false;
        }
        return mine.every(([name, value]) =>
            theirs.has(name) && fieldEquals(value, theirs.get(name)));
    }

    toString(): string {
        const fields = Object.entries(this)
            .map(([name, value]) => `${name}=${describeValue(value)}`)
            .join(",");
        return `${this.constructor.name}(${fields})`;
    }
}
