import { NotSupportedError } from "../errors";
import { CompoundValue } from "../model/compound-value";
import { Variable } from "../transaction/variable";
import { describeValue } from "../util/describe";
import { TestManager } from "./test-manager";

type Reporter = Pick<TestManager, "assert">;

function kindOf(value: unknown): string {
    if (typeof value === "object" && value !== null) {
        return Object.getPrototypeOf(value)?.constructor?.name ?? "Object";
    }
    return typeof value;
}

function valuesEqual(left: unknown, right: unknown): boolean {
    if (left instanceof CompoundValue) {
        return left.equals(right);
    }
    return left === right || (left !== left && right !== right);
}

/**
 * Compares two observed values. Values of different kinds cannot be
 * compared; value classes compare structurally and other objects by identity.
 */
export function equality(left: unknown, right: unknown): boolean {
    const leftAbsent = left === null || left === undefined;
    const rightAbsent = right === null || right === undefined;
    if (leftAbsent && rightAbsent) {
        return true;
    }
    if (leftAbsent || rightAbsent) {
        return false;
    }
    if (kindOf(left) !== kindOf(right)) {
        throw new NotSupportedError(
            `Test manager doesn't know how to compare left ${describeValue(left)} and right ${describeValue(right)} value`);
    }
    return valuesEqual(left, right);
}

export function assertAreEqual<T>(manager: Reporter, expected: T, actual: T, context: string): void {
    manager.assert(valuesEqual(expected, actual),
        `expected '${describeValue(expected)}', actual '${describeValue(actual)}' (${context})`);
}

/**
 * Asserts that a bound variable equals the actual value, or binds it to the
 * actual value if it is not bound yet.
 */
export function assertBind<T>(manager: Reporter, variable: Variable<T>, actual: T, context: string): void {
    if (variable.isBound) {
        assertAreEqual(manager, variable.value, actual,
            `${context}; expected value originates from previous binding`);
    }
    else {
        variable.value = actual;
    }
}

/**
 * Asserts equality of two bound variables, or binds the unbound one to the
 * value of the other. Does nothing if neither is bound.
 */
export function assertBindVariables<T>(manager: Reporter, v1: Variable<T>, v2: Variable<T>, context: string): void {
    if (v1.isBound && v2.isBound) {
        assertAreEqual(manager, v1.value, v2.value,
            `${context}; values originate from previous binding`);
        return;
    }
    if (v1.isBound) {
        v2.value = v1.value;
    }
    else if (v2.isBound) {
        v1.value = v2.value;
    }
}

export function assertNotNull(manager: Reporter, actual: unknown, context: string): void {
    manager.assert(actual !== null && actual !== undefined, `expected non-null value (${context})`);
}
