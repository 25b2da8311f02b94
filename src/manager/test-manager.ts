import { ExpectedEvent, ExpectedPreConstraint, ExpectedReturn } from "../expectation/expected";
import { EventDescriptor, MethodDescriptor, TypeDescriptor } from "../model/descriptors";
import { Variable } from "../transaction/variable";

/**
 * An emitter-like object whose events can be subscribed to.
 * Node's EventEmitter satisfies this interface.
 */
export interface EventSource {
    on(eventName: string, listener: (...args: unknown[]) => void): unknown;
    off(eventName: string, listener: (...args: unknown[]) => void): unknown;
}

/**
 * Receives the notifications of a subscribed event.
 */
export type ObservationHandler = (event: EventDescriptor, target: unknown, args: unknown[]) => void;

/**
 * Supervises a running test case: collects observations, matches them
 * against expectations, and reports checks to the test site.
 */
export interface TestManager {
    /** Retrieves the singleton adapter of the given type; throws on failure. */
    getAdapter<T>(type: TypeDescriptor<T>): T;

    /**
     * Routes notifications of `event` raised by `target` into the event queue,
     * through `handler` when one is given. Subscribing again for the same event
     * and target type replaces the handler.
     */
    subscribe(event: EventDescriptor, target: EventSource, handler?: ObservationHandler): void;

    /**
     * Adds an event to the event queue. The target must be given for
     * instance-based, non-adapter events and must be null otherwise.
     */
    addEvent(event: EventDescriptor, target: unknown, ...args: unknown[]): void;

    /**
     * Resolves to the index of the pattern that matched the next event, or -1.
     * When nothing matches and `failIfNone` is set, a failure is reported.
     */
    expectEvent(timeoutMs: number, failIfNone: boolean, ...expected: ExpectedEvent[]): Promise<number>;

    /**
     * Adds a method return to the return queue. The arguments are the
     * output parameters followed by the return value.
     */
    addReturn(method: MethodDescriptor, target: unknown, ...args: unknown[]): void;

    expectReturn(timeoutMs: number, failIfNone: boolean, ...expected: ExpectedReturn[]): Promise<number>;

    beginTest(name: string): void;
    endTest(): void;
    assert(condition: boolean, description: string): void;
    assume(condition: boolean, description: string): void;
    checkpoint(description: string): void;
    comment(description: string): void;

    /**
     * Upon observation timeout, passes when the state is accepting and no
     * event is pending; fails otherwise.
     */
    checkObservationTimeout(isAcceptingState: boolean, ...expected: ExpectedEvent[]): void;

    /**
     * Returns the index of the first satisfied pre-constraint, or -1.
     */
    selectSatisfiedPreConstraint(printDiagnosisIfFail: boolean, ...expected: ExpectedPreConstraint[]): number;

    createVariable<T>(name: string): Variable<T>;
    generateValue<T>(type: TypeDescriptor<T>): T;

    /** Checkers run inside a transaction implicitly. Transactions do not nest. */
    beginTransaction(): void;
    endTransaction(commit: boolean): void;
}
