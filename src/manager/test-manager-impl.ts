import { TestFailureError, TransactionFailed } from "../errors";
import { ExpectationMatcher } from "../expectation/expectation-matcher";
import { ExpectedEvent, ExpectedPreConstraint, ExpectedReturn } from "../expectation/expected";
import { AdapterClassifier } from "../model/adapter-classifier";
import { EventDescriptor, MethodDescriptor, TypeDescriptor } from "../model/descriptors";
import { AvailableEvent, AvailableReturn } from "../observation/observation";
import { ObservationQueue } from "../observation/observation-queue";
import { TestSite } from "../site/test-site";
import { BindableVariable } from "../transaction/transaction";
import { TransactionLog } from "../transaction/transaction-log";
import { Variable, VariableHost, VariableImpl } from "../transaction/variable";
import { Trace } from "../util/trace";
import { resolveTestManagerConfig, TestManagerConfig, ValueGenerator } from "./config";
import { EventSource, ObservationHandler, TestManager } from "./test-manager";

type Listener = (...args: unknown[]) => void;

export class TestManagerImpl implements TestManager {
    private readonly eventQueue: ObservationQueue<AvailableEvent>;
    private readonly returnQueue: ObservationQueue<AvailableReturn>;
    private readonly transactions: TransactionLog;
    private readonly matcher: ExpectationMatcher;
    private readonly classifier: AdapterClassifier;
    private readonly valueGenerator: ValueGenerator;
    private readonly variableHost: VariableHost;

    // Current handler per event and target prototype.
    private readonly handlers = new Map<EventDescriptor, Map<object | null, ObservationHandler>>();
    // Listener installed on each subscribed target, so that it is never added twice.
    private readonly listeners = new WeakMap<EventSource, Map<EventDescriptor, Listener>>();

    /**
     * If true, failed assertions outside a transaction throw `TestFailureError`
     * so that the caller can decide how to proceed. Otherwise the test site
     * handles the failure.
     */
    throwTestFailureException: boolean;

    constructor(
        private readonly site: TestSite,
        config: TestManagerConfig = {}
    ) {
        const resolved = resolveTestManagerConfig(config);
        this.eventQueue = new ObservationQueue<AvailableEvent>({ name: "event", maxSize: resolved.maxEventQueueSize });
        this.returnQueue = new ObservationQueue<AvailableReturn>({ name: "return", maxSize: resolved.maxReturnQueueSize });
        this.throwTestFailureException = resolved.throwTestFailureException;
        this.classifier = resolved.classifier;
        this.valueGenerator = resolved.valueGenerator;
        this.transactions = new TransactionLog(site);
        this.matcher = new ExpectationMatcher(this.transactions, {
            fail: description => this.internalAssert(false, description),
            comment: description => this.site.comment(description)
        });
        this.variableHost = {
            variableBound: (variable, value) => this.variableBound(variable, value)
        };
    }

    get inTransaction(): boolean {
        return this.transactions.isActive;
    }

    getAdapter<T>(type: TypeDescriptor<T>): T {
        return this.site.getAdapter(type);
    }

    subscribe(event: EventDescriptor, target: EventSource, handler?: ObservationHandler): void {
        const prototype: object | null = Object.getPrototypeOf(target);
        let handlersByType = this.handlers.get(event);
        if (!handlersByType) {
            handlersByType = new Map();
            this.handlers.set(event, handlersByType);
        }
        handlersByType.set(prototype, handler ?? ((e, t, args) => this.addEvent(e, t, ...args)));

        let listenersByEvent = this.listeners.get(target);
        if (!listenersByEvent) {
            listenersByEvent = new Map();
            this.listeners.set(target, listenersByEvent);
        }
        const previous = listenersByEvent.get(event);
        if (previous) {
            target.off(event.name, previous);
        }
        const listener: Listener = (...args) => this.dispatch(event, target, prototype, args);
        listenersByEvent.set(event, listener);
        target.on(event.name, listener);
    }

    addEvent(event: EventDescriptor, target: unknown, ...args: unknown[]): void {
        this.eventQueue.add(new AvailableEvent(event, target, args));
    }

    addReturn(method: MethodDescriptor, target: unknown, ...args: unknown[]): void {
        this.returnQueue.add(new AvailableReturn(method, target, args));
    }

    expectEvent(timeoutMs: number, failIfNone: boolean, ...expected: ExpectedEvent[]): Promise<number> {
        return this.matcher.expect({
            queue: this.eventQueue,
            timeoutMs,
            failIfNone,
            expected,
            describeTimeout: (t, patterns) => [
                `Event must occur within ${t}ms`,
                "Expecting events:",
                ...patterns.map(e => `\t${e.toString()}`)
            ].join("\n")
        });
    }

    expectReturn(timeoutMs: number, failIfNone: boolean, ...expected: ExpectedReturn[]): Promise<number> {
        return this.matcher.expect({
            queue: this.returnQueue,
            timeoutMs,
            failIfNone,
            expected,
            describeTimeout: (t, patterns) => [
                `expecting return within ${t}ms`,
                "Expecting returns:",
                ...patterns.map(e => `\t${e.toString()}`)
            ].join("\n")
        });
    }

    checkObservationTimeout(isAcceptingState: boolean, ...expected: ExpectedEvent[]): void {
        const expectedLines = expected.map(e => `\t${e.toString()}`);
        if (isAcceptingState && this.eventQueue.count === 0) {
            this.site.comment(["Observation timeout while expecting events:", ...expectedLines].join("\n"));
            return;
        }

        const observedLines = this.eventQueue.snapshot().map(o => `\t${o.toString()}`);
        this.internalAssert(false, [
            "Expected event didn't come within configured timeout.",
            "Expected events:",
            ...expectedLines,
            "Observed events:",
            ...observedLines
        ].join("\n"));
    }

    selectSatisfiedPreConstraint(printDiagnosisIfFail: boolean, ...expected: ExpectedPreConstraint[]): number {
        return this.matcher.selectSatisfiedPreConstraint(printDiagnosisIfFail, expected);
    }

    beginTest(name: string): void {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "Checkpoint", description: `Begin Test: ${name}` });
        }
        else {
            this.site.beginTest(name);
        }
    }

    endTest(): void {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "Checkpoint", description: "End Test." });
        }
        else {
            this.site.endTest();
        }
    }

    assert(condition: boolean, description: string): void {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "Assert", condition, description });
            if (!this.site.isTrue(condition, description)) {
                throw new TransactionFailed(description);
            }
        }
        else {
            this.internalAssert(condition, description);
        }
    }

    assume(condition: boolean, description: string): void {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "Assume", condition, description });
            if (!condition) {
                throw new TransactionFailed(description);
            }
        }
        else {
            this.site.assume(condition, description);
        }
    }

    checkpoint(description: string): void {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "Checkpoint", description });
        }
        else {
            this.site.checkpoint(description);
        }
    }

    comment(description: string): void {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "Comment", description });
        }
        else {
            this.site.comment(description);
        }
    }

    createVariable<T>(name: string): Variable<T> {
        return new VariableImpl<T>(name, this.variableHost);
    }

    generateValue<T>(type: TypeDescriptor<T>): T {
        return this.valueGenerator.generate(type);
    }

    beginTransaction(): void {
        this.transactions.begin();
    }

    endTransaction(commit: boolean): void {
        this.transactions.end(commit);
    }

    /**
     * A copy of the pending events, in arrival order.
     */
    eventQueueSnapshot(): readonly AvailableEvent[] {
        return this.eventQueue.snapshot();
    }

    /**
     * A copy of the pending returns, in arrival order.
     */
    returnQueueSnapshot(): readonly AvailableReturn[] {
        return this.returnQueue.snapshot();
    }

    /**
     * Prepares the manager for a new test run: drops pending observations,
     * rolls back an open transaction and clears the adapter classification cache.
     */
    reset(): void {
        if (this.transactions.isActive) {
            Trace.warn("[TestManager] Rolling back a transaction left open by the previous test");
            this.transactions.end(false);
        }
        this.eventQueue.clear();
        this.returnQueue.clear();
        this.classifier.reset();
    }

    private dispatch(event: EventDescriptor, target: EventSource, prototype: object | null, args: unknown[]) {
        const handler = this.handlers.get(event)?.get(prototype);
        if (!handler) {
            Trace.warn(`[TestManager] No handler for ${event.toString()}`);
            return;
        }
        const observedTarget = this.classifier.requiresTarget(event) ? target : null;
        handler(event, observedTarget, args);
    }

    private variableBound(variable: BindableVariable, value: unknown) {
        if (this.transactions.isActive) {
            this.transactions.record({ kind: "VariableBound", variable, value });
        }
    }

    private internalAssert(condition: boolean, description: string) {
        if (!condition && this.throwTestFailureException) {
            throw new TestFailureError(description);
        }
        this.site.assert(condition, description);
    }
}
