/**
 * Base class of every error raised by the test manager.
 * Restores the prototype chain so that `instanceof` works on down-level targets.
 */
export class TestToolsError extends Error {
    __proto__: Error;
    constructor(message?: string) {
        const trueProto = new.target.prototype;
        super(message);

        this.__proto__ = trueProto;
        this.name = new.target.name;
    }
}

/**
 * Aborts the current matching attempt.
 * Raised by a failed assertion or assumption inside a transaction and
 * always caught by the expectation matcher.
 */
export class TransactionFailed extends TestToolsError {
    constructor(message?: string) {
        super(message ?? "transaction failed");
    }
}

/**
 * A reported failure, raised instead of reporting to the site when the
 * manager prefers exceptions.
 */
export class TestFailureError extends TestToolsError {
}

export class InvalidStateError extends TestToolsError {
}

export class NotBoundError extends TestToolsError {
    constructor(variableName: string) {
        super(`variable '${variableName}' is not bound`);
    }
}

export class IncompatibleCheckerError extends TestToolsError {
}

export class UnresolvedMemberError extends TestToolsError {
}

export class AdapterNotFoundError extends TestToolsError {
    constructor(typeName: string) {
        super(`No adapter is registered for type '${typeName}'`);
    }
}

export class QueueOverflowError extends TestToolsError {
    constructor(queueName: string, capacity: number) {
        super(`The ${queueName} queue is full (capacity ${capacity})`);
    }
}

export class NotSupportedError extends TestToolsError {
}

export class UnsupportedValueTypeError extends TestToolsError {
    constructor(typeName: string) {
        super(`Cannot generate a value of type '${typeName}'`);
    }
}
