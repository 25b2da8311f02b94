import { InvalidStateError, NotBoundError } from "../errors";
import { describeValue } from "../util/describe";
import { BindableVariable } from "./transaction";

/**
 * Receives every binding so that it can be recorded in the active
 * transaction, if there is one.
 */
export interface VariableHost {
    variableBound(variable: BindableVariable, value: unknown): void;
}

/**
 * A named cell that is bound at most once.
 * A binding made inside a transaction is undone if the transaction rolls back.
 */
export interface Variable<T> extends BindableVariable {
    readonly isBound: boolean;
    /** Throws `NotBoundError` when read before it is bound. */
    value: T;
}

export class VariableImpl<T> implements Variable<T> {
    private cell: { value: T } | null = null;

    constructor(
        public readonly name: string,
        private readonly host: VariableHost
    ) { }

    get isBound(): boolean {
        return this.cell !== null;
    }

    get value(): T {
        if (this.cell === null) {
            throw new NotBoundError(this.name);
        }
        return this.cell.value;
    }

    set value(value: T) {
        if (this.cell !== null) {
            throw new InvalidStateError(`variable '${this.name}' is already bound to ${describeValue(this.cell.value)}`);
        }
        this.cell = { value };
        this.host.variableBound(this, value);
    }

    unbind(): void {
        this.cell = null;
    }

    toString(): string {
        return this.cell === null
            ? `${this.name} (unbound)`
            : `${this.name} = ${describeValue(this.cell.value)}`;
    }
}
