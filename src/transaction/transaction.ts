import { describeValue } from "../util/describe";

/**
 * The part of a variable a transaction needs: its name, and a way to undo
 * a binding on rollback.
 */
export interface BindableVariable {
    readonly name: string;
    unbind(): void;
}

type AssertEntry = {
    kind: "Assert";
    condition: boolean;
    description: string;
};

type AssumeEntry = {
    kind: "Assume";
    condition: boolean;
    description: string;
};

type CheckpointEntry = {
    kind: "Checkpoint";
    description: string;
};

type CommentEntry = {
    kind: "Comment";
    description: string;
};

type VariableBoundEntry = {
    kind: "VariableBound";
    variable: BindableVariable;
    value: unknown;
};

export type TransactionEntry =
    AssertEntry |
    AssumeEntry |
    CheckpointEntry |
    CommentEntry |
    VariableBoundEntry;

export type TransactionEntryKind = TransactionEntry["kind"];

export function describeBinding(variable: BindableVariable, value: unknown): string {
    return `bound variable ${variable.name} to value: ${describeValue(value)}`;
}

/**
 * One line per entry, each starting with `prefix`.
 */
export function describeTransaction(prefix: string, entries: readonly TransactionEntry[]): string[] {
    return entries.map(entry => {
        switch (entry.kind) {
            case "Assert":
            case "Assume":
                return `${prefix}${entry.kind.toLowerCase()} ${entry.condition ? "succeeded" : "failed"}: ${entry.description}`;
            case "Checkpoint":
                return `${prefix}checkpoint: ${entry.description}`;
            case "Comment":
                return `${prefix}comment: ${entry.description}`;
            case "VariableBound":
                return `${prefix}${describeBinding(entry.variable, entry.value)}`;
        }
    });
}
