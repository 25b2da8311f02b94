import { InvalidStateError } from "../errors";
import { ReportingSink } from "../site/test-site";
import { Trace } from "../util/trace";
import { describeBinding, TransactionEntry } from "./transaction";

/**
 * Buffers the side effects of a checker until the attempt is decided.
 *
 * At most one transaction is active at a time. Committing replays every
 * entry to the reporting sink in the order it was recorded; rolling back
 * only undoes variable bindings and drops everything else.
 */
export class TransactionLog {
    private active: TransactionEntry[] | null = null;

    constructor(private readonly sink: ReportingSink) { }

    get isActive(): boolean {
        return this.active !== null;
    }

    /**
     * The entries recorded so far in the active transaction.
     */
    get entries(): readonly TransactionEntry[] {
        return this.active ? [...this.active] : [];
    }

    begin(): void {
        if (this.active !== null) {
            throw new InvalidStateError("nested test manager transactions not allowed");
        }
        this.active = [];
    }

    record(entry: TransactionEntry): void {
        if (this.active === null) {
            throw new InvalidStateError("no test manager transaction active which can record entries");
        }
        this.active.push(entry);
    }

    /**
     * Ends the active transaction and returns its entries.
     */
    end(commit: boolean): TransactionEntry[] {
        const entries = this.active;
        if (entries === null) {
            throw new InvalidStateError("no test manager transaction active which can be ended");
        }
        this.active = null;

        if (commit) {
            for (const entry of entries) {
                this.replay(entry);
            }
        }
        else {
            let unbound = 0;
            for (const entry of entries) {
                if (entry.kind === "VariableBound") {
                    entry.variable.unbind();
                    unbound++;
                }
            }
            if (unbound > 0) {
                Trace.info(`[TransactionLog] Rolled back ${unbound} variable binding(s)`);
            }
        }
        return entries;
    }

    private replay(entry: TransactionEntry): void {
        switch (entry.kind) {
            case "Assert":
                this.sink.assert(entry.condition, entry.description);
                break;
            case "Assume":
                this.sink.assume(entry.condition, entry.description);
                break;
            case "Checkpoint":
                this.sink.checkpoint(entry.description);
                break;
            case "Comment":
                this.sink.comment(entry.description);
                break;
            case "VariableBound":
                this.sink.comment(describeBinding(entry.variable, entry.value));
                break;
        }
    }
}
