import { TransactionFailed } from "../errors";
import { MemberDescriptor } from "../model/descriptors";
import { Observation } from "../observation/observation";
import { ObservationQueue } from "../observation/observation-queue";
import { describeTransaction, TransactionEntry } from "../transaction/transaction";
import { TransactionLog } from "../transaction/transaction-log";
import { Trace } from "../util/trace";
import { ExpectedObservation, ExpectedPreConstraint } from "./expected";

/**
 * Where the matcher sends unmet expectations.
 */
export interface MatchReporter {
    /** Reports a test failure. May throw, depending on the manager's policy. */
    fail(description: string): void;
    comment(description: string): void;
}

type AttemptResult =
    { accepted: true } |
    { accepted: false; entries: TransactionEntry[] };

type Diagnosis<P> =
    { pattern: P; index: number; outcome: "rejected"; entries: TransactionEntry[] } |
    { pattern: P; index: number; outcome: "not-applicable" };

export interface ExpectOptions<T extends Observation, E> {
    queue: ObservationQueue<T>;
    timeoutMs: number;
    failIfNone: boolean;
    expected: readonly E[];
    /** Builds the failure reported when nothing is observed in time. */
    describeTimeout: (timeoutMs: number, expected: readonly E[]) => string;
}

/**
 * Matches the head observation of a queue against expected patterns.
 * Each applicable pattern's checker runs inside its own transaction; the first
 * one that does not fail is committed and the observation is consumed.
 */
export class ExpectationMatcher {
    constructor(
        private readonly transactions: TransactionLog,
        private readonly reporter: MatchReporter
    ) { }

    async expect<T extends Observation, E extends ExpectedObservation<MemberDescriptor>>(
        options: ExpectOptions<T, E>
    ): Promise<number> {
        const { queue, timeoutMs, failIfNone, expected } = options;

        const observation = await queue.tryGet(timeoutMs, false);
        if (observation === null) {
            if (failIfNone) {
                this.reporter.fail(options.describeTimeout(timeoutMs, expected));
            }
            return -1;
        }

        const diagnoses: Diagnosis<E>[] = [];
        for (let index = 0; index < expected.length; index++) {
            const pattern = expected[index];
            if (!pattern.matches(observation)) {
                diagnoses.push({ pattern, index, outcome: "not-applicable" });
                continue;
            }

            const checker = pattern.checker;
            const result = this.attempt(() => {
                if (checker) {
                    checker.invoke(observation.target, observation.args);
                }
            });
            if (result.accepted) {
                queue.remove(observation);
                Trace.info(`[ExpectationMatcher] Matched ${observation.toString()} with pattern ${index + 1} of ${expected.length}`);
                return index;
            }
            if (failIfNone) {
                diagnoses.push({ pattern, index, outcome: "rejected", entries: result.entries });
            }
        }

        if (!failIfNone) {
            return -1;
        }

        const lines = [`expected matching ${queue.name}, found '${observation.toString()}'. Diagnosis:`];
        for (const diagnosis of diagnoses) {
            if (diagnosis.outcome === "rejected") {
                lines.push(`  ${diagnosis.index + 1}. ${diagnosis.pattern.toString()} is not matching`);
                lines.push(...describeTransaction("      ", diagnosis.entries));
            }
            else {
                lines.push(`  ${diagnosis.index + 1}. ${diagnosis.pattern.toString()} is not applicable`);
            }
        }
        this.reporter.fail(lines.join("\n"));
        return -1;
    }

    /**
     * Returns the index of the first pre-constraint whose predicate does not
     * fail, or -1. When `printDiagnosisIfFail` is set and none is satisfied,
     * the rolled-back transactions of all candidates are commented.
     */
    selectSatisfiedPreConstraint(printDiagnosisIfFail: boolean, expected: readonly ExpectedPreConstraint[]): number {
        const rejected: { preConstraint: ExpectedPreConstraint; entries: TransactionEntry[] }[] = [];
        for (let index = 0; index < expected.length; index++) {
            const preConstraint = expected[index];
            const result = this.attempt(() => preConstraint.check());
            if (result.accepted) {
                return index;
            }
            rejected.push({ preConstraint, entries: result.entries });
        }

        if (printDiagnosisIfFail) {
            const lines = ["None of the expected pre-constraints are matched."];
            rejected.forEach(({ preConstraint, entries }, index) => {
                lines.push(`  ${index + 1}. ${preConstraint.toString()} is not satisfied`);
                lines.push(...describeTransaction("      ", entries));
            });
            this.reporter.comment(lines.join("\n"));
        }
        return -1;
    }

    private attempt(run: () => void): AttemptResult {
        this.transactions.begin();
        try {
            run();
        }
        catch (error) {
            const entries = this.transactions.end(false);
            if (error instanceof TransactionFailed) {
                return { accepted: false, entries };
            }
            throw error;
        }
        this.transactions.end(true);
        return { accepted: true };
    }
}
