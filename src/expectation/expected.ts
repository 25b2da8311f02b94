import { BoundChecker, bindChecker, Checker } from "../checker/checker";
import { AdapterClassifier } from "../model/adapter-classifier";
import { EventDescriptor, MemberDescriptor, MethodDescriptor } from "../model/descriptors";
import { Observation } from "../observation/observation";
import { describeValue } from "../util/describe";

/**
 * A pattern an observation is matched against: the member, the target
 * (null matches any target), and an optional checker whose calling
 * convention is resolved when the pattern is built.
 */
export abstract class ExpectedObservation<M extends MemberDescriptor> {
    readonly target: unknown;
    readonly checker: BoundChecker | null;

    constructor(
        public readonly member: M,
        target: unknown,
        checker: Checker | null = null,
        classifier: AdapterClassifier = AdapterClassifier.default
    ) {
        this.target = target ?? null;
        this.checker = checker ? bindChecker(member, checker, classifier) : null;
    }

    protected abstract get label(): string;

    matches(observation: Observation): boolean {
        return observation.member === this.member &&
            (this.target === null || this.target === observation.target);
    }

    toString(): string {
        const on = this.target === null ? "" : ` on ${describeValue(this.target)}`;
        const check = this.checker ? ` with ${this.checker.convention} checker` : "";
        return `${this.label} ${this.member.toString()}${on}${check}`;
    }
}

export class ExpectedEvent extends ExpectedObservation<EventDescriptor> {
    protected get label(): string {
        return "event";
    }
}

export class ExpectedReturn extends ExpectedObservation<MethodDescriptor> {
    protected get label(): string {
        return "return";
    }
}

/**
 * A condition over the test state, checked without any observation.
 * The predicate reports through the manager's assert and assume.
 */
export class ExpectedPreConstraint {
    constructor(
        public readonly check: () => void,
        public readonly description: string = "pre-constraint"
    ) { }

    toString(): string {
        return this.description;
    }
}
