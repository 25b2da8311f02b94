import { EventDescriptor, MemberDescriptor, MethodDescriptor } from "../model/descriptors";
import { describeValue } from "../util/describe";

/**
 * A record that a member of the system under test produced observable
 * behavior: the member, the target instance (null for static and adapter
 * members), the actual values, and the moment it was captured.
 */
export abstract class Observation<M extends MemberDescriptor = MemberDescriptor> {
    readonly target: unknown;
    readonly args: readonly unknown[];

    constructor(
        public readonly member: M,
        target: unknown,
        args: readonly unknown[],
        public readonly timestamp: Date = new Date()
    ) {
        this.target = target ?? null;
        this.args = Object.freeze([...args]);
    }

    protected abstract get label(): string;

    toString(): string {
        const args = this.args.map(a => describeValue(a)).join(", ");
        const on = this.target === null
            ? ""
            : ` on ${describeValue(this.target)}`;
        return `${this.label} ${this.member.declaringType.name}.${this.member.name}(${args})${on}`;
    }
}

export class AvailableEvent extends Observation<EventDescriptor> {
    protected get label(): string {
        return "event";
    }
}

export class AvailableReturn extends Observation<MethodDescriptor> {
    protected get label(): string {
        return "return";
    }
}
