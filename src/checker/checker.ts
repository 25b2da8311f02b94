import { IncompatibleCheckerError } from "../errors";
import { AdapterClassifier } from "../model/adapter-classifier";
import { MemberDescriptor, TypeDescriptor } from "../model/descriptors";
import { Types } from "../model/types";
import { CallingConvention, resolveCallingConvention } from "./calling-convention";

// Method syntax keeps parameters bivariant, so that a checker written as
// `(id: number, name: string) => void` can be stored and invoked uniformly.
export type CheckerFunction = { bivarianceHack(...args: unknown[]): void }["bivarianceHack"];

/**
 * A caller-supplied check together with the parameter types it declares.
 */
export interface Checker {
    readonly parameterTypes: readonly TypeDescriptor[];
    readonly check: CheckerFunction;
}

export function checker(parameterTypes: TypeDescriptor[], check: CheckerFunction): Checker {
    return { parameterTypes: [...parameterTypes], check };
}

/**
 * A checker that receives the observed values as one array.
 * For members that require a target, the target is the first element.
 */
export function untypedChecker(check: (values: unknown[]) => void): Checker {
    return { parameterTypes: [Types.object], check };
}

type BoundConvention = Exclude<CallingConvention, CallingConvention.Invalid>;

/**
 * A checker whose calling convention has been resolved against a member.
 */
export interface BoundChecker {
    readonly convention: BoundConvention;
    invoke(target: unknown, args: readonly unknown[]): void;
}

function describeShape(types: readonly TypeDescriptor[]): string {
    return `(${types.map(t => t.name).join(", ")})`;
}

export function bindChecker(member: MemberDescriptor, checker: Checker, classifier: AdapterClassifier): BoundChecker {
    const convention = resolveCallingConvention(member, checker.parameterTypes, classifier);
    const check = checker.check;
    switch (convention) {
        case CallingConvention.ParametersDirect:
            return { convention, invoke: (_target, args) => check(...args) };
        case CallingConvention.TargetAndParametersDirect:
            return { convention, invoke: (target, args) => check(target, ...args) };
        case CallingConvention.ParametersArray:
            return { convention, invoke: (_target, args) => check([...args]) };
        case CallingConvention.TargetAndParametersArray:
            return { convention, invoke: (target, args) => check([target, ...args]) };
        case CallingConvention.Invalid:
            throw new IncompatibleCheckerError(
                `Checker ${describeShape(checker.parameterTypes)} is not compatible with ${member.toString()}, ` +
                `which provides ${describeShape(member.outputTypes)}`);
    }
}
