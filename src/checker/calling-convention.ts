import { AdapterClassifier } from "../model/adapter-classifier";
import { MemberDescriptor, TypeDescriptor } from "../model/descriptors";
import { Types } from "../model/types";

/**
 * How a checker is invoked against the values of an observation.
 */
export enum CallingConvention {
  /** The checker cannot be called for the member. */
  Invalid = 'Invalid',
  /** `check(...outputs)` */
  ParametersDirect = 'ParametersDirect',
  /** `check(target, ...outputs)` */
  TargetAndParametersDirect = 'TargetAndParametersDirect',
  /** `check(outputs)` */
  ParametersArray = 'ParametersArray',
  /** `check([target, ...outputs])` */
  TargetAndParametersArray = 'TargetAndParametersArray'
}

/**
 * Computes the calling convention of a checker declaring `checkerParameters`
 * for observations of `member`. Pure apart from the classifier's cache.
 */
export function resolveCallingConvention(
  member: MemberDescriptor,
  checkerParameters: readonly TypeDescriptor[],
  classifier: AdapterClassifier
): CallingConvention {
  const requiresTarget = classifier.requiresTarget(member);

  if (checkerParameters.length === 1 && checkerParameters[0] === Types.object) {
    return requiresTarget
      ? CallingConvention.TargetAndParametersArray
      : CallingConvention.ParametersArray;
  }

  const outputs = member.outputTypes;
  let offset = 0;
  let convention = CallingConvention.ParametersDirect;

  if (checkerParameters.length === outputs.length + 1) {
    if (!requiresTarget || checkerParameters[0] !== member.declaringType) {
      return CallingConvention.Invalid;
    }
    offset = 1;
    convention = CallingConvention.TargetAndParametersDirect;
  }
  else if (checkerParameters.length !== outputs.length) {
    return CallingConvention.Invalid;
  }

  for (let i = 0; i < outputs.length; i++) {
    if (outputs[i] !== checkerParameters[offset + i]) {
      return CallingConvention.Invalid;
    }
  }
  return convention;
}
