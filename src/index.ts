export { CallingConvention, resolveCallingConvention } from './checker/calling-convention';
export { bindChecker, BoundChecker, Checker, checker, CheckerFunction, untypedChecker } from './checker/checker';
export {
  AdapterNotFoundError,
  IncompatibleCheckerError,
  InvalidStateError,
  NotBoundError,
  NotSupportedError,
  QueueOverflowError,
  TestFailureError,
  TestToolsError,
  TransactionFailed,
  UnresolvedMemberError,
  UnsupportedValueTypeError
} from './errors';
export { ExpectationMatcher, ExpectOptions, MatchReporter } from './expectation/expectation-matcher';
export { ExpectedEvent, ExpectedObservation, ExpectedPreConstraint, ExpectedReturn } from './expectation/expected';
export { DefaultValueGenerator, resolveTestManagerConfig, ResolvedTestManagerConfig, TestManagerConfig, TestManagerOptions, ValueGenerator } from './manager/config';
export { assertAreEqual, assertBind, assertBindVariables, assertNotNull, equality } from './manager/helpers';
export { EventSource, ObservationHandler, TestManager } from './manager/test-manager';
export { TestManagerImpl } from './manager/test-manager-impl';
export { AdapterClassifier } from './model/adapter-classifier';
export { CompoundValue } from './model/compound-value';
export {
  EventDescriptor,
  getConstructor,
  getEvent,
  getMethod,
  MemberDescriptor,
  MemberOptions,
  MethodDescriptor,
  ParameterDeclaration,
  ParameterDescriptor,
  TypeDescriptor,
  TypeOptions
} from './model/descriptors';
export { defineType, Types } from './model/types';
export { AvailableEvent, AvailableReturn, Observation } from './observation/observation';
export { ObservationQueue, ObservationQueueOptions } from './observation/observation-queue';
export { AdapterRegistry } from './site/adapter-registry';
export { MemoryTestSite, SiteEntry, SiteEntryKind } from './site/memory-test-site';
export { AdapterLookup, ReportingSink, TestSite } from './site/test-site';
export { BindableVariable, describeTransaction, TransactionEntry, TransactionEntryKind } from './transaction/transaction';
export { TransactionLog } from './transaction/transaction-log';
export { Variable, VariableHost, VariableImpl } from './transaction/variable';
export { describeValue } from './util/describe';
export { Signal } from './util/promise';
export { ConsoleTracer, MemoryTracer, NoOpTracer, Trace, Tracer } from './util/trace';
