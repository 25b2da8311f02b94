import {
    AdapterClassifier,
    bindChecker,
    CallingConvention,
    checker,
    IncompatibleCheckerError,
    resolveCallingConvention,
    Types,
    untypedChecker
} from "@src";
import {
    Connected,
    Foo,
    IServerAdapter,
    LoggingServerAdapter,
    Open,
    Read,
    Renamed,
    Reset,
    Restarted,
    Server,
    ServerAdapter,
    ServerInstance
} from "../serverModel";

describe("Calling convention", () => {
    let classifier: AdapterClassifier;

    beforeEach(() => {
        classifier = new AdapterClassifier();
    });

    describe("adapter classification", () => {
        it("should classify a marked type as an adapter", () => {
            expect(classifier.isAdapter(IServerAdapter)).toBe(true);
        });

        it("should inherit the marker through interfaces and base types", () => {
            expect(classifier.isAdapter(ServerAdapter)).toBe(true);
            expect(classifier.isAdapter(LoggingServerAdapter)).toBe(true);
        });

        it("should not classify an unmarked type as an adapter", () => {
            expect(classifier.isAdapter(Server)).toBe(false);
        });

        it("should cache each classified type until reset", () => {
            classifier.isAdapter(LoggingServerAdapter);
            expect(classifier.cachedTypeCount).toBe(3);

            classifier.reset();
            expect(classifier.cachedTypeCount).toBe(0);
        });

        it("should require a target only for instance members of non-adapter types", () => {
            expect(classifier.requiresTarget(Foo)).toBe(true);
            expect(classifier.requiresTarget(Restarted)).toBe(false);
            expect(classifier.requiresTarget(Connected)).toBe(false);
            expect(classifier.requiresTarget(Read)).toBe(true);
            expect(classifier.requiresTarget(Reset)).toBe(false);
        });
    });

    describe("resolution", () => {
        it("should pass parameters directly when the types match", () => {
            expect(resolveCallingConvention(Renamed, [Types.number, Types.string], classifier))
                .toBe(CallingConvention.ParametersDirect);
        });

        it("should prepend the target when the checker takes the declaring type first", () => {
            expect(resolveCallingConvention(Renamed, [Server, Types.number, Types.string], classifier))
                .toBe(CallingConvention.TargetAndParametersDirect);
        });

        it("should pass the target and an array to an untyped checker of an instance member", () => {
            expect(resolveCallingConvention(Renamed, [Types.object], classifier))
                .toBe(CallingConvention.TargetAndParametersArray);
        });

        it("should pass only an array to an untyped checker of a static or adapter member", () => {
            expect(resolveCallingConvention(Restarted, [Types.object], classifier))
                .toBe(CallingConvention.ParametersArray);
            expect(resolveCallingConvention(Connected, [Types.object], classifier))
                .toBe(CallingConvention.ParametersArray);
        });

        it("should reject parameters in the wrong order", () => {
            expect(resolveCallingConvention(Renamed, [Types.string, Types.number], classifier))
                .toBe(CallingConvention.Invalid);
        });

        it("should reject a mismatched arity", () => {
            expect(resolveCallingConvention(Renamed, [Types.number], classifier))
                .toBe(CallingConvention.Invalid);
            expect(resolveCallingConvention(Renamed, [Server, Server, Types.number, Types.string], classifier))
                .toBe(CallingConvention.Invalid);
        });

        it("should reject a leading target parameter of the wrong type", () => {
            expect(resolveCallingConvention(Renamed, [Types.string, Types.number, Types.string], classifier))
                .toBe(CallingConvention.Invalid);
        });

        it("should reject a target parameter for members that take no target", () => {
            expect(resolveCallingConvention(Connected, [ServerAdapter, Types.string], classifier))
                .toBe(CallingConvention.Invalid);
        });

        it("should match method outputs: by-reference parameters, then the return value", () => {
            expect(Read.outputTypes).toEqual([Types.string, Types.number]);
            expect(resolveCallingConvention(Read, [Types.string, Types.number], classifier))
                .toBe(CallingConvention.ParametersDirect);
            expect(resolveCallingConvention(Read, [Types.number, Types.string], classifier))
                .toBe(CallingConvention.Invalid);
            expect(resolveCallingConvention(Read, [Server, Types.string, Types.number], classifier))
                .toBe(CallingConvention.TargetAndParametersDirect);
        });

        it("should accept a parameterless checker for a void method", () => {
            expect(resolveCallingConvention(Reset, [], classifier))
                .toBe(CallingConvention.ParametersDirect);
        });

        it("should accept the return value of an adapter method", () => {
            expect(resolveCallingConvention(Open, [Types.boolean], classifier))
                .toBe(CallingConvention.ParametersDirect);
        });
    });

    describe("binding", () => {
        const target = new ServerInstance("T1");
        let calls: unknown[][];

        beforeEach(() => {
            calls = [];
        });

        it("should invoke a direct checker with the values", () => {
            const bound = bindChecker(Renamed, checker([Types.number, Types.string], (id: number, name: string) => {
                calls.push([id, name]);
            }), classifier);

            bound.invoke(target, [3, "three"]);

            expect(bound.convention).toBe(CallingConvention.ParametersDirect);
            expect(calls).toEqual([[3, "three"]]);
        });

        it("should invoke a target checker with the target first", () => {
            const bound = bindChecker(Renamed, checker([Server, Types.number, Types.string], (server: ServerInstance, id: number, name: string) => {
                calls.push([server.id, id, name]);
            }), classifier);

            bound.invoke(target, [3, "three"]);

            expect(calls).toEqual([["T1", 3, "three"]]);
        });

        it("should invoke an untyped checker with the target and the values in one array", () => {
            const bound = bindChecker(Renamed, untypedChecker(values => {
                calls.push(values);
            }), classifier);

            bound.invoke(target, [3, "three"]);

            expect(calls).toEqual([[target, 3, "three"]]);
        });

        it("should invoke an untyped checker of an adapter member with the values only", () => {
            const bound = bindChecker(Connected, untypedChecker(values => {
                calls.push(values);
            }), classifier);

            bound.invoke(null, ["client-1"]);

            expect(bound.convention).toBe(CallingConvention.ParametersArray);
            expect(calls).toEqual([["client-1"]]);
        });

        it("should refuse an incompatible checker", () => {
            const incompatible = checker([Types.string], () => { });

            expect(() => bindChecker(Renamed, incompatible, classifier)).toThrow(IncompatibleCheckerError);
            expect(() => bindChecker(Renamed, incompatible, classifier))
                .toThrow("Checker (string) is not compatible with Server.Renamed, which provides (number, string)");
        });
    });
});
