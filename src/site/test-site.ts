import { TypeDescriptor } from "../model/descriptors";

/**
 * The destination of test results.
 * Failed assertions are handled here unless the manager is configured to
 * raise `TestFailureError` itself.
 */
export interface ReportingSink {
    assert(condition: boolean, description: string): void;
    assume(condition: boolean, description: string): void;
    /** Evaluates a condition without reporting it. */
    isTrue(condition: boolean, description: string): boolean;
    checkpoint(description: string): void;
    comment(description: string): void;
    beginTest(name: string): void;
    endTest(): void;
}

export interface AdapterLookup {
    /** Returns the singleton adapter of the type; throws if none is registered. */
    getAdapter<T>(type: TypeDescriptor<T>): T;
}

export interface TestSite extends ReportingSink, AdapterLookup {
}
