import { TypeDescriptor } from "../model/descriptors";
import { Trace } from "../util/trace";
import { AdapterRegistry } from "./adapter-registry";
import { TestSite } from "./test-site";

export type SiteEntryKind = "Assert" | "Assume" | "Checkpoint" | "Comment" | "BeginTest" | "EndTest";

export interface SiteEntry {
    kind: SiteEntryKind;
    condition: boolean;
    description: string;
    test: string | null;
}

/**
 * A test site that keeps its log in memory.
 * Failed assertions and assumptions are recorded and traced, never thrown.
 */
export class MemoryTestSite implements TestSite {
    private readonly log: SiteEntry[] = [];
    private currentTest: string | null = null;

    constructor(
        private readonly adapters: AdapterRegistry = new AdapterRegistry()
    ) { }

    get entries(): readonly SiteEntry[] {
        return [...this.log];
    }

    get failures(): readonly SiteEntry[] {
        return this.log.filter(e => !e.condition);
    }

    get testName(): string | null {
        return this.currentTest;
    }

    assert(condition: boolean, description: string): void {
        this.append("Assert", condition, description);
        if (!condition) {
            Trace.error(`Assertion failed: ${description}`);
        }
    }

    assume(condition: boolean, description: string): void {
        this.append("Assume", condition, description);
        if (!condition) {
            Trace.warn(`Assumption failed: ${description}`);
        }
    }

    isTrue(condition: boolean, description: string): boolean {
        return condition;
    }

    checkpoint(description: string): void {
        this.append("Checkpoint", true, description);
    }

    comment(description: string): void {
        this.append("Comment", true, description);
    }

    beginTest(name: string): void {
        this.currentTest = name;
        this.append("BeginTest", true, name);
        Trace.info(`[MemoryTestSite] Begin test ${name}`);
    }

    endTest(): void {
        const name = this.currentTest;
        this.append("EndTest", true, name ?? "");
        this.currentTest = null;
        Trace.info(`[MemoryTestSite] End test ${name ?? "(none)"}`);
    }

    getAdapter<T>(type: TypeDescriptor<T>): T {
        return this.adapters.getAdapter(type);
    }

    clear(): void {
        this.log.length = 0;
        this.currentTest = null;
    }

    private append(kind: SiteEntryKind, condition: boolean, description: string) {
        this.log.push({ kind, condition, description, test: this.currentTest });
    }
}
