export interface Tracer {
    info(message: string): void;
    warn(message: string): void;
    error(error: unknown): void;
    counter(name: string, value: number): void;
}

export class NoOpTracer implements Tracer {
    info(message: string): void {
    }
    warn(message: string): void {
    }
    error(error: unknown): void {
    }
    counter(name: string, value: number): void {
    }
}

export class ConsoleTracer implements Tracer {
    info(message: string): void {
        console.log(message);
    }
    warn(message: string): void {
        console.warn(message);
    }
    error(error: unknown): void {
        console.error(error);
    }
    counter(name: string, value: number): void {
        console.log(`Counter: ${name} = ${value}`);
    }
}

/**
 * Collects trace output in memory so that tests can inspect it
 * without writing to the console.
 */
export class MemoryTracer implements Tracer {
    readonly messages: { level: "info" | "warn" | "error"; message: string }[] = [];
    readonly counters: Map<string, number> = new Map();

    info(message: string): void {
        this.messages.push({ level: "info", message });
    }
    warn(message: string): void {
        this.messages.push({ level: "warn", message });
    }
    error(error: unknown): void {
        const message = error instanceof Error ? error.message : String(error);
        this.messages.push({ level: "error", message });
    }
    counter(name: string, value: number): void {
        this.counters.set(name, value);
    }

    clear(): void {
        this.messages.length = 0;
        this.counters.clear();
    }
}

export class Trace {
    private static tracer: Tracer = new ConsoleTracer();

    static configure(tracer: Tracer) {
        Trace.tracer = tracer;
    }

    static off() {
        Trace.tracer = new NoOpTracer();
    }

    static getTracer(): Tracer {
        return Trace.tracer;
    }

    static info(message: string): void {
        this.tracer.info(message);
    }

    static warn(message: string): void {
        this.tracer.warn(message);
    }

    static error(error: unknown): void {
        this.tracer.error(error);
    }

    static counter(name: string, value: number): void {
        this.tracer.counter(name, value);
    }
}
