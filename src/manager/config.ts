import { z } from "zod";
import { UnsupportedValueTypeError } from "../errors";
import { AdapterClassifier } from "../model/adapter-classifier";
import { TypeDescriptor } from "../model/descriptors";

/**
 * Produces values of a described type for `generateValue`.
 */
export interface ValueGenerator {
    generate<T>(type: TypeDescriptor<T>): T;
}

/**
 * Uses the default value factory declared on the type.
 */
export class DefaultValueGenerator implements ValueGenerator {
    generate<T>(type: TypeDescriptor<T>): T {
        const factory = type.defaultValue;
        if (!factory) {
            throw new UnsupportedValueTypeError(type.name);
        }
        return factory();
    }
}

const testManagerOptionsSchema = z.object({
    /** Maximum number of queued events (0 = unbounded) */
    maxEventQueueSize: z.number().int().nonnegative().default(0),
    /** Maximum number of queued returns (0 = unbounded) */
    maxReturnQueueSize: z.number().int().nonnegative().default(0),
    /** Raise TestFailureError on failed assertions instead of reporting them to the site */
    throwTestFailureException: z.boolean().default(false)
});

export type TestManagerOptions = z.infer<typeof testManagerOptionsSchema>;

export type TestManagerConfig = z.input<typeof testManagerOptionsSchema> & {
    valueGenerator?: ValueGenerator;
    classifier?: AdapterClassifier;
};

export interface ResolvedTestManagerConfig extends TestManagerOptions {
    valueGenerator: ValueGenerator;
    classifier: AdapterClassifier;
}

/**
 * Applies defaults and validates the numeric and boolean options.
 * Throws the zod validation error for malformed input.
 */
export function resolveTestManagerConfig(config: TestManagerConfig = {}): ResolvedTestManagerConfig {
    const { valueGenerator, classifier, ...options } = config;
    return {
        ...testManagerOptionsSchema.parse(options),
        valueGenerator: valueGenerator ?? new DefaultValueGenerator(),
        classifier: classifier ?? AdapterClassifier.default
    };
}
