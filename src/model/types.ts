import { TypeDescriptor, TypeOptions } from "./descriptors";

/**
 * Descriptors of the built-in value types.
 * `Types.object` is the untyped marker: a checker declaring a single
 * parameter of this type receives the whole argument array.
 */
export const Types = {
    object: new TypeDescriptor<unknown>("object", { defaultValue: () => null }),
    string: new TypeDescriptor<string>("string", { defaultValue: () => "" }),
    number: new TypeDescriptor<number>("number", { defaultValue: () => 0 }),
    boolean: new TypeDescriptor<boolean>("boolean", { defaultValue: () => false }),
    bigint: new TypeDescriptor<bigint>("bigint", { defaultValue: () => BigInt(0) })
} as const;

export function defineType<T = unknown>(name: string, options: TypeOptions<T> = {}): TypeDescriptor<T> {
    return new TypeDescriptor<T>(name, options);
}
