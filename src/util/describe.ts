/**
 * Renders a value for diagnostics.
 * Strings are quoted, arrays and plain objects are expanded, and any other
 * object is shown through its own `toString` when it defines one.
 */
export function describeValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    switch (typeof value) {
        case "undefined":
            return "undefined";
        case "string":
            return JSON.stringify(value);
        case "bigint":
            return `${value}n`;
        case "function":
            return `[function ${value.name || "anonymous"}]`;
        case "object":
            return describeObject(value);
        default:
            return String(value);
    }
}

function describeObject(value: object): string {
    if (Array.isArray(value)) {
        return `[${value.map(v => describeValue(v)).join(", ")}]`;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    const prototype = Object.getPrototypeOf(value);
    if (prototype === Object.prototype || prototype === null) {
        const fields = Object.entries(value)
            .map(([key, field]) => `${key}: ${describeValue(field)}`)
            .join(", ");
        return `{${fields}}`;
    }
    if (value.toString !== Object.prototype.toString) {
        return value.toString();
    }
    return `[${value.constructor.name}]`;
}
