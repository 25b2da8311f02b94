import { MemberDescriptor, TypeDescriptor } from "./descriptors";

/**
 * Decides whether a type belongs to a test adapter. A type is an adapter if it
 * carries the adapter marker, or if any interface or base type it
 * transitively implements or extends is an adapter.
 *
 * Classification is memoized per type. The cache lives as long as the
 * classifier; call `reset` when a new test run begins.
 */
export class AdapterClassifier {
    /** Shared by expected patterns and managers that are not given their own. */
    static readonly default = new AdapterClassifier();

    private readonly adapterTypes = new Map<TypeDescriptor, boolean>();

    isAdapter(type: TypeDescriptor): boolean {
        const cached = this.adapterTypes.get(type);
        if (cached !== undefined) {
            return cached;
        }

        let isAdapter = type.hasAdapterMarker;
        if (!isAdapter) {
            isAdapter = type.interfaces.some(i => this.isAdapter(i));
        }
        if (!isAdapter && type.base) {
            isAdapter = this.isAdapter(type.base);
        }

        this.adapterTypes.set(type, isAdapter);
        return isAdapter;
    }

    /**
     * A member requires a target when it is instance based and does not
     * originate from an adapter.
     */
    requiresTarget(member: MemberDescriptor): boolean {
        return !member.isStatic && !this.isAdapter(member.declaringType);
    }

    get cachedTypeCount(): number {
        return this.adapterTypes.size;
    }

    reset(): void {
        this.adapterTypes.clear();
    }
}
