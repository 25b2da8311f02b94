import { UnresolvedMemberError } from "../errors";

export interface TypeOptions<T> {
    /** Marks the type as a test adapter. Classification is inherited by derived types. */
    adapter?: boolean;
    base?: TypeDescriptor;
    interfaces?: TypeDescriptor[];
    /** Produces the value used by `generateValue` for this type. */
    defaultValue?: () => T;
}

export interface ParameterDescriptor {
    name: string;
    type: TypeDescriptor;
    /** Output parameter, reported back to the checker of a method return. */
    byRef?: boolean;
}

export type ParameterDeclaration = ParameterDescriptor | TypeDescriptor;

export interface MemberOptions {
    isStatic?: boolean;
}

function toParameters(declarations: ParameterDeclaration[]): ParameterDescriptor[] {
    return declarations.map((declaration, index) =>
        declaration instanceof TypeDescriptor
            ? { name: `arg${index}`, type: declaration }
            : { ...declaration });
}

function sameTypes(parameters: readonly ParameterDescriptor[], types: readonly TypeDescriptor[]): boolean {
    return parameters.length === types.length &&
        parameters.every((parameter, index) => parameter.type === types[index]);
}

/**
 * Describes a type of the system under test: its name, its place in the
 * type hierarchy, and the events, methods and constructors declared on it.
 * Descriptors are compared by identity.
 */
export class TypeDescriptor<T = unknown> {
    private readonly members: MemberDescriptor[] = [];

    constructor(
        public readonly name: string,
        private readonly options: TypeOptions<T> = {}
    ) { }

    get hasAdapterMarker(): boolean {
        return this.options.adapter === true;
    }

    get base(): TypeDescriptor | undefined {
        return this.options.base;
    }

    get interfaces(): readonly TypeDescriptor[] {
        return this.options.interfaces ?? [];
    }

    get defaultValue(): (() => T) | undefined {
        return this.options.defaultValue;
    }

    defineEvent(name: string, parameters: ParameterDeclaration[] = [], options: MemberOptions = {}): EventDescriptor {
        const event = new EventDescriptor(this, name, toParameters(parameters), options.isStatic ?? false);
        this.members.push(event);
        return event;
    }

    defineMethod(name: string, parameters: ParameterDeclaration[] = [], returnType: TypeDescriptor | null = null, options: MemberOptions = {}): MethodDescriptor {
        const method = new MethodDescriptor(this, name, "method", toParameters(parameters), returnType, options.isStatic ?? false);
        this.members.push(method);
        return method;
    }

    defineConstructor(parameters: ParameterDeclaration[] = []): MethodDescriptor {
        const ctor = new MethodDescriptor(this, this.name, "constructor", toParameters(parameters), null, false);
        this.members.push(ctor);
        return ctor;
    }

    getEvent(name: string): EventDescriptor {
        for (const member of this.members) {
            if (member instanceof EventDescriptor && member.name === name) {
                return member;
            }
        }
        throw new UnresolvedMemberError(`Cannot resolve event '${name}' for type '${this.name}'`);
    }

    getMethod(name: string, ...parameterTypes: TypeDescriptor[]): MethodDescriptor {
        for (const member of this.members) {
            if (member instanceof MethodDescriptor &&
                member.kind === "method" &&
                member.name === name &&
                sameTypes(member.parameters, parameterTypes)) {
                return member;
            }
        }
        throw new UnresolvedMemberError(`Cannot resolve method '${name}' in type '${this.name}'`);
    }

    getConstructor(...parameterTypes: TypeDescriptor[]): MethodDescriptor {
        for (const member of this.members) {
            if (member instanceof MethodDescriptor &&
                member.kind === "constructor" &&
                sameTypes(member.parameters, parameterTypes)) {
                return member;
            }
        }
        throw new UnresolvedMemberError(`Cannot resolve constructor for type '${this.name}'`);
    }

    toString(): string {
        return this.name;
    }
}

export class EventDescriptor {
    readonly kind = "event";

    constructor(
        public readonly declaringType: TypeDescriptor,
        public readonly name: string,
        public readonly parameters: readonly ParameterDescriptor[],
        public readonly isStatic: boolean
    ) { }

    /**
     * The values an observation of this event carries, in order.
     */
    get outputTypes(): TypeDescriptor[] {
        return this.parameters.map(p => p.type);
    }

    toString(): string {
        return `${this.declaringType.name}.${this.name}`;
    }
}

export class MethodDescriptor {
    constructor(
        public readonly declaringType: TypeDescriptor,
        public readonly name: string,
        public readonly kind: "method" | "constructor",
        public readonly parameters: readonly ParameterDescriptor[],
        public readonly returnType: TypeDescriptor | null,
        public readonly isStatic: boolean
    ) { }

    /**
     * The values a return of this method carries: by-reference parameters
     * in declaration order, then the return value unless the method is void.
     */
    get outputTypes(): TypeDescriptor[] {
        const outputs = this.parameters
            .filter(p => p.byRef === true)
            .map(p => p.type);
        if (this.returnType !== null) {
            outputs.push(this.returnType);
        }
        return outputs;
    }

    toString(): string {
        const parameters = this.parameters
            .map(p => p.byRef ? `out ${p.type.name}` : p.type.name)
            .join(", ");
        return `${this.declaringType.name}.${this.name}(${parameters})`;
    }
}

export type MemberDescriptor = EventDescriptor | MethodDescriptor;

export function getEvent(type: TypeDescriptor | null | undefined, name: string): EventDescriptor {
    if (!type) {
        throw new TypeError("type must be provided");
    }
    return type.getEvent(name);
}

export function getMethod(type: TypeDescriptor | null | undefined, name: string, ...parameterTypes: TypeDescriptor[]): MethodDescriptor {
    if (!type) {
        throw new TypeError("type must be provided");
    }
    return type.getMethod(name, ...parameterTypes);
}

export function getConstructor(type: TypeDescriptor | null | undefined, ...parameterTypes: TypeDescriptor[]): MethodDescriptor {
    if (!type) {
        throw new TypeError("type must be provided");
    }
    return type.getConstructor(...parameterTypes);
}
