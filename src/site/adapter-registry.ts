import { AdapterNotFoundError } from "../errors";
import { TypeDescriptor } from "../model/descriptors";
import { AdapterLookup } from "./test-site";

type Registration<T> = {
    type: TypeDescriptor<T>;
    instance: T;
};

export class AdapterRegistry implements AdapterLookup {
    private readonly registrations: Registration<unknown>[] = [];

    register<T>(type: TypeDescriptor<T>, instance: T): this {
        const existing = this.registrations.findIndex(r => r.type === type);
        if (existing >= 0) {
            this.registrations.splice(existing, 1);
        }
        this.registrations.push({ type, instance });
        return this;
    }

    getAdapter<T>(type: TypeDescriptor<T>): T {
        for (const registration of this.registrations) {
            if (isRegistrationOf(registration, type)) {
                return registration.instance;
            }
        }
        throw new AdapterNotFoundError(type.name);
    }
}

function isRegistrationOf<T>(registration: Registration<unknown>, type: TypeDescriptor<T>): registration is Registration<T> {
    return registration.type === type;
}
