// src/core/capability/CapabilityRegistry.ts

import { ErrorFactory } from '../errors';
import { AugmentedCase, wrappedTypeKey } from '../model';

export interface RegistryEntry {
    /** Wrapped type as declared on the case */
    readonly wrappedType: string;
    readonly case: AugmentedCase;
}

/**
 * Wrapped-type -> case mapping for one capability scope. Lives for a single
 * generator invocation; collisions with other invocations using the same
 * capability name are not its concern.
 */
export class CapabilityRegistry {
    private entriesByKey: Map<string, RegistryEntry> = new Map();

    constructor(public readonly scope: string, private readonly itemName: string = scope) { }

    /**
     * Claims the case's wrapped type. Opaque cases are ignored.
     * Throws `DuplicateWrappedTypeError` when the type is already claimed.
     */
    public register(c: AugmentedCase): void {
        if (c.kind.tag !== 'contextual') return;

        const key = wrappedTypeKey(c.kind.wrappedType);
        const existing = this.entriesByKey.get(key);
        if (existing) {
            throw ErrorFactory.duplicateWrappedType(
                this.itemName,
                this.scope,
                c.kind.wrappedType,
                existing.case.name,
                c.name
            );
        }
        this.entriesByKey.set(key, { wrappedType: c.kind.wrappedType, case: c });
    }

    public registerAll(cases: readonly AugmentedCase[]): this {
        cases.forEach(c => this.register(c));
        return this;
    }

    public lookup(wrappedType: string): RegistryEntry | undefined {
        return this.entriesByKey.get(wrappedTypeKey(wrappedType));
    }

    /** Entries in registration order. */
    public entries(): RegistryEntry[] {
        return Array.from(this.entriesByKey.values());
    }

    public get size(): number {
        return this.entriesByKey.size;
    }
}
