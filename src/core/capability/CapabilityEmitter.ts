// src/core/capability/CapabilityEmitter.ts

import { CONFIG } from '../../config/config';
import { CapabilityImplementation, EmittedCapability } from '../model';
import { CapabilityRegistry, RegistryEntry } from './CapabilityRegistry';

function implementationFor(scope: string, target: string, entry: RegistryEntry): CapabilityImplementation {
    const base = { capability: scope, wrappedType: entry.wrappedType, target, caseName: entry.case.name };
    const [source, message] = entry.case.fields;

    if (source?.name !== undefined && message?.name !== undefined) {
        return { ...base, style: 'named', sourceSlot: source.name, messageSlot: message.name };
    }
    return { ...base, style: 'positional', sourceSlot: 0, messageSlot: 1 };
}

/**
 * Emits the capability declaration and one implementation per registry entry.
 */
export function emitCapability(registry: CapabilityRegistry, target: string): EmittedCapability {
    return {
        declaration: {
            name: registry.scope,
            method: CONFIG.CAPABILITY.METHOD_NAME,
            okTypeParameter: CONFIG.CAPABILITY.OK_TYPE_PARAMETER,
            contextParameter: CONFIG.CAPABILITY.CONTEXT_PARAMETER,
            target,
        },
        implementations: registry.entries().map(entry => implementationFor(registry.scope, target, entry)),
    };
}
