// src/core/model/ItemModelBuilder.ts

import { CONFIG } from '../../config/config';
import { ErrorFactory } from '../errors';
import {
    FieldDescription,
    AttributeDescription,
    ItemDescription,
    isIdentifier,
    validateItemDescription,
} from '../validation';
import { Attribute, Case, DeclaredCase, Field, TypeDefinition } from './types';
import { fieldStyleOf } from './helpers';

export interface BuildOptions {
    /** Capability name used when the item has no `capability` option */
    defaultCapabilityName?: string;
}

/** Scope-level options the generator understands. */
const SCOPE_OPTION_KEYS: readonly string[] = ['capability'];

function resolveCapabilityName(item: ItemDescription, fallback: string): string {
    for (const key of Object.keys(item.options)) {
        if (!SCOPE_OPTION_KEYS.includes(key)) {
            throw ErrorFactory.invalidOptions(`Unknown option '${key}'`, {
                item: item.name,
                suggestion: `supported options: ${SCOPE_OPTION_KEYS.join(', ')}`,
            });
        }
    }

    const name = item.options.capability ?? fallback;
    if (!isIdentifier(name)) {
        throw ErrorFactory.invalidOptions(`Capability name '${name}' is not a valid identifier`, {
            item: item.name,
            scope: name,
        });
    }
    return name;
}

/**
 * Reads the boolean-like `context` marker off a case's attributes and
 * returns the remaining attributes untouched.
 */
function splitContextMarker(
    itemName: string,
    caseName: string,
    attributes: readonly AttributeDescription[]
): { contextual: boolean; attributes: Attribute[] } {
    const markers = attributes.filter(attr => attr.name === CONFIG.ATTRIBUTES.CONTEXTUAL);
    const rest = attributes.filter(attr => attr.name !== CONFIG.ATTRIBUTES.CONTEXTUAL);

    if (markers.length > 1) {
        throw ErrorFactory.invalidOptions(`'${CONFIG.ATTRIBUTES.CONTEXTUAL}' is repeated on ${caseName}`, {
            item: itemName,
            caseName,
        });
    }

    const marker = markers[0];
    if (!marker) {
        return { contextual: false, attributes: rest };
    }

    switch (marker.value) {
        case undefined:
        case 'true':
            return { contextual: true, attributes: rest };
        case 'false':
            return { contextual: false, attributes: rest };
        default:
            throw ErrorFactory.invalidOptions(
                `'${CONFIG.ATTRIBUTES.CONTEXTUAL}' on ${caseName} expects true or false, got '${marker.value}'`,
                { item: itemName, caseName }
            );
    }
}

function declaredCase(
    name: string,
    fields: readonly FieldDescription[] | undefined,
    attributes: readonly Attribute[] | undefined
): DeclaredCase {
    return {
        name,
        ...(fields === undefined ? {} : { fields }),
        ...(attributes === undefined ? {} : { attributes }),
    };
}

function buildCase(
    itemName: string,
    caseName: string,
    declaredFields: readonly FieldDescription[] | undefined,
    declaredAttributes: readonly AttributeDescription[] | undefined
): Case {
    const fields: Field[] = (declaredFields ?? []).map(field => ({ ...field, attributes: field.attributes ?? [] }));
    if (fieldStyleOf(fields) === null) {
        throw ErrorFactory.malformedItem(`${caseName} mixes named and positional fields`, {
            item: itemName,
            caseName,
        });
    }

    const marker = splitContextMarker(itemName, caseName, declaredAttributes ?? []);
    const built: Case = {
        name: caseName,
        fields,
        attributes: marker.attributes,
        contextual: marker.contextual,
    };
    if (marker.contextual) {
        return built;
    }
    const attributes = declaredAttributes === undefined ? undefined : marker.attributes;
    return { ...built, declared: declaredCase(caseName, declaredFields, attributes) };
}

function buildEnum(item: ItemDescription, capabilityName: string): TypeDefinition {
    if (item.fields !== undefined) {
        throw ErrorFactory.malformedItem(`enum ${item.name} cannot declare struct fields`, { item: item.name });
    }
    if (!item.variants || item.variants.length === 0) {
        throw ErrorFactory.malformedItem(`enum ${item.name} has no cases`, { item: item.name });
    }
    const attributes = item.attributes ?? [];
    if (attributes.some(attr => attr.name === CONFIG.ATTRIBUTES.CONTEXTUAL)) {
        throw ErrorFactory.invalidOptions(
            `'${CONFIG.ATTRIBUTES.CONTEXTUAL}' belongs on a variant of enum ${item.name}, not on the enum`,
            { item: item.name }
        );
    }

    const seen = new Set<string>();
    const cases = item.variants.map(variant => {
        if (seen.has(variant.name)) {
            throw ErrorFactory.malformedItem(`enum ${item.name} declares ${variant.name} twice`, {
                item: item.name,
                caseName: variant.name,
            });
        }
        seen.add(variant.name);
        return buildCase(item.name, variant.name, variant.fields, variant.attributes);
    });

    return {
        name: item.name,
        shape: 'enum',
        attributes,
        cases,
        capabilityName,
    };
}

function buildStruct(item: ItemDescription, capabilityName: string): TypeDefinition {
    if (item.variants !== undefined) {
        throw ErrorFactory.malformedItem(`struct ${item.name} cannot declare variants`, { item: item.name });
    }

    return {
        name: item.name,
        shape: 'struct',
        attributes: [],
        cases: [buildCase(item.name, item.name, item.fields, item.attributes)],
        capabilityName,
    };
}

/**
 * Turns the front end's structured item into a `TypeDefinition`.
 * Pure: the input is validated, never mutated.
 */
export function buildTypeDefinition(input: unknown, options: BuildOptions = {}): TypeDefinition {
    const item = validateItemDescription(input);
    const capabilityName = resolveCapabilityName(
        item,
        options.defaultCapabilityName ?? CONFIG.CAPABILITY.DEFAULT_NAME
    );

    switch (item.kind) {
        case 'enum':
            return buildEnum(item, capabilityName);
        case 'struct':
            return buildStruct(item, capabilityName);
        default:
            throw ErrorFactory.malformedItem(`this generator only works for structs and enums, got '${item.kind}'`, {
                item: item.name,
            });
    }
}
