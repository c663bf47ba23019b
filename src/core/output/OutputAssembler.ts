// src/core/output/OutputAssembler.ts

import {
    Attribute,
    AugmentedCase,
    DeclaredCase,
    DeclaredField,
    EmittedCapability,
    GeneratedArtifact,
    ItemShape,
    TypeDefinition,
} from '../model';

/** The augmented item in the same structural form the front end produced. */
export interface ItemDescriptionOutput {
    readonly kind: ItemShape;
    readonly name: string;
    readonly attributes?: readonly Attribute[];
    readonly variants?: readonly DeclaredCase[];
    readonly fields?: readonly DeclaredField[];
    readonly options: Readonly<Record<string, string>>;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach(deepFreeze);
    }
    return value;
}

/**
 * Puts the rewritten definition, the capability declaration and its
 * implementations together, in that order.
 */
export function assembleArtifact(
    definition: TypeDefinition,
    cases: readonly AugmentedCase[],
    capability: EmittedCapability
): GeneratedArtifact {
    return deepFreeze({
        definition: {
            name: definition.name,
            shape: definition.shape,
            attributes: definition.attributes,
            cases,
        },
        capability: {
            declaration: capability.declaration,
            implementations: capability.implementations,
        },
    });
}

/** Augmented cases in full; untouched cases exactly as they were declared. */
function caseForm(c: AugmentedCase): DeclaredCase {
    return c.declared ?? { name: c.name, fields: c.fields, attributes: c.attributes };
}

/**
 * Converts the artifact's definition back to the front end's item form.
 * Generator attributes and scope options have been consumed and do not
 * reappear.
 */
export function toItemDescription(artifact: GeneratedArtifact): ItemDescriptionOutput {
    const { definition } = artifact;
    const sole = definition.cases[0];

    if (definition.shape === 'struct' && sole) {
        const { fields, attributes } = caseForm(sole);
        return {
            kind: 'struct',
            name: definition.name,
            ...(attributes === undefined ? {} : { attributes }),
            ...(fields === undefined ? {} : { fields }),
            options: {},
        };
    }

    return {
        kind: 'enum',
        name: definition.name,
        attributes: definition.attributes,
        variants: definition.cases.map(caseForm),
        options: {},
    };
}
