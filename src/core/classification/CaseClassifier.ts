// src/core/classification/CaseClassifier.ts

import { CONFIG } from '../../config/config';
import { ErrorFactory } from '../errors';
import { Case, ClassifiedCase, TypeDefinition, hasAttribute } from '../model';

function isClassified(c: Case): c is ClassifiedCase {
    return 'kind' in c;
}

/**
 * Classifies one case as contextual (wrapping the type of its single field)
 * or opaque. Opaque cases keep their field and attribute lists by reference,
 * and an already-opaque case is returned as is.
 */
export function classifyCase(c: Case, itemName: string = c.name): ClassifiedCase {
    if (!c.contextual) {
        if (isClassified(c) && c.kind.tag === 'opaque') {
            return c;
        }
        return { ...c, kind: { tag: 'opaque' } };
    }

    const wrapped = c.fields[0];
    if (c.fields.length !== 1 || !wrapped) {
        throw ErrorFactory.invalidContextualCase(itemName, c.name, 'exactly-one-field', {
            fieldCount: c.fields.length,
        });
    }
    if (hasAttribute(c.attributes, CONFIG.ATTRIBUTES.DISPLAY)) {
        throw ErrorFactory.invalidContextualCase(itemName, c.name, 'no-display-template');
    }

    return { ...c, kind: { tag: 'contextual', wrappedType: wrapped.type } };
}

/** Classifies every case in declaration order; the first invalid case aborts. */
export function classifyCases(definition: TypeDefinition): ClassifiedCase[] {
    return definition.cases.map(c => classifyCase(c, definition.name));
}
