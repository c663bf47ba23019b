// src/core/synthesis/AugmentationSynthesizer.ts

import { CONFIG } from '../../config/config';
import { AugmentedCase, ClassifiedCase, Field, hasAttribute } from '../model';

function markAsSource(field: Field): Field {
    if (hasAttribute(field.attributes, CONFIG.ATTRIBUTES.SOURCE)) {
        return field;
    }
    return { ...field, attributes: [...field.attributes, { name: CONFIG.ATTRIBUTES.SOURCE }] };
}

function messageFieldName(wrapped: Field): string {
    return wrapped.name === CONFIG.SYNTHESIS.MESSAGE_FIELD
        ? CONFIG.SYNTHESIS.FALLBACK_MESSAGE_FIELD
        : CONFIG.SYNTHESIS.MESSAGE_FIELD;
}

/**
 * Builds the augmented form of a case. A contextual case becomes
 * `[wrapped (source), message: string]` with a display template that
 * renders the message only; anything else is returned unchanged.
 */
export function synthesizeCase(c: ClassifiedCase): AugmentedCase {
    const wrapped = c.fields[0];
    if (c.kind.tag === 'opaque' || !wrapped) {
        return c;
    }

    const source = markAsSource(wrapped);
    let message: Field;
    let template: string;

    if (wrapped.name === undefined) {
        message = { type: CONFIG.SYNTHESIS.MESSAGE_TYPE, attributes: [] };
        template = '{1}';
    } else {
        const name = messageFieldName(wrapped);
        message = { name, type: CONFIG.SYNTHESIS.MESSAGE_TYPE, attributes: [] };
        template = `{${name}}`;
    }

    return {
        ...c,
        fields: [source, message],
        attributes: [...c.attributes, { name: CONFIG.ATTRIBUTES.DISPLAY, value: template }],
    };
}

export function synthesizeCases(cases: readonly ClassifiedCase[]): AugmentedCase[] {
    return cases.map(synthesizeCase);
}
