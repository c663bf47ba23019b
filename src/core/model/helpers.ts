// src/core/model/helpers.ts

import { Attribute, Field, FieldStyle } from './types';

export function findAttribute(attributes: readonly Attribute[], name: string): Attribute | undefined {
    return attributes.find(attr => attr.name === name);
}

export function hasAttribute(attributes: readonly Attribute[], name: string): boolean {
    return findAttribute(attributes, name) !== undefined;
}

/**
 * Returns the field style of a case, or `null` when named and unnamed
 * fields are mixed.
 */
export function fieldStyleOf(fields: readonly Field[]): FieldStyle | null {
    if (fields.length === 0) return 'unit';
    const named = fields.filter(field => field.name !== undefined).length;
    if (named === fields.length) return 'named';
    if (named === 0) return 'positional';
    return null;
}

/**
 * Identity of a wrapped type inside a capability scope. Whitespace next to
 * punctuation is dropped and other runs collapse to one space, so
 * `Map<string, Io>` and `Map<string,Io>` collide while `typeof io` and
 * `typeofio` stay apart.
 */
export function wrappedTypeKey(type: string): string {
    return type
        .trim()
        .replace(/\s+/g, ' ')
        .replace(/ ?([^\w$ ]) ?/g, '$1');
}
