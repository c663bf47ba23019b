// src/core/validation/identifier.ts

/**
 * Identifier pattern shared by item, case, field, attribute and capability names.
 */
export const IDENTIFIER_REGEX = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isIdentifier(value: string): boolean {
    return IDENTIFIER_REGEX.test(value);
}
