// src/core/validation/itemValidator.ts

import { z } from 'zod';
import { ErrorFactory } from '../errors';
import { IDENTIFIER_REGEX } from './identifier';

const IdentifierSchema = z.string().regex(IDENTIFIER_REGEX, { message: 'must be a valid identifier' });

export const AttributeSchema = z.object({
    name: IdentifierSchema,
    value: z.string().optional(),
}).strict();

export const FieldSchema = z.object({
    name: IdentifierSchema.optional(),
    type: z.string().refine(type => type.trim().length > 0, { message: 'field type cannot be empty' }),
    attributes: z.array(AttributeSchema).optional(),
}).strict();

export const VariantSchema = z.object({
    name: IdentifierSchema,
    fields: z.array(FieldSchema).optional(),
    attributes: z.array(AttributeSchema).optional(),
}).strict();

/**
 * Structured view of an annotated item, as handed over by the front end.
 * `kind` stays a free string here so the builder can name the item when it
 * rejects an unsupported kind. Omitted lists stay omitted; the builder
 * fills them in.
 */
export const ItemDescriptionSchema = z.object({
    kind: z.string(),
    name: IdentifierSchema,
    attributes: z.array(AttributeSchema).optional(),
    variants: z.array(VariantSchema).optional(),
    fields: z.array(FieldSchema).optional(),
    options: z.record(z.string()).default({}),
}).strict();

export type AttributeDescription = z.infer<typeof AttributeSchema>;
export type FieldDescription = z.infer<typeof FieldSchema>;
export type VariantDescription = z.infer<typeof VariantSchema>;
export type ItemDescription = z.infer<typeof ItemDescriptionSchema>;
export type ItemDescriptionInput = z.input<typeof ItemDescriptionSchema>;

function nameOf(input: unknown): string | undefined {
    if (typeof input === 'object' && input !== null && 'name' in input && typeof input.name === 'string') {
        return input.name;
    }
    return undefined;
}

/**
 * Parses the front end's structured item, throwing `MalformedItemError`
 * with every zod issue in `details`.
 */
export function validateItemDescription(input: unknown): ItemDescription {
    const parsed = ItemDescriptionSchema.safeParse(input);
    if (parsed.success) {
        return parsed.data;
    }

    const issues = parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
    }));
    const first = issues[0];
    const where = first && first.path ? ` at '${first.path}'` : '';
    throw ErrorFactory.malformedItem(
        `Invalid item description${where}: ${first ? first.message : 'unknown issue'}`,
        { item: nameOf(input), details: issues }
    );
}
