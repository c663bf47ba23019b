// tests/unit/item_model.test.ts

import { buildTypeDefinition } from '../../src/core/model';
import { InvalidOptionsError, MalformedItemError } from '../../src/core/errors';
import { CONFIG } from '../../src/config/config';
import { contextualStruct, enumOf, networkAndIoEnum } from '../fixtures/items';
import { catchError } from '../fixtures/errors';

function buildError<E extends Error>(input: unknown, type: abstract new (...args: never[]) => E): E {
    return catchError(() => buildTypeDefinition(input), type);
}

describe('Item Model Builder', () => {
    describe('enums', () => {
        it('should keep cases in declaration order with their contextual marker', () => {
            const definition = buildTypeDefinition(networkAndIoEnum());

            expect(definition.name).toBe('AppError');
            expect(definition.shape).toBe('enum');
            expect(definition.cases.map(c => c.name)).toEqual(['Reqwest', 'Io', 'NotFound']);
            expect(definition.cases.map(c => c.contextual)).toEqual([true, true, false]);
        });

        it('should strip the generator marker and keep other attributes', () => {
            const definition = buildTypeDefinition(networkAndIoEnum());

            expect(definition.attributes).toEqual([{ name: 'derive', value: 'Debug' }]);
            expect(definition.cases[0]?.attributes).toEqual([]);
            expect(definition.cases[2]?.attributes).toEqual([{ name: 'display', value: 'not found: {path}' }]);
        });

        it('should read boolean-like marker values', () => {
            const definition = buildTypeDefinition(enumOf([
                { name: 'A', fields: [{ type: 'IoFailure' }], attributes: [{ name: 'context', value: 'true' }] },
                { name: 'B', fields: [{ type: 'IoFailure' }], attributes: [{ name: 'context', value: 'false' }] },
            ]));

            expect(definition.cases.map(c => c.contextual)).toEqual([true, false]);
            expect(definition.cases[1]?.attributes).toEqual([]);
        });

        it('should reject an enum without cases', () => {
            const error = buildError(enumOf([]), MalformedItemError);
            expect(error.message).toBe('enum AppError has no cases');
            expect(error.context.item).toBe('AppError');

            expect(() => buildTypeDefinition({ kind: 'enum', name: 'Bare' })).toThrow('enum Bare has no cases');
        });

        it('should reject repeated case names', () => {
            expect(() => buildTypeDefinition(enumOf([{ name: 'A' }, { name: 'A' }])))
                .toThrow('enum AppError declares A twice');
        });

        it('should reject cases mixing named and positional fields', () => {
            const error = buildError(enumOf([
                { name: 'Mixed', fields: [{ name: 'path', type: 'string' }, { type: 'IoFailure' }] },
            ]), MalformedItemError);
            expect(error.context.caseName).toBe('Mixed');
        });

        it('should reject the marker on the enum itself', () => {
            const input = { ...enumOf([{ name: 'A' }]), attributes: [{ name: 'context' }] };
            expect(() => buildTypeDefinition(input)).toThrow(InvalidOptionsError);
        });
    });

    describe('structs', () => {
        it('should treat a struct as a single case named after it', () => {
            const definition = buildTypeDefinition(contextualStruct());

            expect(definition.shape).toBe('struct');
            expect(definition.attributes).toEqual([]);
            expect(definition.cases).toHaveLength(1);
            expect(definition.cases[0]).toEqual({
                name: 'IoWrapper',
                fields: [{ type: 'IoFailure', attributes: [] }],
                attributes: [],
                contextual: true,
            });
        });

        it('should accept a unit struct', () => {
            const definition = buildTypeDefinition({ kind: 'struct', name: 'Timeout' });
            expect(definition.cases[0]?.fields).toEqual([]);
            expect(definition.cases[0]?.contextual).toBe(false);
        });

        it('should reject a struct with variants', () => {
            expect(() => buildTypeDefinition({ kind: 'struct', name: 'S', variants: [] }))
                .toThrow('struct S cannot declare variants');
        });
    });

    it('should reject items that are neither enums nor structs', () => {
        const error = buildError({ kind: 'union', name: 'Thing' }, MalformedItemError);
        expect(error.message)
            .toBe("this generator only works for structs and enums, got 'union'");
        expect(error.context.item).toBe('Thing');
    });

    describe('capability name', () => {
        it('should default to the configured name', () => {
            expect(buildTypeDefinition(networkAndIoEnum()).capabilityName).toBe(CONFIG.CAPABILITY.DEFAULT_NAME);
        });

        it('should honour the build option default', () => {
            const definition = buildTypeDefinition(networkAndIoEnum(), { defaultCapabilityName: 'WithContext' });
            expect(definition.capabilityName).toBe('WithContext');
        });

        it('should prefer the explicit item option', () => {
            const definition = buildTypeDefinition(contextualStruct('ContextErr1'), { defaultCapabilityName: 'WithContext' });
            expect(definition.capabilityName).toBe('ContextErr1');
        });

        it('should reject unknown options', () => {
            const error = buildError({ ...networkAndIoEnum(), options: { trait: 'X' } }, InvalidOptionsError);
            expect(error.message).toBe("Unknown option 'trait'");
        });

        it('should reject a capability name that is not an identifier', () => {
            expect(() => buildTypeDefinition(contextualStruct('1Bad')))
                .toThrow("Capability name '1Bad' is not a valid identifier");
        });
    });

    describe('contextual marker', () => {
        it('should reject values that are not boolean-like', () => {
            const error = buildError(enumOf([
                { name: 'A', fields: [{ type: 'IoFailure' }], attributes: [{ name: 'context', value: 'maybe' }] },
            ]), InvalidOptionsError);
            expect(error.context.caseName).toBe('A');
        });

        it('should reject a repeated marker', () => {
            expect(() => buildTypeDefinition(enumOf([
                { name: 'A', fields: [{ type: 'IoFailure' }], attributes: [{ name: 'context' }, { name: 'context' }] },
            ]))).toThrow("'context' is repeated on A");
        });
    });
});
