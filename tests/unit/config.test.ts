// tests/unit/config.test.ts

import { envSchema } from '../../src/config/env';
import { isIdentifier } from '../../src/core/validation';

describe('Environment configuration', () => {
    it('should default the capability name when unset or empty', () => {
        expect(envSchema.parse({}).CONTEXT_ERR_DEFAULT_CAPABILITY).toBe('ContextErr');
        expect(envSchema.parse({ CONTEXT_ERR_DEFAULT_CAPABILITY: '' }).CONTEXT_ERR_DEFAULT_CAPABILITY).toBe('ContextErr');
    });

    it('should accept every capability name an item option accepts', () => {
        ['$Ctx', 'Ctx$1', '_ctx'].forEach(name => {
            expect(isIdentifier(name)).toBe(true);
            expect(envSchema.parse({ CONTEXT_ERR_DEFAULT_CAPABILITY: name }).CONTEXT_ERR_DEFAULT_CAPABILITY).toBe(name);
        });
    });

    it('should reject capability names that are not identifiers', () => {
        expect(envSchema.safeParse({ CONTEXT_ERR_DEFAULT_CAPABILITY: 'context-err' }).success).toBe(false);
    });

    it('should treat an empty log level as unset', () => {
        expect(envSchema.parse({ LOG_LEVEL: '' }).LOG_LEVEL).toBeUndefined();
    });
});
