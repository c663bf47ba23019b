// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { IDENTIFIER_REGEX } from '../core/validation/identifier';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 * Empty strings count as unset so `.env.example` can be copied as-is.
 */
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Explicit log level; when unset the level follows NODE_ENV
    LOG_LEVEL: z.preprocess(
        val => (val === '' ? undefined : val),
        z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
    ),

    // Capability name used when an item does not override it
    CONTEXT_ERR_DEFAULT_CAPABILITY: z.preprocess(
        val => (val === '' ? undefined : val),
        z.string()
            .regex(IDENTIFIER_REGEX, { message: 'CONTEXT_ERR_DEFAULT_CAPABILITY must be a valid identifier' })
            .default('ContextErr')
    ),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
