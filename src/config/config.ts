// src/config/config.ts

import { ENV } from './env';

interface GeneratorConfig {
    NAME: string;
    VERSION: string;
}

interface CapabilityConfig {
    DEFAULT_NAME: string;
    METHOD_NAME: string;
    OK_TYPE_PARAMETER: string;
    CONTEXT_PARAMETER: string;
}

interface AttributeConfig {
    /** Generator marker on a case */
    CONTEXTUAL: string;
    /** Display template consumed by the failure-type derivation */
    DISPLAY: string;
    /** Causal-source marker on a field */
    SOURCE: string;
}

interface SynthesisConfig {
    MESSAGE_FIELD: string;
    FALLBACK_MESSAGE_FIELD: string;
    MESSAGE_TYPE: string;
}

interface RenderConfig {
    RUNTIME_MODULE: string;
    INDENT: string;
    DISCRIMINANT: string;
}

interface Config {
    GENERATOR: GeneratorConfig;
    CAPABILITY: CapabilityConfig;
    ATTRIBUTES: AttributeConfig;
    SYNTHESIS: SynthesisConfig;
    RENDER: RenderConfig;
}

/**
 * Centralized configuration for the generator.
 */
export const CONFIG: Config = {
    GENERATOR: {
        NAME: 'context-err',
        VERSION: '0.1.0',
    },

    CAPABILITY: {
        DEFAULT_NAME: ENV.CONTEXT_ERR_DEFAULT_CAPABILITY,
        METHOD_NAME: 'context',
        OK_TYPE_PARAMETER: 'T',
        CONTEXT_PARAMETER: 'context',
    },

    ATTRIBUTES: {
        CONTEXTUAL: 'context',
        DISPLAY: 'display',
        SOURCE: 'source',
    },

    SYNTHESIS: {
        MESSAGE_FIELD: 'message',
        FALLBACK_MESSAGE_FIELD: 'context',
        MESSAGE_TYPE: 'string',
    },

    RENDER: {
        RUNTIME_MODULE: 'context-err',
        INDENT: '    ',
        DISCRIMINANT: 'kind',
    },
};
