// src/core/errors/ErrorContext.ts

/** Pipeline stage that raised a generation error. */
export type GenerationStage = 'build' | 'classify' | 'register' | 'bind' | 'dispatch';

/** Rule a contextual case broke. */
export type ContextualRule = 'exactly-one-field' | 'no-display-template';

/**
 * Metadata carried by every generation error so it can be reported as a
 * diagnostic pointing at the offending item or case.
 */
export interface ErrorContext {
    code?: string;              // Machine-readable error code (e.g., 'DUPLICATE_WRAPPED_TYPE')
    stage?: GenerationStage;
    item?: string;              // Name of the annotated item
    caseName?: string;          // Offending case
    rule?: ContextualRule;
    scope?: string;             // Capability scope name
    wrappedType?: string;
    cases?: string[];           // Every case involved, in declaration order
    suggestion?: string;
    details?: unknown;
}
