// src/core/errors/errors.ts

import { GenerationError } from './GenerationError';
import { ErrorContext } from './ErrorContext';

/**
 * The annotated item is not an enum with at least one case, nor a struct.
 */
export class MalformedItemError extends GenerationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'MALFORMED_ITEM',
            stage: 'build',
            ...context
        });
        this.name = 'MalformedItemError';
    }
}

/**
 * Scope-level or per-case generator options could not be understood.
 */
export class InvalidOptionsError extends GenerationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'INVALID_OPTIONS',
            stage: 'build',
            ...context
        });
        this.name = 'InvalidOptionsError';
    }
}

/**
 * A case marked contextual does not wrap exactly one field, or also
 * declares its own display template.
 */
export class InvalidContextualCaseError extends GenerationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'INVALID_CONTEXTUAL_CASE',
            stage: 'classify',
            ...context
        });
        this.name = 'InvalidContextualCaseError';
    }
}

/**
 * Two contextual cases of one capability scope wrap the same failure type.
 */
export class DuplicateWrappedTypeError extends GenerationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'DUPLICATE_WRAPPED_TYPE',
            stage: 'register',
            ...context
        });
        this.name = 'DuplicateWrappedTypeError';
    }
}

/**
 * Runtime bindings do not match the capability's wrapped types.
 */
export class BindingError extends GenerationError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'BINDING_ERROR',
            stage: 'bind',
            ...context
        });
        this.name = 'BindingError';
    }
}

/**
 * No single conversion accepts a failure. The failure is kept as `cause`.
 */
export class DispatchError extends GenerationError {
    constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
        super(message, {
            code: 'DISPATCH_ERROR',
            stage: 'dispatch',
            ...context
        }, { cause });
        this.name = 'DispatchError';
    }
}
