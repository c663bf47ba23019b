// src/core/errors/GenerationError.ts

import { ErrorContext } from './ErrorContext';

/**
 * Base error class for everything the generator and its runtime binding raise.
 */
export class GenerationError extends Error {
    public readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationError';
        this.context = context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code ?? 'GENERATION_ERROR';
    }

    public toJSON() {
        return {
            name: this.name,
            message: this.message,
            context: this.context,
        };
    }

    /**
     * Formats the error as a generation-time diagnostic, e.g.
     * `error[DUPLICATE_WRAPPED_TYPE] AppError::B: ...`.
     */
    public toDiagnostic(): string {
        let location = this.context.item ?? '<item>';
        if (this.context.caseName) {
            location += `::${this.context.caseName}`;
        }
        let msg = `error[${this.code}] ${location}: ${this.message}`;
        if (this.context.suggestion) {
            msg += `\nhelp: ${this.context.suggestion}`;
        }
        return msg;
    }

    public toDebugString(): string {
        return JSON.stringify(this.toJSON(), null, 2);
    }
}
