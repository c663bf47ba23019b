// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ContextualRule, ErrorContext } from './ErrorContext';

const RULE_MESSAGES: Record<ContextualRule, string> = {
    'exactly-one-field': 'a contextual case must have exactly one field',
    'no-display-template': 'a contextual case cannot declare its own display template',
};

/**
 * Factory class to create consistent error instances across the generator.
 */
export class ErrorFactory {
    static malformedItem(message: string, context?: ErrorContext) {
        return new Errors.MalformedItemError(message, context);
    }

    static invalidOptions(message: string, context?: ErrorContext) {
        return new Errors.InvalidOptionsError(message, context);
    }

    static invalidContextualCase(item: string, caseName: string, rule: ContextualRule, details?: unknown) {
        return new Errors.InvalidContextualCaseError(`${caseName}: ${RULE_MESSAGES[rule]}`, {
            item,
            caseName,
            rule,
            details,
            suggestion: rule === 'exactly-one-field'
                ? 'wrap a single failure value, or drop the `context` marker'
                : 'remove the display template; the message field is rendered instead',
        });
    }

    static duplicateWrappedType(item: string, scope: string, wrappedType: string, firstCase: string, secondCase: string) {
        return new Errors.DuplicateWrappedTypeError(
            `${wrappedType} is already wrapped by ${firstCase}; ${secondCase} cannot wrap it again in ${scope}`,
            {
                item,
                scope,
                wrappedType,
                caseName: secondCase,
                cases: [firstCase, secondCase],
                suggestion: 'keep one contextual case per failure type, or mark the other case opaque',
            }
        );
    }

    static binding(message: string, context?: ErrorContext) {
        return new Errors.BindingError(message, context);
    }

    static dispatch(message: string, failure: unknown, context?: ErrorContext) {
        return new Errors.DispatchError(message, context, failure);
    }
}
