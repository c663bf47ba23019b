// tests/unit/errors.test.ts

import {
    DispatchError,
    ErrorFactory,
    GenerationError,
    InvalidContextualCaseError,
    MalformedItemError,
} from '../../src/core/errors';

describe('Generation errors', () => {
    it('should carry code and stage for each taxonomy member', () => {
        expect(ErrorFactory.malformedItem('bad').context).toMatchObject({ code: 'MALFORMED_ITEM', stage: 'build' });
        expect(ErrorFactory.invalidOptions('bad').context).toMatchObject({ code: 'INVALID_OPTIONS', stage: 'build' });
        expect(ErrorFactory.invalidContextualCase('AppError', 'A', 'no-display-template').context)
            .toMatchObject({ code: 'INVALID_CONTEXTUAL_CASE', stage: 'classify' });
        expect(ErrorFactory.duplicateWrappedType('AppError', 'ContextErr', 'IoFailure', 'A', 'B').context)
            .toMatchObject({ code: 'DUPLICATE_WRAPPED_TYPE', stage: 'register' });
        expect(ErrorFactory.binding('bad').context).toMatchObject({ code: 'BINDING_ERROR', stage: 'bind' });
    });

    it('should be Error and GenerationError instances with their own name', () => {
        const error = ErrorFactory.malformedItem('no cases', { item: 'AppError' });

        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(GenerationError);
        expect(error).toBeInstanceOf(MalformedItemError);
        expect(error.name).toBe('MalformedItemError');
    });

    it('should format a diagnostic pointing at the case', () => {
        const error = ErrorFactory.invalidContextualCase('AppError', 'Reqwest', 'exactly-one-field');

        expect(error).toBeInstanceOf(InvalidContextualCaseError);
        expect(error.toDiagnostic()).toBe(
            'error[INVALID_CONTEXTUAL_CASE] AppError::Reqwest: Reqwest: a contextual case must have exactly one field\n' +
            'help: wrap a single failure value, or drop the `context` marker'
        );
    });

    it('should let explicit context override the defaults', () => {
        const error = ErrorFactory.malformedItem('bad', { item: 'AppError', code: 'CUSTOM' });
        expect(error.code).toBe('CUSTOM');
        expect(error.context.stage).toBe('build');
    });

    it('should fall back to a placeholder when no item is known', () => {
        expect(new GenerationError('oops').toDiagnostic()).toBe('error[GENERATION_ERROR] <item>: oops');
    });

    it('should serialize to JSON', () => {
        const error = ErrorFactory.duplicateWrappedType('AppError', 'ContextErr', 'IoFailure', 'A', 'B');
        const json = JSON.parse(error.toDebugString());

        expect(json.name).toBe('DuplicateWrappedTypeError');
        expect(json.context.cases).toEqual(['A', 'B']);
    });

    it('should keep the undispatched failure as cause', () => {
        const failure = { kind: 'Unknown' };
        const error = ErrorFactory.dispatch('no conversion', failure, { scope: 'ContextErr' });

        expect(error).toBeInstanceOf(DispatchError);
        expect(error.cause).toBe(failure);
    });
});
