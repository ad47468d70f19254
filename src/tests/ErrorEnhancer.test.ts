import { describe, it, expect } from '@jest/globals';
import { ErrorEnhancer } from '../errors/ErrorEnhancer.js';
import { AnalysisError, toAnalysisError } from '../errors/AnalysisError.js';

describe('ErrorEnhancer', () => {
    it('should thread the symbol name into NotFound guidance', () => {
        const guidance = ErrorEnhancer.forKind('NotFound', { symbolName: 'UserService', projectPath: '/repo' });

        expect(guidance.suggestion).toBe("'UserService' was not found. Check the spelling or search for it first.");
        expect(guidance.alternatives[0]).toEqual({
            toolName: 'find_symbol',
            rationale: 'Locate the declaration and its exact name.',
            exampleArgs: { projectPath: '/repo', symbolName: 'UserService' },
            priority: 'high'
        });
    });

    it('should fall back to a generic suggestion without a name', () => {
        const guidance = ErrorEnhancer.forKind('NotFound');

        expect(guidance.suggestion).toBe('The requested target was not found. Check the exact text or name.');
        expect(guidance.alternatives[0].exampleArgs).toEqual({ projectPath: '.', symbolName: '*' });
    });

    it('should point build failures at validate_build', () => {
        const guidance = ErrorEnhancer.forKind('BuildValidationFailed', { projectPath: '/repo/app' });

        expect(guidance.alternatives.map(alternative => alternative.toolName)).toEqual(['validate_build', 'auto_fix']);
        expect(guidance.alternatives[0].exampleArgs).toEqual({ projectPath: '/repo/app' });
    });

    it('should offer no alternatives for configuration errors', () => {
        expect(ErrorEnhancer.forKind('ConfigurationError').alternatives).toEqual([]);
    });

    it('should find names within a small edit distance', () => {
        expect(ErrorEnhancer.findSimilarNames('UserServce', ['UserService', 'OrderService', 'Helper'])).toEqual(['UserService']);
    });
});

describe('AnalysisError', () => {
    it('should fill in guidance and retryability from its kind', () => {
        const error = new AnalysisError('BuildValidationFailed', 'Build has 2 error(s)', { data: { projectPath: '/repo' } });

        expect(error.canRetry).toBe(false);
        expect(error.toPayload()).toEqual({
            kind: 'BuildValidationFailed',
            message: 'Build has 2 error(s)',
            suggestion: 'Fix the reported build errors and validate again; text-level search still works on a broken build.',
            alternatives: ErrorEnhancer.forKind('BuildValidationFailed', { projectPath: '/repo' }).alternatives,
            canRetry: false,
            data: { projectPath: '/repo' }
        });
    });

    it('should let explicit guidance win over the defaults', () => {
        const error = new AnalysisError('NotFound', 'missing', { suggestion: 'Try another name.', alternatives: [] });

        expect(error.suggestion).toBe('Try another name.');
        expect(error.alternatives).toEqual([]);
        expect(error.canRetry).toBe(true);
    });

    it('should wrap unknown failures as InternalError', () => {
        const wrapped = toAnalysisError(new Error('boom'));

        expect(wrapped.kind).toBe('InternalError');
        expect(wrapped.message).toBe('boom');
        expect(toAnalysisError('plain text').message).toBe('plain text');
    });

    it('should map aborts to Cancelled', () => {
        const abort = new Error('stopped');
        abort.name = 'AbortError';

        expect(toAnalysisError(abort).kind).toBe('Cancelled');
    });

    it('should return an AnalysisError unchanged', () => {
        const original = AnalysisError.notFound('nothing here');
        expect(toAnalysisError(original)).toBe(original);
    });

    it('should describe cancellation by stage', () => {
        const error = AnalysisError.cancelled('directory scan');

        expect(error.message).toBe('Request cancelled during directory scan');
        expect(error.data).toEqual({ stage: 'directory scan' });
    });
});
