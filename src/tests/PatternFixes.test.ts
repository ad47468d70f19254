import { describe, it, expect } from '@jest/globals';
import { applyPatternFixes, suggestFixesForBuildErrors } from '../autofix/PatternFixes.js';
import { autoFix } from '../refactoring/AutoFix.js';

describe('PatternFixes', () => {
    it('should apply style fixes and count each occurrence', () => {
        const result = applyPatternFixes('var x = 1;\nif (x == 2) {}\n', ['style']);

        expect(result.code).toBe('let x = 1;\nif (x === 2) {}\n');
        expect(result.changeCount).toBe(2);
        expect(result.applied.map(fix => fix.id)).toEqual(['var-to-let', 'strict-equality']);
    });

    it('should leave comparisons with null alone', () => {
        const result = applyPatternFixes('if (a == null || b != undefined) {}\n');

        expect(result.code).toBe('if (a == null || b != undefined) {}\n');
        expect(result.changeCount).toBe(0);
    });

    it('should modernize constructors and indexOf checks', () => {
        const result = applyPatternFixes('const xs = new Array();\nif (xs.indexOf(item) !== -1) {}\n', ['modernize']);

        expect(result.code).toBe('const xs = [];\nif (xs.includes(item)) {}\n');
        expect(result.applied.map(fix => fix.id)).toEqual(['array-literal', 'index-of-to-includes']);
    });

    it('should only run the requested category', () => {
        const result = applyPatternFixes('var a = new Array();\n', ['style']);
        expect(result.code).toBe('let a = new Array();\n');
    });

    it('should strip trailing whitespace', () => {
        const result = applyPatternFixes('const a = 1;   \nconst b = 2;\t\n', ['style']);

        expect(result.code).toBe('const a = 1;\nconst b = 2;\n');
        expect(result.applied).toEqual([
            { id: 'trailing-whitespace', description: 'Remove trailing whitespace', occurrences: 2 }
        ]);
    });

    it('should suggest fixes for known diagnostic codes, most frequent first', () => {
        const suggestions = suggestFixesForBuildErrors([
            { code: 'TS7006', message: 'implicit any', project: 'app' },
            { code: 'TS2304', message: "Cannot find name 'x'.", project: 'app' },
            { code: 'TS2304', message: "Cannot find name 'y'.", project: 'app' },
            { code: 'TS9999', message: 'unknown', project: 'app' }
        ]);

        expect(suggestions).toEqual([
            'TS2304: Cannot find name: import the symbol or declare it before use.',
            'TS7006: Implicit any: add a type annotation to the parameter.'
        ]);
    });
});

describe('autoFix', () => {
    it('should report the fixes as a refactoring outcome', () => {
        const outcome = autoFix('var x = 1;\nif (x == 2) {}\n', ['style']);

        expect(outcome.modifiedCode).toBe('let x = 1;\nif (x === 2) {}\n');
        expect(outcome.changeCount).toBe(2);
        expect(outcome.conflicts).toEqual([]);
        expect(outcome.details.fixTypes).toEqual(['style']);
    });

    it('should default to every fix type', () => {
        const outcome = autoFix('var list = new Object();\n');

        expect(outcome.modifiedCode).toBe('let list = {};\n');
        expect(outcome.details.fixTypes).toEqual(['all']);
    });
});
