import { describe, it, expect } from '@jest/globals';
import { applyTextEdits } from '../refactoring/TextEdits.js';
import { assertValidIdentifier, isReservedWord, isValidIdentifier } from '../refactoring/Identifiers.js';
import { thrownBy } from './helpers.js';

describe('applyTextEdits', () => {
    it('should apply edits given in any order', () => {
        const result = applyTextEdits('hello world', [
            { start: 6, end: 11, newText: 'there' },
            { start: 0, end: 0, newText: '>> ' }
        ]);
        expect(result).toBe('>> hello there');
    });

    it('should keep insertions at one offset in input order', () => {
        const result = applyTextEdits('ab', [
            { start: 1, end: 1, newText: '1' },
            { start: 1, end: 1, newText: '2' }
        ]);
        expect(result).toBe('a12b');
    });

    it('should reject overlapping edits', () => {
        const error = thrownBy(() => applyTextEdits('abcdefgh', [
            { start: 0, end: 5, newText: 'x' },
            { start: 3, end: 8, newText: 'y' }
        ]));
        expect(error.kind).toBe('InternalError');
    });

    it('should reject edits past the end of the text', () => {
        const error = thrownBy(() => applyTextEdits('abc', [{ start: 2, end: 9, newText: '' }]));
        expect(error.message).toBe('Edit range [2, 9) is out of bounds for text of length 3');
    });
});

describe('Identifiers', () => {
    it('should accept contextual keywords as names', () => {
        expect(isValidIdentifier('type')).toBe(true);
        expect(isValidIdentifier('async')).toBe(true);
        expect(isReservedWord('type')).toBe(false);
    });

    it('should reject reserved and strict-mode words', () => {
        expect(isValidIdentifier('class')).toBe(false);
        expect(isReservedWord('let')).toBe(true);
        expect(isReservedWord('implements')).toBe(true);
    });

    it('should reject text that is not an identifier', () => {
        expect(isValidIdentifier('1abc')).toBe(false);
        expect(isValidIdentifier('a-b')).toBe(false);
        expect(isValidIdentifier('')).toBe(false);
    });

    it('should accept dollar signs, underscores and non-ASCII letters', () => {
        expect(isValidIdentifier('$_value1')).toBe(true);
        expect(isValidIdentifier('café')).toBe(true);
        expect(isValidIdentifier('π')).toBe(true);
        expect(isValidIdentifier('a b')).toBe(false);

        const invalid = thrownBy(() => assertValidIdentifier('2nd', 'variableName'));
        expect(invalid.message).toBe("'2nd' is not a valid identifier for variableName");
    });

    it('should name the parameter in the error', () => {
        const empty = thrownBy(() => assertValidIdentifier('  ', 'newName'));
        expect(empty.kind).toBe('ConfigurationError');
        expect(empty.message).toBe('newName must not be empty');

        const reserved = thrownBy(() => assertValidIdentifier('class', 'methodName'));
        expect(reserved.message).toBe("'class' is a reserved word and cannot be used as methodName");
        expect(reserved.data).toEqual({ parameter: 'methodName', value: 'class' });
    });
});
