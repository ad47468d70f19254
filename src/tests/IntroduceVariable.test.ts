import { describe, it, expect } from '@jest/globals';
import { introduceVariable } from '../refactoring/IntroduceVariable.js';
import { thrownBy } from './helpers.js';

const totalSource = [
    'function total(price: number, quantity: number): number {',
    '    const subtotal = price * quantity;',
    '    return price * quantity + 5;',
    '}',
    ''
].join('\n');

const formatterSource = [
    'class PriceFormatter {',
    '    format(amount: number): string {',
    '        return "EUR " + amount;',
    '    }',
    '    label(): string {',
    '        return "EUR ";',
    '    }',
    '}'
].join('\n');

describe('introduceVariable', () => {
    it('should declare a typed local before the first use and replace every occurrence', () => {
        const outcome = introduceVariable({ code: totalSource, expression: 'price * quantity', variableName: 'cost' });

        expect(outcome.modifiedCode).toBe([
            'function total(price: number, quantity: number): number {',
            '    const cost: number = price * quantity;',
            '    const subtotal = cost;',
            '    return cost + 5;',
            '}',
            ''
        ].join('\n'));
        expect(outcome.extractedArtifact).toBe('const cost: number = price * quantity;');
        expect(outcome.changeCount).toBe(3);
        expect(outcome.usedIdentifiers).toEqual(['price', 'quantity']);
        expect(outcome.details).toEqual({ scope: 'local', occurrences: 2, skippedOccurrences: 0, type: 'number' });
    });

    it('should replace only the first occurrence when asked', () => {
        const outcome = introduceVariable({ code: totalSource, expression: 'price * quantity', variableName: 'cost', replaceAll: false });

        expect(outcome.changeCount).toBe(2);
        expect(outcome.modifiedCode).toContain('    return price * quantity + 5;');
    });

    it('should report a name already in scope', () => {
        const outcome = introduceVariable({ code: totalSource, expression: 'price * quantity', variableName: 'subtotal' });
        expect(outcome.conflicts).toEqual(["'subtotal' is already declared in this scope"]);
    });

    it('should lift a class-level expression into a private readonly field', () => {
        const outcome = introduceVariable({ code: formatterSource, expression: '"EUR "', variableName: 'currency', scope: 'field' });

        expect(outcome.modifiedCode).toBe([
            'class PriceFormatter {',
            '    private readonly currency: string = "EUR ";',
            '',
            '    format(amount: number): string {',
            '        return this.currency + amount;',
            '    }',
            '    label(): string {',
            '        return this.currency;',
            '    }',
            '}'
        ].join('\n'));
        expect(outcome.changeCount).toBe(3);
    });

    it('should lift a class-level expression into a private getter', () => {
        const outcome = introduceVariable({ code: formatterSource, expression: '"EUR "', variableName: 'currency', scope: 'property' });

        expect(outcome.extractedArtifact).toBe('private get currency(): string {\n        return "EUR ";\n    }');
        expect(outcome.modifiedCode.startsWith(
            'class PriceFormatter {\n    private get currency(): string {\n        return "EUR ";\n    }\n\n    format(amount: number): string {'
        )).toBe(true);
    });

    it('should refuse to move member locals into a field', () => {
        const error = thrownBy(() => introduceVariable({
            code: formatterSource,
            expression: '"EUR " + amount',
            variableName: 'formatted',
            scope: 'field'
        }));

        expect(error.kind).toBe('ConfigurationError');
        expect(error.message).toBe("'amount' is local to a member and cannot be used in a class-level field");
    });

    it('should need a class for field scope', () => {
        const error = thrownBy(() => introduceVariable({ code: totalSource, expression: 'price * quantity', variableName: 'cost', scope: 'field' }));
        expect(error.message).toBe("Scope 'field' needs the expression to be inside a class");
    });

    it('should fail with NotFound when the expression does not occur', () => {
        const error = thrownBy(() => introduceVariable({ code: totalSource, expression: 'price / quantity', variableName: 'ratio' }));
        expect(error.kind).toBe('NotFound');
    });
});
