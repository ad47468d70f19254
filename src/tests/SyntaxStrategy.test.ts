import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryFileSystem } from '../platform/FileSystem.js';
import { AnalysisContext } from '../analysis/AnalysisTypes.js';
import { SyntaxStrategy } from '../analysis/strategies/SyntaxStrategy.js';

describe('SyntaxStrategy', () => {
    const strategy = new SyntaxStrategy();
    let fileSystem: MemoryFileSystem;
    let context: AnalysisContext;

    const withFiles = (files: string[]): AnalysisContext => ({
        projectPath: '/proj',
        files,
        fileSystem,
        semanticAllowed: false,
        graph: async () => {
            throw new Error('the syntax tier never compiles');
        }
    });

    beforeEach(async () => {
        fileSystem = new MemoryFileSystem('/proj');
        await fileSystem.writeFile('/proj/a.ts', 'export function greet(name: string) {\n    return name;\n}\n');
        await fileSystem.writeFile('/proj/b.ts', 'import { greet } from "./a";\ngreet("x");\n');
        await fileSystem.writeFile('/proj/shapes.ts', [
            'export abstract class Shape {',
            '    abstract area(): number;',
            '}',
            'export class Square extends Shape implements Printable {',
            '    static count = 0;',
            '    constructor(private readonly side: number, label: string) {',
            '        super();',
            '    }',
            '    area(): number {',
            '        return this.side * this.side;',
            '    }',
            '    protected get label(): string {',
            '        return "square";',
            '    }',
            '}',
            ''
        ].join('\n'));
        context = withFiles(['/proj/a.ts', '/proj/b.ts', '/proj/shapes.ts']);
    });

    it('should find declarations by name and kind', async () => {
        const outcome = await strategy.handlers.find_symbol(
            { symbolName: 'greet', symbolType: 'function', maxResults: 10, optimizeForTokens: false },
            context
        );

        expect(outcome).toEqual({
            kind: 'complete',
            confidence: 0.75,
            payload: {
                symbolName: 'greet',
                matches: [{
                    name: 'greet',
                    kind: 'function',
                    filePath: '/proj/a.ts',
                    line: 1,
                    column: 17,
                    exported: true,
                    signature: 'export function greet(name: string)'
                }],
                totalMatches: 1,
                truncated: false
            }
        });
    });

    it('should leave room for other tiers when no declaration matches', async () => {
        const outcome = await strategy.handlers.find_symbol(
            { symbolName: 'Missing', symbolType: 'any', maxResults: 10, optimizeForTokens: false },
            context
        );

        expect(outcome).toEqual({
            kind: 'partial',
            confidence: 0.75,
            reason: "no declaration matches 'Missing'",
            payload: { symbolName: 'Missing', matches: [], totalMatches: 0, truncated: false }
        });
    });

    it('should find identifier usages across files', async () => {
        const outcome = await strategy.handlers.find_symbol_usages({ symbolName: 'greet', maxResults: 10 }, context);

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            expect(outcome.payload.usages.map(usage => [usage.filePath, usage.line, usage.column, usage.isDefinition])).toEqual([
                ['/proj/a.ts', 1, 17, true],
                ['/proj/b.ts', 1, 10, false],
                ['/proj/b.ts', 2, 1, false]
            ]);
            expect(outcome.payload.usages[2].lineText).toBe('greet("x");');
            expect(outcome.payload.definitionCount).toBe(1);
        }
    });

    it('should not count string contents as usages', async () => {
        await fileSystem.writeFile('/proj/c.ts', 'const label = "greet";\n');
        const outcome = await strategy.handlers.find_symbol_usages({ symbolName: 'greet', maxResults: 10 }, withFiles(['/proj/c.ts']));

        expect(outcome.kind === 'complete' && outcome.payload.totalUsages).toBe(0);
    });

    it('should be insufficient without readable files', async () => {
        const outcome = await strategy.handlers.find_symbol(
            { symbolName: 'greet', symbolType: 'any', maxResults: 10, optimizeForTokens: false },
            withFiles(['/proj/missing.ts'])
        );

        expect(outcome).toEqual({ kind: 'insufficient', reason: 'no readable source files' });
    });

    it('should describe members, heritage and constructor dependencies', async () => {
        const outcome = await strategy.handlers.get_class_context({
            className: 'Square',
            includeDependencies: true,
            includeUsages: false,
            includeInheritance: true,
            maxResults: 10
        }, context);

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            const payload = outcome.payload;
            expect(payload.line).toBe(4);
            expect(payload.baseClass).toBe('Shape');
            expect(payload.interfaces).toEqual(['Printable']);
            expect(payload.dependencies).toEqual(['number', 'string']);
            expect(payload.members?.map(member => [member.name, member.kind, member.visibility, member.isStatic])).toEqual([
                ['count', 'property', 'public', true],
                ['constructor', 'constructor', 'public', false],
                ['area', 'method', 'public', false],
                ['label', 'accessor', 'protected', false]
            ]);
        }
    });

    it('should list classes that extend the requested one', async () => {
        const outcome = await strategy.handlers.get_class_context({
            className: 'Shape',
            includeDependencies: false,
            includeUsages: true,
            includeInheritance: true,
            maxResults: 10
        }, context);

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            expect(outcome.payload.isAbstract).toBe(true);
            expect(outcome.payload.derivedClasses).toEqual(['Square']);
            expect(outcome.payload.dependencies).toBeUndefined();
            expect(outcome.payload.usages?.map(usage => [usage.line, usage.column])).toEqual([[4, 29]]);
        }
    });
});
