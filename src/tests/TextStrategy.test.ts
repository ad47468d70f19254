import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryFileSystem } from '../platform/FileSystem.js';
import { AnalysisContext } from '../analysis/AnalysisTypes.js';
import { TextStrategy } from '../analysis/strategies/TextStrategy.js';

const USER_SERVICE = [
    'export class UserService extends BaseService implements Disposable {',
    '    private cache = 1;',
    '    constructor(repo: UserRepository, clock: Clock) {',
    '        super();',
    '    }',
    '    findUser(id: string): string {',
    '        // a } in a comment does not close the class',
    '        return id;',
    '    }',
    '}',
    ''
].join('\n');

const ADMIN_SERVICE = 'export class AdminService extends UserService {}\n';

describe('TextStrategy', () => {
    const strategy = new TextStrategy();
    let context: AnalysisContext;

    beforeEach(async () => {
        const fileSystem = new MemoryFileSystem('/proj');
        await fileSystem.writeFile('/proj/src/services/UserService.ts', USER_SERVICE);
        await fileSystem.writeFile('/proj/src/services/AdminService.ts', ADMIN_SERVICE);
        context = {
            projectPath: '/proj',
            files: ['/proj/src/services/UserService.ts', '/proj/src/services/AdminService.ts'],
            fileSystem,
            semanticAllowed: false,
            graph: async () => {
                throw new Error('the text tier never compiles');
            }
        };
    });

    it('should find a class declaration by line scanning', async () => {
        const outcome = await strategy.handlers.find_symbol(
            { symbolName: 'UserService', symbolType: 'any', maxResults: 10, optimizeForTokens: false },
            context
        );

        expect(outcome).toEqual({
            kind: 'complete',
            confidence: 0.5,
            payload: {
                symbolName: 'UserService',
                matches: [{
                    name: 'UserService',
                    kind: 'class',
                    filePath: '/proj/src/services/UserService.ts',
                    line: 1,
                    column: 14,
                    exported: true,
                    signature: 'export class UserService extends BaseService implements Disposable'
                }],
                totalMatches: 1,
                truncated: false
            }
        });
    });

    it('should match wildcards and cap the result list', async () => {
        const outcome = await strategy.handlers.find_symbol(
            { symbolName: '*Service', symbolType: 'class', maxResults: 1, optimizeForTokens: true },
            context
        );

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            expect(outcome.payload.matches.map(match => match.name)).toEqual(['UserService']);
            expect(outcome.payload.totalMatches).toBe(2);
            expect(outcome.payload.truncated).toBe(true);
            expect(outcome.payload.matches[0].signature).toBeUndefined();
        }
    });

    it('should list whole-word usages and flag the definition', async () => {
        const outcome = await strategy.handlers.find_symbol_usages({ symbolName: 'UserService', maxResults: 10 }, context);

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            expect(outcome.payload.usages).toEqual([
                {
                    filePath: '/proj/src/services/AdminService.ts',
                    line: 1,
                    column: 35,
                    lineText: 'export class AdminService extends UserService {}',
                    isDefinition: false
                },
                {
                    filePath: '/proj/src/services/UserService.ts',
                    line: 1,
                    column: 14,
                    lineText: 'export class UserService extends BaseService implements Disposable {',
                    isDefinition: true
                }
            ]);
            expect(outcome.payload.definitionCount).toBe(1);
        }
    });

    it('should decline usage search for wildcard names', async () => {
        const outcome = await strategy.handlers.find_symbol_usages({ symbolName: 'User*', maxResults: 10 }, context);
        expect(outcome).toEqual({ kind: 'insufficient', reason: 'reference search needs an exact symbol name' });
    });

    it('should describe a class from its header and member lines', async () => {
        const outcome = await strategy.handlers.get_class_context({
            className: 'UserService',
            includeDependencies: true,
            includeUsages: false,
            includeInheritance: true,
            maxResults: 10
        }, context);

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            const payload = outcome.payload;
            expect(payload.found).toBe(true);
            expect(payload.line).toBe(1);
            expect(payload.isAbstract).toBe(false);
            expect(payload.baseClass).toBe('BaseService');
            expect(payload.interfaces).toEqual(['Disposable']);
            expect(payload.dependencies).toEqual(['UserRepository', 'Clock']);
            expect(payload.derivedClasses).toEqual(['AdminService']);
            expect(payload.members).toEqual([
                { name: 'cache', kind: 'property', visibility: 'private', isStatic: false, signature: 'private cache = 1;' },
                { name: 'constructor', kind: 'constructor', visibility: 'public', isStatic: false, signature: 'constructor(repo: UserRepository, clock: Clock)' },
                { name: 'findUser', kind: 'method', visibility: 'public', isStatic: false, signature: 'findUser(id: string): string' }
            ]);
        }
    });

    it('should report a missing class as insufficient', async () => {
        const outcome = await strategy.handlers.get_class_context({
            className: 'Missing',
            includeDependencies: true,
            includeUsages: false,
            includeInheritance: true,
            maxResults: 10
        }, context);

        expect(outcome).toEqual({ kind: 'insufficient', reason: "no class declaration named 'Missing'" });
    });

    it('should count top-level declarations per directory', async () => {
        const outcome = await strategy.handlers.analyze_project_structure({ includeArchitecture: true, maxDepth: 3 }, context);

        expect(outcome.kind).toBe('complete');
        if (outcome.kind === 'complete') {
            expect(outcome.payload.fileCount).toBe(2);
            expect(outcome.payload.totals).toEqual({ classes: 2, interfaces: 0, functions: 0, enums: 0, types: 0 });
            expect(outcome.payload.directories).toEqual([
                { path: 'src/services', depth: 2, fileCount: 2, classes: 2, interfaces: 0, functions: 0, enums: 0, types: 0 }
            ]);
            expect(outcome.payload.layers).toEqual(['application']);
        }
    });
});
