import { describe, it, expect } from '@jest/globals';
import { extractInterface } from '../refactoring/ExtractInterface.js';
import { thrownBy } from './helpers.js';

const userService = [
    'export class UserService {',
    '    private cache: string[] = [];',
    '    constructor(private readonly prefix: string) {}',
    '    getName(id: string): string {',
    '        return this.prefix + id;',
    '    }',
    '    get size(): number {',
    '        return this.cache.length;',
    '    }',
    '    static create(): UserService {',
    '        return new UserService("user-");',
    '    }',
    '}',
    ''
].join('\n');

describe('extractInterface', () => {
    it('should extract the public instance surface and implement it', () => {
        const outcome = extractInterface({ code: userService, className: 'UserService', interfaceName: 'IUserService' });

        const expectedInterface = [
            'export interface IUserService {',
            '    getName(id: string): string;',
            '    readonly size: number;',
            '}'
        ].join('\n');
        expect(outcome.extractedArtifact).toBe(expectedInterface);
        expect(outcome.modifiedCode).toBe(
            `${expectedInterface}\n\n${userService.replace('export class UserService {', 'export class UserService implements IUserService {')}`
        );
        expect(outcome.changeCount).toBe(2);
        expect(outcome.details).toEqual({ interfaceName: 'IUserService', members: ['getName', 'size'], exported: true });
    });

    it('should report requested members the class does not expose', () => {
        const outcome = extractInterface({
            code: userService,
            className: 'UserService',
            interfaceName: 'INamed',
            memberNames: ['getName', 'missing']
        });

        expect(outcome.details.members).toEqual(['getName']);
        expect(outcome.conflicts).toEqual(["'missing' is not a public instance member of UserService"]);
    });

    it('should append to an existing implements clause', () => {
        const code = 'class Repo implements Disposable {\n    dispose(): void {}\n}';

        const outcome = extractInterface({ code, className: 'Repo', interfaceName: 'IRepo' });

        expect(outcome.modifiedCode).toBe(
            'interface IRepo {\n    dispose(): void;\n}\n\nclass Repo implements Disposable, IRepo {\n    dispose(): void {}\n}'
        );
    });

    it('should carry type parameters and mark defaulted parameters optional', () => {
        const code = 'class Box<T> {\n    value?: T;\n    set(item: T, replace = false): void {}\n}';

        const outcome = extractInterface({ code, className: 'Box', interfaceName: 'IBox' });

        expect(outcome.extractedArtifact).toBe('interface IBox<T> {\n    value?: T;\n    set(item: T, replace?: boolean): void;\n}');
        expect(outcome.modifiedCode).toContain('class Box<T> implements IBox<T> {');
    });

    it('should keep overload signatures and drop the implementation', () => {
        const code = [
            'class Parser {',
            '    parse(input: string): number;',
            '    parse(input: number): number;',
            '    parse(input: string | number): number {',
            '        return 1;',
            '    }',
            '}'
        ].join('\n');

        const outcome = extractInterface({ code, className: 'Parser', interfaceName: 'IParser' });

        expect(outcome.extractedArtifact).toBe('interface IParser {\n    parse(input: string): number;\n    parse(input: number): number;\n}');
    });

    it('should fail with NotFound for an unknown class', () => {
        const error = thrownBy(() => extractInterface({ code: userService, className: 'Missing', interfaceName: 'IMissing' }));

        expect(error.kind).toBe('NotFound');
        expect(error.message).toBe("Class 'Missing' was not found");
    });

    it('should fail with NotFound when there is nothing public to extract', () => {
        const code = 'class Vault {\n    private key = "test-secret";\n}';

        const error = thrownBy(() => extractInterface({ code, className: 'Vault', interfaceName: 'IVault' }));

        expect(error.kind).toBe('NotFound');
    });

    it('should reject an invalid interface name', () => {
        const error = thrownBy(() => extractInterface({ code: userService, className: 'UserService', interfaceName: '1bad' }));
        expect(error.kind).toBe('ConfigurationError');
    });
});
