import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryFileSystem } from '../platform/FileSystem.js';
import { renameInFile } from '../refactoring/RenameSymbol.js';
import { SymbolRefactoringEngine } from '../refactoring/SymbolRefactoringEngine.js';
import { thrownBy } from './helpers.js';

describe('renameInFile', () => {
    const classSource = [
        'class OldName {',
        '    describe(): string {',
        '        return "OldName";',
        '    }',
        '}',
        'const instance = new OldName();'
    ].join('\n');

    it('should rename bindings and leave string literals alone', () => {
        const outcome = renameInFile(classSource, { oldName: 'OldName', newName: 'NewName' });

        expect(outcome.modifiedCode).toBe([
            'class NewName {',
            '    describe(): string {',
            '        return "OldName";',
            '    }',
            '}',
            'const instance = new NewName();'
        ].join('\n'));
        expect(outcome.changeCount).toBe(2);
        expect(outcome.conflicts).toEqual([]);
        expect(outcome.details.mode).toBe('binding');
        expect(outcome.details.lines).toEqual([1, 6]);
    });

    it('should report a conflict when the new name is already declared', () => {
        const outcome = renameInFile(classSource, { oldName: 'OldName', newName: 'instance' });
        expect(outcome.conflicts).toEqual(["'instance' is already declared in this file"]);
    });

    it('should rename only member positions for a property', () => {
        const code = [
            'class Counter {',
            '    count = 0;',
            '    increment(): void {',
            '        this.count++;',
            '    }',
            '}',
            'const count = 5;'
        ].join('\n');

        const outcome = renameInFile(code, { oldName: 'count', newName: 'total', symbolKind: 'property' });

        expect(outcome.modifiedCode).toBe([
            'class Counter {',
            '    total = 0;',
            '    increment(): void {',
            '        this.total++;',
            '    }',
            '}',
            'const count = 5;'
        ].join('\n'));
        expect(outcome.changeCount).toBe(2);
        expect(outcome.details.mode).toBe('member');
    });

    it('should expand shorthand properties so the object keeps its shape', () => {
        const code = 'const value = 1;\nconst box = { value };\nconsole.log(box.value);';

        const outcome = renameInFile(code, { oldName: 'value', newName: 'amount' });

        expect(outcome.modifiedCode).toBe('const amount = 1;\nconst box = { value: amount };\nconsole.log(box.value);');
        expect(outcome.changeCount).toBe(2);
    });

    it('should restore shorthand properties when renamed back', () => {
        const code = 'const value = 1;\nconst box = { value };\nconsole.log(box.value);';

        const there = renameInFile(code, { oldName: 'value', newName: 'amount' });
        const back = renameInFile(there.modifiedCode, { oldName: 'amount', newName: 'value' });

        expect(back.modifiedCode).toBe(code);
        expect(back.changeCount).toBe(2);
    });

    it('should keep destructured properties and rename only the local', () => {
        const code = 'const box = { count: 1 };\nconst { count } = box;\nconsole.log(count);';

        const there = renameInFile(code, { oldName: 'count', newName: 'total' });
        expect(there.modifiedCode).toBe('const box = { count: 1 };\nconst { count: total } = box;\nconsole.log(total);');

        const back = renameInFile(there.modifiedCode, { oldName: 'total', newName: 'count' });
        expect(back.modifiedCode).toBe(code);
    });

    it('should fail with NotFound when the symbol must exist', () => {
        const error = thrownBy(() => renameInFile('const a = 1;', { oldName: 'x', newName: 'y', mustExist: true }));

        expect(error.kind).toBe('NotFound');
        expect(error.message).toBe("Symbol 'x' was not found");
    });

    it('should return the code unchanged when nothing matches', () => {
        const outcome = renameInFile('const a = 1;', { oldName: 'x', newName: 'y' });

        expect(outcome.modifiedCode).toBe('const a = 1;');
        expect(outcome.changeCount).toBe(0);
    });

    it('should reject a reserved word as the new name', () => {
        const error = thrownBy(() => renameInFile('const a = 1;', { oldName: 'a', newName: 'class' }));
        expect(error.kind).toBe('ConfigurationError');
    });
});

describe('SymbolRefactoringEngine.renameInWorkspace', () => {
    let fileSystem: MemoryFileSystem;

    beforeEach(async () => {
        fileSystem = new MemoryFileSystem('/ws');
        await fileSystem.writeFile('/ws/a/shapes.ts', 'class Shape {}\n');
        await fileSystem.writeFile('/ws/b/main.ts', 'const s = new Shape();\n');
    });

    it('should rename the declaration and its references in every file', async () => {
        const engine = new SymbolRefactoringEngine({ maxFiles: 100 }, fileSystem);

        const result = await engine.renameInWorkspace('/ws', { oldName: 'Shape', newName: 'Circle' });

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const byPath = new Map(result.value.files.map(file => [file.originalPath, file.modifiedCode]));
        expect(byPath.get('/ws/a/shapes.ts')).toBe('class Circle {}\n');
        expect(byPath.get('/ws/b/main.ts')).toBe('const s = new Circle();\n');
        expect(result.value.changeCount).toBe(2);
        expect(result.value.symbolKind).toBe('class');
        expect(result.value.declaration).toEqual({ originalPath: '/ws/a/shapes.ts', line: 1 });
    });

    it('should return to the original text when renamed back', async () => {
        const original = 'const count = 1;\nexport const box = { count };\n';
        await fileSystem.writeFile('/ws/a/box.ts', original);
        const engine = new SymbolRefactoringEngine({ maxFiles: 100 }, fileSystem);

        const there = await engine.renameInWorkspace('/ws', { oldName: 'count', newName: 'total' });
        expect(there.ok).toBe(true);
        if (!there.ok) return;
        expect(there.value.files.map(file => file.modifiedCode)).toEqual(['const total = 1;\nexport const box = { count: total };\n']);
        await fileSystem.writeFile('/ws/a/box.ts', there.value.files[0].modifiedCode);

        const back = await engine.renameInWorkspace('/ws', { oldName: 'total', newName: 'count' });
        expect(back.ok).toBe(true);
        if (!back.ok) return;
        expect(back.value.files.map(file => file.modifiedCode)).toEqual([original]);
    });

    it('should not write anything while planning', async () => {
        const engine = new SymbolRefactoringEngine({ maxFiles: 100 }, fileSystem);

        await engine.renameInWorkspace('/ws', { oldName: 'Shape', newName: 'Circle' });

        expect(await fileSystem.readFile('/ws/a/shapes.ts')).toBe('class Shape {}\n');
    });

    it('should refuse workspaces with more files than allowed', async () => {
        const engine = new SymbolRefactoringEngine({ maxFiles: 1 }, fileSystem);

        const result = await engine.renameInWorkspace('/ws', { oldName: 'Shape', newName: 'Circle' });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('ResourceLimitExceeded');
    });

    it('should reject parameter renames across files', async () => {
        const engine = new SymbolRefactoringEngine({ maxFiles: 100 }, fileSystem);

        const result = await engine.renameInWorkspace('/ws', { oldName: 'x', newName: 'y', symbolKind: 'parameter' });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('ConfigurationError');
    });

    it('should report a missing workspace path', async () => {
        const engine = new SymbolRefactoringEngine({ maxFiles: 100 }, fileSystem);

        const result = await engine.renameInWorkspace('/elsewhere', { oldName: 'Shape', newName: 'Circle' });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('ProjectDiscoveryFailed');
    });
});
