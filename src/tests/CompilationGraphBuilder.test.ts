import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryFileSystem } from '../platform/FileSystem.js';
import { CompilationGraphBuilder } from '../compilation/CompilationGraphBuilder.js';
import { rejection } from './helpers.js';

describe('CompilationGraphBuilder', () => {
    let fileSystem: MemoryFileSystem;
    let builder: CompilationGraphBuilder;

    beforeEach(async () => {
        fileSystem = new MemoryFileSystem('/ws');
        builder = new CompilationGraphBuilder(fileSystem, { maxFiles: 10 });
        await fileSystem.writeFile('/ws/a/index.ts', 'export const a = 1;\n');
        await fileSystem.writeFile('/ws/b/index.ts', 'import { a } from "../a/index.js";\nexport const b = a + 1;\n');
    });

    it('should give same-named files distinct ids and resolve imports between them', async () => {
        const graph = await builder.build(['/ws/a/index.ts', '/ws/b/index.ts']);

        expect(graph.resolve('/ws/a/index.ts')).toBe('/__graph__/index.a.ts');
        expect(graph.originalPathOf('/__graph__/index.b.ts')).toBe('/ws/b/index.ts');
        const importer = graph.unitFor('/ws/b/index.ts');
        expect(importer).toBeDefined();
        if (!importer) return;
        expect(graph.program.getSemanticDiagnostics(graph.sourceFileOf(importer))).toHaveLength(0);
    });

    it('should type-check against the standard library', async () => {
        await fileSystem.writeFile('/ws/c/text.ts', 'export const upper = "a".toUpperCase().split("");\n');
        const graph = await builder.build(['/ws/c/text.ts']);

        const unit = graph.unitFor('/ws/c/text.ts');
        expect(unit).toBeDefined();
        if (!unit) return;
        expect(graph.program.getSemanticDiagnostics(graph.sourceFileOf(unit))).toHaveLength(0);
        expect(graph.program.getGlobalDiagnostics()).toHaveLength(0);
    });

    it('should list declarations against their original paths', async () => {
        const graph = await builder.build(['/ws/a/index.ts', '/ws/b/index.ts']);

        expect(graph.symbols.map(entry => [entry.name, entry.originalPath, entry.line])).toEqual([
            ['a', '/ws/a/index.ts', 1],
            ['b', '/ws/b/index.ts', 2]
        ]);
    });

    it('should map positions back to the original file', async () => {
        const graph = await builder.build(['/ws/a/index.ts', '/ws/b/index.ts']);
        const content = 'import { a } from "../a/index.js";\nexport const b = a + 1;\n';

        expect(graph.toOriginalLocation('/__graph__/index.b.ts', content.indexOf('b = '))).toEqual({
            originalPath: '/ws/b/index.ts',
            line: 2,
            column: 14,
            lineText: 'export const b = a + 1;'
        });
    });

    it('should skip unreadable paths and directories without failing', async () => {
        const graph = await builder.build(['/ws/a/index.ts', '/ws/missing.ts', '/ws/b']);

        expect(graph.size).toBe(1);
        expect(graph.skipped).toEqual([
            { path: '/ws/missing.ts', reason: "ENOENT: no such file or directory, stat '/ws/missing.ts'" },
            { path: '/ws/b', reason: 'is a directory' }
        ]);
    });

    it('should compile a file passed under two spellings once and report it', async () => {
        const graph = await builder.build(['/ws/a/index.ts', '/ws/b/../a/index.ts', '/ws/a/index.ts']);

        expect(graph.size).toBe(1);
        expect(graph.diagnostics).toEqual([{
            kind: 'DuplicateFilesDetected',
            message: '2 paths refer to /ws/a/index.ts; only the first was compiled',
            paths: ['/ws/a/index.ts', '/ws/b/../a/index.ts']
        }]);
    });

    it('should refuse more files than the limit', async () => {
        const limited = new CompilationGraphBuilder(fileSystem, { maxFiles: 1 });

        const error = await rejection(limited.build(['/ws/a/index.ts', '/ws/b/index.ts']));

        expect(error.kind).toBe('ResourceLimitExceeded');
        expect(error.message).toBe('2 files exceed the compilation limit of 1');
    });

    it('should stop when the request is already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();

        const error = await rejection(builder.build(['/ws/a/index.ts'], controller.signal));
        expect(error.kind).toBe('Cancelled');
    });
});
