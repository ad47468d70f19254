import { describe, it, expect, beforeEach } from '@jest/globals';
import { BuildError, BuildTarget } from '../types.js';
import { AnalysisError } from '../errors/AnalysisError.js';
import { MemoryFileSystem } from '../platform/FileSystem.js';
import { SourceScanner } from '../workspace/SourceScanner.js';
import { BuildGate, assertBuildable, summarizeBuildErrors } from '../build/BuildGate.js';
import { BuildRunner } from '../build/BuildRunner.js';
import { BuildTargetLocator } from '../build/BuildTargetLocator.js';
import { rejection } from './helpers.js';

class FakeBuildRunner implements BuildRunner {
    readonly targets: BuildTarget[] = [];

    constructor(private outcome: BuildError[] | Error) {}

    respondWith(outcome: BuildError[] | Error): void {
        this.outcome = outcome;
    }

    async run(target: BuildTarget): Promise<BuildError[]> {
        this.targets.push(target);
        if (this.outcome instanceof Error) {
            throw this.outcome;
        }
        return this.outcome;
    }
}

const missingName = (name: string): BuildError => ({
    code: 'TS2304',
    message: `Cannot find name '${name}'.`,
    project: 'ws',
    filePath: '/ws/src/app.ts',
    line: 1,
    column: 1
});

describe('BuildGate', () => {
    let fileSystem: MemoryFileSystem;
    let scanner: SourceScanner;
    let runner: FakeBuildRunner;

    const createGate = (cacheSize = 4) =>
        new BuildGate(fileSystem, scanner, new BuildTargetLocator(fileSystem, scanner), runner, { cacheSize });

    beforeEach(async () => {
        fileSystem = new MemoryFileSystem('/ws');
        scanner = new SourceScanner(fileSystem);
        runner = new FakeBuildRunner([]);
        await fileSystem.writeFile('/ws/tsconfig.json', '{}');
        await fileSystem.writeFile('/ws/src/app.ts', 'export const answer = 42;\n');
    });

    it('should report Success when the runner finds no errors', async () => {
        const result = await createGate().validate('/ws');

        expect(result.status).toBe('Success');
        expect(result.chosenTarget).toBe('/ws/tsconfig.json');
        expect(result.targetKind).toBe('project');
        expect(result.message).toBe('Build succeeded for /ws/tsconfig.json');
        expect(result.cached).toBe(false);
        expect(runner.targets).toEqual([{ path: '/ws/tsconfig.json', kind: 'project' }]);
    });

    it('should summarize errors on Failure', async () => {
        runner.respondWith([
            missingName('x'),
            missingName('y'),
            { code: 'TS7006', message: "Parameter 'a' implicitly has an 'any' type.", project: 'ws' }
        ]);

        const result = await createGate().validate('/ws');

        expect(result.status).toBe('Failure');
        expect(result.errorCount).toBe(3);
        expect(result.failedProjects).toEqual(['ws']);
        expect(result.message).toBe('Build failed with 3 error(s) in 1 project(s)');
        expect(result.errorSummary).toBe(
            "TS2304 (2x): Cannot find name 'x'.\nTS7006 (1x): Parameter 'a' implicitly has an 'any' type."
        );
        expect(result.suggestions).toEqual([
            'TS2304: Cannot find name: import the symbol or declare it before use.',
            'TS7006: Implicit any: add a type annotation to the parameter.'
        ]);
    });

    it('should warn and continue when there is no build target', async () => {
        const bare = new MemoryFileSystem('/bare');
        await bare.writeFile('/bare/main.ts', 'console.log(1);\n');
        const bareScanner = new SourceScanner(bare);
        const gate = new BuildGate(bare, bareScanner, new BuildTargetLocator(bare, bareScanner), runner, { cacheSize: 0 });

        const result = await gate.validate('/bare');

        expect(result.status).toBe('Warning');
        expect(result.chosenTarget).toBeNull();
        expect(result.message).toBe('No tsconfig.json or workspace package.json found; analysis continues in degraded mode');
        expect(runner.targets).toEqual([]);
    });

    it('should warn when the runner itself fails', async () => {
        runner.respondWith(new Error('compiler crashed'));

        const result = await createGate().validate('/ws');

        expect(result.status).toBe('Warning');
        expect(result.chosenTarget).toBe('/ws/tsconfig.json');
        expect(result.message).toBe('Could not validate build: compiler crashed');
    });

    it('should serve an unchanged tree from the cache', async () => {
        const gate = createGate();

        await gate.validate('/ws');
        const second = await gate.validate('/ws');

        expect(second.status).toBe('Success');
        expect(second.cached).toBe(true);
        expect(runner.targets).toHaveLength(1);
    });

    it('should validate again after a source file changes', async () => {
        const gate = createGate();

        await gate.validate('/ws');
        await fileSystem.writeFile('/ws/src/app.ts', 'export const answer = 43;\n');
        const second = await gate.validate('/ws');

        expect(second.cached).toBe(false);
        expect(runner.targets).toHaveLength(2);
    });

    it('should not cache when the cache size is zero', async () => {
        const gate = createGate(0);

        await gate.validate('/ws');
        await gate.validate('/ws');

        expect(runner.targets).toHaveLength(2);
    });

    it('should reject a path that does not exist', async () => {
        const error = await rejection(createGate().validate('/ws/missing'));
        expect(error.kind).toBe('ProjectDiscoveryFailed');
    });

    it('should stop when the request is already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();

        const error = await rejection(createGate().validate('/ws', controller.signal));
        expect(error.kind).toBe('Cancelled');
    });
});

describe('summarizeBuildErrors', () => {
    it('should return an empty summary for no errors', () => {
        expect(summarizeBuildErrors([])).toBe('');
    });

    it('should add a total once the list gets long', () => {
        const errors = Array.from({ length: 21 }, (_, index) => missingName(`v${index}`));
        expect(summarizeBuildErrors(errors)).toBe("TS2304 (21x): Cannot find name 'v0'.\nTotal: 21 errors");
    });

    it('should list at most five codes', () => {
        const errors = ['TS1', 'TS2', 'TS3', 'TS4', 'TS5', 'TS6'].map(code => ({ code, message: 'm', project: 'p' }));
        expect(summarizeBuildErrors(errors).split('\n')).toEqual([
            'TS1 (1x): m',
            'TS2 (1x): m',
            'TS3 (1x): m',
            'TS4 (1x): m',
            'TS5 (1x): m'
        ]);
    });
});

describe('assertBuildable', () => {
    it('should throw BuildValidationFailed for a failed build', async () => {
        const fileSystem = new MemoryFileSystem('/ws');
        await fileSystem.writeFile('/ws/tsconfig.json', '{}');
        const scanner = new SourceScanner(fileSystem);
        const gate = new BuildGate(fileSystem, scanner, new BuildTargetLocator(fileSystem, scanner), new FakeBuildRunner([missingName('x')]), { cacheSize: 0 });
        const result = await gate.validate('/ws');

        let caught: unknown;
        try {
            assertBuildable(result);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(AnalysisError);
        if (caught instanceof AnalysisError) {
            expect(caught.kind).toBe('BuildValidationFailed');
            expect(caught.message).toBe('Build has 1 error(s) in /ws/tsconfig.json');
            expect(caught.data.projectPath).toBe('/ws');
        }
    });
});
