import { describe, it, expect, beforeEach } from '@jest/globals';
import { AnalysisError } from '../errors/AnalysisError.js';
import { MemoryFileSystem } from '../platform/FileSystem.js';
import { SourceScanner } from '../workspace/SourceScanner.js';
import { WorkspaceDiscovery } from '../workspace/WorkspaceDiscovery.js';
import { BuildTargetLocator } from '../build/BuildTargetLocator.js';

function createDiscovery(fileSystem: MemoryFileSystem): WorkspaceDiscovery {
    const scanner = new SourceScanner(fileSystem);
    return new WorkspaceDiscovery(fileSystem, scanner, new BuildTargetLocator(fileSystem, scanner));
}

describe('WorkspaceDiscovery', () => {
    let fileSystem: MemoryFileSystem;
    let discovery: WorkspaceDiscovery;

    beforeEach(async () => {
        fileSystem = new MemoryFileSystem('/ws');
        discovery = createDiscovery(fileSystem);
        await fileSystem.writeFile('/ws/package.json', JSON.stringify({ name: 'root', private: true, workspaces: ['packages/*'] }));
        await fileSystem.writeFile('/ws/packages/core/package.json', JSON.stringify({
            name: '@demo/core',
            dependencies: { '@demo/api': '*' }
        }));
        await fileSystem.writeFile('/ws/packages/core/tsconfig.json', '{}');
        await fileSystem.writeFile('/ws/packages/core/src/index.ts', 'export const core = 1;\n');
        await fileSystem.writeFile('/ws/packages/api/package.json', JSON.stringify({
            name: '@demo/api',
            bin: 'cli.js',
            dependencies: { '@demo/core': '^1.0.0', lodash: '^4.0.0' }
        }));
        await fileSystem.writeFile('/ws/packages/api/tsconfig.json', '{}');
        await fileSystem.writeFile('/ws/packages/api/src/index.ts', 'export const api = 2;\n');
        await fileSystem.writeFile('/ws/packages/empty/package.json', JSON.stringify({ name: 'empty-pkg' }));
    });

    it('should list every workspace package as a project', async () => {
        const layout = await discovery.discover('/ws');

        expect(layout.target).toEqual({ path: '/ws/package.json', kind: 'solution' });
        expect(layout.projects.map(project => project.name)).toEqual(['@demo/api', '@demo/core', 'empty-pkg']);
        expect(layout.projects.map(project => project.descriptorPath)).toEqual([
            '/ws/packages/api/tsconfig.json',
            '/ws/packages/core/tsconfig.json',
            '/ws/packages/empty/package.json'
        ]);
    });

    it('should resolve sibling dependencies and classify projects', async () => {
        const layout = await discovery.discover('/ws');
        const [api, core, empty] = layout.projects;

        expect(api.dependencies).toEqual(['@demo/core']);
        expect(api.type).toBe('application');
        expect(api.sourceFiles).toEqual(['/ws/packages/api/src/index.ts']);
        expect(core.dependencies).toEqual(['@demo/api']);
        expect(core.type).toBe('library');
        expect(empty.sourceFiles).toEqual([]);
    });

    it('should detect duplicate names, empty projects and cycles', async () => {
        const layout = await discovery.discover('/ws');
        const issues = discovery.detectIssues(layout);

        expect(issues.map(issue => issue.kind)).toEqual(['duplicate-file-names', 'empty-project', 'circular-dependency']);
        expect(issues[0].message).toBe("'index.ts' exists in 2 projects; graph ids are disambiguated by directory");
        expect(issues[1].message).toBe("Project 'empty-pkg' has no source files");
        expect(issues[2]).toEqual({
            kind: 'circular-dependency',
            severity: 'warning',
            message: 'Circular project dependency: @demo/api -> @demo/core -> @demo/api',
            projects: ['@demo/api', '@demo/core']
        });
    });

    it('should follow tsconfig references', async () => {
        const refs = new MemoryFileSystem('/r');
        await refs.writeFile('/r/tsconfig.json', JSON.stringify({ files: [], references: [{ path: './a' }, { path: './b' }] }));
        await refs.writeFile('/r/a/tsconfig.json', JSON.stringify({ include: ['src'] }));
        await refs.writeFile('/r/b/tsconfig.json', '{}');

        const descriptors = await createDiscovery(refs).projectDescriptors({ path: '/r/tsconfig.json', kind: 'solution' });

        expect(descriptors).toEqual(['/r/a/tsconfig.json', '/r/b/tsconfig.json']);
    });

    it('should fail when nothing describes a project', async () => {
        const bare = new MemoryFileSystem('/bare');
        await bare.writeFile('/bare/main.ts', '');

        let caught: unknown;
        try {
            await createDiscovery(bare).discover('/bare');
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(AnalysisError);
        expect(caught instanceof AnalysisError && caught.kind).toBe('ProjectDiscoveryFailed');
    });
});
