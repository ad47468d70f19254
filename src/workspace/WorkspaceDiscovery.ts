import * as path from "path";
import { BuildTarget } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { throwIfCancelled } from "../common/Cancellation.js";
import { BuildTargetLocator } from "../build/BuildTargetLocator.js";
import { SourceScanner } from "./SourceScanner.js";
import {
    PackageJson,
    expandWorkspacePatterns,
    isTestProjectPath,
    readPackageJson,
    readTsconfig,
    referencedDescriptors,
    workspacePatterns
} from "./Descriptors.js";

export type ProjectType = "library" | "application" | "test";

export interface WorkspaceProject {
    name: string;
    descriptorPath: string;
    directory: string;
    type: ProjectType;
    packageName?: string;
    sourceFiles: string[];
    /** names of sibling projects this one depends on */
    dependencies: string[];
}

export interface WorkspaceLayout {
    rootPath: string;
    target: BuildTarget;
    projects: WorkspaceProject[];
}

export type SolutionIssueKind = "duplicate-file-names" | "empty-project" | "circular-dependency";

export interface SolutionIssue {
    kind: SolutionIssueKind;
    severity: "warning" | "info";
    message: string;
    projects: string[];
    files?: string[];
}

const MAX_DUPLICATE_ISSUES = 20;

interface ProjectDraft {
    descriptorPath: string;
    directory: string;
    name: string;
    pkg?: PackageJson;
    references: string[];
}

export class WorkspaceDiscovery {
    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly scanner: SourceScanner,
        private readonly locator: BuildTargetLocator
    ) {}

    /**
     * Descriptors to compile for a target: the project itself, every
     * workspace package, or every project reachable through references.
     */
    async projectDescriptors(target: BuildTarget): Promise<string[]> {
        if (target.kind === "project") {
            return [target.path];
        }
        if (path.basename(target.path) === "package.json") {
            const pkg = await readPackageJson(this.fileSystem, target.path);
            const dirs = await expandWorkspacePatterns(this.fileSystem, path.dirname(target.path), pkg ? workspacePatterns(pkg) : []);
            const descriptors: string[] = [];
            for (const dir of dirs) {
                descriptors.push(await this.primaryDescriptor(dir));
            }
            return descriptors;
        }

        const visited = new Set<string>();
        const descriptors: string[] = [];
        const queue = [target.path];
        for (let index = 0; index < queue.length; index++) {
            const current = queue[index];
            if (visited.has(current)) continue;
            visited.add(current);
            const config = await readTsconfig(this.fileSystem, current);
            if (!config) continue;
            const references = referencedDescriptors(current, config);
            const listsFiles = (config.files?.length ?? 0) > 0 || (config.include?.length ?? 0) > 0;
            const implicitFiles = config.files === undefined && config.include === undefined && references.length === 0;
            if (listsFiles || implicitFiles) {
                descriptors.push(current);
            }
            queue.push(...references);
        }
        return descriptors;
    }

    async discover(solutionPath: string, signal?: AbortSignal): Promise<WorkspaceLayout> {
        const resolved = this.fileSystem.resolve(solutionPath);
        if (!(await this.fileSystem.exists(resolved))) {
            throw new AnalysisError("ProjectDiscoveryFailed", `Path does not exist: ${resolved}`, { data: { projectPath: solutionPath } });
        }
        const target = await this.locator.locate(resolved, signal);
        if (!target) {
            throw new AnalysisError(
                "ProjectDiscoveryFailed",
                `No workspace package.json or tsconfig.json found under ${resolved}`,
                { data: { projectPath: solutionPath } }
            );
        }

        const drafts: ProjectDraft[] = [];
        for (const descriptorPath of await this.projectDescriptors(target)) {
            throwIfCancelled(signal, "workspace discovery");
            drafts.push(await this.draftProject(descriptorPath));
        }

        const files = new Map<string, string[]>();
        for (const draft of drafts) {
            files.set(draft.descriptorPath, await this.scanner.scanSources(draft.directory, { signal }));
        }
        // a file belongs to the deepest project directory containing it
        const ownerOf = (filePath: string): string | undefined => {
            let owner: ProjectDraft | undefined;
            for (const draft of drafts) {
                if (isInside(filePath, draft.directory) && (!owner || draft.directory.length > owner.directory.length)) {
                    owner = draft;
                }
            }
            return owner?.directory;
        };

        const byName = new Map(drafts.map(draft => [draft.pkg?.name ?? draft.name, draft.name]));
        const byDescriptor = new Map(drafts.map(draft => [draft.descriptorPath, draft.name]));

        const projects = drafts.map((draft): WorkspaceProject => {
            const dependencies = new Set<string>();
            const declared = {
                ...(draft.pkg?.dependencies ?? {}),
                ...(draft.pkg?.devDependencies ?? {}),
                ...(draft.pkg?.peerDependencies ?? {})
            };
            for (const dependency of Object.keys(declared)) {
                const sibling = byName.get(dependency);
                if (sibling && sibling !== draft.name) dependencies.add(sibling);
            }
            for (const reference of draft.references) {
                const sibling = byDescriptor.get(reference);
                if (sibling && sibling !== draft.name) dependencies.add(sibling);
            }
            return {
                name: draft.name,
                descriptorPath: draft.descriptorPath,
                directory: draft.directory,
                type: classify(draft, target),
                ...(draft.pkg?.name ? { packageName: draft.pkg.name } : {}),
                sourceFiles: (files.get(draft.descriptorPath) ?? []).filter(file => ownerOf(file) === draft.directory),
                dependencies: Array.from(dependencies).sort()
            };
        });

        return { rootPath: resolved, target, projects };
    }

    detectIssues(layout: WorkspaceLayout): SolutionIssue[] {
        return [
            ...duplicateFileNames(layout.projects),
            ...layout.projects
                .filter(project => project.sourceFiles.length === 0)
                .map((project): SolutionIssue => ({
                    kind: "empty-project",
                    severity: "info",
                    message: `Project '${project.name}' has no source files`,
                    projects: [project.name]
                })),
            ...dependencyCycles(layout.projects)
        ];
    }

    private async primaryDescriptor(dir: string): Promise<string> {
        for (const candidate of ["tsconfig.json", "jsconfig.json"]) {
            const descriptor = path.join(dir, candidate);
            if (await this.fileSystem.exists(descriptor)) return descriptor;
        }
        return path.join(dir, "package.json");
    }

    private async draftProject(descriptorPath: string): Promise<ProjectDraft> {
        const directory = path.dirname(descriptorPath);
        const pkgPath = path.join(directory, "package.json");
        const pkg = (await this.fileSystem.exists(pkgPath)) ? await readPackageJson(this.fileSystem, pkgPath) : undefined;
        const fileName = path.basename(descriptorPath);
        const config = fileName.endsWith(".json") && fileName !== "package.json"
            ? await readTsconfig(this.fileSystem, descriptorPath)
            : undefined;
        const baseName = pkg?.name ?? path.basename(directory);
        const isPrimary = ["tsconfig.json", "jsconfig.json", "package.json"].includes(fileName);
        return {
            descriptorPath,
            directory,
            name: isPrimary ? baseName : `${baseName} (${fileName})`,
            pkg,
            references: config ? referencedDescriptors(descriptorPath, config) : []
        };
    }
}

function isInside(filePath: string, dir: string): boolean {
    const relative = path.relative(dir, filePath);
    return relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative);
}

function classify(draft: ProjectDraft, target: BuildTarget): ProjectType {
    const rootDir = path.dirname(target.path);
    if (isTestProjectPath(path.relative(rootDir, draft.descriptorPath))) return "test";
    if (draft.pkg?.bin !== undefined || draft.pkg?.scripts?.start !== undefined) return "application";
    return "library";
}

function duplicateFileNames(projects: WorkspaceProject[]): SolutionIssue[] {
    const owners = new Map<string, Map<string, string[]>>();
    for (const project of projects) {
        for (const file of project.sourceFiles) {
            const name = path.basename(file);
            const perProject = owners.get(name) ?? new Map<string, string[]>();
            perProject.set(project.name, [...(perProject.get(project.name) ?? []), file]);
            owners.set(name, perProject);
        }
    }
    const issues: SolutionIssue[] = [];
    for (const [name, perProject] of owners) {
        if (perProject.size < 2) continue;
        issues.push({
            kind: "duplicate-file-names",
            severity: "info",
            message: `'${name}' exists in ${perProject.size} projects; graph ids are disambiguated by directory`,
            projects: Array.from(perProject.keys()),
            files: Array.from(perProject.values()).flat()
        });
        if (issues.length >= MAX_DUPLICATE_ISSUES) break;
    }
    return issues;
}

function dependencyCycles(projects: WorkspaceProject[]): SolutionIssue[] {
    const edges = new Map(projects.map(project => [project.name, project.dependencies]));
    const state = new Map<string, "visiting" | "done">();
    const stack: string[] = [];
    const seen = new Set<string>();
    const issues: SolutionIssue[] = [];

    const visit = (name: string) => {
        state.set(name, "visiting");
        stack.push(name);
        for (const next of edges.get(name) ?? []) {
            const nextState = state.get(next);
            if (nextState === "visiting") {
                const cycle = [...stack.slice(stack.indexOf(next)), next];
                const key = [...cycle.slice(0, -1)].sort().join("|");
                if (!seen.has(key)) {
                    seen.add(key);
                    issues.push({
                        kind: "circular-dependency",
                        severity: "warning",
                        message: `Circular project dependency: ${cycle.join(" -> ")}`,
                        projects: cycle.slice(0, -1)
                    });
                }
            } else if (nextState === undefined) {
                visit(next);
            }
        }
        stack.pop();
        state.set(name, "done");
    };

    for (const project of projects) {
        if (!state.has(project.name)) visit(project.name);
    }
    return issues;
}
