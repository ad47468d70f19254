import * as path from "path";
import { BuildTarget } from "../types.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { SourceScanner, isBuildOutputPath } from "../workspace/SourceScanner.js";
import {
    isProjectDescriptorName,
    isTestProjectPath,
    readPackageJson,
    readTsconfig,
    workspacePatterns
} from "../workspace/Descriptors.js";

interface Candidate {
    path: string;
    depth: number;
    isTest: boolean;
}

/**
 * Picks the build target for a path: a solution-level descriptor (workspace
 * package.json or tsconfig with references) wins over any project-level
 * tsconfig; among projects, non-test ones come first. Remaining ties go to
 * the shallowest, then lexicographically smallest path.
 */
export class BuildTargetLocator {
    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly scanner: SourceScanner
    ) {}

    async locate(targetPath: string, signal?: AbortSignal): Promise<BuildTarget | null> {
        const resolved = this.fileSystem.resolve(targetPath);
        const stats = await this.fileSystem.stat(resolved);
        if (!stats.isDirectory()) {
            return this.classifyFile(resolved);
        }

        const descriptors = await this.scanner.walk(resolved, filePath => {
            const name = path.basename(filePath);
            return name === "package.json" || isProjectDescriptorName(name);
        }, { signal });

        const solutions: Candidate[] = [];
        const projects: Candidate[] = [];
        for (const descriptor of descriptors) {
            const relative = path.relative(resolved, descriptor);
            if (isBuildOutputPath(relative)) continue;
            const candidate: Candidate = {
                path: descriptor,
                depth: relative.split(path.sep).length,
                isTest: isTestProjectPath(relative)
            };
            if (await this.isSolution(descriptor)) {
                solutions.push(candidate);
            } else if (isProjectDescriptorName(path.basename(descriptor))) {
                projects.push(candidate);
            }
        }

        if (solutions.length > 0) {
            return { path: pickBest(solutions).path, kind: "solution" };
        }
        if (projects.length > 0) {
            return { path: pickBest(projects).path, kind: "project" };
        }
        return null;
    }

    private async classifyFile(filePath: string): Promise<BuildTarget | null> {
        const name = path.basename(filePath);
        if (await this.isSolution(filePath)) {
            return { path: filePath, kind: "solution" };
        }
        return isProjectDescriptorName(name) ? { path: filePath, kind: "project" } : null;
    }

    private async isSolution(descriptor: string): Promise<boolean> {
        const name = path.basename(descriptor);
        if (name === "package.json") {
            const pkg = await readPackageJson(this.fileSystem, descriptor);
            return !!pkg && workspacePatterns(pkg).length > 0;
        }
        if (isProjectDescriptorName(name)) {
            const config = await readTsconfig(this.fileSystem, descriptor);
            return (config?.references?.length ?? 0) > 0;
        }
        return false;
    }
}

function pickBest(candidates: Candidate[]): Candidate {
    const sorted = [...candidates].sort((a, b) =>
        Number(a.isTest) - Number(b.isTest)
        || a.depth - b.depth
        || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)
    );
    return sorted[0];
}
