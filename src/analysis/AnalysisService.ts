import * as path from "path";
import { BuildStatus, BuildValidationResult } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { ServerConfig, MAX_RESULTS_LIMIT } from "../config/ServerConfig.js";
import { throwIfCancelled } from "../common/Cancellation.js";
import { BuildGate, assertBuildable } from "../build/BuildGate.js";
import { BuildRunner, TypeScriptBuildRunner } from "../build/BuildRunner.js";
import { BuildTargetLocator } from "../build/BuildTargetLocator.js";
import { CompilationGraph } from "../compilation/CompilationGraph.js";
import { CompilationGraphBuilder } from "../compilation/CompilationGraphBuilder.js";
import { SourceScanner } from "../workspace/SourceScanner.js";
import { SolutionIssue, WorkspaceDiscovery, WorkspaceLayout } from "../workspace/WorkspaceDiscovery.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { AnalysisStrategySelector } from "./AnalysisStrategySelector.js";
import {
    AnalysisContext,
    AnalysisPayloadMap,
    AnalysisRequestMap,
    AnalysisRequestType,
    AnalysisResult,
    ClassContextPayload,
    ClassContextRequest,
    FindSymbolPayload,
    FindSymbolRequest,
    FindUsagesPayload,
    FindUsagesRequest,
    ProjectStructurePayload,
    ProjectStructureRequest
} from "./AnalysisTypes.js";

const log = createLogger("AnalysisService");

export type GateStatus = BuildStatus | "Skipped";

export type AnalysisResponse<T> = AnalysisResult<T> & {
    buildStatus: GateStatus;
    /** files found under the project, before any were skipped as unreadable */
    scannedFiles: number;
};

export interface SolutionAnalysis {
    rootPath: string;
    targetPath: string;
    targetKind: WorkspaceLayout["target"]["kind"];
    projectCount: number;
    projects: Array<{
        name: string;
        descriptorPath: string;
        type: string;
        packageName?: string;
        sourceFileCount: number;
        dependencies?: string[];
    }>;
    dependencyGraph?: Record<string, string[]>;
    issues?: SolutionIssue[];
}

export interface AnalysisServiceDependencies {
    /** replaces the in-process TypeScript build pass */
    buildRunner?: BuildRunner;
    selector?: AnalysisStrategySelector;
}

type WithOptionalLimit<T> = Omit<T, "maxResults"> & { maxResults?: number };

/**
 * Entry point of every read-only command: resolves the project, runs the
 * build gate, scans sources and hands the request to the tier selector
 * with a graph that is only compiled if a tier asks for it.
 */
export class AnalysisService {
    readonly scanner: SourceScanner;
    readonly locator: BuildTargetLocator;
    readonly discovery: WorkspaceDiscovery;
    readonly buildGate: BuildGate;
    private readonly graphBuilder: CompilationGraphBuilder;
    private readonly selector: AnalysisStrategySelector;

    constructor(
        private readonly config: ServerConfig,
        private readonly fileSystem: IFileSystem,
        dependencies: AnalysisServiceDependencies = {}
    ) {
        this.scanner = new SourceScanner(fileSystem);
        this.locator = new BuildTargetLocator(fileSystem, this.scanner);
        this.discovery = new WorkspaceDiscovery(fileSystem, this.scanner, this.locator);
        this.buildGate = new BuildGate(
            fileSystem,
            this.scanner,
            this.locator,
            dependencies.buildRunner ?? new TypeScriptBuildRunner(this.discovery),
            { cacheSize: config.buildCacheSize }
        );
        this.graphBuilder = new CompilationGraphBuilder(fileSystem, { maxFiles: config.maxFiles });
        this.selector = dependencies.selector ?? new AnalysisStrategySelector();
    }

    async validateBuild(projectPath: string, signal?: AbortSignal): Promise<BuildValidationResult> {
        return this.buildGate.validate(projectPath, signal);
    }

    async findSymbol(request: WithOptionalLimit<FindSymbolRequest>, projectPath: string, signal?: AbortSignal): Promise<AnalysisResponse<FindSymbolPayload>> {
        return this.analyze("find_symbol", { ...request, maxResults: this.resultLimit(request.maxResults) }, projectPath, signal);
    }

    async findUsages(request: WithOptionalLimit<FindUsagesRequest>, projectPath: string, signal?: AbortSignal): Promise<AnalysisResponse<FindUsagesPayload>> {
        return this.analyze("find_symbol_usages", { ...request, maxResults: this.resultLimit(request.maxResults) }, projectPath, signal);
    }

    async getClassContext(request: WithOptionalLimit<ClassContextRequest>, projectPath: string, signal?: AbortSignal): Promise<AnalysisResponse<ClassContextPayload>> {
        return this.analyze("get_class_context", { ...request, maxResults: this.resultLimit(request.maxResults) }, projectPath, signal);
    }

    async analyzeStructure(request: ProjectStructureRequest, projectPath: string, signal?: AbortSignal): Promise<AnalysisResponse<ProjectStructurePayload>> {
        return this.analyze("analyze_project_structure", request, projectPath, signal);
    }

    async analyzeSolution(
        solutionPath: string,
        options: { includeDependencyGraph: boolean; detectIssues: boolean },
        signal?: AbortSignal
    ): Promise<SolutionAnalysis> {
        const layout = await this.discovery.discover(solutionPath, signal);
        const result: SolutionAnalysis = {
            rootPath: layout.rootPath,
            targetPath: layout.target.path,
            targetKind: layout.target.kind,
            projectCount: layout.projects.length,
            projects: layout.projects.map(project => ({
                name: project.name,
                descriptorPath: project.descriptorPath,
                type: project.type,
                ...(project.packageName ? { packageName: project.packageName } : {}),
                sourceFileCount: project.sourceFiles.length,
                ...(options.includeDependencyGraph ? { dependencies: project.dependencies } : {})
            }))
        };
        if (options.includeDependencyGraph) {
            result.dependencyGraph = Object.fromEntries(layout.projects.map(project => [project.name, project.dependencies]));
        }
        if (options.detectIssues) {
            result.issues = this.discovery.detectIssues(layout);
        }
        return result;
    }

    private resultLimit(requested: number | undefined): number {
        const limit = requested ?? this.config.maxResults;
        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RESULTS_LIMIT) {
            throw AnalysisError.configuration(
                `maxResults must be an integer between 1 and ${MAX_RESULTS_LIMIT}, got ${limit}`,
                { parameter: "maxResults", value: limit }
            );
        }
        return limit;
    }

    private async analyze<K extends AnalysisRequestType>(
        type: K,
        request: AnalysisRequestMap[K],
        projectPath: string,
        signal?: AbortSignal
    ): Promise<AnalysisResponse<AnalysisPayloadMap[K]>> {
        const resolved = this.fileSystem.resolve(projectPath);
        if (!(await this.fileSystem.exists(resolved))) {
            throw new AnalysisError("ProjectDiscoveryFailed", `Path does not exist: ${resolved}`, { data: { projectPath } });
        }

        let buildStatus: GateStatus = "Skipped";
        if (!this.config.skipBuildGate) {
            const validation = await this.buildGate.validate(resolved, signal);
            assertBuildable(validation);
            buildStatus = validation.status;
        }

        const stats = await this.fileSystem.stat(resolved);
        const root = stats.isDirectory() ? resolved : path.dirname(resolved);
        const files = await this.scanner.scanSources(root, { signal, limit: this.config.maxFiles + 1 });
        if (files.length > this.config.maxFiles) {
            throw new AnalysisError(
                "ResourceLimitExceeded",
                `More than ${this.config.maxFiles} source files under ${root}`,
                { data: { limit: this.config.maxFiles, projectPath } }
            );
        }
        throwIfCancelled(signal, "analysis");

        let graph: Promise<CompilationGraph> | undefined;
        const context: AnalysisContext = {
            projectPath: root,
            files,
            fileSystem: this.fileSystem,
            semanticAllowed: buildStatus !== "Skipped",
            graph: () => {
                graph ??= this.graphBuilder.build(files, signal);
                return graph;
            },
            signal
        };

        const result = await this.selector.run(type, request, context);
        log.info("Analysis finished", { request: type, tier: result.tierUsed, confidence: result.confidence, files: files.length });
        return { ...result, buildStatus, scannedFiles: files.length };
    }
}
