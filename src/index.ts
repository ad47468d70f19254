#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, CallToolResult, ErrorCode, ListToolsRequestSchema, McpError } from "@modelcontextprotocol/sdk/types.js";
import { AnalysisErrorPayload, RefactoringOutcome } from "./types.js";
import { AnalysisError, toAnalysisError } from "./errors/AnalysisError.js";
import { Result } from "./common/Result.js";
import { ServerConfig, resolveServerConfigFromEnv } from "./config/ServerConfig.js";
import { IFileSystem, NodeFileSystem } from "./platform/FileSystem.js";
import { AnalysisService } from "./analysis/AnalysisService.js";
import { BuildRunner } from "./build/BuildRunner.js";
import { BatchOrchestrator } from "./engine/BatchOrchestrator.js";
import { DeltaGenerator } from "./engine/DeltaGenerator.js";
import { SymbolRefactoringEngine } from "./refactoring/SymbolRefactoringEngine.js";
import { TOOLS } from "./tools/ToolDefinitions.js";
import {
    AnalyzeSolutionArgs,
    AutoFixArgs,
    BatchRefactorArgs,
    ClassContextArgs,
    ExtractInterfaceArgs,
    ExtractMethodArgs,
    FindSymbolArgs,
    FindUsagesArgs,
    IntroduceVariableArgs,
    ProjectStructureArgs,
    RenameSymbolArgs,
    ValidateBuildArgs,
    parseToolArgs
} from "./tools/ToolSchemas.js";
import { installStdoutGuard } from "./utils/StdoutGuard.js";
import { createLogger } from "./utils/StructuredLogger.js";

const log = createLogger("GraphRefactorServer");

export interface GraphRefactorServerOptions {
    fileSystem?: IFileSystem;
    buildRunner?: BuildRunner;
}

interface SourceArgs {
    code?: string;
    filePath?: string;
    dryRun: boolean;
}

interface LoadedSource {
    code: string;
    /** set when the code came from disk and should go back there */
    writeTarget?: string;
    label: string;
}

export class GraphRefactorServer {
    private readonly server: Server;
    private readonly fileSystem: IFileSystem;
    private readonly analysis: AnalysisService;
    private readonly engine: SymbolRefactoringEngine;
    private readonly batch: BatchOrchestrator;

    constructor(private readonly config: ServerConfig, options: GraphRefactorServerOptions = {}) {
        this.server = new Server({
            name: "graph-refactor-mcp",
            version: "1.0.0",
        }, {
            capabilities: { tools: {} },
        });
        this.fileSystem = options.fileSystem ?? new NodeFileSystem(config.rootPath);
        this.analysis = new AnalysisService(config, this.fileSystem, { buildRunner: options.buildRunner });
        this.engine = new SymbolRefactoringEngine(config, this.fileSystem);
        this.batch = new BatchOrchestrator(this.engine);
        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: TOOLS,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
            return this.handleCallTool(request.params.name, request.params.arguments, extra.signal);
        });
    }

    async handleCallTool(name: string, args: unknown, signal?: AbortSignal): Promise<CallToolResult> {
        try {
            switch (name) {
                case "validate_build": {
                    const { projectPath } = parseToolArgs(name, ValidateBuildArgs, args);
                    return this.jsonResponse(await this.analysis.validateBuild(projectPath, signal));
                }
                case "find_symbol": {
                    const parsed = parseToolArgs(name, FindSymbolArgs, args);
                    return this.jsonResponse(await this.analysis.findSymbol({
                        symbolName: parsed.symbolName,
                        symbolType: parsed.symbolType,
                        maxResults: parsed.maxResults,
                        optimizeForTokens: parsed.optimizeForTokens
                    }, parsed.projectPath, signal));
                }
                case "find_symbol_usages": {
                    const parsed = parseToolArgs(name, FindUsagesArgs, args);
                    return this.jsonResponse(await this.analysis.findUsages({
                        symbolName: parsed.symbolName,
                        maxResults: parsed.maxResults
                    }, parsed.projectPath, signal));
                }
                case "get_class_context": {
                    const parsed = parseToolArgs(name, ClassContextArgs, args);
                    return this.jsonResponse(await this.analysis.getClassContext({
                        className: parsed.className,
                        includeDependencies: parsed.includeDependencies,
                        includeUsages: parsed.includeUsages,
                        includeInheritance: parsed.includeInheritance,
                        maxResults: parsed.maxResults
                    }, parsed.projectPath, signal));
                }
                case "analyze_project_structure": {
                    const parsed = parseToolArgs(name, ProjectStructureArgs, args);
                    return this.jsonResponse(await this.analysis.analyzeStructure({
                        includeArchitecture: parsed.includeArchitecture,
                        maxDepth: parsed.maxDepth
                    }, parsed.projectPath, signal));
                }
                case "analyze_solution": {
                    const parsed = parseToolArgs(name, AnalyzeSolutionArgs, args);
                    return this.jsonResponse(await this.analysis.analyzeSolution(parsed.solutionPath, {
                        includeDependencyGraph: parsed.includeDependencyGraph,
                        detectIssues: parsed.detectIssues
                    }, signal));
                }
                case "extract_method": {
                    const parsed = parseToolArgs(name, ExtractMethodArgs, args);
                    return await this.mutate(parsed, source => this.engine.extractMethod({
                        code: source.code,
                        selectedText: parsed.selectedText,
                        methodName: parsed.methodName,
                        filePath: source.writeTarget
                    }));
                }
                case "rename_symbol": {
                    const parsed = parseToolArgs(name, RenameSymbolArgs, args);
                    const request = {
                        oldName: parsed.oldName,
                        newName: parsed.newName,
                        symbolKind: parsed.symbolKind,
                        mustExist: parsed.mustExist,
                        filePath: parsed.filePath
                    };
                    if (parsed.scope === "workspace" && parsed.projectPath) {
                        return await this.renameWorkspace(parsed.projectPath, request, parsed.dryRun, signal);
                    }
                    return await this.mutate(parsed, source => this.engine.renameSymbol(source.code, { ...request, filePath: source.writeTarget }));
                }
                case "extract_interface": {
                    const parsed = parseToolArgs(name, ExtractInterfaceArgs, args);
                    return await this.mutate(parsed, source => this.engine.extractInterface({
                        code: source.code,
                        className: parsed.className,
                        interfaceName: parsed.interfaceName,
                        memberNames: parsed.memberNames,
                        filePath: source.writeTarget
                    }));
                }
                case "introduce_variable": {
                    const parsed = parseToolArgs(name, IntroduceVariableArgs, args);
                    return await this.mutate(parsed, source => this.engine.introduceVariable({
                        code: source.code,
                        expression: parsed.expression,
                        variableName: parsed.variableName,
                        scope: parsed.scope,
                        replaceAll: parsed.replaceAll,
                        filePath: source.writeTarget
                    }));
                }
                case "auto_fix": {
                    const parsed = parseToolArgs(name, AutoFixArgs, args);
                    return await this.mutate(parsed, source => this.engine.autoFix(source.code, parsed.fixTypes));
                }
                case "batch_refactor": {
                    const parsed = parseToolArgs(name, BatchRefactorArgs, args);
                    const source = await this.loadSource(parsed);
                    const result = this.batch.run(parsed.operations, source.code, { signal, filePath: source.label });
                    const written = result.success && await this.writeBack(source, parsed.dryRun, result.finalCode);
                    return this.jsonResponse({ ...result, written }, !result.success);
                }
                default:
                    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
            }
        } catch (error) {
            if (error instanceof McpError) {
                throw error;
            }
            const analysisError = toAnalysisError(error);
            if (analysisError.kind === "InternalError") {
                log.error("Tool failed unexpectedly", { tool: name, error });
            }
            return this.errorResponse(analysisError.toPayload());
        }
    }

    private async mutate(args: SourceArgs, operation: (source: LoadedSource) => Result<RefactoringOutcome>): Promise<CallToolResult> {
        const source = await this.loadSource(args);
        const result = operation(source);
        if (!result.ok) {
            return this.errorResponse(result.error.toPayload());
        }
        const outcome = result.value;
        const delta = DeltaGenerator.diff(source.code, outcome.modifiedCode, {
            filePath: source.label,
            methodSignature: typeof outcome.details.signature === "string" ? outcome.details.signature : undefined,
            affectedIdentifiers: outcome.usedIdentifiers
        });
        const written = outcome.changeCount > 0 && await this.writeBack(source, args.dryRun, outcome.modifiedCode);
        return this.jsonResponse({
            success: true,
            ...outcome,
            delta,
            sizeReduction: DeltaGenerator.estimateSizeReduction(delta, source.code),
            written
        });
    }

    private async renameWorkspace(
        projectPath: string,
        request: Parameters<SymbolRefactoringEngine["renameInWorkspace"]>[1],
        dryRun: boolean,
        signal?: AbortSignal
    ): Promise<CallToolResult> {
        const result = await this.engine.renameInWorkspace(projectPath, request, signal);
        if (!result.ok) {
            return this.errorResponse(result.error.toPayload());
        }
        const outcome = result.value;
        if (!dryRun) {
            for (const file of outcome.files) {
                await this.fileSystem.writeFile(file.originalPath, file.modifiedCode);
            }
            log.info("Workspace rename written", { files: outcome.files.length, changeCount: outcome.changeCount });
        }
        return this.jsonResponse({
            success: true,
            changeCount: outcome.changeCount,
            conflicts: outcome.conflicts,
            symbolKind: outcome.symbolKind,
            declaration: outcome.declaration,
            files: outcome.files.map(file => ({
                originalPath: file.originalPath,
                changeCount: file.changeCount,
                delta: file.delta,
                ...(dryRun ? { modifiedCode: file.modifiedCode } : {})
            })),
            written: !dryRun && outcome.files.length > 0
        });
    }

    private async loadSource(args: { code?: string; filePath?: string }): Promise<LoadedSource> {
        if (args.code !== undefined) {
            return { code: args.code, label: args.filePath ?? "inline" };
        }
        if (args.filePath === undefined) {
            throw AnalysisError.configuration("either code or filePath is required", { parameter: "code" });
        }
        const resolved = this.fileSystem.resolve(args.filePath);
        if (!(await this.fileSystem.exists(resolved))) {
            throw AnalysisError.notFound(`File not found: ${resolved}`, { filePath: args.filePath });
        }
        return { code: await this.fileSystem.readFile(resolved), writeTarget: resolved, label: resolved };
    }

    private async writeBack(source: LoadedSource, dryRun: boolean, content: string): Promise<boolean> {
        if (dryRun || !source.writeTarget || content === source.code) {
            return false;
        }
        await this.fileSystem.writeFile(source.writeTarget, content);
        log.info("File updated", { filePath: source.writeTarget });
        return true;
    }

    private jsonResponse(payload: unknown, isError = false): CallToolResult {
        return {
            ...(isError ? { isError: true } : {}),
            content: [{ type: "text", text: JSON.stringify(payload, null, 2) }]
        };
    }

    private errorResponse(error: AnalysisErrorPayload): CallToolResult {
        return {
            isError: true,
            content: [{ type: "text", text: JSON.stringify({ success: false, error }, null, 2) }]
        };
    }

    async run(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        log.info("Server running on stdio", { rootPath: this.config.rootPath });
    }

    async close(): Promise<void> {
        await this.server.close();
    }
}

if (require.main === module) {
    installStdoutGuard();
    const server = new GraphRefactorServer(resolveServerConfigFromEnv());
    const shutdown = (signal: string) => {
        log.info("Shutting down", { signal });
        server.close()
            .catch(error => log.error("Shutdown failed", { error }))
            .finally(() => process.exit(0));
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    server.run().catch(error => {
        log.error("Fatal error while starting", { error });
        process.exit(1);
    });
}
