import * as path from "path";
import { AutoFixType, RefactoringOutcome, WorkspaceRenameOutcome } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { Result, captureAnalysisError, captureAnalysisErrorAsync } from "../common/Result.js";
import { throwIfCancelled } from "../common/Cancellation.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { ServerConfig } from "../config/ServerConfig.js";
import { CompilationGraphBuilder } from "../compilation/CompilationGraphBuilder.js";
import { SourceScanner } from "../workspace/SourceScanner.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { autoFix } from "./AutoFix.js";
import { ExtractInterfaceRequest, extractInterface } from "./ExtractInterface.js";
import { ExtractMethodRequest, extractMethod } from "./ExtractMethod.js";
import { IntroduceVariableRequest, introduceVariable } from "./IntroduceVariable.js";
import { RenameRequest, renameInFile, renameInWorkspace } from "./RenameSymbol.js";

const log = createLogger("SymbolRefactoringEngine");

/**
 * Every refactoring entry point. Failures the caller can act on come back
 * as `Err`; anything else is a defect and is thrown.
 */
export class SymbolRefactoringEngine {
    private readonly scanner: SourceScanner;
    private readonly graphBuilder: CompilationGraphBuilder;

    constructor(
        private readonly config: Pick<ServerConfig, "maxFiles">,
        private readonly fileSystem: IFileSystem
    ) {
        this.scanner = new SourceScanner(fileSystem);
        this.graphBuilder = new CompilationGraphBuilder(fileSystem, { maxFiles: config.maxFiles });
    }

    extractMethod(request: ExtractMethodRequest): Result<RefactoringOutcome> {
        return this.run("extract_method", () => extractMethod(request));
    }

    renameSymbol(code: string, request: RenameRequest): Result<RefactoringOutcome> {
        return this.run("rename_symbol", () => renameInFile(code, request));
    }

    extractInterface(request: ExtractInterfaceRequest): Result<RefactoringOutcome> {
        return this.run("extract_interface", () => extractInterface(request));
    }

    introduceVariable(request: IntroduceVariableRequest): Result<RefactoringOutcome> {
        return this.run("introduce_variable", () => introduceVariable(request));
    }

    autoFix(code: string, fixTypes?: readonly AutoFixType[]): Result<RefactoringOutcome> {
        return this.run("auto_fix", () => autoFix(code, fixTypes));
    }

    /**
     * Compiles every source file under `projectPath` and plans the rename
     * across all of them. Nothing is written here.
     */
    async renameInWorkspace(projectPath: string, request: RenameRequest, signal?: AbortSignal): Promise<Result<WorkspaceRenameOutcome>> {
        const result = await captureAnalysisErrorAsync(async () => {
            const resolved = this.fileSystem.resolve(projectPath);
            if (!(await this.fileSystem.exists(resolved))) {
                throw new AnalysisError("ProjectDiscoveryFailed", `Path does not exist: ${resolved}`, { data: { projectPath } });
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
            const graph = await this.graphBuilder.build(files, signal);
            throwIfCancelled(signal, "workspace rename");
            const filePath = request.filePath ? this.fileSystem.resolve(request.filePath) : undefined;
            return renameInWorkspace(graph, { ...request, filePath });
        });
        this.report("rename_symbol", result, result.ok ? result.value.changeCount : 0);
        return result;
    }

    private run(operation: string, fn: () => RefactoringOutcome): Result<RefactoringOutcome> {
        const result = captureAnalysisError(fn);
        this.report(operation, result, result.ok ? result.value.changeCount : 0);
        return result;
    }

    private report(operation: string, result: Result<unknown>, changeCount: number): void {
        if (result.ok) {
            log.debug("Refactoring planned", { operation, changeCount });
        } else {
            log.debug("Refactoring rejected", { operation, kind: result.error.kind, message: result.error.message });
        }
    }
}
