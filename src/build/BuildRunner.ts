import * as path from "path";
import * as ts from "typescript";
import { BuildError, BuildTarget } from "../types.js";
import { throwIfCancelled } from "../common/Cancellation.js";
import { WorkspaceDiscovery } from "../workspace/WorkspaceDiscovery.js";
import { createLogger } from "../utils/StructuredLogger.js";

const log = createLogger("TypeScriptBuildRunner");

// "No inputs were found in config file" is an empty project, not a broken one
const IGNORED_CONFIG_CODES = new Set([18003]);

/**
 * The build pass the gate consults. Returns the errors it found; throwing
 * means the build itself could not run.
 */
export interface BuildRunner {
    run(target: BuildTarget, signal?: AbortSignal): Promise<BuildError[]>;
}

/**
 * Type-checks every project of the target in-process with the compiler's
 * pre-emit diagnostics. Nothing is written to disk.
 */
export class TypeScriptBuildRunner implements BuildRunner {
    constructor(private readonly discovery: WorkspaceDiscovery) {}

    async run(target: BuildTarget, signal?: AbortSignal): Promise<BuildError[]> {
        const descriptors = await this.discovery.projectDescriptors(target);
        const errors: BuildError[] = [];
        for (const descriptor of descriptors) {
            throwIfCancelled(signal, "build validation");
            if (path.basename(descriptor) === "package.json") {
                log.debug("Skipping workspace package without tsconfig", { descriptor });
                continue;
            }
            errors.push(...this.checkProject(descriptor));
        }
        return errors;
    }

    private checkProject(configPath: string): BuildError[] {
        const project = path.basename(path.dirname(configPath));
        const read = ts.readConfigFile(configPath, ts.sys.readFile);
        if (read.error) {
            return [toBuildError(read.error, project)];
        }
        const parsed = ts.parseJsonConfigFileContent(read.config, ts.sys, path.dirname(configPath), undefined, configPath);
        const configErrors = parsed.errors
            .filter(diagnostic => diagnostic.category === ts.DiagnosticCategory.Error && !IGNORED_CONFIG_CODES.has(diagnostic.code))
            .map(diagnostic => toBuildError(diagnostic, project));
        if (parsed.fileNames.length === 0) {
            return configErrors;
        }

        const started = Date.now();
        const program = ts.createProgram({
            rootNames: parsed.fileNames,
            options: { ...parsed.options, noEmit: true },
            projectReferences: parsed.projectReferences
        });
        const diagnostics = ts.getPreEmitDiagnostics(program)
            .filter(diagnostic => diagnostic.category === ts.DiagnosticCategory.Error);
        log.debug("Type-checked project", {
            configPath,
            files: parsed.fileNames.length,
            errors: diagnostics.length,
            durationMs: Date.now() - started
        });
        return [...configErrors, ...diagnostics.map(diagnostic => toBuildError(diagnostic, project))];
    }
}

function toBuildError(diagnostic: ts.Diagnostic, project: string): BuildError {
    const error: BuildError = {
        code: `TS${diagnostic.code}`,
        message: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
        project
    };
    if (diagnostic.file && diagnostic.start !== undefined) {
        const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
        error.filePath = diagnostic.file.fileName;
        error.line = line + 1;
        error.column = character + 1;
    }
    return error;
}
