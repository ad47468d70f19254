import * as crypto from "crypto";
import * as path from "path";
import { LRUCache } from "lru-cache";
import { BuildError, BuildStatus, BuildTarget, BuildValidationResult } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { isCancellation, throwIfCancelled } from "../common/Cancellation.js";
import { SourceScanner } from "../workspace/SourceScanner.js";
import { isProjectDescriptorName } from "../workspace/Descriptors.js";
import { suggestFixesForBuildErrors } from "../autofix/PatternFixes.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { BuildRunner } from "./BuildRunner.js";
import { BuildTargetLocator } from "./BuildTargetLocator.js";

const log = createLogger("BuildGate");

const SUMMARY_TOP_CODES = 5;
const SUMMARY_TOTAL_THRESHOLD = 20;
const SUMMARY_MESSAGE_LENGTH = 120;

export interface BuildGateOptions {
    /** 0 disables caching */
    cacheSize: number;
}

/**
 * Top error codes by frequency, one line each, plus a total once the list
 * gets long.
 */
export function summarizeBuildErrors(errors: readonly BuildError[]): string {
    if (errors.length === 0) return "";
    const byCode = new Map<string, { count: number; message: string }>();
    for (const error of errors) {
        const entry = byCode.get(error.code);
        if (entry) {
            entry.count++;
        } else {
            byCode.set(error.code, { count: 1, message: error.message });
        }
    }
    const lines = Array.from(byCode.entries())
        .sort((a, b) => b[1].count - a[1].count || a[0].localeCompare(b[0]))
        .slice(0, SUMMARY_TOP_CODES)
        .map(([code, { count, message }]) => {
            const firstLine = message.split("\n")[0];
            const trimmed = firstLine.length > SUMMARY_MESSAGE_LENGTH ? firstLine.slice(0, SUMMARY_MESSAGE_LENGTH - 3) + "..." : firstLine;
            return `${code} (${count}x): ${trimmed}`;
        });
    if (errors.length > SUMMARY_TOTAL_THRESHOLD) {
        lines.push(`Total: ${errors.length} errors`);
    }
    return lines.join("\n");
}

/**
 * Converts a failed validation into the hard stop analysis commands obey.
 */
export function assertBuildable(result: BuildValidationResult): void {
    if (result.status !== "Failure") return;
    throw new AnalysisError(
        "BuildValidationFailed",
        `Build has ${result.errorCount} error(s) in ${result.chosenTarget ?? "the target"}`,
        {
            data: {
                errorCount: result.errorCount,
                errorSummary: result.errorSummary,
                failedProjects: result.failedProjects,
                chosenTarget: result.chosenTarget,
                projectPath: result.chosenTarget ? path.dirname(result.chosenTarget) : undefined
            }
        }
    );
}

export class BuildGate {
    private readonly cache?: LRUCache<string, BuildValidationResult>;

    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly scanner: SourceScanner,
        private readonly locator: BuildTargetLocator,
        private readonly runner: BuildRunner,
        options: BuildGateOptions
    ) {
        if (options.cacheSize > 0) {
            this.cache = new LRUCache<string, BuildValidationResult>({ max: options.cacheSize });
        }
    }

    async validate(targetPath: string, signal?: AbortSignal): Promise<BuildValidationResult> {
        throwIfCancelled(signal, "build validation");
        const resolved = this.fileSystem.resolve(targetPath);
        if (!(await this.fileSystem.exists(resolved))) {
            throw new AnalysisError("ProjectDiscoveryFailed", `Path does not exist: ${resolved}`, { data: { projectPath: targetPath } });
        }

        const target = await this.locator.locate(resolved, signal);
        if (!target) {
            log.info("No build target found; continuing without validation", { path: resolved });
            return emptyResult("Warning", null, "No tsconfig.json or workspace package.json found; analysis continues in degraded mode");
        }

        const cacheKey = this.cache ? `${target.path}::${await this.fingerprint(target, signal)}` : undefined;
        const cached = cacheKey ? this.cache?.get(cacheKey) : undefined;
        if (cached) {
            log.debug("Build validation cache hit", { target: target.path });
            return { ...cached, cached: true };
        }

        let errors: BuildError[];
        try {
            errors = await this.runner.run(target, signal);
        } catch (error) {
            if (isCancellation(error)) throw error;
            const reason = error instanceof Error ? error.message : String(error);
            log.warn("Build runner failed", { target: target.path, error });
            return emptyResult("Warning", target, `Could not validate build: ${reason}`);
        }

        const result = errors.length === 0
            ? emptyResult("Success", target, `Build succeeded for ${target.path}`)
            : this.failure(target, errors);

        if (cacheKey) {
            this.cache?.set(cacheKey, result);
        }
        log.info("Build validated", { target: target.path, status: result.status, errorCount: result.errorCount });
        return result;
    }

    private failure(target: BuildTarget, errors: BuildError[]): BuildValidationResult {
        const failedProjects = Array.from(new Set(errors.map(error => error.project)));
        return {
            status: "Failure",
            chosenTarget: target.path,
            targetKind: target.kind,
            message: `Build failed with ${errors.length} error(s) in ${failedProjects.length} project(s)`,
            errorSummary: summarizeBuildErrors(errors),
            errorCount: errors.length,
            failedProjects,
            errors,
            suggestions: suggestFixesForBuildErrors(errors),
            cached: false
        };
    }

    /**
     * Hash over path, size and mtime of every source file and descriptor
     * under the target's directory.
     */
    private async fingerprint(target: BuildTarget, signal?: AbortSignal): Promise<string> {
        const root = path.dirname(target.path);
        const files = await this.scanner.walk(root, filePath => {
            const name = path.basename(filePath);
            return name === "package.json" || isProjectDescriptorName(name) || /\.[mc]?[jt]sx?$/.test(name);
        }, { signal });
        const hash = crypto.createHash("sha1");
        for (const file of files) {
            try {
                const stats = await this.fileSystem.stat(file);
                hash.update(`${file}:${stats.size}:${stats.mtime}\n`);
            } catch (error) {
                log.debug("File vanished while fingerprinting", { file, error });
                hash.update(`${file}:missing\n`);
            }
        }
        return hash.digest("hex");
    }
}

function emptyResult(status: BuildStatus, target: BuildTarget | null, message: string): BuildValidationResult {
    return {
        status,
        chosenTarget: target?.path ?? null,
        targetKind: target?.kind ?? null,
        message,
        errorSummary: "",
        errorCount: 0,
        failedProjects: [],
        errors: [],
        suggestions: [],
        cached: false
    };
}
