import * as path from "path";
import * as ts from "typescript";
import { GraphDiagnostic, SkippedPath, SourceInput, SourceUnit } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { throwIfCancelled } from "../common/Cancellation.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { CompilationGraph } from "./CompilationGraph.js";
import { assignSyntheticIds } from "./SyntheticIds.js";

const log = createLogger("CompilationGraphBuilder");

export interface CompilationGraphBuilderOptions {
    maxFiles: number;
    compilerOptions?: ts.CompilerOptions;
}

interface Deduplicated {
    inputs: string[];
    diagnostics: GraphDiagnostic[];
}

export class CompilationGraphBuilder {
    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly options: CompilationGraphBuilderOptions
    ) {}

    /**
     * Reads `paths` and compiles them as one graph. Unreadable paths are
     * skipped and listed in `graph.skipped`; they never abort the build.
     */
    async build(paths: readonly string[], signal?: AbortSignal): Promise<CompilationGraph> {
        const { inputs, diagnostics } = this.deduplicate(paths);
        this.assertWithinLimit(inputs.length);

        const sources: SourceInput[] = [];
        const skipped: SkippedPath[] = [];
        for (const originalPath of inputs) {
            throwIfCancelled(signal, "compilation graph build");
            try {
                const stats = await this.fileSystem.stat(originalPath);
                if (stats.isDirectory()) {
                    skipped.push({ path: originalPath, reason: "is a directory" });
                    log.warn("Skipping directory passed as source file", { path: originalPath });
                    continue;
                }
                sources.push({ originalPath, content: await this.fileSystem.readFile(originalPath) });
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                skipped.push({ path: originalPath, reason });
                log.warn("Skipping unreadable source file", { path: originalPath, reason });
            }
        }

        if (skipped.length > 0) {
            log.info("Compilation graph built with skipped files", { included: sources.length, skipped: skipped.length });
        }
        return this.createGraph(sources, skipped, diagnostics);
    }

    /**
     * Same as `build`, for content already in memory.
     */
    buildFromSources(sources: readonly SourceInput[]): CompilationGraph {
        const { inputs, diagnostics } = this.deduplicate(sources.map(source => source.originalPath));
        this.assertWithinLimit(inputs.length);
        const byPath = new Map<string, SourceInput>();
        for (const source of sources) {
            const key = path.resolve(source.originalPath);
            if (!byPath.has(key)) byPath.set(key, source);
        }
        const kept = inputs.flatMap(input => {
            const source = byPath.get(path.resolve(input));
            return source ? [source] : [];
        });
        return this.createGraph(kept, [], diagnostics);
    }

    private createGraph(sources: SourceInput[], skipped: SkippedPath[], diagnostics: GraphDiagnostic[]): CompilationGraph {
        const ids = assignSyntheticIds(sources.map(source => source.originalPath));
        const units: SourceUnit[] = sources.map(source => Object.freeze({
            originalPath: source.originalPath,
            syntheticId: ids.get(source.originalPath) ?? "",
            content: source.content
        }));
        const collided = units.filter(unit => path.basename(unit.syntheticId) !== path.basename(unit.originalPath)).length;
        if (collided > 0) {
            log.debug("Disambiguated colliding file names", { collided });
        }
        return new CompilationGraph({ units, skipped, diagnostics, compilerOptions: this.options.compilerOptions });
    }

    /**
     * Keeps the first spelling of each normalized path. Distinct spellings of
     * one file are reported; exact repeats are dropped silently.
     */
    private deduplicate(paths: readonly string[]): Deduplicated {
        const firstSpelling = new Map<string, string>();
        const aliases = new Map<string, Set<string>>();
        for (const raw of paths) {
            const normalized = path.resolve(raw);
            const existing = firstSpelling.get(normalized);
            if (existing === undefined) {
                firstSpelling.set(normalized, raw);
                continue;
            }
            if (existing !== raw) {
                const set = aliases.get(normalized) ?? new Set([existing]);
                set.add(raw);
                aliases.set(normalized, set);
            }
        }

        const diagnostics: GraphDiagnostic[] = [];
        for (const [normalized, spellings] of aliases) {
            const list = Array.from(spellings);
            log.warn("Same file passed under several paths", { path: normalized, spellings: list });
            diagnostics.push({
                kind: "DuplicateFilesDetected",
                message: `${list.length} paths refer to ${normalized}; only the first was compiled`,
                paths: list
            });
        }
        return { inputs: Array.from(firstSpelling.values()), diagnostics };
    }

    private assertWithinLimit(count: number): void {
        if (count > this.options.maxFiles) {
            throw new AnalysisError(
                "ResourceLimitExceeded",
                `${count} files exceed the compilation limit of ${this.options.maxFiles}`,
                { data: { fileCount: count, maxFiles: this.options.maxFiles } }
            );
        }
    }
}
