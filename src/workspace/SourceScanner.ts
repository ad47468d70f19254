import * as path from "path";
import ignore from "ignore";
import { IFileSystem } from "../platform/FileSystem.js";
import { throwIfCancelled } from "../common/Cancellation.js";
import { createLogger } from "../utils/StructuredLogger.js";

const log = createLogger("SourceScanner");

export const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];
export const BUILD_OUTPUT_DIRS = new Set(["node_modules", "dist", "build", "out", "bin", "obj", "coverage"]);
const IGNORE_FILES = [".gitignore", ".refactorignore"];

type IgnoreMatcher = ReturnType<typeof ignore>;

export function isBuildOutputPath(targetPath: string): boolean {
    return targetPath.split(/[\\/]/).some(segment => BUILD_OUTPUT_DIRS.has(segment));
}

export function isSourceFile(targetPath: string): boolean {
    const lowered = targetPath.toLowerCase();
    if (/\.d\.[mc]?ts$/.test(lowered)) {
        return false;
    }
    return SOURCE_EXTENSIONS.includes(path.extname(lowered));
}

export interface ScanOptions {
    signal?: AbortSignal;
    /** stop descending once this many matches were collected */
    limit?: number;
}

/**
 * Walks a directory tree, pruning build output, dot-directories and anything
 * matched by the root's ignore files.
 */
export class SourceScanner {
    constructor(private readonly fileSystem: IFileSystem) {}

    async scanSources(rootPath: string, options: ScanOptions = {}): Promise<string[]> {
        return this.walk(rootPath, isSourceFile, options);
    }

    async walk(rootPath: string, accept: (filePath: string) => boolean, options: ScanOptions = {}): Promise<string[]> {
        const root = this.fileSystem.resolve(rootPath);
        const matcher = await this.loadIgnore(root);
        const results: string[] = [];
        const limit = options.limit ?? Number.POSITIVE_INFINITY;

        const visit = async (dir: string): Promise<void> => {
            throwIfCancelled(options.signal, "directory scan");
            let entries: string[];
            try {
                entries = await this.fileSystem.readDir(dir);
            } catch (error) {
                log.warn("Skipping unreadable directory", { dir, error });
                return;
            }
            for (const entry of entries) {
                if (results.length >= limit) return;
                const fullPath = path.join(dir, entry);
                const relative = path.relative(root, fullPath).split(path.sep).join("/");
                let isDirectory: boolean;
                try {
                    isDirectory = (await this.fileSystem.stat(fullPath)).isDirectory();
                } catch (error) {
                    log.debug("Skipping entry that cannot be stat'ed", { path: fullPath, error });
                    continue;
                }
                if (isDirectory) {
                    if (entry.startsWith(".") || BUILD_OUTPUT_DIRS.has(entry) || matcher.ignores(relative + "/")) {
                        continue;
                    }
                    await visit(fullPath);
                } else if (!matcher.ignores(relative) && accept(fullPath)) {
                    results.push(fullPath);
                }
            }
        };

        await visit(root);
        return results.sort();
    }

    private async loadIgnore(root: string): Promise<IgnoreMatcher> {
        const matcher = ignore();
        for (const fileName of IGNORE_FILES) {
            const ignorePath = path.join(root, fileName);
            if (!(await this.fileSystem.exists(ignorePath))) continue;
            try {
                matcher.add(await this.fileSystem.readFile(ignorePath));
            } catch (error) {
                log.warn("Failed to read ignore file", { path: ignorePath, error });
            }
        }
        return matcher;
    }
}
