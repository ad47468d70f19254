import * as path from "path";
import * as ts from "typescript";
import { z } from "zod";
import { IFileSystem } from "../platform/FileSystem.js";

export const PackageJsonSchema = z.object({
    name: z.string().optional(),
    private: z.boolean().optional(),
    main: z.string().optional(),
    bin: z.union([z.string(), z.record(z.string())]).optional(),
    scripts: z.record(z.string()).optional(),
    workspaces: z.union([
        z.array(z.string()),
        z.object({ packages: z.array(z.string()).optional() })
    ]).optional(),
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
    peerDependencies: z.record(z.string()).optional()
}).passthrough();

export type PackageJson = z.infer<typeof PackageJsonSchema>;

export const TsconfigSchema = z.object({
    extends: z.union([z.string(), z.array(z.string())]).optional(),
    files: z.array(z.string()).optional(),
    include: z.array(z.string()).optional(),
    references: z.array(z.object({ path: z.string() })).optional()
}).passthrough();

export type Tsconfig = z.infer<typeof TsconfigSchema>;

const TEST_TOKENS = new Set(["test", "tests", "spec", "specs", "__tests__", "e2e"]);

export function isProjectDescriptorName(fileName: string): boolean {
    return /^tsconfig(\..+)?\.json$/.test(fileName) || fileName === "jsconfig.json";
}

/**
 * True when any path segment or file-name token denotes tests
 * (`tsconfig.spec.json`, `packages/api-tests/...`).
 */
export function isTestProjectPath(descriptorPath: string): boolean {
    return descriptorPath
        .split(/[\\/._-]+/)
        .some(token => TEST_TOKENS.has(token.toLowerCase()));
}

export async function readPackageJson(fileSystem: IFileSystem, filePath: string): Promise<PackageJson | undefined> {
    try {
        const parsed = PackageJsonSchema.safeParse(JSON.parse(await fileSystem.readFile(filePath)));
        return parsed.success ? parsed.data : undefined;
    } catch {
        return undefined;
    }
}

/**
 * tsconfig files allow comments and trailing commas, so they go through the
 * compiler's own JSON reader.
 */
export async function readTsconfig(fileSystem: IFileSystem, filePath: string): Promise<Tsconfig | undefined> {
    let text: string;
    try {
        text = await fileSystem.readFile(filePath);
    } catch {
        return undefined;
    }
    const { config, error } = ts.parseConfigFileTextToJson(filePath, text);
    if (error) return undefined;
    const parsed = TsconfigSchema.safeParse(config);
    return parsed.success ? parsed.data : undefined;
}

export function workspacePatterns(pkg: PackageJson): string[] {
    if (!pkg.workspaces) return [];
    return Array.isArray(pkg.workspaces) ? pkg.workspaces : (pkg.workspaces.packages ?? []);
}

export function referencedDescriptors(tsconfigPath: string, config: Tsconfig): string[] {
    const baseDir = path.dirname(tsconfigPath);
    return (config.references ?? []).map(reference => {
        const target = path.resolve(baseDir, reference.path);
        return target.endsWith(".json") ? target : path.join(target, "tsconfig.json");
    });
}

/**
 * Expands `packages/*`-style workspace globs into directories. `**` is
 * treated like `*`; negated patterns are ignored.
 */
export async function expandWorkspacePatterns(fileSystem: IFileSystem, rootDir: string, patterns: readonly string[]): Promise<string[]> {
    const results = new Set<string>();
    for (const pattern of patterns) {
        if (pattern.startsWith("!")) continue;
        let frontier = [rootDir];
        for (const segment of pattern.split("/").filter(part => part.length > 0 && part !== ".")) {
            const next: string[] = [];
            for (const dir of frontier) {
                if (segment.includes("*")) {
                    const matcher = new RegExp("^" + segment.split("*").map(escapeRegExp).join(".*") + "$");
                    let entries: string[] = [];
                    try {
                        entries = await fileSystem.readDir(dir);
                    } catch {
                        continue;
                    }
                    for (const entry of entries) {
                        if (!matcher.test(entry) || entry.startsWith(".") || entry === "node_modules") continue;
                        const candidate = path.join(dir, entry);
                        try {
                            if ((await fileSystem.stat(candidate)).isDirectory()) next.push(candidate);
                        } catch {
                            continue;
                        }
                    }
                } else {
                    next.push(path.join(dir, segment));
                }
            }
            frontier = next;
        }
        for (const dir of frontier) {
            if (await fileSystem.exists(path.join(dir, "package.json"))) {
                results.add(dir);
            }
        }
    }
    return Array.from(results).sort();
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
