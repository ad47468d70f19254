import * as path from "path";

export interface ServerConfig {
    rootPath: string;
    /** default cap for analysis result lists */
    maxResults: number;
    /** upper bound on units in one compilation graph */
    maxFiles: number;
    /** build-result cache entries; 0 disables caching */
    buildCacheSize: number;
    skipBuildGate: boolean;
}

export const DEFAULT_MAX_RESULTS = 100;
export const MAX_RESULTS_LIMIT = 1000;
export const DEFAULT_MAX_FILES = 5000;
export const DEFAULT_BUILD_CACHE_SIZE = 32;

export function resolveServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const rootRaw = env.GRAPH_REFACTOR_ROOT;
    const rootPath = rootRaw && rootRaw.trim().length > 0 ? rootRaw.trim() : process.cwd();

    return {
        rootPath: path.resolve(rootPath),
        maxResults: clamp(parseOptionalInt(env.GRAPH_REFACTOR_MAX_RESULTS) ?? DEFAULT_MAX_RESULTS, 1, MAX_RESULTS_LIMIT),
        maxFiles: Math.max(1, parseOptionalInt(env.GRAPH_REFACTOR_MAX_FILES) ?? DEFAULT_MAX_FILES),
        buildCacheSize: Math.max(0, parseOptionalInt(env.GRAPH_REFACTOR_BUILD_CACHE_SIZE) ?? DEFAULT_BUILD_CACHE_SIZE),
        skipBuildGate: env.GRAPH_REFACTOR_SKIP_BUILD_GATE === "true"
    };
}

function parseOptionalInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}
