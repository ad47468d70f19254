import * as path from "path";
import * as ts from "typescript";
import { SymbolKind } from "../../types.js";
import { throwIfCancelled } from "../../common/Cancellation.js";
import { hasModifier } from "../../compilation/DeclarationCollector.js";
import { createLogger } from "../../utils/StructuredLogger.js";
import {
    AnalysisContext,
    DeclarationCounts,
    DirectorySummary,
    MemberVisibility,
    ProjectStructurePayload,
    ProjectStructureRequest,
    SymbolTypeFilter,
    UsageLocation
} from "../AnalysisTypes.js";

const log = createLogger("AnalysisStrategy");

const LAYER_NAMES: Record<string, string> = {
    controllers: "presentation",
    controller: "presentation",
    routes: "presentation",
    handlers: "presentation",
    api: "presentation",
    services: "application",
    service: "application",
    usecases: "application",
    application: "application",
    domain: "domain",
    models: "domain",
    entities: "domain",
    repositories: "infrastructure",
    repository: "infrastructure",
    persistence: "infrastructure",
    infrastructure: "infrastructure",
    infra: "infrastructure",
    db: "infrastructure",
    components: "ui",
    views: "ui",
    pages: "ui",
    utils: "shared",
    helpers: "shared",
    common: "shared",
    shared: "shared",
    tests: "tests",
    __tests__: "tests"
};

export function createNameMatcher(pattern: string): (name: string) => boolean {
    if (!pattern.includes("*")) {
        return name => name === pattern;
    }
    const source = pattern.split("*").map(part => part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")).join(".*");
    const regex = new RegExp(`^${source}$`, "i");
    return name => regex.test(name);
}

export function matchesKind(filter: SymbolTypeFilter, kind: SymbolKind): boolean {
    return filter === "any" || filter === kind || (filter === "property" && kind === "accessor");
}

export function visibilityOf(member: ts.ClassElement): MemberVisibility {
    if ((member.name && ts.isPrivateIdentifier(member.name)) || hasModifier(member, ts.SyntaxKind.PrivateKeyword)) {
        return "private";
    }
    return hasModifier(member, ts.SyntaxKind.ProtectedKeyword) ? "protected" : "public";
}

export function emptyCounts(): DeclarationCounts {
    return { classes: 0, interfaces: 0, functions: 0, enums: 0, types: 0 };
}

export function countKind(counts: DeclarationCounts, kind: SymbolKind): void {
    switch (kind) {
        case "class": counts.classes++; break;
        case "interface": counts.interfaces++; break;
        case "function": counts.functions++; break;
        case "enum": counts.enums++; break;
        case "type": counts.types++; break;
        default: break;
    }
}

export function capList<T>(items: T[], maxResults: number): { items: T[]; truncated: boolean } {
    return { items: items.slice(0, maxResults), truncated: items.length > maxResults };
}

export function sortUsages(usages: UsageLocation[]): UsageLocation[] {
    return usages.sort((a, b) =>
        a.filePath.localeCompare(b.filePath) || a.line - b.line || a.column - b.column);
}

export interface FileCounts {
    filePath: string;
    counts: DeclarationCounts;
}

/**
 * Rolls per-file declaration counts up into directories (cut at `maxDepth`)
 * and guesses architectural layers from directory names.
 */
export function buildStructure(projectPath: string, files: FileCounts[], request: ProjectStructureRequest): ProjectStructurePayload {
    const totals = emptyCounts();
    const directories = new Map<string, DirectorySummary>();
    const layers = new Set<string>();

    for (const { filePath, counts } of files) {
        totals.classes += counts.classes;
        totals.interfaces += counts.interfaces;
        totals.functions += counts.functions;
        totals.enums += counts.enums;
        totals.types += counts.types;

        const segments = path.relative(projectPath, path.dirname(filePath)).split(path.sep).filter(segment => segment.length > 0);
        for (const segment of segments) {
            const layer = LAYER_NAMES[segment.toLowerCase()];
            if (layer) layers.add(layer);
        }
        const kept = segments.slice(0, Math.max(0, request.maxDepth));
        const key = kept.length > 0 ? kept.join("/") : ".";
        const summary = directories.get(key) ?? { path: key, depth: kept.length, fileCount: 0, ...emptyCounts() };
        summary.fileCount++;
        summary.classes += counts.classes;
        summary.interfaces += counts.interfaces;
        summary.functions += counts.functions;
        summary.enums += counts.enums;
        summary.types += counts.types;
        directories.set(key, summary);
    }

    return {
        projectPath,
        fileCount: files.length,
        totals,
        directories: Array.from(directories.values()).sort((a, b) => a.path.localeCompare(b.path)),
        ...(request.includeArchitecture ? { layers: Array.from(layers).sort() } : {})
    };
}

export interface LoadedSource {
    filePath: string;
    content: string;
}

/**
 * Reads every file of the context; unreadable files are logged and left out.
 */
export async function readSources(context: AnalysisContext): Promise<LoadedSource[]> {
    const sources: LoadedSource[] = [];
    for (const filePath of context.files) {
        throwIfCancelled(context.signal, "source scan");
        try {
            sources.push({ filePath, content: await context.fileSystem.readFile(filePath) });
        } catch (error) {
            log.warn("Skipping unreadable file", { filePath, error });
        }
    }
    return sources;
}
