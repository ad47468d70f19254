import { SymbolKind } from "../types.js";
import { IFileSystem } from "../platform/FileSystem.js";
import { CompilationGraph } from "../compilation/CompilationGraph.js";

export type AnalysisTier = "Semantic" | "Syntax" | "Text" | "Hybrid";
export type StrategyTier = Exclude<AnalysisTier, "Hybrid">;

export const TIER_CONFIDENCE: Record<StrategyTier, number> = {
    Semantic: 0.95,
    Syntax: 0.75,
    Text: 0.5
};

// ---- requests ----

export type SymbolTypeFilter = "any" | SymbolKind;

export interface FindSymbolRequest {
    symbolName: string;
    symbolType: SymbolTypeFilter;
    maxResults: number;
    optimizeForTokens: boolean;
}

export interface FindUsagesRequest {
    symbolName: string;
    maxResults: number;
}

export interface ClassContextRequest {
    className: string;
    includeDependencies: boolean;
    includeUsages: boolean;
    includeInheritance: boolean;
    maxResults: number;
}

export interface ProjectStructureRequest {
    includeArchitecture: boolean;
    maxDepth: number;
}

export interface AnalysisRequestMap {
    find_symbol: FindSymbolRequest;
    find_symbol_usages: FindUsagesRequest;
    get_class_context: ClassContextRequest;
    analyze_project_structure: ProjectStructureRequest;
}

export type AnalysisRequestType = keyof AnalysisRequestMap;

// ---- payloads ----

export interface SymbolMatch {
    name: string;
    kind: SymbolKind;
    filePath: string;
    line: number;
    column: number;
    container?: string;
    exported?: boolean;
    signature?: string;
    type?: string;
}

export interface FindSymbolPayload {
    symbolName: string;
    matches: SymbolMatch[];
    totalMatches: number;
    truncated: boolean;
}

export interface UsageLocation {
    filePath: string;
    line: number;
    column: number;
    lineText: string;
    isDefinition: boolean;
}

export interface FindUsagesPayload {
    symbolName: string;
    usages: UsageLocation[];
    totalUsages: number;
    truncated: boolean;
    definitionCount?: number;
}

export type MemberVisibility = "public" | "protected" | "private";

export interface ClassMemberInfo {
    name: string;
    kind: "method" | "property" | "accessor" | "constructor";
    visibility: MemberVisibility;
    isStatic: boolean;
    signature?: string;
    type?: string;
}

export interface ClassContextPayload {
    className: string;
    found: boolean;
    filePath?: string;
    line?: number;
    isAbstract?: boolean;
    exported?: boolean;
    baseClass?: string;
    interfaces?: string[];
    members?: ClassMemberInfo[];
    dependencies?: string[];
    usages?: UsageLocation[];
    derivedClasses?: string[];
}

export interface DeclarationCounts {
    classes: number;
    interfaces: number;
    functions: number;
    enums: number;
    types: number;
}

export interface DirectorySummary extends DeclarationCounts {
    path: string;
    depth: number;
    fileCount: number;
}

export interface ProjectStructurePayload {
    projectPath: string;
    fileCount: number;
    totals: DeclarationCounts;
    directories: DirectorySummary[];
    layers?: string[];
    /** exported top-level declarations; needs the compiled graph */
    exportedSymbols?: number;
}

export interface AnalysisPayloadMap {
    find_symbol: FindSymbolPayload;
    find_symbol_usages: FindUsagesPayload;
    get_class_context: ClassContextPayload;
    analyze_project_structure: ProjectStructurePayload;
}

// ---- tier protocol ----

export type TierOutcome<T> =
    | { kind: "complete"; payload: T; confidence: number }
    | { kind: "partial"; payload: T; confidence: number; reason: string }
    | { kind: "insufficient"; reason: string };

export const complete = <T>(payload: T, confidence: number): TierOutcome<T> => ({ kind: "complete", payload, confidence });
export const partial = <T>(payload: T, confidence: number, reason: string): TierOutcome<T> => ({ kind: "partial", payload, confidence, reason });
export const insufficient = <T>(reason: string): TierOutcome<T> => ({ kind: "insufficient", reason });

export interface AnalysisContext {
    projectPath: string;
    /** source files of the project, original paths */
    files: readonly string[];
    fileSystem: IFileSystem;
    /** false when the build gate failed or was skipped */
    semanticAllowed: boolean;
    /** built on first use, once per request */
    graph(): Promise<CompilationGraph>;
    signal?: AbortSignal;
}

export type StrategyHandlers = {
    [K in AnalysisRequestType]: (request: AnalysisRequestMap[K], context: AnalysisContext) => Promise<TierOutcome<AnalysisPayloadMap[K]>>;
};

export interface AnalysisStrategy {
    readonly tier: StrategyTier;
    readonly handlers: StrategyHandlers;
}

export type AttemptStatus = "complete" | "partial" | "insufficient" | "error" | "skipped";

export interface TierAttempt {
    tier: StrategyTier;
    status: AttemptStatus;
    reason?: string;
    durationMs: number;
}

export interface AnalysisResult<T> {
    tierUsed: AnalysisTier;
    confidence: number;
    payload: T;
    attempts: TierAttempt[];
    degraded: boolean;
}
