export interface ToolSuggestion {
    toolName: string;
    rationale: string;
    exampleArgs?: Record<string, unknown>;
    priority?: "high" | "medium" | "low";
}

// ---- errors ----

export type AnalysisErrorKind =
    | "BuildValidationFailed"
    | "DuplicateFilesDetected"
    | "ProjectDiscoveryFailed"
    | "ResourceLimitExceeded"
    | "ConfigurationError"
    | "NotFound"
    | "Cancelled"
    | "InternalError";

export interface AnalysisErrorPayload {
    kind: AnalysisErrorKind;
    message: string;
    suggestion: string;
    alternatives: ToolSuggestion[];
    canRetry: boolean;
    data: Record<string, unknown>;
}

// ---- build gate ----

export type BuildStatus = "Success" | "Warning" | "Failure";
export type BuildTargetKind = "solution" | "project";

export interface BuildTarget {
    path: string;
    kind: BuildTargetKind;
}

export interface BuildError {
    code: string;
    message: string;
    project: string;
    filePath?: string;
    line?: number;
    column?: number;
}

export interface BuildValidationResult {
    status: BuildStatus;
    chosenTarget: string | null;
    targetKind: BuildTargetKind | null;
    message: string;
    errorSummary: string;
    errorCount: number;
    failedProjects: string[];
    errors: BuildError[];
    suggestions: string[];
    cached: boolean;
}

// ---- compilation graph ----

export interface SourceInput {
    originalPath: string;
    content: string;
}

export interface SourceUnit {
    readonly originalPath: string;
    readonly syntheticId: string;
    readonly content: string;
}

export interface SkippedPath {
    path: string;
    reason: string;
}

export interface GraphDiagnostic {
    kind: "DuplicateFilesDetected";
    message: string;
    paths: string[];
}

export type SymbolKind =
    | "class"
    | "interface"
    | "enum"
    | "type"
    | "function"
    | "variable"
    | "method"
    | "property"
    | "accessor"
    | "constructor";

export interface SymbolEntry {
    name: string;
    kind: SymbolKind;
    container?: string;
    originalPath: string;
    syntheticId: string;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
    exported: boolean;
    signature: string;
}

// ---- refactoring ----

export type RenameKind =
    | "auto"
    | "class"
    | "interface"
    | "method"
    | "function"
    | "property"
    | "field"
    | "variable"
    | "parameter"
    | "type"
    | "enum";

export type VariableScope = "local" | "field" | "property";
export type AutoFixType = "style" | "modernize" | "all";

export interface RefactoringOutcome {
    modifiedCode: string;
    extractedArtifact: string;
    usedIdentifiers: string[];
    changeCount: number;
    conflicts: string[];
    details: Record<string, unknown>;
}

export interface FileRenameResult {
    originalPath: string;
    modifiedCode: string;
    changeCount: number;
    delta: RefactoringDelta;
}

export interface WorkspaceRenameOutcome {
    changeCount: number;
    conflicts: string[];
    symbolKind: SymbolKind | null;
    declaration: { originalPath: string; line: number } | null;
    files: FileRenameResult[];
}

// ---- deltas ----

export type TextChangeKind = "Replace" | "Insert" | "Delete";

export interface TextChange {
    /** 1-based line in the original text */
    startLine: number;
    /** inclusive; `startLine - 1` for inserts */
    endLine: number;
    originalText: string;
    newText: string;
    kind: TextChangeKind;
}

export interface DeltaContext {
    filePath: string;
    methodSignature?: string;
    affectedIdentifiers?: string[];
}

export interface RefactoringDelta {
    filePath: string;
    changes: TextChange[];
    methodSignature?: string;
    affectedIdentifiers: string[];
}

export interface SizeReductionEstimate {
    originalTokens: number;
    deltaTokens: number;
    tokensSaved: number;
    reductionRatio: number;
}

// ---- batch ----

export type BatchOperation =
    | { operation: "auto_fix"; fixTypes?: AutoFixType[] }
    | { operation: "rename_symbol"; oldName: string; newName: string; symbolKind?: RenameKind; mustExist?: boolean }
    | { operation: "extract_method"; selectedText: string; methodName: string }
    | { operation: "extract_interface"; className: string; interfaceName: string; memberNames?: string[] }
    | { operation: "introduce_variable"; expression: string; variableName: string; scope?: VariableScope; replaceAll?: boolean };

export type BatchOperationName = BatchOperation["operation"];

export interface BatchStepResult {
    index: number;
    operation: BatchOperationName;
    success: boolean;
    outcome?: RefactoringOutcome;
    error?: AnalysisErrorPayload;
}

export interface BatchResult {
    success: boolean;
    finalCode: string;
    results: BatchStepResult[];
    failedStep?: number;
    delta?: RefactoringDelta;
}
