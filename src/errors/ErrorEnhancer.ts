import { AnalysisErrorKind, ToolSuggestion } from "../types.js";

export interface ErrorGuidance {
    suggestion: string;
    alternatives: ToolSuggestion[];
}

const readString = (data: Record<string, unknown>, key: string): string | undefined => {
    const value = data[key];
    return typeof value === "string" && value.length > 0 ? value : undefined;
};

export class ErrorEnhancer {
    /**
     * Default recovery guidance for an error kind. `data` is the error's own
     * payload; known keys (projectPath, symbolName, className) are threaded
     * into the example arguments.
     */
    static forKind(kind: AnalysisErrorKind, data: Record<string, unknown> = {}): ErrorGuidance {
        const projectPath = readString(data, "projectPath") ?? ".";
        const symbolName = readString(data, "symbolName") ?? readString(data, "className");

        switch (kind) {
            case "BuildValidationFailed":
                return {
                    suggestion: "Fix the reported build errors and validate again; text-level search still works on a broken build.",
                    alternatives: [
                        {
                            toolName: "validate_build",
                            rationale: "Re-run the build gate after fixing errors to see the remaining diagnostics.",
                            exampleArgs: { projectPath },
                            priority: "high"
                        },
                        {
                            toolName: "auto_fix",
                            rationale: "Apply pattern fixes for common style problems before retrying.",
                            priority: "medium"
                        }
                    ]
                };
            case "DuplicateFilesDetected":
                return {
                    suggestion: "Some files share a logical identity; narrow the request to a single project.",
                    alternatives: [
                        {
                            toolName: "analyze_solution",
                            rationale: "List the projects of the workspace to pick one directory.",
                            exampleArgs: { solutionPath: projectPath, detectIssues: true },
                            priority: "high"
                        }
                    ]
                };
            case "ProjectDiscoveryFailed":
                return {
                    suggestion: "Point projectPath at a directory containing a tsconfig.json or a package.json with workspaces.",
                    alternatives: [
                        {
                            toolName: "analyze_project_structure",
                            rationale: "Inspect the directory layout to locate the project root.",
                            exampleArgs: { projectPath, maxDepth: 2 },
                            priority: "high"
                        }
                    ]
                };
            case "ResourceLimitExceeded":
                return {
                    suggestion: "Narrow the scope: use a sub-directory as projectPath or lower maxResults.",
                    alternatives: [
                        {
                            toolName: "find_symbol",
                            rationale: "Token-optimized search returns smaller payloads.",
                            exampleArgs: { projectPath, symbolName: symbolName ?? "*", optimizeForTokens: true, maxResults: 20 },
                            priority: "medium"
                        }
                    ]
                };
            case "ConfigurationError":
                return {
                    suggestion: "Correct the arguments and retry; required fields must be non-empty and numbers within range.",
                    alternatives: []
                };
            case "NotFound":
                return {
                    suggestion: symbolName
                        ? `'${symbolName}' was not found. Check the spelling or search for it first.`
                        : "The requested target was not found. Check the exact text or name.",
                    alternatives: [
                        {
                            toolName: "find_symbol",
                            rationale: "Locate the declaration and its exact name.",
                            exampleArgs: { projectPath, symbolName: symbolName ?? "*" },
                            priority: "high"
                        }
                    ]
                };
            case "Cancelled":
                return {
                    suggestion: "The request was cancelled before completion; retry when ready.",
                    alternatives: []
                };
            case "InternalError":
                return {
                    suggestion: "An unexpected error occurred. Check the server log for the stack trace.",
                    alternatives: [
                        {
                            toolName: "find_symbol",
                            rationale: "Lower-fidelity text search may still answer the question.",
                            exampleArgs: { projectPath, symbolName: symbolName ?? "*", optimizeForTokens: true },
                            priority: "low"
                        }
                    ]
                };
        }
    }

    /**
     * Closest candidates by edit distance, for "did you mean" hints.
     */
    static findSimilarNames(target: string, candidates: Iterable<string>, limit = 5): string[] {
        const lowered = target.toLowerCase();
        const threshold = Math.max(2, Math.floor(target.length / 3));
        const scored: Array<{ name: string; distance: number }> = [];
        for (const candidate of new Set(candidates)) {
            if (candidate === target) continue;
            const distance = levenshtein(lowered, candidate.toLowerCase());
            if (distance <= threshold || candidate.toLowerCase().includes(lowered)) {
                scored.push({ name: candidate, distance });
            }
        }
        scored.sort((a, b) => a.distance - b.distance || a.name.localeCompare(b.name));
        return scored.slice(0, limit).map(entry => entry.name);
    }
}

function levenshtein(a: string, b: string): number {
    let previous = Array.from({ length: b.length + 1 }, (_, idx) => idx);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
        }
        previous = current;
    }
    return previous[b.length];
}
