import { AutoFixType, RefactoringOutcome } from "../types.js";
import { applyPatternFixes } from "../autofix/PatternFixes.js";

export function autoFix(code: string, fixTypes: readonly AutoFixType[] = ["all"]): RefactoringOutcome {
    const result = applyPatternFixes(code, fixTypes);
    return {
        modifiedCode: result.code,
        extractedArtifact: "",
        usedIdentifiers: [],
        changeCount: result.changeCount,
        conflicts: [],
        details: { fixTypes: [...fixTypes], applied: result.applied }
    };
}
