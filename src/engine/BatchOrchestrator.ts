import { BatchOperation, BatchResult, BatchStepResult, RefactoringOutcome } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { Result } from "../common/Result.js";
import { SymbolRefactoringEngine } from "../refactoring/SymbolRefactoringEngine.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { DeltaGenerator } from "./DeltaGenerator.js";

const log = createLogger("BatchOrchestrator");

export interface BatchOptions {
    signal?: AbortSignal;
    /** path reported in the resulting delta */
    filePath?: string;
}

/**
 * Runs refactorings one after another over the same text. The batch is
 * all-or-nothing: on the first failure the caller gets the initial code
 * back, with every step's record up to the failing one.
 */
export class BatchOrchestrator {
    constructor(private readonly engine: SymbolRefactoringEngine) {}

    run(operations: readonly BatchOperation[], initialCode: string, options: BatchOptions = {}): BatchResult {
        if (operations.length === 0) {
            throw AnalysisError.configuration("operations must contain at least one step", { parameter: "operations" });
        }

        const results: BatchStepResult[] = [];
        let current = initialCode;
        for (const [index, operation] of operations.entries()) {
            if (options.signal?.aborted) {
                const error = AnalysisError.cancelled(`batch step ${index}`);
                results.push({ index, operation: operation.operation, success: false, error: error.toPayload() });
                log.warn("Batch cancelled", { step: index, completed: index });
                return { success: false, finalCode: initialCode, results, failedStep: index };
            }

            const outcome = this.execute(operation, current);
            if (!outcome.ok) {
                results.push({ index, operation: operation.operation, success: false, error: outcome.error.toPayload() });
                log.info("Batch stopped at failing step", { step: index, operation: operation.operation, kind: outcome.error.kind });
                return { success: false, finalCode: initialCode, results, failedStep: index };
            }
            results.push({ index, operation: operation.operation, success: true, outcome: outcome.value });
            current = outcome.value.modifiedCode;
        }

        log.info("Batch completed", { steps: operations.length });
        return {
            success: true,
            finalCode: current,
            results,
            delta: DeltaGenerator.diff(initialCode, current, {
                filePath: options.filePath ?? "inline",
                affectedIdentifiers: Array.from(new Set(results.flatMap(result => result.outcome?.usedIdentifiers ?? [])))
            })
        };
    }

    private execute(operation: BatchOperation, code: string): Result<RefactoringOutcome> {
        switch (operation.operation) {
            case "auto_fix":
                return this.engine.autoFix(code, operation.fixTypes);
            case "rename_symbol":
                return this.engine.renameSymbol(code, {
                    oldName: operation.oldName,
                    newName: operation.newName,
                    symbolKind: operation.symbolKind,
                    mustExist: operation.mustExist
                });
            case "extract_method":
                return this.engine.extractMethod({ code, selectedText: operation.selectedText, methodName: operation.methodName });
            case "extract_interface":
                return this.engine.extractInterface({
                    code,
                    className: operation.className,
                    interfaceName: operation.interfaceName,
                    memberNames: operation.memberNames
                });
            case "introduce_variable":
                return this.engine.introduceVariable({
                    code,
                    expression: operation.expression,
                    variableName: operation.variableName,
                    scope: operation.scope,
                    replaceAll: operation.replaceAll
                });
        }
    }
}
