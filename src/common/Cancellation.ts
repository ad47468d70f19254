import { AnalysisError } from "../errors/AnalysisError.js";

export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
        throw AnalysisError.cancelled(stage);
    }
}

export function isCancellation(error: unknown): boolean {
    if (error instanceof AnalysisError) {
        return error.kind === "Cancelled";
    }
    return error instanceof Error && error.name === "AbortError";
}
