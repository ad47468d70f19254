import { AnalysisErrorKind, AnalysisErrorPayload, ToolSuggestion } from "../types.js";
import { ErrorEnhancer } from "./ErrorEnhancer.js";

const RETRYABLE: Record<AnalysisErrorKind, boolean> = {
    BuildValidationFailed: false,
    DuplicateFilesDetected: true,
    ProjectDiscoveryFailed: true,
    ResourceLimitExceeded: true,
    ConfigurationError: true,
    NotFound: true,
    Cancelled: true,
    InternalError: false
};

export interface AnalysisErrorOptions {
    suggestion?: string;
    alternatives?: ToolSuggestion[];
    data?: Record<string, unknown>;
    cause?: unknown;
}

export class AnalysisError extends Error {
    readonly kind: AnalysisErrorKind;
    readonly suggestion: string;
    readonly alternatives: ToolSuggestion[];
    readonly canRetry: boolean;
    readonly data: Record<string, unknown>;

    constructor(kind: AnalysisErrorKind, message: string, options: AnalysisErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "AnalysisError";
        this.kind = kind;
        this.data = options.data ?? {};
        const guidance = ErrorEnhancer.forKind(kind, this.data);
        this.suggestion = options.suggestion ?? guidance.suggestion;
        this.alternatives = options.alternatives ?? guidance.alternatives;
        this.canRetry = RETRYABLE[kind];
    }

    toPayload(): AnalysisErrorPayload {
        return {
            kind: this.kind,
            message: this.message,
            suggestion: this.suggestion,
            alternatives: this.alternatives,
            canRetry: this.canRetry,
            data: this.data
        };
    }

    static notFound(message: string, data?: Record<string, unknown>): AnalysisError {
        return new AnalysisError("NotFound", message, { data });
    }

    static configuration(message: string, data?: Record<string, unknown>): AnalysisError {
        return new AnalysisError("ConfigurationError", message, { data });
    }

    static cancelled(stage: string): AnalysisError {
        return new AnalysisError("Cancelled", `Request cancelled during ${stage}`, { data: { stage } });
    }
}

/**
 * Normalizes anything thrown into an AnalysisError so the transport never
 * sees an unstructured failure.
 */
export function toAnalysisError(error: unknown): AnalysisError {
    if (error instanceof AnalysisError) {
        return error;
    }
    if (error instanceof Error && error.name === "AbortError") {
        return new AnalysisError("Cancelled", error.message || "Request aborted", { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AnalysisError("InternalError", message || "Unknown error", { cause: error });
}
