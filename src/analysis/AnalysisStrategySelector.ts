import { throwIfCancelled, isCancellation } from "../common/Cancellation.js";
import { createLogger } from "../utils/StructuredLogger.js";
import {
    AnalysisContext,
    AnalysisPayloadMap,
    AnalysisRequestMap,
    AnalysisRequestType,
    AnalysisResult,
    AnalysisStrategy,
    StrategyTier,
    TierAttempt,
    TierOutcome
} from "./AnalysisTypes.js";
import { buildStructure } from "./strategies/StrategySupport.js";
import { SemanticStrategy } from "./strategies/SemanticStrategy.js";
import { SyntaxStrategy } from "./strategies/SyntaxStrategy.js";
import { TextStrategy } from "./strategies/TextStrategy.js";

const log = createLogger("AnalysisStrategySelector");

const TIER_RANK: Record<StrategyTier, number> = {
    Semantic: 3,
    Syntax: 2,
    Text: 1
};

type EmptyPayloads = {
    [K in AnalysisRequestType]: (request: AnalysisRequestMap[K], context: AnalysisContext) => AnalysisPayloadMap[K];
};

/** What a caller receives when no tier produced anything. */
const EMPTY_PAYLOADS: EmptyPayloads = {
    find_symbol: request => ({ symbolName: request.symbolName, matches: [], totalMatches: 0, truncated: false }),
    find_symbol_usages: request => ({ symbolName: request.symbolName, usages: [], totalUsages: 0, truncated: false }),
    get_class_context: request => ({ className: request.className, found: false }),
    analyze_project_structure: (request, context) => buildStructure(context.projectPath, [], request)
};

type ContentChecks = {
    [K in AnalysisRequestType]: (payload: AnalysisPayloadMap[K]) => boolean;
};

/** A tier that found nothing must not mask one that found something. */
const HAS_CONTENT: ContentChecks = {
    find_symbol: payload => payload.matches.length > 0,
    find_symbol_usages: payload => payload.usages.length > 0,
    get_class_context: payload => payload.found,
    analyze_project_structure: () => true
};

interface Contribution<T> {
    tier: StrategyTier;
    payload: T;
    confidence: number;
}

function definedFields<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}

/**
 * Field-wise merge; for a field several tiers filled in, the
 * higher-fidelity tier's value is kept.
 */
export function mergeContributions<T extends object>(contributions: readonly Contribution<T>[]): Contribution<T> | undefined {
    const ordered = [...contributions].sort((a, b) => TIER_RANK[a.tier] - TIER_RANK[b.tier]);
    const [lowest, ...rest] = ordered;
    if (!lowest) return undefined;
    let payload: T = lowest.payload;
    let best = lowest;
    for (const contribution of rest) {
        payload = { ...payload, ...definedFields(contribution.payload) };
        if (contribution.confidence > best.confidence) best = contribution;
    }
    return { tier: best.tier, payload, confidence: best.confidence };
}

/**
 * Runs a request down the tiers Semantic, Syntax, Text. The first complete
 * answer wins; partial answers are remembered and merged; an exhausted
 * chain still yields a tagged (possibly empty) result.
 */
export class AnalysisStrategySelector {
    constructor(
        private readonly strategies: readonly AnalysisStrategy[] = [new SemanticStrategy(), new SyntaxStrategy(), new TextStrategy()]
    ) {}

    async run<K extends AnalysisRequestType>(
        type: K,
        request: AnalysisRequestMap[K],
        context: AnalysisContext
    ): Promise<AnalysisResult<AnalysisPayloadMap[K]>> {
        const attempts: TierAttempt[] = [];
        const partials: Contribution<AnalysisPayloadMap[K]>[] = [];

        for (const strategy of this.strategies) {
            throwIfCancelled(context.signal, `${strategy.tier} analysis`);
            if (strategy.tier === "Semantic" && !context.semanticAllowed) {
                attempts.push({ tier: strategy.tier, status: "skipped", reason: "build validation did not pass", durationMs: 0 });
                continue;
            }

            const startedAt = performance.now();
            let outcome: TierOutcome<AnalysisPayloadMap[K]>;
            try {
                outcome = await strategy.handlers[type](request, context);
            } catch (error) {
                if (isCancellation(error)) throw error;
                const reason = error instanceof Error ? error.message : String(error);
                log.error("Analysis tier failed, advancing to the next tier", { tier: strategy.tier, request: type, error });
                attempts.push({ tier: strategy.tier, status: "error", reason, durationMs: elapsed(startedAt) });
                continue;
            }

            const durationMs = elapsed(startedAt);
            if (outcome.kind === "insufficient") {
                log.debug("Analysis tier insufficient", { tier: strategy.tier, request: type, reason: outcome.reason });
                attempts.push({ tier: strategy.tier, status: "insufficient", reason: outcome.reason, durationMs });
                continue;
            }
            if (outcome.kind === "partial") {
                attempts.push({ tier: strategy.tier, status: "partial", reason: outcome.reason, durationMs });
                partials.push({ tier: strategy.tier, payload: outcome.payload, confidence: outcome.confidence });
                continue;
            }

            attempts.push({ tier: strategy.tier, status: "complete", durationMs });
            const answer = { tier: strategy.tier, payload: outcome.payload, confidence: outcome.confidence };
            return this.combine([...partials, answer], HAS_CONTENT[type], attempts);
        }

        if (partials.length > 0) {
            return this.combine(partials, HAS_CONTENT[type], attempts);
        }

        log.warn("No analysis tier produced a result", { request: type, attempts });
        return {
            tierUsed: "Text",
            confidence: 0,
            payload: EMPTY_PAYLOADS[type](request, context),
            attempts,
            degraded: true
        };
    }

    private combine<T extends object>(
        contributions: Contribution<T>[],
        hasContent: (payload: T) => boolean,
        attempts: TierAttempt[]
    ): AnalysisResult<T> {
        const useful = contributions.filter(contribution => hasContent(contribution.payload));
        const kept = useful.length > 0 ? useful : contributions;
        const [first] = kept;
        if (kept.length === 1) {
            return this.result(first.tier, first.confidence, first.payload, attempts);
        }
        const merged = mergeContributions(kept) ?? first;
        return { tierUsed: "Hybrid", confidence: merged.confidence, payload: merged.payload, attempts, degraded: true };
    }

    private result<T>(tier: StrategyTier, confidence: number, payload: T, attempts: TierAttempt[]): AnalysisResult<T> {
        return { tierUsed: tier, confidence, payload, attempts, degraded: tier !== "Semantic" };
    }
}

function elapsed(startedAt: number): number {
    return Math.round((performance.now() - startedAt) * 100) / 100;
}
