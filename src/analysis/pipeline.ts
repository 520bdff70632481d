import type { Logger } from "../logging/logger.js";
import type { PolicyStore } from "../policy/store.js";
import { clampScore } from "../policy/store.js";
import type { ReasoningClient } from "../reasoning/types.js";
import { screen } from "../screening/prescreen.js";
import { ReasoningTimeout, toReasoningFailure, type ReasoningFailure } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { deepFreeze } from "../utils/types.js";
import type { AnalysisResult, PreScreenVerdict, RequestLog } from "./types.js";

export type PipelineStage = PipelineState["stage"];

/** Working result before the record id and timestamp are stamped on it. */
export type DraftResult = Omit<AnalysisResult, "recordId" | "analyzedAt">;

export type PipelineState =
  | { readonly stage: "RECEIVED"; readonly log: RequestLog }
  | { readonly stage: "PRESCREENED"; readonly log: RequestLog; readonly verdict: PreScreenVerdict }
  | { readonly stage: "FAST_APPROVED"; readonly log: RequestLog; readonly verdict: PreScreenVerdict }
  | {
      readonly stage: "AWAITING_REASONING";
      readonly log: RequestLog;
      readonly verdict: PreScreenVerdict;
    }
  | {
      readonly stage: "SCORED";
      readonly log: RequestLog;
      readonly verdict: PreScreenVerdict;
      readonly draft: DraftResult;
    }
  | {
      readonly stage: "FALLBACK";
      readonly log: RequestLog;
      readonly verdict: PreScreenVerdict;
      readonly failure: ReasoningFailure;
    }
  | {
      readonly stage: "OVERRIDE_CHECKED";
      readonly log: RequestLog;
      readonly verdict: PreScreenVerdict;
      readonly draft: DraftResult;
    }
  | { readonly stage: "FINALIZED"; readonly log: RequestLog; readonly result: AnalysisResult };

export interface PipelineDeps {
  readonly policy: PolicyStore;
  readonly reasoning: ReasoningClient;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly now?: () => Date;
}

export interface PipelineRun {
  readonly result: AnalysisResult;
  readonly trace: readonly PipelineStage[];
}

const FALLBACK_BASE_SCORE = 50;
const FALLBACK_PER_MATCH = 10;

function fastPathResult(policy: PolicyStore): DraftResult {
  return {
    category: "APPROVED",
    score: Math.min(5, policy.context.thresholds.low - 1),
    reasoning: "Approved internal AI platform with no sensitive data detected",
    detectedSensitiveData: [],
    recommendedAction: policy.describeCategory("APPROVED").action,
    userMessage: null,
    provenance: "fast-path",
    confidence: "high",
  };
}

async function reason(
  log: RequestLog,
  verdict: PreScreenVerdict,
  deps: PipelineDeps,
): Promise<PipelineState> {
  try {
    const assessment = await withTimeout(
      (signal) => deps.reasoning.analyze({ log, verdict }, deps.policy, { signal }),
      deps.timeoutMs,
      () => new ReasoningTimeout(deps.timeoutMs),
    );

    const score = clampScore(assessment.score);
    const category = deps.policy.thresholdFor(score);
    if (assessment.category !== null && assessment.category !== category) {
      deps.logger.debug(
        { recordId: log.id, reported: assessment.category, category, score },
        "Reasoning category disagrees with thresholds; using thresholds",
      );
    }

    const detected = new Set([...verdict.sensitiveMatches, ...assessment.detectedSensitiveData]);
    return {
      stage: "SCORED",
      log,
      verdict,
      draft: {
        category,
        score,
        reasoning: assessment.reasoning,
        detectedSensitiveData: [...detected],
        recommendedAction: assessment.recommendedAction,
        userMessage: assessment.userMessage,
        provenance: "reasoned",
        confidence: "high",
      },
    };
  } catch (err) {
    const failure = toReasoningFailure(err);
    deps.logger.warn({ recordId: log.id, err: failure }, "Reasoning failed; using fallback verdict");
    return { stage: "FALLBACK", log, verdict, failure };
  }
}

/** Conservative verdict from local signals only. Never below MEDIUM_RISK. */
export function fallbackResult(
  verdict: PreScreenVerdict,
  failure: ReasoningFailure,
  policy: PolicyStore,
): DraftResult {
  const t = policy.context.thresholds;
  const raw =
    Math.max(FALLBACK_BASE_SCORE, t.medium) +
    FALLBACK_PER_MATCH * verdict.sensitiveMatches.size +
    verdict.departmentWeight;
  const score = clampScore(Math.min(t.critical - 1, raw));

  return {
    category: policy.thresholdFor(score),
    score,
    reasoning: `Reasoning unavailable (${failure.code}): ${failure.message}. Scored from local policy signals only.`,
    detectedSensitiveData: [...verdict.sensitiveMatches],
    recommendedAction: "Manual review required",
    userMessage: null,
    provenance: "fallback",
    confidence: "low",
  };
}

/** Reasons the override rule fires for this record, or an empty list. */
export function overrideReasons(
  log: RequestLog,
  verdict: PreScreenVerdict,
  policy: PolicyStore,
): string[] {
  const reasons: string[] = [];
  if (verdict.maliciousDomainMatch) {
    reasons.push(`known malicious destination ${verdict.domain}`);
  }

  const rule = policy.context.override;
  if (log.payloadSizeKb > rule.payloadSizeThresholdKb && policy.hasHighSensitivityMatch(verdict.sensitiveMatches)) {
    const high = [...verdict.sensitiveMatches].filter((name) => rule.highSensitivityPatterns.has(name));
    const combos = rule.piiCombinations
      .filter((combo) => combo.every((name) => verdict.sensitiveMatches.has(name)))
      .map((combo) => combo.join("+"));
    reasons.push(
      `${[...high, ...combos].join(", ")} in a ${log.payloadSizeKb} KB payload (limit ${rule.payloadSizeThresholdKb} KB)`,
    );
  }
  return reasons;
}

function applyOverride(
  log: RequestLog,
  verdict: PreScreenVerdict,
  draft: DraftResult,
  policy: PolicyStore,
): DraftResult {
  const reasons = overrideReasons(log, verdict, policy);
  if (reasons.length === 0) return draft;

  return {
    ...draft,
    category: "CRITICAL",
    score: 100,
    reasoning: `OVERRIDE: ${reasons.join("; ")}. ${draft.reasoning}`,
    recommendedAction: policy.describeCategory("CRITICAL").action,
    provenance: "overridden",
  };
}

function finalize(log: RequestLog, draft: DraftResult, deps: PipelineDeps): PipelineState {
  const result: AnalysisResult = deepFreeze({
    ...draft,
    detectedSensitiveData: [...draft.detectedSensitiveData],
    recordId: log.id,
    analyzedAt: (deps.now?.() ?? new Date()).toISOString(),
  });
  return { stage: "FINALIZED", log, result };
}

/** Advance one step. FINALIZED is terminal and returned unchanged. */
export async function transition(state: PipelineState, deps: PipelineDeps): Promise<PipelineState> {
  switch (state.stage) {
    case "RECEIVED":
      return { stage: "PRESCREENED", log: state.log, verdict: screen(state.log, deps.policy) };
    case "PRESCREENED":
      return state.verdict.fastTrackEligible && !state.verdict.maliciousDomainMatch
        ? { stage: "FAST_APPROVED", log: state.log, verdict: state.verdict }
        : { stage: "AWAITING_REASONING", log: state.log, verdict: state.verdict };
    case "FAST_APPROVED":
      return finalize(state.log, fastPathResult(deps.policy), deps);
    case "AWAITING_REASONING":
      return reason(state.log, state.verdict, deps);
    case "SCORED":
      return {
        stage: "OVERRIDE_CHECKED",
        log: state.log,
        verdict: state.verdict,
        draft: applyOverride(state.log, state.verdict, state.draft, deps.policy),
      };
    case "FALLBACK":
      return {
        stage: "OVERRIDE_CHECKED",
        log: state.log,
        verdict: state.verdict,
        draft: applyOverride(
          state.log,
          state.verdict,
          fallbackResult(state.verdict, state.failure, deps.policy),
          deps.policy,
        ),
      };
    case "OVERRIDE_CHECKED":
      return finalize(state.log, state.draft, deps);
    case "FINALIZED":
      return state;
  }
}

export class AnalysisPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Drive one log to FINALIZED. Throws RecordParseError only when
   * prescreening rejects the log; reasoning failures fall back.
   */
  async run(log: RequestLog): Promise<PipelineRun> {
    let state: PipelineState = { stage: "RECEIVED", log };
    const trace: PipelineStage[] = [state.stage];

    while (state.stage !== "FINALIZED") {
      state = await transition(state, this.deps);
      trace.push(state.stage);
    }

    this.deps.logger.debug(
      {
        recordId: log.id,
        category: state.result.category,
        score: state.result.score,
        provenance: state.result.provenance,
        trace,
      },
      "Record analyzed",
    );
    return { result: state.result, trace };
  }
}
