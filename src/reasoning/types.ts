import type { PreScreenVerdict, RequestLog, RiskCategory } from "../analysis/types.js";
import type { PolicyStore } from "../policy/store.js";

export interface RequestContext {
  readonly log: RequestLog;
  readonly verdict: PreScreenVerdict;
}

/** What the reasoning service said. Category is a hint; the score is authoritative input. */
export interface ReasoningAssessment {
  readonly category: RiskCategory | null;
  readonly score: number;
  readonly reasoning: string;
  readonly detectedSensitiveData: string[];
  readonly recommendedAction: string;
  readonly userMessage: string | null;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface CallOptions {
  readonly signal?: AbortSignal;
}

/**
 * External reasoning capability. Implementations reject with
 * ReasoningTimeout, ReasoningUnavailable or MalformedResponse.
 */
export interface ReasoningClient {
  analyze(
    request: RequestContext,
    policy: PolicyStore,
    opts?: CallOptions,
  ): Promise<ReasoningAssessment>;
  converse(messages: readonly ChatMessage[], opts?: CallOptions): Promise<string>;
}
