export const RISK_CATEGORIES = [
  "APPROVED",
  "LOW_RISK",
  "MEDIUM_RISK",
  "HIGH_RISK",
  "CRITICAL",
] as const;

export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export type Provenance = "fast-path" | "reasoned" | "overridden" | "fallback";

export type Confidence = "high" | "low";

export interface RequestLog {
  /** Stable identifier derived from the log's content. */
  readonly id: string;
  readonly timestamp: string;
  readonly userId: string;
  readonly department: string;
  readonly requestUrl: string;
  readonly method: string;
  readonly payloadSizeKb: number;
  readonly payloadSnippet: string;
  readonly userAgent: string;
  readonly sourceIp: string;
}

export interface PreScreenVerdict {
  readonly domain: string;
  readonly fastTrackEligible: boolean;
  readonly maliciousDomainMatch: boolean;
  readonly approvedDomain: boolean;
  readonly externalAiService: boolean;
  /** Matched pattern names, in policy order. */
  readonly sensitiveMatches: ReadonlySet<string>;
  readonly departmentWeight: number;
}

export interface AnalysisResult {
  readonly recordId: string;
  readonly category: RiskCategory;
  readonly score: number;
  readonly reasoning: string;
  readonly detectedSensitiveData: readonly string[];
  readonly recommendedAction: string;
  readonly userMessage: string | null;
  readonly provenance: Provenance;
  readonly confidence: Confidence;
  readonly analyzedAt: string;
}

/** A finalized result together with the log it was computed from. */
export interface AnalysisOutcome {
  readonly log: RequestLog;
  readonly result: AnalysisResult;
}

export interface RecordError {
  readonly index: number;
  readonly code: "RECORD_PARSE";
  readonly message: string;
  readonly issues: readonly string[];
}
