import { parseRequestLog } from "../../src/analysis/record.js";
import type { AnalysisResult, RequestLog } from "../../src/analysis/types.js";
import { parseConfig } from "../../src/config/schema.js";
import type { SentinelConfig } from "../../src/config/types.js";
import { DEFAULT_POLICY } from "../../src/policy/defaults.js";
import { PolicyStore } from "../../src/policy/store.js";

/** Raw log record in the proxy's snake_case export format. */
export function makeRawLog(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    timestamp: "2025-03-14T09:30:00Z",
    user_id: "jdoe",
    department: "Engineering",
    request_url: "https://api.example-ai.com/v1/chat",
    method: "POST",
    payload_size_kb: 2,
    payload_snippet: "Summarize the release notes for version 4.2",
    user_agent: "Mozilla/5.0",
    ip_address: "10.0.0.12",
    ...overrides,
  };
}

export function makeRequestLog(overrides: Record<string, unknown> = {}): RequestLog {
  return parseRequestLog(makeRawLog(overrides));
}

export function makeResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    recordId: "rec-1",
    category: "LOW_RISK",
    score: 30,
    reasoning: "External AI service with ordinary content",
    detectedSensitiveData: [],
    recommendedAction: "Monitor",
    userMessage: null,
    provenance: "reasoned",
    confidence: "high",
    analyzedAt: "2025-03-14T09:30:01.000Z",
    ...overrides,
  };
}

export function makePolicy(overrides: Partial<typeof DEFAULT_POLICY> = {}): PolicyStore {
  return PolicyStore.load({ ...DEFAULT_POLICY, ...overrides });
}

export function makeConfig(raw: Record<string, unknown> = {}): SentinelConfig {
  return parseConfig({ logging: { level: "silent", json: true }, ...raw });
}
