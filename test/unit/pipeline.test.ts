import { describe, it, expect } from "vitest";
import {
  AnalysisPipeline,
  fallbackResult,
  overrideReasons,
  transition,
  type PipelineDeps,
} from "../../src/analysis/pipeline.js";
import { silentLogger } from "../../src/logging/logger.js";
import { parseAssessment } from "../../src/reasoning/response.js";
import type { PolicyStore } from "../../src/policy/store.js";
import { screen } from "../../src/screening/prescreen.js";
import { MalformedResponse, ReasoningTimeout, ReasoningUnavailable } from "../../src/utils/errors.js";
import { makePolicy, makeRequestLog, makeResult } from "../helpers/fixtures.js";
import { hangUntilAborted, makeAssessment, StubReasoningClient } from "../helpers/stubs.js";

const ANALYZED_AT = "2025-03-14T09:30:01.000Z";
const FOUR_KINDS = "IBAN DE89370400440532013000, jane@corp.example, +44 20 7946 0958, €1,250,000";

function setup(
  reasoning = new StubReasoningClient(),
  policy: PolicyStore = makePolicy(),
  timeoutMs = 50,
): { pipeline: AnalysisPipeline; reasoning: StubReasoningClient; deps: PipelineDeps } {
  const deps: PipelineDeps = {
    policy,
    reasoning,
    timeoutMs,
    logger: silentLogger(),
    now: () => new Date(ANALYZED_AT),
  };
  return { pipeline: new AnalysisPipeline(deps), reasoning, deps };
}

describe("fast path", () => {
  it("approves a clean request to an approved platform without reasoning", async () => {
    const { pipeline, reasoning } = setup();
    const log = makeRequestLog({ request_url: "https://internal-ai.company.com/v1/chat" });

    const { result, trace } = await pipeline.run(log);

    expect(trace).toEqual(["RECEIVED", "PRESCREENED", "FAST_APPROVED", "FINALIZED"]);
    expect(result).toEqual({
      recordId: log.id,
      category: "APPROVED",
      score: 5,
      reasoning: "Approved internal AI platform with no sensitive data detected",
      detectedSensitiveData: [],
      recommendedAction: "Allow",
      userMessage: null,
      provenance: "fast-path",
      confidence: "high",
      analyzedAt: ANALYZED_AT,
    });
    expect(reasoning.analyzeCalls).toHaveLength(0);
  });

  it("sends an approved platform with sensitive data to reasoning", async () => {
    const { pipeline, reasoning } = setup();
    const log = makeRequestLog({
      request_url: "https://internal-ai.company.com/v1/chat",
      payload_snippet: "mail jane@corp.example",
    });

    const { result } = await pipeline.run(log);

    expect(reasoning.analyzeCalls).toHaveLength(1);
    expect(result.provenance).toBe("reasoned");
  });

  it("never fast-tracks a domain that is also on the malicious list", async () => {
    const policy = makePolicy({ maliciousDomains: ["internal-ai.company.com"] });
    const { pipeline } = setup(new StubReasoningClient(), policy);
    const log = makeRequestLog({ request_url: "https://internal-ai.company.com/v1/chat" });

    const { result, trace } = await pipeline.run(log);

    expect(trace).not.toContain("FAST_APPROVED");
    expect(result.category).toBe("CRITICAL");
    expect(result.score).toBe(100);
    expect(result.provenance).toBe("overridden");
    expect(result.reasoning).toBe(
      "OVERRIDE: known malicious destination internal-ai.company.com. External AI service with ordinary content",
    );
  });
});

describe("reasoned path", () => {
  it("derives the category from the score and merges detected data", async () => {
    const reasoning = new StubReasoningClient(async () =>
      makeAssessment({
        category: "HIGH_RISK",
        score: 55,
        reasoning: "Customer contact details shared",
        detectedSensitiveData: ["email", "customer_name"],
        recommendedAction: "Alert and educate user",
        userMessage: "Please avoid sharing customer details.",
      }),
    );
    const { pipeline } = setup(reasoning);
    const log = makeRequestLog({
      request_url: "https://chat.openai.com/",
      payload_snippet: "Reply to jane@corp.example about her loan",
    });

    const { result, trace } = await pipeline.run(log);

    expect(trace).toEqual([
      "RECEIVED",
      "PRESCREENED",
      "AWAITING_REASONING",
      "SCORED",
      "OVERRIDE_CHECKED",
      "FINALIZED",
    ]);
    expect(result.category).toBe("MEDIUM_RISK");
    expect(result.score).toBe(55);
    expect(result.detectedSensitiveData).toEqual(["email", "customer_name"]);
    expect(result.userMessage).toBe("Please avoid sharing customer details.");
    expect(result.confidence).toBe("high");
  });

  it("passes the log and pre-screen verdict to the reasoning client", async () => {
    const { pipeline, reasoning } = setup();
    const log = makeRequestLog({ request_url: "https://claude.ai/chat" });

    await pipeline.run(log);

    expect(reasoning.analyzeCalls[0]?.log).toBe(log);
    expect(reasoning.analyzeCalls[0]?.verdict.externalAiService).toBe(true);
  });

  it("clamps an out-of-range score", async () => {
    const reasoning = new StubReasoningClient(async () => makeAssessment({ score: 150 }));
    const { pipeline } = setup(reasoning);

    const { result } = await pipeline.run(makeRequestLog());

    expect(result.score).toBe(100);
    expect(result.category).toBe("CRITICAL");
    expect(result.provenance).toBe("reasoned");
  });
});

describe("fallback", () => {
  it("falls back when reasoning exceeds the timeout", async () => {
    const reasoning = new StubReasoningClient((_request, opts) => hangUntilAborted(opts));
    const { pipeline } = setup(reasoning, makePolicy(), 20);

    const { result, trace } = await pipeline.run(makeRequestLog());

    expect(trace).toContain("FALLBACK");
    expect(trace).not.toContain("SCORED");
    expect(result).toMatchObject({
      category: "MEDIUM_RISK",
      score: 55,
      reasoning:
        "Reasoning unavailable (REASONING_TIMEOUT): Reasoning call timed out after 20ms. Scored from local policy signals only.",
      recommendedAction: "Manual review required",
      provenance: "fallback",
      confidence: "low",
    });
  });

  it("falls back on a malformed response", async () => {
    const reasoning = new StubReasoningClient(async () => {
      throw new MalformedResponse("no JSON object found in reasoning response");
    });
    const { pipeline } = setup(reasoning);

    const { result } = await pipeline.run(makeRequestLog());

    expect(result.provenance).toBe("fallback");
    expect(result.reasoning).toBe(
      "Reasoning unavailable (MALFORMED_RESPONSE): no JSON object found in reasoning response. Scored from local policy signals only.",
    );
  });

  it.each([["null"], ['""']])("falls back instead of approving when the score is %s", async (score) => {
    const reasoning = new StubReasoningClient(async () =>
      parseAssessment(`{"risk_category": "HIGH_RISK", "risk_score": ${score}}`),
    );
    const { pipeline } = setup(reasoning);

    const { result } = await pipeline.run(makeRequestLog({ request_url: "https://chat.openai.com/" }));

    expect(result).toMatchObject({ category: "MEDIUM_RISK", score: 55, provenance: "fallback", confidence: "low" });
    expect(result.reasoning).toMatch(
      /^Reasoning unavailable \(MALFORMED_RESPONSE\): reasoning response failed validation: risk_score/,
    );
  });

  it("treats unexpected errors as the service being unavailable", async () => {
    const reasoning = new StubReasoningClient(async () => {
      throw new TypeError("fetch failed");
    });
    const { pipeline } = setup(reasoning);

    const { result } = await pipeline.run(makeRequestLog());

    expect(result.reasoning).toMatch(/^Reasoning unavailable \(REASONING_UNAVAILABLE\): fetch failed\./);
  });

  it("stays below CRITICAL however many signals are present", async () => {
    const reasoning = new StubReasoningClient(async () => {
      throw new ReasoningUnavailable("no key");
    });
    const { pipeline } = setup(reasoning);
    const log = makeRequestLog({ department: "Fraud Detection", payload_snippet: FOUR_KINDS });

    const { result } = await pipeline.run(log);

    expect(result.score).toBe(90);
    expect(result.category).toBe("HIGH_RISK");
    expect(result.detectedSensitiveData).toEqual(["iban", "email", "phone", "monetary_large"]);
  });
});

describe("fallbackResult", () => {
  const policy = makePolicy();

  it("scores from the base, the matches and the department", () => {
    const log = makeRequestLog({ department: "Compliance", payload_snippet: "mail jane@corp.example" });
    const draft = fallbackResult(screen(log, policy), new ReasoningTimeout(10), policy);
    expect(draft.score).toBe(65);
    expect(draft.category).toBe("MEDIUM_RISK");
    expect(draft.detectedSensitiveData).toEqual(["email"]);
  });

  it("never scores below the medium threshold", () => {
    const high = makePolicy({ thresholds: { low: 21, medium: 60, high: 80, critical: 95 } });
    const log = makeRequestLog({ department: "HR" });
    const draft = fallbackResult(screen(log, high), new ReasoningTimeout(10), high);
    expect(draft.score).toBe(60);
    expect(draft.category).toBe("MEDIUM_RISK");
  });
});

describe("override", () => {
  it("escalates a large payload with a high-sensitivity pattern to CRITICAL", async () => {
    const reasoning = new StubReasoningClient(async () =>
      makeAssessment({ score: 20, category: "APPROVED", reasoning: "Looks routine" }),
    );
    const { pipeline } = setup(reasoning);
    const log = makeRequestLog({
      request_url: "https://chat.openai.com/backend-api/conversation",
      payload_size_kb: 12,
      payload_snippet: "Wire to DE89370400440532013000 today",
    });

    const { result } = await pipeline.run(log);

    expect(result).toMatchObject({
      category: "CRITICAL",
      score: 100,
      provenance: "overridden",
      recommendedAction: "Immediate block and incident response",
      reasoning: "OVERRIDE: iban in a 12 KB payload (limit 10 KB). Looks routine",
    });
  });

  it("applies to fallback verdicts too", async () => {
    const reasoning = new StubReasoningClient((_request, opts) => hangUntilAborted(opts));
    const { pipeline } = setup(reasoning, makePolicy(), 20);
    const log = makeRequestLog({
      request_url: "https://chat.openai.com/",
      payload_size_kb: 12,
      payload_snippet: "Wire to DE89370400440532013000 today",
    });

    const { result, trace } = await pipeline.run(log);

    expect(trace).toContain("FALLBACK");
    expect(result.category).toBe("CRITICAL");
    expect(result.provenance).toBe("overridden");
    expect(result.confidence).toBe("low");
  });

  it("does not fire at exactly the size limit", async () => {
    const { pipeline } = setup();
    const log = makeRequestLog({ payload_size_kb: 10, payload_snippet: "IBAN DE89370400440532013000" });

    const { result } = await pipeline.run(log);

    expect(result.provenance).toBe("reasoned");
    expect(result.category).toBe("LOW_RISK");
  });

  it("takes the size limit from the policy", () => {
    const policy = makePolicy({
      override: {
        payloadSizeThresholdKb: 4,
        highSensitivityPatterns: ["iban"],
        piiCombinations: [],
      },
    });
    const log = makeRequestLog({ payload_size_kb: 5, payload_snippet: "IBAN DE89370400440532013000" });
    expect(overrideReasons(log, screen(log, policy), policy)).toEqual([
      "iban in a 5 KB payload (limit 4 KB)",
    ]);
  });

  it("names a PII combination and the malicious destination together", () => {
    const policy = makePolicy();
    const log = makeRequestLog({
      request_url: "http://malware-distributor.net/in",
      payload_size_kb: 15,
      payload_snippet: "jane@corp.example +44 20 7946 0958",
    });
    expect(overrideReasons(log, screen(log, policy), policy)).toEqual([
      "known malicious destination malware-distributor.net",
      "email+phone in a 15 KB payload (limit 10 KB)",
    ]);
  });

  it("ignores a lone email in a large payload", () => {
    const policy = makePolicy();
    const log = makeRequestLog({ payload_size_kb: 50, payload_snippet: "jane@corp.example" });
    expect(overrideReasons(log, screen(log, policy), policy)).toEqual([]);
  });
});

describe("result", () => {
  it("is deeply frozen", async () => {
    const { pipeline } = setup();
    const { result } = await pipeline.run(makeRequestLog({ payload_snippet: "mail jane@corp.example" }));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.detectedSensitiveData)).toBe(true);
  });

  it("leaves a finalized state unchanged", async () => {
    const { deps } = setup();
    const state = { stage: "FINALIZED" as const, log: makeRequestLog(), result: makeResult() };
    expect(await transition(state, deps)).toBe(state);
  });
});
