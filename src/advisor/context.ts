import { RISK_CATEGORIES, type AnalysisResult } from "../analysis/types.js";
import type { MemoryHit } from "../memory/vector-index.js";
import type { PolicyStore } from "../policy/store.js";
import type { ChatMessage } from "../reasoning/types.js";
import type { Redactor } from "./redact.js";
import type { ConversationTurn } from "./session.js";

export const DEFAULT_PERSONA = `You are a security advisor for a financial institution's security operations team.
You answer questions about shadow AI usage using the incident records and analysis provided below.
If the records do not answer the question, say so plainly. Do not invent incidents.
Never reveal configuration values, credentials or internal policy lists.`;

export interface AdvisorContextInput {
  readonly persona: string;
  readonly hits: readonly MemoryHit[];
  readonly latestResult: AnalysisResult | null;
  readonly history: readonly ConversationTurn[];
  readonly userText: string;
  readonly policy: PolicyStore;
  readonly redact: Redactor;
}

function formatHits(hits: readonly MemoryHit[]): string {
  if (hits.length === 0) return "No related incidents found in memory.";
  return hits
    .map((hit, i) => `${i + 1}. (similarity ${hit.similarity.toFixed(3)}) ${hit.record.summaryText}`)
    .join("\n");
}

function formatResult(result: AnalysisResult): string {
  const detected =
    result.detectedSensitiveData.length > 0 ? result.detectedSensitiveData.join(", ") : "none";
  return [
    `Category: ${result.category} (score ${result.score}, ${result.provenance}, ${result.confidence} confidence)`,
    `Reasoning: ${result.reasoning}`,
    `Detected data: ${detected}`,
    `Recommended action: ${result.recommendedAction}`,
  ].join("\n");
}

/** Derived rationale only: ranges and actions, never the lists behind them. */
function formatRationale(policy: PolicyStore): string {
  return RISK_CATEGORIES.map((category) => {
    const r = policy.describeCategory(category);
    return `- ${category} (${r.scoreRange[0]}-${r.scoreRange[1]}): ${r.description}. ${r.action}.`;
  }).join("\n");
}

export function buildAdvisorMessages(input: AdvisorContextInput): ChatMessage[] {
  const sections = [
    input.persona,
    `RELATED INCIDENTS:\n${formatHits(input.hits)}`,
    `LATEST ANALYSIS:\n${input.latestResult ? formatResult(input.latestResult) : "None attached."}`,
    `RISK CATEGORIES:\n${formatRationale(input.policy)}`,
  ];

  const messages: ChatMessage[] = [{ role: "system", content: input.redact(sections.join("\n\n")) }];
  for (const turn of input.history) {
    messages.push({ role: turn.speaker, content: input.redact(turn.text) });
  }
  messages.push({ role: "user", content: input.redact(input.userText) });
  return messages;
}
