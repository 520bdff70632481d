import type { AnalysisResult, RequestLog } from "../analysis/types.js";
import type { MemoryInput } from "./vector-index.js";

const REASONING_EXCERPT_CHARS = 240;

function excerpt(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 3)}...`;
}

/** Compact, embeddable description of one analyzed request. */
export function summarizeForMemory(log: RequestLog, result: AnalysisResult): MemoryInput {
  const detected =
    result.detectedSensitiveData.length > 0 ? result.detectedSensitiveData.join(", ") : "none";
  const summaryText = [
    `User ${log.userId} (${log.department} department)`,
    `requested ${log.requestUrl} on ${log.timestamp}.`,
    `Risk ${result.category} score ${result.score} (${result.provenance}).`,
    `Detected data: ${detected}.`,
    `Reasoning: ${excerpt(result.reasoning, REASONING_EXCERPT_CHARS)}`,
  ].join(" ");

  return { id: log.id, summaryText, insertedAt: Date.parse(result.analyzedAt) || Date.now() };
}
