import { z } from "zod";
import { RISK_CATEGORIES, type RiskCategory } from "../analysis/types.js";
import { formatIssues } from "../config/schema.js";
import { MalformedResponse } from "../utils/errors.js";
import type { ReasoningAssessment } from "./types.js";

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;

// A number, or a string holding only a decimal number. null, "" and booleans are rejected.
const scoreSchema = z
  .union([z.number(), z.string().regex(/^\s*-?\d+(\.\d+)?\s*$/).transform(Number)])
  .pipe(z.number().finite());

const assessmentSchema = z.object({
  risk_category: z.string().nullish(),
  risk_score: scoreSchema,
  reasoning: z.string().nullish(),
  detected_sensitive_data: z.array(z.string()).nullish(),
  recommended_action: z.string().nullish(),
  user_message: z.string().nullish(),
});

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull a JSON object out of model output: the whole text, a fenced block, or
 * the outermost braces, in that order.
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  const direct = tryParse(trimmed);
  if (direct !== undefined) return direct;

  const fenced = FENCED_JSON.exec(trimmed);
  if (fenced?.[1]) {
    const parsed = tryParse(fenced[1]);
    if (parsed !== undefined) return parsed;
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    const parsed = tryParse(trimmed.slice(start, end + 1));
    if (parsed !== undefined) return parsed;
  }

  throw new MalformedResponse("no JSON object found in reasoning response", text.slice(0, 500));
}

function toCategory(value: string | null | undefined): RiskCategory | null {
  const upper = value?.trim().toUpperCase();
  return RISK_CATEGORIES.find((c) => c === upper) ?? null;
}

export function parseAssessment(text: string): ReasoningAssessment {
  const result = assessmentSchema.safeParse(extractJson(text));
  if (!result.success) {
    throw new MalformedResponse(
      `reasoning response failed validation: ${formatIssues(result.error).join("; ")}`,
      text.slice(0, 500),
    );
  }

  const data = result.data;
  return {
    category: toCategory(data.risk_category),
    score: data.risk_score,
    reasoning: data.reasoning?.trim() || "No reasoning provided",
    detectedSensitiveData: data.detected_sensitive_data ?? [],
    recommendedAction: data.recommended_action?.trim() || "Review",
    userMessage: data.user_message?.trim() || null,
  };
}
