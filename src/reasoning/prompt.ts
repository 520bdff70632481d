import type { RequestContext } from "./types.js";
import type { PolicyStore } from "../policy/store.js";
import { RISK_CATEGORIES } from "../analysis/types.js";

function formatRanges(policy: PolicyStore): string {
  return RISK_CATEGORIES.map((category) => {
    const r = policy.describeCategory(category);
    return `- ${category} (${r.scoreRange[0]}-${r.scoreRange[1]}): ${r.description}. Action: ${r.action}`;
  }).join("\n");
}

export function buildDetectionPrompt(policy: PolicyStore): string {
  const ctx = policy.context;
  return `You are an AI security analyst for a financial institution.

Your task is to analyze network requests to AI services and assess their security risk level.

APPROVED AI PLATFORMS:
${[...ctx.approvedDomains].join(", ") || "(none)"}

EXTERNAL AI SERVICES (require scrutiny):
${[...ctx.externalAiServices].join(", ") || "(none)"}

RISK CATEGORIES:
${formatRanges(policy)}

RISK ASSESSMENT CRITERIA:
1. Is the endpoint approved by the organization?
2. Does the payload contain sensitive banking data (IBANs, account numbers, customer PII, financial amounts)?
3. What is the user's department sensitivity level?
4. Is the payload size unusually large (potential data dump)?

RESPONSE FORMAT (JSON only):
{
  "risk_category": "${RISK_CATEGORIES.join("|")}",
  "risk_score": 0-100,
  "reasoning": "Brief explanation of the risk assessment",
  "detected_sensitive_data": ["list of sensitive data types found"],
  "recommended_action": "Action to take",
  "user_message": "Friendly message to educate the user, or null"
}

Be strict but fair. The goal is to protect the organization's data while supporting legitimate AI use.`;
}

function sensitivityLabel(weight: number): string {
  if (weight >= 15) return "high sensitivity";
  if (weight >= 5) return "medium sensitivity";
  return "low sensitivity";
}

export function buildRequestPrompt({ log, verdict }: RequestContext): string {
  const sensitive = [...verdict.sensitiveMatches];
  const flags: string[] = [];
  if (verdict.maliciousDomainMatch) flags.push("- LOCAL POLICY: domain is on the known malicious list.");
  if (verdict.externalAiService) flags.push("- Domain is a public AI service.");
  if (sensitive.length > 0) flags.push(`- SENSITIVE DATA: identified ${sensitive.join(", ")}`);

  return `NETWORK REQUEST DETAILS:
- URL: ${log.requestUrl}
- Method: ${log.method}
- User: ${log.userId}
- Department: ${log.department} (${sensitivityLabel(verdict.departmentWeight)})
- Payload Size: ${log.payloadSizeKb} KB
- Payload Content: "${log.payloadSnippet}"
- Pre-detected Sensitive Data: ${sensitive.length > 0 ? sensitive.join(", ") : "None"}
${flags.length > 0 ? `\nPRE-DETECTION METADATA:\n${flags.join("\n")}\n` : ""}
Analyze this request and provide a risk assessment.`;
}
