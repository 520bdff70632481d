import type { PolicyConfig } from "../config/types.js";

const HIGH_SENSITIVITY = 15;
const MEDIUM_SENSITIVITY = 5;
const LOW_SENSITIVITY = 0;

export const DEFAULT_POLICY: PolicyConfig = {
  approvedDomains: [
    "internal-ai.company.com",
    "internal-ai.company.local",
    "ai.company.internal",
    "approved-partner.com",
  ],
  externalAiServices: [
    "chat.openai.com",
    "chatgpt.com",
    "api.openai.com",
    "api.anthropic.com",
    "claude.ai",
    "gemini.google.com",
    "api.cohere.ai",
    "bard.google.com",
  ],
  maliciousDomains: [
    "evil-phishing-site.com",
    "malware-distributor.net",
    "suspicious-internal-proxy.info",
    "data-exfiltration-test.org",
  ],
  sensitivePatterns: [
    { name: "iban", pattern: String.raw`\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b`, flags: "" },
    { name: "account_number", pattern: String.raw`\b\d{8,12}\b`, flags: "" },
    {
      name: "email",
      pattern: String.raw`\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b`,
      flags: "",
    },
    {
      name: "phone",
      pattern: String.raw`(?:\+\d{1,3}[-.\s]?)?\(?\d{2,4}\)?[-.\s]\d{3,4}[-.\s]?\d{3,4}\b`,
      flags: "",
    },
    {
      name: "monetary_large",
      pattern: String.raw`[€$£]\s*\d{1,3}(?:,\d{3})*(?:\.\d{2})?\s*[KMB]?\b`,
      flags: "i",
    },
  ],
  departmentWeights: {
    "Fraud Detection": HIGH_SENSITIVITY,
    "Investment Banking": HIGH_SENSITIVITY,
    "Risk Analytics": HIGH_SENSITIVITY,
    "Data Engineering": HIGH_SENSITIVITY,
    Compliance: MEDIUM_SENSITIVITY,
    "Customer Service": MEDIUM_SENSITIVITY,
    "IT Security": MEDIUM_SENSITIVITY,
    HR: LOW_SENSITIVITY,
    Marketing: LOW_SENSITIVITY,
    "Product Management": LOW_SENSITIVITY,
  },
  defaultDepartmentWeight: MEDIUM_SENSITIVITY,
  thresholds: { low: 21, medium: 41, high: 71, critical: 91 },
  override: {
    payloadSizeThresholdKb: 10,
    highSensitivityPatterns: ["iban", "account_number"],
    piiCombinations: [["email", "phone"]],
  },
};
