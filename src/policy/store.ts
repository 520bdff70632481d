import type { PolicyConfig } from "../config/types.js";
import { policySchema, formatIssues } from "../config/schema.js";
import { hostOf } from "../analysis/record.js";
import type { RiskCategory } from "../analysis/types.js";
import { ConfigError } from "../utils/errors.js";
import type { CategoryRationale, PolicyContext, SensitivePattern } from "./types.js";

const CATEGORY_TEXT: Record<RiskCategory, { description: string; action: string }> = {
  APPROVED: {
    description: "Request to a sanctioned internal AI platform",
    action: "Allow",
  },
  LOW_RISK: {
    description: "External AI service with non-sensitive data",
    action: "Monitor",
  },
  MEDIUM_RISK: {
    description: "External AI service with potentially sensitive context",
    action: "Alert and educate user",
  },
  HIGH_RISK: {
    description: "External AI service with confirmed sensitive data",
    action: "Block and notify security team",
  },
  CRITICAL: {
    description: "Active data exfiltration attempt or known malicious destination",
    action: "Immediate block and incident response",
  },
};

function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^\*\./, "").replace(/\.$/, "");
}

function matchesDomainSet(host: string | null, set: ReadonlySet<string>): boolean {
  if (!host) return false;
  if (set.has(host)) return true;
  // Walk up the labels so sub.example.com matches example.com
  let dot = host.indexOf(".");
  while (dot !== -1) {
    if (set.has(host.slice(dot + 1))) return true;
    dot = host.indexOf(".", dot + 1);
  }
  return false;
}

/**
 * Immutable policy: domain lists, sensitive-data patterns, department weights
 * and the score thresholds. Every operation is pure.
 */
export class PolicyStore {
  private constructor(readonly context: PolicyContext) {}

  /** Validate raw policy config. Throws ConfigError. */
  static load(config: unknown): PolicyStore {
    const parsed = policySchema.safeParse(config);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigError(`Invalid policy: ${issues.join("; ")}`, issues);
    }
    return new PolicyStore(PolicyStore.compile(parsed.data));
  }

  private static compile(config: PolicyConfig): PolicyContext {
    const patterns: SensitivePattern[] = config.sensitivePatterns.map((p) =>
      Object.freeze({ name: p.name, regex: new RegExp(p.pattern, p.flags) }),
    );

    return Object.freeze({
      approvedDomains: new Set(config.approvedDomains.map(normalizeDomain)),
      externalAiServices: new Set(config.externalAiServices.map(normalizeDomain)),
      maliciousDomains: new Set(config.maliciousDomains.map(normalizeDomain)),
      sensitivePatterns: Object.freeze(patterns),
      departmentWeights: new Map(
        Object.entries(config.departmentWeights).map(([dept, w]) => [dept.toLowerCase(), w]),
      ),
      defaultDepartmentWeight: config.defaultDepartmentWeight,
      thresholds: Object.freeze({ ...config.thresholds }),
      override: Object.freeze({
        payloadSizeThresholdKb: config.override.payloadSizeThresholdKb,
        highSensitivityPatterns: new Set(config.override.highSensitivityPatterns),
        piiCombinations: Object.freeze(
          config.override.piiCombinations.map((combo) => Object.freeze([...combo])),
        ),
      }),
    });
  }

  isApprovedDomain(url: string): boolean {
    return matchesDomainSet(hostOf(url), this.context.approvedDomains);
  }

  isMaliciousDomain(url: string): boolean {
    return matchesDomainSet(hostOf(url), this.context.maliciousDomains);
  }

  isExternalAiService(url: string): boolean {
    return matchesDomainSet(hostOf(url), this.context.externalAiServices);
  }

  scanSensitive(text: string): Set<string> {
    const found = new Set<string>();
    if (!text) return found;
    for (const { name, regex } of this.context.sensitivePatterns) {
      if (regex.test(text)) found.add(name);
    }
    return found;
  }

  thresholdFor(score: number): RiskCategory {
    const s = clampScore(score);
    const t = this.context.thresholds;
    if (s >= t.critical) return "CRITICAL";
    if (s >= t.high) return "HIGH_RISK";
    if (s >= t.medium) return "MEDIUM_RISK";
    if (s >= t.low) return "LOW_RISK";
    return "APPROVED";
  }

  departmentWeight(department: string): number {
    return (
      this.context.departmentWeights.get(department.trim().toLowerCase()) ??
      this.context.defaultDepartmentWeight
    );
  }

  /** True when the matches trip the high-sensitivity half of the override rule. */
  hasHighSensitivityMatch(matches: ReadonlySet<string>): boolean {
    const rule = this.context.override;
    for (const name of matches) {
      if (rule.highSensitivityPatterns.has(name)) return true;
    }
    return rule.piiCombinations.some((combo) => combo.every((name) => matches.has(name)));
  }

  describeCategory(category: RiskCategory): CategoryRationale {
    const t = this.context.thresholds;
    const ranges: Record<RiskCategory, readonly [number, number]> = {
      APPROVED: [0, t.low - 1],
      LOW_RISK: [t.low, t.medium - 1],
      MEDIUM_RISK: [t.medium, t.high - 1],
      HIGH_RISK: [t.high, t.critical - 1],
      CRITICAL: [t.critical, 100],
    };
    return { category, ...CATEGORY_TEXT[category], scoreRange: ranges[category] };
  }
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(100, Math.max(0, Math.round(score)));
}
