import { z } from "zod";
import type { SentinelConfig } from "./types.js";
import { DEFAULT_POLICY } from "../policy/defaults.js";
import { ConfigError } from "../utils/errors.js";

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const sensitivePatternSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, "only i, m, s and u flags are allowed").default(""),
});

const thresholdSchema = z.object({
  low: z.number().int().min(1).max(21),
  medium: z.number().int().max(100),
  high: z.number().int().max(100),
  critical: z.number().int().max(100),
});

const overrideSchema = z.object({
  payloadSizeThresholdKb: z.number().nonnegative(),
  highSensitivityPatterns: z.array(z.string().min(1)).default([]),
  piiCombinations: z.array(z.array(z.string().min(1)).min(1)).default([]),
});

export const policySchema = z
  .object({
    approvedDomains: z.array(z.string().min(1)),
    externalAiServices: z.array(z.string().min(1)).default([]),
    maliciousDomains: z.array(z.string().min(1)),
    sensitivePatterns: z.array(sensitivePatternSchema),
    departmentWeights: z.record(z.string(), z.number().min(0).max(100)).default({}),
    defaultDepartmentWeight: z.number().min(0).max(100).default(0),
    thresholds: thresholdSchema,
    override: overrideSchema,
  })
  .superRefine((policy, ctx) => {
    const { low, medium, high, critical } = policy.thresholds;
    if (!(low < medium && medium < high && high < critical)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["thresholds"],
        message: `thresholds must be strictly increasing (got ${low}/${medium}/${high}/${critical})`,
      });
    }

    const names = new Set<string>();
    policy.sensitivePatterns.forEach((p, i) => {
      if (names.has(p.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sensitivePatterns", i, "name"],
          message: `duplicate pattern name "${p.name}"`,
        });
      }
      names.add(p.name);
      try {
        new RegExp(p.pattern, p.flags);
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sensitivePatterns", i, "pattern"],
          message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
    });

    const referenced = [
      ...policy.override.highSensitivityPatterns,
      ...policy.override.piiCombinations.flat(),
    ];
    for (const name of referenced) {
      if (!names.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["override"],
          message: `override references unknown pattern "${name}"`,
        });
      }
    }
  });

const reasoningSchema = z
  .object({
    provider: z.enum(["openai", "ollama"]).default("openai"),
    model: z.string().min(1).optional(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(30_000),
    temperature: z.number().min(0).max(2).default(0.1),
    maxTokens: z.number().int().positive().default(500),
  })
  .transform((r) => ({
    ...r,
    model: r.model ?? (r.provider === "ollama" ? "llama3.2:1b" : "gpt-4o-mini"),
  }));

const analysisSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
});

const alertWebhookSchema = z.object({
  channel: z.string().min(1),
  url: z.string().url(),
  format: z.enum(["slack", "teams", "generic"]).default("generic"),
});

const mitigationSchema = z.object({
  securityChannel: z.string().min(1).default("security"),
  firewallWebhookUrl: z.string().url().optional(),
  alertWebhooks: z.array(alertWebhookSchema).default([]),
  requestTimeoutMs: z.number().int().positive().default(5_000),
  retryDelayMs: z.number().int().nonnegative().default(250),
});

const memorySchema = z.object({
  dimension: z.number().int().min(8).max(4096).default(256),
  snapshotPath: z.string().optional(),
});

const advisorSchema = z.object({
  topK: z.number().int().min(1).max(50).default(5),
  historyTurns: z.number().int().min(0).max(100).default(10),
  persona: z.string().min(1).optional(),
});

const serverSchema = z.object({
  port: z.number().int().positive().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

export const sentinelConfigSchema = z.object({
  logging: loggingSchema.default({}),
  policy: policySchema.default(DEFAULT_POLICY),
  reasoning: reasoningSchema.default({}),
  analysis: analysisSchema.default({}),
  mitigation: mitigationSchema.default({}),
  memory: memorySchema.default({}),
  advisor: advisorSchema.default({}),
  server: serverSchema.default({}),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseConfig(raw: unknown): SentinelConfig {
  const result = sentinelConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
