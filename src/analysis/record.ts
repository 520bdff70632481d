import { createHash } from "node:crypto";
import { z } from "zod";
import type { RequestLog } from "./types.js";
import { formatIssues } from "../config/schema.js";
import { RecordParseError } from "../utils/errors.js";
import { isRecord } from "../utils/types.js";

const ID_LENGTH = 24;

/** Input keys as exported by the proxy (snake_case) mapped to their camelCase form. */
const KEY_ALIASES: Record<string, string> = {
  user_id: "userId",
  request_url: "requestUrl",
  payload_size_kb: "payloadSizeKb",
  payload_snippet: "payloadSnippet",
  user_agent: "userAgent",
  ip_address: "sourceIp",
  source_ip: "sourceIp",
};

const requestLogSchema = z.object({
  timestamp: z.string().min(1),
  userId: z.string().min(1),
  department: z.string().min(1).default("Unknown"),
  requestUrl: z
    .string()
    .min(1)
    .refine((url) => hostOf(url) !== null, "request URL has no parseable host"),
  method: z.string().min(1).default("POST").transform((m) => m.toUpperCase()),
  payloadSizeKb: z.coerce.number().nonnegative().default(0),
  payloadSnippet: z.string().default(""),
  userAgent: z.string().default(""),
  sourceIp: z.string().default("0.0.0.0"),
});

/**
 * Lowercase host of a request URL. URLs without a scheme are read as https.
 * Returns null when no host can be extracted.
 */
export function hostOf(url: string): string | null {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `https://${url}`;
  try {
    const host = new URL(candidate).hostname.toLowerCase();
    return host.length > 0 ? host : null;
  } catch {
    return null;
  }
}

export function deriveRecordId(fields: Omit<RequestLog, "id">): string {
  return createHash("sha256")
    .update(
      [
        fields.timestamp,
        fields.userId,
        fields.method,
        fields.requestUrl,
        fields.sourceIp,
        fields.payloadSnippet,
      ].join("\u0000"),
    )
    .digest("hex")
    .slice(0, ID_LENGTH);
}

function normalizeKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const target = KEY_ALIASES[key] ?? key;
    if (out[target] === undefined) out[target] = value;
  }
  return out;
}

/** Validate one raw input record. Throws RecordParseError. */
export function parseRequestLog(raw: unknown, index: number | null = null): RequestLog {
  if (!isRecord(raw)) {
    throw new RecordParseError("record is not an object", index, ["expected an object"]);
  }

  const parsed = requestLogSchema.safeParse(normalizeKeys(raw));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new RecordParseError(`malformed request log: ${issues.join("; ")}`, index, issues);
  }

  return Object.freeze({ id: deriveRecordId(parsed.data), ...parsed.data });
}
