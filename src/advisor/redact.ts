export const REDACTED = "[REDACTED]";

const MIN_SECRET_LENGTH = 6;

const CREDENTIAL_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bsk-[A-Za-z0-9_-]{8,}/g, REDACTED],
  [/\bBearer\s+[A-Za-z0-9._~+/-]+=*/gi, `Bearer ${REDACTED}`],
  [/\b(password|passwd|pwd|api[_-]?key|secret|token)(\s*[:=]\s*)[^\s,;]+/gi, `$1$2${REDACTED}`],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export type Redactor = (text: string) => string;

/**
 * Replace the given secrets and anything credential-shaped with
 * [REDACTED]. Secrets shorter than six characters are ignored.
 */
export function createRedactor(secrets: ReadonlyArray<string | undefined>): Redactor {
  const literals = [...new Set(secrets)]
    .filter((s): s is string => typeof s === "string" && s.length >= MIN_SECRET_LENGTH)
    // Longest first so a secret containing another is replaced whole
    .sort((a, b) => b.length - a.length)
    .map((s) => new RegExp(escapeRegExp(s), "g"));

  return (text) => {
    let out = text;
    for (const literal of literals) out = out.replace(literal, REDACTED);
    for (const [pattern, replacement] of CREDENTIAL_PATTERNS) out = out.replace(pattern, replacement);
    return out;
  };
}
