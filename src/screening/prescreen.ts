import type { PreScreenVerdict, RequestLog } from "../analysis/types.js";
import { hostOf } from "../analysis/record.js";
import type { PolicyStore } from "../policy/store.js";
import { RecordParseError } from "../utils/errors.js";

/**
 * Local, deterministic screening. Runs before any external call and is the
 * only gate allowed to skip reasoning.
 */
export function screen(log: RequestLog, policy: PolicyStore): PreScreenVerdict {
  const domain = hostOf(log.requestUrl);
  if (!domain) {
    throw new RecordParseError(`request URL has no parseable host: ${log.requestUrl}`, null, [
      "requestUrl: no parseable host",
    ]);
  }

  const approvedDomain = policy.isApprovedDomain(log.requestUrl);
  const maliciousDomainMatch = policy.isMaliciousDomain(log.requestUrl);
  const sensitiveMatches = policy.scanSensitive(log.payloadSnippet);

  return Object.freeze({
    domain,
    approvedDomain,
    maliciousDomainMatch,
    externalAiService: policy.isExternalAiService(log.requestUrl),
    fastTrackEligible: approvedDomain && sensitiveMatches.size === 0,
    sensitiveMatches,
    departmentWeight: policy.departmentWeight(log.department),
  });
}
