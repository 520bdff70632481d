import type { Action } from "../mitigation/types.js";
import type { AnalysisOutcome, RiskCategory } from "./types.js";

const REPORTED: ReadonlySet<RiskCategory> = new Set(["HIGH_RISK", "CRITICAL"]);

export interface IncidentDetail {
  readonly recordId: string;
  readonly timestamp: string;
  readonly userId: string;
  readonly department: string;
  readonly requestUrl: string;
  readonly sourceIp: string;
  readonly category: RiskCategory;
  readonly score: number;
  readonly provenance: string;
  readonly reasoning: string;
  readonly detectedSensitiveData: readonly string[];
  readonly mitigation: string | null;
  readonly unresolved: boolean;
}

export interface IncidentReport {
  readonly reportDate: string;
  readonly summary: {
    readonly totalAnalyzed: number;
    readonly criticalThreats: number;
    readonly highRiskThreats: number;
    readonly unresolvedActions: number;
  };
  readonly detailedIncidents: readonly IncidentDetail[];
}

/** Export of HIGH_RISK and CRITICAL verdicts with their mitigation state. */
export function buildIncidentReport(
  outcomes: readonly AnalysisOutcome[],
  actions: readonly Action[],
  now: Date = new Date(),
): IncidentReport {
  const actionByRecord = new Map(actions.map((a) => [a.recordId, a]));

  const detailedIncidents = outcomes
    .filter(({ result }) => REPORTED.has(result.category))
    .map(({ log, result }): IncidentDetail => {
      const action = actionByRecord.get(result.recordId);
      return {
        recordId: result.recordId,
        timestamp: log.timestamp,
        userId: log.userId,
        department: log.department,
        requestUrl: log.requestUrl,
        sourceIp: log.sourceIp,
        category: result.category,
        score: result.score,
        provenance: result.provenance,
        reasoning: result.reasoning,
        detectedSensitiveData: result.detectedSensitiveData,
        mitigation: action?.kind ?? null,
        unresolved: action?.unresolved ?? false,
      };
    });

  return {
    reportDate: now.toISOString(),
    summary: {
      totalAnalyzed: outcomes.length,
      criticalThreats: outcomes.filter(({ result }) => result.category === "CRITICAL").length,
      highRiskThreats: outcomes.filter(({ result }) => result.category === "HIGH_RISK").length,
      unresolvedActions: actions.filter((a) => a.unresolved).length,
    },
    detailedIncidents,
  };
}
