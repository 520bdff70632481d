import type { AnalysisOutcome, Provenance, RiskCategory } from "./types.js";

const THREAT_SCORE = 40;

export interface DepartmentStats {
  readonly total: number;
  readonly byCategory: Record<RiskCategory, number>;
  readonly averageScore: number;
}

export interface BatchMetrics {
  readonly total: number;
  readonly byCategory: Record<RiskCategory, number>;
  readonly byProvenance: Record<Provenance, number>;
  readonly departments: Record<string, DepartmentStats>;
  /** Occurrences of each detected sensitive-data type. */
  readonly sensitiveData: Record<string, number>;
  /** Results scoring above 40. */
  readonly totalThreats: number;
  readonly averageScore: number;
}

function emptyCategoryCounts(): Record<RiskCategory, number> {
  return { APPROVED: 0, LOW_RISK: 0, MEDIUM_RISK: 0, HIGH_RISK: 0, CRITICAL: 0 };
}

function average(sum: number, count: number): number {
  return count === 0 ? 0 : Math.round((sum / count) * 100) / 100;
}

export function computeMetrics(outcomes: readonly AnalysisOutcome[]): BatchMetrics {
  const byCategory = emptyCategoryCounts();
  const byProvenance: Record<Provenance, number> = {
    "fast-path": 0,
    reasoned: 0,
    overridden: 0,
    fallback: 0,
  };
  const departments = new Map<
    string,
    { total: number; scoreSum: number; byCategory: Record<RiskCategory, number> }
  >();
  const sensitiveData: Record<string, number> = {};
  let scoreSum = 0;
  let totalThreats = 0;

  for (const { log, result } of outcomes) {
    byCategory[result.category]++;
    byProvenance[result.provenance]++;
    scoreSum += result.score;
    if (result.score > THREAT_SCORE) totalThreats++;

    let dept = departments.get(log.department);
    if (!dept) {
      dept = { total: 0, scoreSum: 0, byCategory: emptyCategoryCounts() };
      departments.set(log.department, dept);
    }
    dept.total++;
    dept.scoreSum += result.score;
    dept.byCategory[result.category]++;

    for (const kind of result.detectedSensitiveData) {
      sensitiveData[kind] = (sensitiveData[kind] ?? 0) + 1;
    }
  }

  const departmentStats: Record<string, DepartmentStats> = {};
  for (const [name, dept] of [...departments].sort(([a], [b]) => a.localeCompare(b))) {
    departmentStats[name] = {
      total: dept.total,
      byCategory: dept.byCategory,
      averageScore: average(dept.scoreSum, dept.total),
    };
  }

  return {
    total: outcomes.length,
    byCategory,
    byProvenance,
    departments: departmentStats,
    sensitiveData,
    totalThreats,
    averageScore: average(scoreSum, outcomes.length),
  };
}
