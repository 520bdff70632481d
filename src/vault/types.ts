import type { RiskCategory } from "../analysis/types.js";

export type IncidentStatus = "open" | "unresolved" | "closed";

export interface Incident {
  readonly id: string;
  readonly recordId: string;
  readonly userId: string;
  readonly department: string;
  readonly sourceIp: string;
  readonly requestUrl: string;
  readonly category: RiskCategory;
  readonly score: number;
  readonly reasoning: string;
  readonly status: IncidentStatus;
  readonly failureReason: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}
