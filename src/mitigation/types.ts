import type { RiskCategory } from "../analysis/types.js";

export type ActionKind =
  | "allow"
  | "monitor"
  | "warn_user"
  | "block_and_notify"
  | "block_notify_incident";

export type ActionStep =
  | { readonly type: "log"; readonly level: "debug" | "info" }
  | { readonly type: "alert"; readonly channel: string; readonly message: string }
  | { readonly type: "block"; readonly ip: string }
  | { readonly type: "open_incident" };

export type StepStatus = "ok" | "failed";

export interface StepOutcome {
  readonly step: ActionStep;
  readonly status: StepStatus;
  readonly attempts: number;
  readonly error?: string;
}

export interface Action {
  readonly recordId: string;
  readonly category: RiskCategory;
  readonly kind: ActionKind;
  readonly steps: readonly ActionStep[];
  readonly outcomes: readonly StepOutcome[];
  readonly incidentId: string | null;
  /** Set when any step failed after its retry. */
  readonly unresolved: boolean;
  readonly failures: readonly string[];
}

export interface SinkAck {
  readonly ok: true;
  readonly detail?: string;
}

/**
 * Side-effecting collaborator. Rejects with MitigationDispatchError; the
 * `transient` flag decides whether the router retries.
 */
export interface MitigationActionSink {
  triggerBlock(ip: string): Promise<SinkAck>;
  broadcastAlert(channel: string, message: string): Promise<SinkAck>;
}
