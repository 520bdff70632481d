import { hostOf } from "../analysis/record.js";
import type { AnalysisResult, RequestLog, RiskCategory } from "../analysis/types.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage, MitigationDispatchError } from "../utils/errors.js";
import { retry } from "../utils/retry.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import type { IncidentStore } from "../vault/incidents.js";
import type {
  Action,
  ActionKind,
  ActionStep,
  MitigationActionSink,
  StepOutcome,
} from "./types.js";

export interface MitigationRouterOptions {
  readonly securityChannel: string;
  /** Delay before the single retry of a transient sink failure. */
  readonly retryDelayMs: number;
}

export type MitigationEvents = {
  action: [action: Action];
  unresolved: [action: Action];
};

interface PlanContext {
  readonly result: AnalysisResult;
  readonly log: RequestLog;
  readonly securityChannel: string;
}

const MAX_SINK_ATTEMPTS = 2;

function userAlertMessage({ result, log }: PlanContext): string {
  return (
    result.userMessage ??
    `Your request to ${hostOf(log.requestUrl) ?? log.requestUrl} was flagged as ${result.category}. ` +
      "Please use the approved internal AI platform for work data."
  );
}

function securityAlertMessage({ result, log }: PlanContext): string {
  const detected =
    result.detectedSensitiveData.length > 0 ? result.detectedSensitiveData.join(", ") : "none";
  return [
    `[${result.category}] score ${result.score} (${result.provenance})`,
    `User: ${log.userId} (${log.department}) from ${log.sourceIp}`,
    `Destination: ${log.requestUrl}`,
    `Sensitive data: ${detected}`,
    `Reasoning: ${result.reasoning}`,
  ].join("\n");
}

const ACTION_TABLE: Record<
  RiskCategory,
  { readonly kind: ActionKind; readonly plan: (ctx: PlanContext) => ActionStep[] }
> = {
  APPROVED: {
    kind: "allow",
    plan: () => [{ type: "log", level: "debug" }],
  },
  LOW_RISK: {
    kind: "monitor",
    plan: () => [{ type: "log", level: "info" }],
  },
  MEDIUM_RISK: {
    kind: "warn_user",
    plan: (ctx) => [
      { type: "alert", channel: `user:${ctx.log.userId}`, message: userAlertMessage(ctx) },
    ],
  },
  HIGH_RISK: {
    kind: "block_and_notify",
    plan: (ctx) => [
      { type: "block", ip: ctx.log.sourceIp },
      { type: "alert", channel: ctx.securityChannel, message: securityAlertMessage(ctx) },
    ],
  },
  CRITICAL: {
    kind: "block_notify_incident",
    plan: (ctx) => [
      { type: "open_incident" },
      { type: "block", ip: ctx.log.sourceIp },
      { type: "alert", channel: ctx.securityChannel, message: securityAlertMessage(ctx) },
    ],
  },
};

function isTransient(err: unknown): boolean {
  return err instanceof MitigationDispatchError && err.transient;
}

function describeStep(step: ActionStep): string {
  switch (step.type) {
    case "log":
      return "log";
    case "alert":
      return `alert ${step.channel}`;
    case "block":
      return `block ${step.ip}`;
    case "open_incident":
      return "open incident";
  }
}

/**
 * Turns a finalized verdict into side effects. Never mutates the result;
 * a step that still fails after its retry leaves the action unresolved.
 */
export class MitigationRouter {
  readonly events = new TypedEventEmitter<MitigationEvents>();
  private readonly inFlight = new Set<Promise<Action>>();

  constructor(
    private readonly sink: MitigationActionSink,
    private readonly incidents: IncidentStore | null,
    private readonly logger: Logger,
    private readonly options: MitigationRouterOptions,
  ) {}

  /** Plan the action for a verdict without executing it. */
  route(result: AnalysisResult, log: RequestLog): Action {
    const entry = ACTION_TABLE[result.category];
    return {
      recordId: result.recordId,
      category: result.category,
      kind: entry.kind,
      steps: entry.plan({ result, log, securityChannel: this.options.securityChannel }),
      outcomes: [],
      incidentId: null,
      unresolved: false,
      failures: [],
    };
  }

  async dispatch(result: AnalysisResult, log: RequestLog): Promise<Action> {
    const planned = this.route(result, log);
    const outcomes: StepOutcome[] = [];
    const failures: string[] = [];
    let incidentId: string | null = null;

    for (const step of planned.steps) {
      const outcome = await this.execute(step, result, log);
      outcomes.push(outcome.outcome);
      if (outcome.incidentId) incidentId = outcome.incidentId;
      if (outcome.outcome.status === "failed") {
        failures.push(`${describeStep(step)}: ${outcome.outcome.error ?? "unknown error"}`);
      }
    }

    if (failures.length > 0) {
      incidentId = this.recordUnresolved(result, log, incidentId, failures);
    }

    const action: Action = {
      ...planned,
      outcomes,
      incidentId,
      unresolved: failures.length > 0,
      failures,
    };

    if (action.unresolved) {
      this.logger.error(
        { recordId: action.recordId, category: action.category, failures },
        "Mitigation unresolved",
      );
      this.events.emit("unresolved", action);
    } else {
      this.logger.debug({ recordId: action.recordId, kind: action.kind }, "Mitigation dispatched");
    }
    this.events.emit("action", action);
    return action;
  }

  /** Dispatch without waiting. Use drain() to wait for everything submitted. */
  submit(result: AnalysisResult, log: RequestLog): void {
    const pending = this.dispatch(result, log);
    this.inFlight.add(pending);
    pending
      .catch((err: unknown) => {
        this.logger.error({ err, recordId: result.recordId }, "Mitigation dispatch crashed");
      })
      .finally(() => {
        this.inFlight.delete(pending);
      });
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** Wait until every submitted dispatch has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async execute(
    step: ActionStep,
    result: AnalysisResult,
    log: RequestLog,
  ): Promise<{ outcome: StepOutcome; incidentId?: string }> {
    switch (step.type) {
      case "log":
        this.logger[step.level](
          { recordId: result.recordId, category: result.category, userId: log.userId },
          "Request recorded",
        );
        return { outcome: { step, status: "ok", attempts: 1 } };
      case "open_incident": {
        if (!this.incidents) return { outcome: { step, status: "ok", attempts: 1 } };
        try {
          const incident = this.incidents.open(log, result);
          return { outcome: { step, status: "ok", attempts: 1 }, incidentId: incident.id };
        } catch (err) {
          return { outcome: { step, status: "failed", attempts: 1, error: errorMessage(err) } };
        }
      }
      case "block":
        return { outcome: await this.callSink(step, () => this.sink.triggerBlock(step.ip)) };
      case "alert":
        return {
          outcome: await this.callSink(step, () =>
            this.sink.broadcastAlert(step.channel, step.message),
          ),
        };
    }
  }

  private async callSink(step: ActionStep, call: () => Promise<unknown>): Promise<StepOutcome> {
    let attempts = 0;
    try {
      await retry(
        async () => {
          attempts++;
          return call();
        },
        {
          maxAttempts: MAX_SINK_ATTEMPTS,
          baseDelayMs: this.options.retryDelayMs,
          maxDelayMs: this.options.retryDelayMs,
          shouldRetry: isTransient,
          onRetry: (err) => {
            this.logger.warn({ err, step: describeStep(step) }, "Mitigation step failed, retrying once");
          },
        },
      );
      return { step, status: "ok", attempts };
    } catch (err) {
      return { step, status: "failed", attempts, error: errorMessage(err) };
    }
  }

  private recordUnresolved(
    result: AnalysisResult,
    log: RequestLog,
    incidentId: string | null,
    failures: readonly string[],
  ): string | null {
    if (!this.incidents) return incidentId;
    const reason = failures.join("; ");
    try {
      if (incidentId) {
        this.incidents.markUnresolved(incidentId, reason);
        return incidentId;
      }
      return this.incidents.open(log, result, "unresolved", reason).id;
    } catch (err) {
      this.logger.error({ err, recordId: result.recordId }, "Failed to record unresolved incident");
      return incidentId;
    }
  }
}
