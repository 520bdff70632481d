import type { Logger } from "../logging/logger.js";
import type { VectorIndex } from "../memory/vector-index.js";
import { summarizeForMemory } from "../memory/summary.js";
import type { MitigationRouter } from "../mitigation/router.js";
import { Semaphore } from "../utils/concurrency.js";
import { RecordParseError } from "../utils/errors.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { computeMetrics, type BatchMetrics } from "./metrics.js";
import type { AnalysisPipeline } from "./pipeline.js";
import { parseRequestLog } from "./record.js";
import type { AnalysisOutcome, RecordError, RequestLog } from "./types.js";

export interface BatchReport {
  /** Surviving records, in input order. */
  readonly results: readonly AnalysisOutcome[];
  readonly errors: readonly RecordError[];
  readonly cancelled: boolean;
  readonly metrics: BatchMetrics;
}

export type BatchEvents = {
  result: [outcome: AnalysisOutcome, index: number];
  "record-error": [error: RecordError];
  cancelled: [scheduled: number];
};

export interface BatchAnalyzerDeps {
  readonly pipeline: AnalysisPipeline;
  readonly logger: Logger;
  readonly concurrency: number;
  readonly memory?: VectorIndex | null;
  readonly router?: MitigationRouter | null;
}

export interface AnalyzeOptions {
  readonly signal?: AbortSignal;
  /** Overrides the configured worker count for this batch. */
  readonly concurrency?: number;
}

function toRecordError(index: number, err: RecordParseError): RecordError {
  return { index, code: "RECORD_PARSE", message: err.message, issues: [...err.issues] };
}

/**
 * Runs many logs through the pipeline on a bounded worker pool. Cancellation
 * is checked before each record is scheduled; records already running finish.
 */
export class BatchAnalyzer {
  readonly events = new TypedEventEmitter<BatchEvents>();

  constructor(private readonly deps: BatchAnalyzerDeps) {}

  async analyze(records: readonly unknown[], opts: AnalyzeOptions = {}): Promise<BatchReport> {
    const semaphore = new Semaphore(opts.concurrency ?? this.deps.concurrency);
    const slots: Array<AnalysisOutcome | undefined> = new Array(records.length);
    const errors: RecordError[] = [];
    const running: Promise<void>[] = [];
    let cancelled = false;

    for (let index = 0; index < records.length; index++) {
      if (opts.signal?.aborted) {
        cancelled = true;
        break;
      }

      let log: RequestLog;
      try {
        log = parseRequestLog(records[index], index);
      } catch (err) {
        if (!(err instanceof RecordParseError)) throw err;
        errors.push(this.reportError(toRecordError(index, err)));
        continue;
      }

      await semaphore.acquire();
      if (opts.signal?.aborted) {
        semaphore.release();
        cancelled = true;
        break;
      }

      running.push(
        this.analyzeOne(log, index, slots, errors).finally(() => semaphore.release()),
      );
    }

    const settled = await Promise.allSettled(running);
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
    }

    if (cancelled) {
      this.deps.logger.warn({ scheduled: running.length, total: records.length }, "Batch cancelled");
      this.events.emit("cancelled", running.length);
    }

    const results = slots.filter((slot): slot is AnalysisOutcome => slot !== undefined);
    errors.sort((a, b) => a.index - b.index);

    if (this.deps.memory && results.length > 0) {
      try {
        await this.deps.memory.persist();
      } catch (err) {
        this.deps.logger.error({ err }, "Failed to persist memory index after batch");
      }
    }

    this.deps.logger.info(
      { analyzed: results.length, errors: errors.length, cancelled },
      "Batch analysis complete",
    );
    return { results, errors, cancelled, metrics: computeMetrics(results) };
  }

  private async analyzeOne(
    log: RequestLog,
    index: number,
    slots: Array<AnalysisOutcome | undefined>,
    errors: RecordError[],
  ): Promise<void> {
    let outcome: AnalysisOutcome;
    try {
      const { result } = await this.deps.pipeline.run(log);
      outcome = { log, result };
    } catch (err) {
      if (!(err instanceof RecordParseError)) throw err;
      errors.push(this.reportError(toRecordError(index, err)));
      return;
    }

    slots[index] = outcome;
    this.events.emit("result", outcome, index);
    this.deps.router?.submit(outcome.result, log);

    if (this.deps.memory) {
      try {
        await this.deps.memory.insert(summarizeForMemory(log, outcome.result));
      } catch (err) {
        this.deps.logger.error({ err, recordId: log.id }, "Memory insert failed");
      }
    }
  }

  private reportError(error: RecordError): RecordError {
    this.deps.logger.warn(
      { index: error.index, issues: error.issues },
      `Skipping malformed record: ${error.message}`,
    );
    this.events.emit("record-error", error);
    return error;
  }
}
