import { readFile, writeFile } from "node:fs/promises";
import { Command, Option } from "clipanion";
import { buildIncidentReport } from "../../analysis/report.js";
import type { BatchReport } from "../../analysis/batch.js";
import { RISK_CATEGORIES } from "../../analysis/types.js";
import { createSentinel, type SentinelContext } from "../../gateway/lifecycle.js";
import type { Action } from "../../mitigation/types.js";
import { ConfigError, errorMessage } from "../../utils/errors.js";
import { isRecord } from "../../utils/types.js";

/** Accepts a bare array or an object with a `records` array. */
export function extractRecords(raw: unknown): unknown[] | null {
  if (Array.isArray(raw)) return raw;
  if (isRecord(raw) && Array.isArray(raw["records"])) return raw["records"];
  return null;
}

export function formatSummary(report: BatchReport): string {
  const { metrics } = report;
  const lines = [
    `Analyzed: ${metrics.total}  Skipped: ${report.errors.length}${report.cancelled ? "  (cancelled)" : ""}`,
    `Threats (score > 40): ${metrics.totalThreats}  Average score: ${metrics.averageScore}`,
    "",
    ...RISK_CATEGORIES.map((c) => `  ${c.padEnd(12)} ${metrics.byCategory[c]}`),
  ];

  const flagged = report.results.filter(
    ({ result }) => result.category === "HIGH_RISK" || result.category === "CRITICAL",
  );
  if (flagged.length > 0) {
    lines.push("", "Flagged:");
    for (const { log, result } of flagged) {
      lines.push(
        `  ${result.category.padEnd(9)} ${String(result.score).padStart(3)}  ${log.userId} (${log.department}) -> ${log.requestUrl} [${result.provenance}]`,
      );
    }
  }

  for (const error of report.errors) {
    lines.push(`  record ${error.index}: ${error.message}`);
  }
  return lines.join("\n") + "\n";
}

export class AnalyzeCommand extends Command {
  static override paths = [["analyze"]];

  static override usage = Command.Usage({
    description: "Classify a JSON file of request logs",
    examples: [
      ["Analyze a log export", "sentinel analyze ./logs.json"],
      ["Write an incident report", "sentinel analyze ./logs.json --report ./incidents.json"],
    ],
  });

  file = Option.String({ name: "file" });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  concurrency = Option.String("--concurrency", { description: "Parallel reasoning calls", required: false });

  report = Option.String("--report", { description: "Write an incident report to this path", required: false });

  json = Option.Boolean("--json", false, { description: "Print the full batch report as JSON" });

  async execute(): Promise<void> {
    const concurrency = this.concurrency === undefined ? undefined : Number(this.concurrency);
    if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
      this.context.stdout.write(`--concurrency must be a positive integer\n`);
      process.exitCode = 1;
      return;
    }

    let records: unknown[] | null;
    try {
      records = extractRecords(JSON.parse(await readFile(this.file, "utf-8")));
    } catch (err) {
      this.context.stdout.write(`Cannot read ${this.file}: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }
    if (!records) {
      this.context.stdout.write(`${this.file} must contain a JSON array of request logs\n`);
      process.exitCode = 1;
      return;
    }

    let sentinel: SentinelContext;
    try {
      sentinel = await createSentinel({ configPath: this.config });
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      this.context.stdout.write(`${err.message}\n`);
      process.exitCode = 1;
      return;
    }

    const actions: Action[] = [];
    sentinel.router.events.on("action", (action) => actions.push(action));

    const abort = new AbortController();
    const onSigint = (): void => abort.abort();
    process.once("SIGINT", onSigint);

    try {
      const report = await sentinel.analyzer.analyze(records, { concurrency, signal: abort.signal });
      await sentinel.router.drain();

      if (this.report) {
        const incidentReport = buildIncidentReport(report.results, actions);
        await writeFile(this.report, JSON.stringify(incidentReport, null, 2) + "\n", "utf-8");
      }

      this.context.stdout.write(this.json ? JSON.stringify(report, null, 2) + "\n" : formatSummary(report));
      if (this.report) this.context.stdout.write(`Incident report written to ${this.report}\n`);
    } finally {
      process.off("SIGINT", onSigint);
      await sentinel.close();
    }
  }
}
