import { Command, Option } from "clipanion";
import { z } from "zod";
import { ensureDir, getStateDir } from "../../config/paths.js";
import { SentinelDB } from "../../vault/db.js";
import { IncidentStore } from "../../vault/incidents.js";
import type { Incident } from "../../vault/types.js";

const statusSchema = z.enum(["open", "unresolved", "closed"]);

export function formatIncident(incident: Incident): string {
  const when = new Date(incident.createdAt).toISOString();
  const line = `${when}  ${incident.status.padEnd(10)} ${incident.category.padEnd(9)} ${String(incident.score).padStart(3)}  ${incident.userId} (${incident.department}) ${incident.sourceIp} -> ${incident.requestUrl}`;
  return incident.failureReason ? `${line}\n    failure: ${incident.failureReason}` : line;
}

export class IncidentsListCommand extends Command {
  static override paths = [["incidents", "list"]];

  static override usage = Command.Usage({
    description: "List recorded incidents",
    examples: [
      ["List recent incidents", "sentinel incidents list"],
      ["Only unresolved", "sentinel incidents list --status unresolved"],
    ],
  });

  status = Option.String("--status", { description: "open, unresolved or closed", required: false });

  limit = Option.String("--limit", "50", { description: "Maximum rows" });

  async execute(): Promise<void> {
    const status = this.status === undefined ? undefined : statusSchema.safeParse(this.status);
    if (status && !status.success) {
      this.context.stdout.write(`Unknown status "${this.status}" (expected open, unresolved or closed)\n`);
      process.exitCode = 1;
      return;
    }
    const limit = Number(this.limit);

    const db = new SentinelDB(ensureDir(getStateDir()));
    try {
      const incidents = new IncidentStore(db).list({
        status: status?.data,
        limit: Number.isInteger(limit) && limit > 0 ? limit : 50,
      });
      if (incidents.length === 0) {
        this.context.stdout.write("No incidents.\n");
        return;
      }
      for (const incident of incidents) {
        this.context.stdout.write(formatIncident(incident) + "\n");
      }
    } finally {
      db.close();
    }
  }
}
