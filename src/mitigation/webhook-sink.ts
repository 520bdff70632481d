import type { AlertFormat, MitigationConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage, MitigationDispatchError } from "../utils/errors.js";
import type { MitigationActionSink, SinkAck } from "./types.js";

export type FetchFn = typeof fetch;

/** Slack incoming webhook, Teams MessageCard, or a plain JSON body. */
export function formatAlert(format: AlertFormat, channel: string, message: string, at: Date): unknown {
  switch (format) {
    case "slack":
      return { text: message };
    case "teams":
      return {
        "@type": "MessageCard",
        "@context": "http://schema.org/extensions",
        summary: "Shadow AI alert",
        themeColor: "D70000",
        title: "Shadow AI alert",
        text: message,
      };
    case "generic":
      return { channel, message, timestamp: at.toISOString() };
  }
}

/** A binding matches its channel exactly, "*", or a "prefix:*" wildcard. */
export function matchesChannel(binding: string, channel: string): boolean {
  if (binding === "*" || binding === channel) return true;
  return binding.endsWith(":*") && channel.startsWith(binding.slice(0, -1));
}

const MAX_PARTIAL_ALERTS = 256;

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

function toDispatchError(err: unknown): MitigationDispatchError {
  return err instanceof MitigationDispatchError
    ? err
    : new MitigationDispatchError(errorMessage(err), false, { cause: err });
}

/**
 * Delivers blocks and alerts over HTTP webhooks: a firewall/SOAR hook for
 * blocks, and per-channel Slack, Teams or generic hooks for alerts.
 */
export class WebhookActionSink implements MitigationActionSink {
  private readonly fetchFn: FetchFn;
  /** Hooks that accepted an alert whose delivery failed elsewhere, by channel and message. */
  private readonly partialAlerts = new Map<string, Set<string>>();

  constructor(
    private readonly config: Pick<
      MitigationConfig,
      "firewallWebhookUrl" | "alertWebhooks" | "requestTimeoutMs"
    >,
    private readonly logger: Logger,
    fetchFn?: FetchFn,
  ) {
    this.fetchFn = fetchFn ?? fetch;
  }

  async triggerBlock(ip: string): Promise<SinkAck> {
    const url = this.config.firewallWebhookUrl;
    if (!url) {
      this.logger.info({ ip }, "Block requested but no firewall webhook is configured");
      return { ok: true, detail: "no firewall webhook" };
    }

    await this.post(url, {
      event: "MITIGATION_TRIGGERED",
      action: "block",
      ip,
      timestamp: new Date().toISOString(),
    });
    this.logger.info({ ip }, "Block sent to firewall webhook");
    return { ok: true, detail: "blocked" };
  }

  async broadcastAlert(channel: string, message: string): Promise<SinkAck> {
    const targets = this.config.alertWebhooks.filter((hook) => matchesChannel(hook.channel, channel));
    if (targets.length === 0) {
      this.logger.info({ channel }, "No alert webhook bound to channel");
      return { ok: true, detail: "no webhook bound" };
    }

    // A retried alert skips the hooks that already accepted it
    const key = `${channel}\n${message}`;
    const accepted = this.partialAlerts.get(key) ?? new Set<string>();
    const pending = targets.filter((hook) => !accepted.has(hook.url));

    const now = new Date();
    const outcomes = await Promise.allSettled(
      pending.map((hook) => this.post(hook.url, formatAlert(hook.format, channel, message, now))),
    );
    const failures: MitigationDispatchError[] = [];
    outcomes.forEach((outcome, i) => {
      const hook = pending[i];
      if (!hook) return;
      if (outcome.status === "fulfilled") {
        accepted.add(hook.url);
      } else {
        failures.push(toDispatchError(outcome.reason));
      }
    });

    if (failures.length === 0) {
      this.partialAlerts.delete(key);
      this.logger.debug({ channel, hooks: targets.length }, "Alert delivered");
      return { ok: true, detail: `sent to ${targets.length} webhook(s)` };
    }

    const transient = failures.every((err) => err.transient);
    if (transient && accepted.size > 0) {
      this.rememberPartial(key, accepted);
    } else {
      this.partialAlerts.delete(key);
    }
    throw new MitigationDispatchError(failures.map((err) => err.message).join("; "), transient);
  }

  private rememberPartial(key: string, accepted: Set<string>): void {
    this.partialAlerts.delete(key);
    this.partialAlerts.set(key, accepted);
    while (this.partialAlerts.size > MAX_PARTIAL_ALERTS) {
      const oldest = this.partialAlerts.keys().next();
      if (oldest.done) break;
      this.partialAlerts.delete(oldest.value);
    }
  }

  private async post(url: string, body: unknown): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      throw new MitigationDispatchError(`webhook request failed: ${errorMessage(err)}`, true, {
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new MitigationDispatchError(
        `webhook responded ${response.status} ${response.statusText}`.trim(),
        isTransientStatus(response.status),
      );
    }
  }
}
