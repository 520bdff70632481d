import type { Logger } from "../logging/logger.js";
import type { MitigationActionSink, SinkAck } from "./types.js";

/** Acknowledges every call and only logs it. */
export class LoggingActionSink implements MitigationActionSink {
  constructor(private readonly logger: Logger) {}

  async triggerBlock(ip: string): Promise<SinkAck> {
    this.logger.info({ ip }, "Block requested (no firewall webhook configured)");
    return { ok: true, detail: "logged" };
  }

  async broadcastAlert(channel: string, message: string): Promise<SinkAck> {
    this.logger.info({ channel, message }, "Alert (no alert webhook configured)");
    return { ok: true, detail: "logged" };
  }
}
