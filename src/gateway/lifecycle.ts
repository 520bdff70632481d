import { ConversationalAdvisor } from "../advisor/advisor.js";
import { BatchAnalyzer } from "../analysis/batch.js";
import { AnalysisPipeline } from "../analysis/pipeline.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getSnapshotPath, getStateDir } from "../config/paths.js";
import type { SentinelConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { HashingEmbedder } from "../memory/embedder.js";
import { VectorIndex } from "../memory/vector-index.js";
import { LoggingActionSink } from "../mitigation/logging-sink.js";
import { MitigationRouter } from "../mitigation/router.js";
import type { MitigationActionSink } from "../mitigation/types.js";
import { WebhookActionSink } from "../mitigation/webhook-sink.js";
import { PolicyStore } from "../policy/store.js";
import { OpenAIReasoningClient } from "../reasoning/openai-client.js";
import type { ReasoningClient } from "../reasoning/types.js";
import { SentinelDB } from "../vault/db.js";
import { IncidentStore } from "../vault/incidents.js";
import { SentinelServer } from "./server.js";

export const VERSION = "0.1.0";

export interface SentinelOptions {
  readonly configPath?: string;
  /** Already-parsed config; skips loading from disk. */
  readonly config?: SentinelConfig;
  readonly stateDir?: string;
  readonly logger?: Logger;
  readonly reasoning?: ReasoningClient;
  readonly sink?: MitigationActionSink;
}

export interface SentinelContext {
  readonly config: SentinelConfig;
  readonly logger: Logger;
  readonly stateDir: string;
  readonly policy: PolicyStore;
  readonly reasoning: ReasoningClient;
  readonly db: SentinelDB;
  readonly incidents: IncidentStore;
  readonly router: MitigationRouter;
  readonly memory: VectorIndex;
  readonly pipeline: AnalysisPipeline;
  readonly analyzer: BatchAnalyzer;
  readonly advisor: ConversationalAdvisor;
  /** Drain pending mitigation, persist memory and close the database. */
  close(): Promise<void>;
}

function createSink(config: SentinelConfig, logger: Logger): MitigationActionSink {
  const { mitigation } = config;
  if (!mitigation.firewallWebhookUrl && mitigation.alertWebhooks.length === 0) {
    return new LoggingActionSink(logger);
  }
  return new WebhookActionSink(mitigation, logger);
}

/** Build every component from config. Throws ConfigError on invalid config or policy. */
export async function createSentinel(options: SentinelOptions = {}): Promise<SentinelContext> {
  // 1. Config and logging
  const config = options.config ?? loadConfig(options.configPath);
  const logger = options.logger ?? createLogger(config.logging);
  const stateDir = ensureDir(options.stateDir ?? getStateDir());

  // 2. Policy
  const policy = PolicyStore.load(config.policy);

  // 3. Collaborators
  const reasoning =
    options.reasoning ?? new OpenAIReasoningClient(config.reasoning, logger.child({ component: "reasoning" }));
  const sink = options.sink ?? createSink(config, logger.child({ component: "sink" }));

  // 4. Incident store and mitigation
  const db = new SentinelDB(stateDir);
  const incidents = new IncidentStore(db);
  const router = new MitigationRouter(sink, incidents, logger.child({ component: "mitigation" }), {
    securityChannel: config.mitigation.securityChannel,
    retryDelayMs: config.mitigation.retryDelayMs,
  });

  // 5. Memory
  const embedder = new HashingEmbedder(config.memory.dimension);
  const memory = await VectorIndex.open(
    getSnapshotPath(stateDir, config.memory.snapshotPath),
    embedder,
    logger.child({ component: "memory" }),
  );

  // 6. Analysis
  const pipeline = new AnalysisPipeline({
    policy,
    reasoning,
    timeoutMs: config.reasoning.timeoutMs,
    logger: logger.child({ component: "pipeline" }),
  });
  const analyzer = new BatchAnalyzer({
    pipeline,
    logger: logger.child({ component: "batch" }),
    concurrency: config.analysis.concurrency,
    memory,
    router,
  });

  // 7. Advisor
  const advisor = new ConversationalAdvisor({
    memory,
    reasoning,
    policy,
    config: config.advisor,
    timeoutMs: config.reasoning.timeoutMs,
    logger: logger.child({ component: "advisor" }),
    secrets: [
      config.reasoning.apiKey,
      config.mitigation.firewallWebhookUrl,
      ...config.mitigation.alertWebhooks.map((hook) => hook.url),
    ],
  });

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await router.drain();
    try {
      await memory.persist();
    } catch (err) {
      logger.error({ err }, "Failed to persist memory index");
    }
    db.close();
  };

  return {
    config,
    logger,
    stateDir,
    policy,
    reasoning,
    db,
    incidents,
    router,
    memory,
    pipeline,
    analyzer,
    advisor,
    close,
  };
}

export interface RunningSentinel {
  readonly context: SentinelContext;
  readonly server: SentinelServer;
  stop(): Promise<void>;
}

/** Build the components, start the HTTP API and stop cleanly on SIGINT/SIGTERM. */
export async function startSentinel(options: SentinelOptions = {}): Promise<RunningSentinel> {
  const context = await createSentinel(options);
  const { config, logger } = context;
  logger.info("Starting shadow-sentinel...");

  const server = new SentinelServer(
    {
      analyzer: context.analyzer,
      advisor: context.advisor,
      memory: context.memory,
      incidents: context.incidents,
      logger: logger.child({ component: "http" }),
      version: VERSION,
    },
    config.server.port,
    config.server.hostname,
  );
  await server.start();

  const SHUTDOWN_TIMEOUT_MS = 15_000;
  let shutdownInProgress = false;

  const stop = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await server.stop();
    await context.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    stop().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ port: config.server.port }, "shadow-sentinel started");
  return { context, server, stop };
}
