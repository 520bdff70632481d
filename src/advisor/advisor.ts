import type { AnalysisResult, RequestLog } from "../analysis/types.js";
import type { AdvisorConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { MemoryHit, VectorIndex } from "../memory/vector-index.js";
import type { PolicyStore } from "../policy/store.js";
import type { ReasoningClient } from "../reasoning/types.js";
import { KeyedMutex } from "../utils/concurrency.js";
import { ReasoningTimeout, toReasoningFailure, type ReasoningFailure } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { buildAdvisorMessages, DEFAULT_PERSONA } from "./context.js";
import { createRedactor, type Redactor } from "./redact.js";
import { SessionStore, type ConversationSession, type ConversationTurn } from "./session.js";

export interface AdvisorDeps {
  readonly memory: VectorIndex;
  readonly reasoning: ReasoningClient;
  readonly policy: PolicyStore;
  readonly config: AdvisorConfig;
  readonly timeoutMs: number;
  readonly logger: Logger;
  /** Literal values that must never reach the reasoning service. */
  readonly secrets?: ReadonlyArray<string | undefined>;
}

function apology(failure: ReasoningFailure): string {
  return `Sorry, I could not reach the analysis service (${failure.code}). Please try again shortly.`;
}

/**
 * Retrieval-augmented Q&A over analyzed incidents. One interaction per
 * session runs at a time.
 */
export class ConversationalAdvisor {
  private readonly sessions = new SessionStore();
  private readonly locks = new KeyedMutex();
  private readonly redact: Redactor;

  constructor(private readonly deps: AdvisorDeps) {
    this.redact = createRedactor(deps.secrets ?? []);
  }

  query(sessionId: string, userText: string): Promise<string> {
    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.resolve(sessionId);
      const hits = this.retrieveFor(session, userText);
      const messages = buildAdvisorMessages({
        persona: this.deps.config.persona ?? DEFAULT_PERSONA,
        hits,
        latestResult: session.latestResult,
        history: this.recentTurns(session),
        userText,
        policy: this.deps.policy,
        redact: this.redact,
      });

      let reply: string;
      try {
        reply = await withTimeout(
          (signal) => this.deps.reasoning.converse(messages, { signal }),
          this.deps.timeoutMs,
          () => new ReasoningTimeout(this.deps.timeoutMs),
        );
      } catch (err) {
        const failure = toReasoningFailure(err);
        this.deps.logger.warn({ err: failure, sessionId }, "Advisor reasoning call failed");
        reply = apology(failure);
      }

      const now = Date.now();
      session.turns.push({ speaker: "user", text: userText, at: now });
      session.turns.push({ speaker: "assistant", text: reply, at: now });
      this.deps.logger.debug({ sessionId, hits: hits.length }, "Advisor query answered");
      return reply;
    });
  }

  /** The memory records a query would be augmented with. */
  retrieve(sessionId: string, userText: string): MemoryHit[] {
    return this.retrieveFor(this.sessions.resolve(sessionId), userText);
  }

  /** Waits for any interaction in progress on the session before attaching. */
  attachResult(sessionId: string, result: AnalysisResult, log?: RequestLog): Promise<void> {
    return this.locks.runExclusive(sessionId, () => this.sessions.attach(sessionId, result, log));
  }

  history(sessionId: string): ConversationTurn[] {
    return [...(this.sessions.get(sessionId)?.turns ?? [])];
  }

  reset(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private recentTurns(session: ConversationSession): ConversationTurn[] {
    const limit = this.deps.config.historyTurns;
    return limit > 0 ? session.turns.slice(-limit) : [];
  }

  private retrieveFor(session: ConversationSession, userText: string): MemoryHit[] {
    const subject = session.latestSubject;
    const retrievalText = subject
      ? `${userText} ${subject.userId} ${subject.department}`
      : userText;
    return this.deps.memory.search(retrievalText, this.deps.config.topK);
  }
}
