import type { AnalysisResult, RequestLog } from "../analysis/types.js";

export type Speaker = "user" | "assistant";

export interface ConversationTurn {
  readonly speaker: Speaker;
  readonly text: string;
  readonly at: number;
}

/** Who the attached result is about. Lets "this user" resolve during retrieval. */
export interface ResultSubject {
  readonly userId: string;
  readonly department: string;
}

export interface ConversationSession {
  readonly id: string;
  readonly turns: ConversationTurn[];
  latestResult: AnalysisResult | null;
  latestSubject: ResultSubject | null;
  readonly createdAt: number;
}

/** In-process sessions keyed by caller-supplied id. Not persisted. */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  /** Existing session, or a new empty one. */
  resolve(id: string): ConversationSession {
    const existing = this.sessions.get(id);
    if (existing) return existing;

    const session: ConversationSession = {
      id,
      turns: [],
      latestResult: null,
      latestSubject: null,
      createdAt: Date.now(),
    };
    this.sessions.set(id, session);
    return session;
  }

  get(id: string): ConversationSession | null {
    return this.sessions.get(id) ?? null;
  }

  attach(id: string, result: AnalysisResult, log?: RequestLog): void {
    const session = this.resolve(id);
    session.latestResult = result;
    session.latestSubject = log ? { userId: log.userId, department: log.department } : null;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
