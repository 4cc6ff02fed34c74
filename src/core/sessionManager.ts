/**
 * @fileOverview: Conversation sessions on top of the query engine
 * @module: SessionManager
 * @keyFunctions:
 *   - handleMessage(): Answer one message with the session's history, then record the exchange
 *   - clearSession(): Drop a session's history
 *   - getHistory(): Current history for a session, oldest first
 * @context: In-memory only. Each session keeps at most `maxHistory` messages and expires after `timeoutMs` without
 * activity. A failed query produces a structured error reply and leaves the history untouched.
 */

import { logger } from '../utils/logger';
import { ErrorResponse, toErrorResponse } from '../utils/errorHandler';
import { ChatMessage } from '../shared/types';
import { AnswerOptions, QueryAnswer, SessionContext } from './queryEngine';

export interface QueryAnswerer {
  answer(question: string, session: SessionContext, options?: AnswerOptions): Promise<QueryAnswer>;
}

export interface SessionManagerConfig {
  maxHistory: number;
  timeoutMs: number;
}

export type SessionReply =
  | { ok: true; sessionId: string; result: QueryAnswer }
  | { ok: false; sessionId: string; message: string; error: ErrorResponse['error'] };

interface Session {
  history: ChatMessage[];
  lastActivity: number;
}

export class SessionManager {
  private sessions = new Map<string, Session>();
  private readonly now: () => number;

  constructor(
    private readonly engine: QueryAnswerer,
    private readonly config: SessionManagerConfig,
    options: { now?: () => number } = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Always resolves; failures come back as `{ ok: false }` with the structured error
   */
  async handleMessage(sessionId: string, message: string, options: AnswerOptions = {}): Promise<SessionReply> {
    const started = this.now();
    const history = this.getHistory(sessionId);

    try {
      const result = await this.engine.answer(message, { sessionId, history }, options);
      this.record(sessionId, message, result.answer);
      logger.info('✅ Message processed', { sessionId, durationMs: this.now() - started });
      return { ok: true, sessionId, result };
    } catch (error) {
      const response = toErrorResponse(error);
      logger.error('❌ Message failed', { sessionId, code: response.error.code, error: response.error.message });
      return { ok: false, sessionId, message: response.error.userMessage, error: response.error };
    }
  }

  getHistory(sessionId: string): ChatMessage[] {
    this.expireIdle();
    const session = this.sessions.get(sessionId);
    return session ? [...session.history] : [];
  }

  clearSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logger.debug('Session cleared', { sessionId });
    }
    return removed;
  }

  get activeSessionCount(): number {
    this.expireIdle();
    return this.sessions.size;
  }

  private record(sessionId: string, question: string, answer: string): void {
    const session = this.sessions.get(sessionId) ?? { history: [], lastActivity: 0 };
    session.history.push({ role: 'user', content: question }, { role: 'assistant', content: answer });
    if (session.history.length > this.config.maxHistory) {
      session.history = session.history.slice(-this.config.maxHistory);
    }
    session.lastActivity = this.now();
    this.sessions.set(sessionId, session);
  }

  private expireIdle(): void {
    const cutoff = this.now() - this.config.timeoutMs;
    for (const [sessionId, session] of this.sessions) {
      if (session.lastActivity < cutoff) {
        this.sessions.delete(sessionId);
        logger.info('🧹 Expired idle session', { sessionId });
      }
    }
  }
}
