import { randomUUID } from 'crypto';
import { SessionNotFoundError } from '../types/errors';
import { err, ok, type Result } from '../types/Result';
import { Logger, silentLogger } from '../utils/logger';
import { TranscriptionSession } from './TranscriptionSession';
import type { Transcriber } from './TranscriptionService';
import type { Translator } from './TranslationService';

export interface SessionRegistryOptions {
  transcriber: Transcriber;
  translator: Translator;
  sessionTtlMs: number;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

/**
 * Owns every live session. Sessions are isolated from each other and are
 * dropped once idle for longer than the configured TTL.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, TranscriptionSession>();
  private readonly options: SessionRegistryOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: SessionRegistryOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): TranscriptionSession {
    this.pruneExpired();
    const id = this.generateId();
    const session = new TranscriptionSession(id, {
      transcriber: this.options.transcriber,
      translator: this.options.translator,
      logger: this.logger.child(`session:${id.slice(0, 8)}`),
      now: this.now,
    });
    this.sessions.set(id, session);
    this.logger.info(`Session started: ${id}`);
    return session;
  }

  get(id: string): Result<TranscriptionSession, SessionNotFoundError> {
    const session = this.sessions.get(id);
    if (!session || this.isExpired(session)) {
      if (session) this.remove(id);
      return err(new SessionNotFoundError(id));
    }
    session.touch();
    return ok(session);
  }

  remove(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) {
      this.logger.info(`Session ended: ${id}`);
    }
    return removed;
  }

  /**
   * Drops expired sessions that are not in the middle of a request
   */
  pruneExpired(): number {
    let pruned = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        pruned++;
      }
    }
    if (pruned > 0) {
      this.logger.debug(`Pruned ${pruned} expired session(s)`);
    }
    return pruned;
  }

  private isExpired(session: TranscriptionSession): boolean {
    return !session.isBusy() && this.now() - session.lastActivity > this.options.sessionTtlMs;
  }
}
