/**
 * Session Manager - Registry of Live Game Sessions
 *
 * Creates sessions under fresh UUIDs, starts their loops in the background
 * and forgets them once the loop settles.
 */

import { v4 as uuidv4 } from 'uuid';
import { createCategoryLogger } from './logger.js';
import { GameSession, SessionInfo, SessionOptions, SessionResult } from './session.js';

const logger = createCategoryLogger('game.sessions');

export interface SessionManagerOptions {
  /** Upper bound on concurrently live sessions; 0 means unlimited. */
  maxSessions?: number;
  /** Defaults handed to every new session. */
  sessionOptions?: SessionOptions;
  /** Called with the outcome of every session loop. */
  onSessionEnd?: (result: SessionResult) => void;
}

export class SessionManager {
  private sessions = new Map<string, GameSession>();
  private running = new Map<string, Promise<void>>();
  private readonly options: SessionManagerOptions;

  constructor(options: SessionManagerOptions = {}) {
    this.options = options;
  }

  get size(): number {
    return this.sessions.size;
  }

  isFull(): boolean {
    const max = this.options.maxSessions ?? 0;
    return max > 0 && this.sessions.size >= max;
  }

  create(playerCount: number, overrides: SessionOptions = {}): GameSession {
    const session = new GameSession(uuidv4(), playerCount, { ...this.options.sessionOptions, ...overrides });
    this.sessions.set(session.id, session);
    logger.info(`Created session ${session.id} for ${playerCount} players`);

    const loop = session.run()
      .then((result) => {
        logger.info(`Session ${session.id} ended`, result);
        this.options.onSessionEnd?.(result);
      })
      .catch((error: unknown) => {
        logger.error(`Session ${session.id} failed`, error);
        session.abort('internal error');
      })
      .finally(() => {
        this.sessions.delete(session.id);
        this.running.delete(session.id);
      });
    this.running.set(session.id, loop);

    return session;
  }

  get(id: string): GameSession | undefined {
    return this.sessions.get(id);
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values(), s => s.info());
  }

  /** Aborts every session and waits for their loops to settle. */
  async shutdown(): Promise<void> {
    for (const session of this.sessions.values()) {
      session.abort();
    }
    await Promise.all(this.running.values());
    logger.info('All sessions stopped');
  }
}
