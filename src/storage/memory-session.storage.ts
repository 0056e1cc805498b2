import { createChildLogger } from '../config/logger.js';
import type { SessionId, SessionVars } from '../core/session.js';
import type { SessionStorage, StoredSession } from '../core/types.js';
import { StripedLock } from './striped-lock.js';

const logger = createChildLogger('memory-storage');

export interface InMemorySessionStorageOptions {
  stripes?: number;
  acquireTimeoutMs?: number;
  sessions?: Map<SessionId, StoredSession>;
}

/**
 * Process-local SessionStorage. Sessions live in a Map and locking goes through a
 * StripedLock, so it only excludes events handled by this process.
 */
export class InMemorySessionStorage implements SessionStorage {
  private sessions: Map<SessionId, StoredSession>;
  private lock: StripedLock;
  private acquireTimeoutMs?: number;

  constructor(options: InMemorySessionStorageOptions = {}) {
    this.sessions = options.sessions ?? new Map();
    this.lock = new StripedLock(options.stripes);
    this.acquireTimeoutMs = options.acquireTimeoutMs;
  }

  async acquireLock(sessionId: SessionId): Promise<void> {
    await this.lock.acquire(sessionId, this.acquireTimeoutMs);
    logger.trace({ sessionId }, 'Session lock acquired');
  }

  async releaseLock(sessionId: SessionId): Promise<void> {
    if (!this.lock.release(sessionId)) {
      logger.warn({ sessionId }, 'Release requested for a session lock that is not held');
    }
  }

  async loadStateAndVars(sessionId: SessionId): Promise<StoredSession> {
    const stored = this.sessions.get(sessionId);
    return stored ? { state: stored.state, vars: { ...stored.vars } } : { state: undefined, vars: {} };
  }

  async store(sessionId: SessionId, state: unknown, vars: SessionVars): Promise<void> {
    this.sessions.set(sessionId, { state, vars: { ...vars } });
  }

  /** Current stored session, for inspection. */
  peek(sessionId: SessionId): StoredSession | undefined {
    return this.sessions.get(sessionId);
  }

  isLocked(sessionId: SessionId): boolean {
    return this.lock.isLocked(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
