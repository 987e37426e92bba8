/**
 * Session Registry
 *
 * One ledger per interactive session, keyed by the x-session-id header.
 * A session is created on first use and dropped on request or after sitting idle.
 */

import { ImportReconciler, Ledger, LedgerService, systemClock } from '@stockroom/core';
import type { Clock, InventoryConfig } from '@stockroom/core';
import { logger as defaultLogger } from '@stockroom/observability';
import type { Logger } from '@stockroom/observability';

export interface InventorySession {
  ledger: LedgerService;
  importer: ImportReconciler;
  clock: Clock;
  createdAt: Date;
  lastSeenAt: Date;
}

export interface SessionRegistryOptions {
  config?: Partial<InventoryConfig>;
  clock?: Clock;
  logger?: Logger;
  /** Default: 2 hours */
  idleTimeoutMs?: number;
}

const DEFAULT_IDLE_TIMEOUT_MS = 2 * 60 * 60 * 1000;

export class SessionRegistry {
  private readonly sessions = new Map<string, InventorySession>();
  private readonly config: Partial<InventoryConfig>;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly idleTimeoutMs: number;

  constructor(options: SessionRegistryOptions = {}) {
    this.config = options.config ?? {};
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? defaultLogger).child({ module: 'sessions' });
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Return the session's ledger, creating an empty one on first use
   */
  acquire(sessionId: string): InventorySession {
    const now = this.clock.now();
    this.evictIdle(now);

    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastSeenAt = now;
      return existing;
    }

    const ledger = new LedgerService(new Ledger(), {
      config: this.config,
      clock: this.clock,
      logger: this.log,
    });
    const session: InventorySession = {
      ledger,
      importer: new ImportReconciler(ledger, { logger: this.log }),
      clock: this.clock,
      createdAt: now,
      lastSeenAt: now,
    };

    this.sessions.set(sessionId, session);
    this.log.info({ sessions: this.sessions.size }, 'Session started');
    return session;
  }

  /**
   * @returns false when no such session existed
   */
  discard(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.log.info({ sessions: this.sessions.size }, 'Session discarded');
    }
    return removed;
  }

  private evictIdle(now: Date): void {
    const cutoff = now.getTime() - this.idleTimeoutMs;
    let evicted = 0;

    for (const [sessionId, session] of this.sessions) {
      if (session.lastSeenAt.getTime() < cutoff) {
        this.sessions.delete(sessionId);
        evicted += 1;
      }
    }

    if (evicted > 0) {
      this.log.info({ evicted, sessions: this.sessions.size }, 'Idle sessions evicted');
    }
  }
}
