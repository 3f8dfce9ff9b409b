import { randomUUID } from 'crypto';
import { CrawlError, TransientFetchError, errorMessage } from '../errors/crawl-errors';
import {
  FetchOutcome,
  FetchPlan,
  FingerprintProfile,
  ProxyRecord,
  RawPage,
  SessionHandle,
} from '../types/crawl';
import { pickProfile } from '../utils/fingerprints';
import { logger } from '../utils/logger';
import { ProxyRotator } from './proxy-rotator.service';

/** One isolated browsing identity (cookies, storage, proxy, fingerprint). */
export interface BrowserSession {
  readonly id: string;
  load(url: string, plan: FetchPlan, signal: AbortSignal): Promise<RawPage>;
  close(): Promise<void>;
}

export interface SessionFactory {
  create(proxy: ProxyRecord, profile: FingerprintProfile): Promise<BrowserSession>;
  shutdown(): Promise<void>;
}

export interface SessionPoolOptions {
  maxSessions: number;
  requestBudget: number;
  proxyWaitTimeoutMs: number;
  now?: () => number;
  pickProfile?: () => FingerprintProfile;
}

export interface SessionPoolStats {
  capacity: number;
  idle: number;
  busy: number;
  creating: number;
  waiting: number;
  retired: number;
}

interface PooledSession {
  handle: SessionHandle;
  session: BrowserSession;
  busy: boolean;
}

interface Waiter {
  resolve: (session: PooledSession | null) => void;
  reject: (error: Error) => void;
}

/**
 * Owns browser session lifecycles. Each handle serves one fetch at a time; callers
 * block in FIFO order when every slot is busy.
 */
export class SessionPool {
  private readonly sessions = new Map<string, PooledSession>();
  private readonly waiters: Waiter[] = [];
  private creating = 0;
  private retired = 0;
  private closed = false;
  private readonly now: () => number;
  private readonly pickProfile: () => FingerprintProfile;

  constructor(
    private readonly factory: SessionFactory,
    private readonly rotator: ProxyRotator,
    private readonly options: SessionPoolOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.pickProfile = options.pickProfile ?? (() => pickProfile());
  }

  async acquire(signal?: AbortSignal): Promise<SessionHandle> {
    for (;;) {
      if (this.closed) {
        throw new TransientFetchError('Session pool is shut down', 'navigation');
      }
      if (signal?.aborted) {
        throw new TransientFetchError('Session acquisition aborted', 'navigation');
      }

      await this.retireUnusableIdle();

      const idle = [...this.sessions.values()].find((entry) => !entry.busy);
      if (idle) {
        idle.busy = true;
        return idle.handle;
      }

      if (this.sessions.size + this.creating < this.options.maxSessions) {
        const created = await this.createSession(signal);
        return created.handle;
      }

      const handedOver = await this.waitForSlot(signal);
      if (handedOver) {
        return handedOver.handle;
      }
    }
  }

  sessionFor(handle: SessionHandle): BrowserSession {
    const entry = this.sessions.get(handle.contextId);
    if (!entry || !entry.busy) {
      throw new TransientFetchError(`Session ${handle.contextId} is not checked out`, 'navigation');
    }
    return entry.session;
  }

  async release(handle: SessionHandle, outcome: FetchOutcome): Promise<void> {
    const entry = this.sessions.get(handle.contextId);
    if (!entry) {
      logger.warn('Release of unknown session ignored', { sessionId: handle.contextId });
      return;
    }

    entry.handle.requestCount += 1;
    entry.handle.lastUsedAt = this.now();
    if (outcome === 'aborted') {
      this.rotator.abandon(handle.proxyId);
    } else {
      this.rotator.report(
        handle.proxyId,
        outcome === 'success' || outcome === 'permanent' ? 'success' : 'failure',
      );
    }

    const retireReason =
      outcome === 'detected'
        ? 'detection'
        : entry.handle.requestCount >= this.options.requestBudget
          ? 'request budget reached'
          : !this.rotator.isUsable(handle.proxyId)
            ? 'proxy unusable'
            : null;

    if (retireReason) {
      await this.retire(entry, retireReason);
      this.wakeWaiter(null);
      return;
    }

    entry.busy = false;
    const waiter = this.waiters.shift();
    if (waiter) {
      entry.busy = true;
      waiter.resolve(entry);
    }
  }

  stats(): SessionPoolStats {
    const entries = [...this.sessions.values()];
    const busy = entries.filter((entry) => entry.busy).length;
    return {
      capacity: this.options.maxSessions,
      idle: entries.length - busy,
      busy,
      creating: this.creating,
      waiting: this.waiters.length,
      retired: this.retired,
    };
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new TransientFetchError('Session pool is shut down', 'navigation'));
    }
    await Promise.all([...this.sessions.values()].map((entry) => this.retire(entry, 'shutdown')));
    await this.factory.shutdown();
    logger.info('Session pool shut down');
  }

  private async createSession(signal?: AbortSignal): Promise<PooledSession> {
    this.creating += 1;
    try {
      const proxy = await this.rotator.waitForProxy(this.options.proxyWaitTimeoutMs, signal);
      const profile = this.pickProfile();
      const session = await this.factory.create(proxy, profile);

      const entry: PooledSession = {
        handle: {
          contextId: session.id,
          proxyId: proxy.id,
          fingerprintProfile: profile,
          lastUsedAt: this.now(),
          requestCount: 0,
        },
        session,
        busy: true,
      };
      this.sessions.set(session.id, entry);
      logger.info('Session created', { sessionId: session.id, proxyId: proxy.id, profile: profile.name });
      return entry;
    } catch (error) {
      // the slot is free again, let a waiter try
      this.wakeWaiter(null);
      if (error instanceof CrawlError) throw error;
      throw new TransientFetchError(`Failed to create browser session: ${errorMessage(error)}`, 'navigation');
    } finally {
      this.creating -= 1;
    }
  }

  private waitForSlot(signal?: AbortSignal): Promise<PooledSession | null> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new TransientFetchError('Session pool is shut down', 'navigation'));
        return;
      }
      if (signal?.aborted) {
        reject(new TransientFetchError('Session acquisition aborted', 'navigation'));
        return;
      }
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(new TransientFetchError('Session acquisition aborted', 'navigation'));
      };
      const waiter: Waiter = {
        resolve: (session) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(session);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private wakeWaiter(session: PooledSession | null): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(session);
    }
  }

  private async retireUnusableIdle(): Promise<void> {
    const stale = [...this.sessions.values()].filter(
      (entry) => !entry.busy && !this.rotator.isUsable(entry.handle.proxyId),
    );
    for (const entry of stale) {
      await this.retire(entry, 'proxy unusable');
    }
  }

  private async retire(entry: PooledSession, reason: string): Promise<void> {
    if (!this.sessions.delete(entry.handle.contextId)) {
      return;
    }
    this.retired += 1;
    logger.info('Session retired', {
      sessionId: entry.handle.contextId,
      proxyId: entry.handle.proxyId,
      requests: entry.handle.requestCount,
      reason,
    });
    try {
      await entry.session.close();
    } catch (error) {
      logger.warn('Failed to close retired session', {
        sessionId: entry.handle.contextId,
        error: errorMessage(error),
      });
    }
  }
}

export function createSessionId(): string {
  return `ctx-${randomUUID()}`;
}
