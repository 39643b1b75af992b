import { describeError, silentLogger, type Logger } from '../bootstrap/logger.js';
import { DEFAULT_POOL_IDLE_TTL_MS, DEFAULT_POOL_SIZE, type OpenOptions } from '../config.js';
import type { ManagedSession } from './session.js';

export type PooledConnection<S extends ManagedSession> = {
  readonly session: S;
  inUse: boolean;
  readonly createdAt: number;
  lastUsedAt: number;
};

export type PoolStats = {
  readonly total: number;
  readonly inUse: number;
  readonly idle: number;
};

export type SessionPoolOptions<S extends ManagedSession> = {
  readonly createSession: () => S;
  readonly maxSessions?: number;
  readonly idleTtlMs?: number;
  readonly openOptions?: Partial<OpenOptions>;
  readonly logger?: Logger;
  readonly now?: () => number;
};

/**
 * Pool acotado de sesiones abiertas. Cada sesión está ociosa en el pool o
 * arrendada por un único consumidor. Todas las operaciones pasan por el mismo
 * candado, así que `lease` nunca entrega dos veces la misma sesión.
 */
export class SessionPool<S extends ManagedSession> {
  readonly maxSessions: number;
  readonly idleTtlMs: number;

  private readonly createSession: () => S;
  private readonly openOptions: Partial<OpenOptions>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly entries: PooledConnection<S>[] = [];
  private lock: Promise<void> = Promise.resolve();

  constructor(options: SessionPoolOptions<S>) {
    this.createSession = options.createSession;
    this.maxSessions = Math.max(1, Math.floor(options.maxSessions ?? DEFAULT_POOL_SIZE));
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_POOL_IDLE_TTL_MS;
    this.openOptions = options.openOptions ?? {};
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Entrega una sesión viva, reutilizando una ociosa o abriendo una nueva si
   * queda capacidad. `null` si el pool está lleno o la apertura falla.
   */
  lease(): Promise<S | null> {
    return this.withLock(async () => {
      const stale: PooledConnection<S>[] = [];
      let chosen: PooledConnection<S> | null = null;

      for (const entry of this.entries) {
        if (entry.inUse) {
          continue;
        }
        if (!entry.session.isAlive() || this.isExpired(entry)) {
          stale.push(entry);
          continue;
        }
        chosen = entry;
        break;
      }

      await this.evict(stale, 'stale');

      if (chosen) {
        chosen.inUse = true;
        chosen.lastUsedAt = this.now();
        this.logger.debug('pool-reuse', { session: chosen.session.id, ...this.snapshot() });
        return chosen.session;
      }

      if (this.entries.length >= this.maxSessions) {
        this.logger.warn('pool-exhausted', this.snapshot());
        return null;
      }

      const session = this.createSession();
      const opened = await session.open(this.openOptions);
      if (!opened) {
        this.logger.error('pool-open-failed', { session: session.id });
        await session.close();
        return null;
      }

      const timestamp = this.now();
      this.entries.push({ session, inUse: true, createdAt: timestamp, lastUsedAt: timestamp });
      this.logger.info('pool-created', { session: session.id, ...this.snapshot() });
      return session;
    });
  }

  /** Devuelve una sesión arrendada. Una sesión desconocida se ignora. */
  release(session: S): Promise<void> {
    return this.withLock(async () => {
      const entry = this.entries.find((candidate) => candidate.session === session);
      if (!entry) {
        this.logger.warn('pool-release-unknown', { session: session.id });
        return;
      }
      entry.inUse = false;
      entry.lastUsedAt = this.now();
      this.logger.debug('pool-released', { session: session.id, ...this.snapshot() });
    });
  }

  /**
   * Retira del pool una sesión arrendada y la cierra. Para sesiones cuyo
   * stream quedó a medias o cuyo transporte falló.
   */
  discard(session: S): Promise<void> {
    return this.withLock(async () => {
      const entry = this.entries.find((candidate) => candidate.session === session);
      if (!entry) {
        this.logger.warn('pool-discard-unknown', { session: session.id });
        await session.close();
        return;
      }
      await this.evict([entry], 'discarded');
    });
  }

  /** Cierra y descarta las sesiones ociosas que superan el TTL o están muertas. */
  sweepExpired(): Promise<number> {
    return this.withLock(async () => {
      const expired = this.entries.filter(
        (entry) => !entry.inUse && (this.isExpired(entry) || !entry.session.isAlive()),
      );
      await this.evict(expired, 'expired');
      return expired.length;
    });
  }

  closeAll(): Promise<void> {
    return this.withLock(async () => {
      const all = this.entries.slice();
      await this.evict(all, 'shutdown');
      this.logger.info('pool-closed', { closed: all.length });
    });
  }

  stats(): PoolStats {
    return this.snapshot();
  }

  private isExpired(entry: PooledConnection<S>): boolean {
    return this.now() - entry.lastUsedAt > this.idleTtlMs;
  }

  private async evict(targets: readonly PooledConnection<S>[], reason: string): Promise<void> {
    for (const entry of targets) {
      const index = this.entries.indexOf(entry);
      if (index >= 0) {
        this.entries.splice(index, 1);
      }
      try {
        await entry.session.close();
      } catch (error) {
        this.logger.warn('pool-close-failed', { session: entry.session.id, message: describeError(error) });
      }
      this.logger.debug('pool-evicted', { session: entry.session.id, reason });
    }
  }

  private snapshot(): PoolStats {
    const inUse = this.entries.filter((entry) => entry.inUse).length;
    return { total: this.entries.length, inUse, idle: this.entries.length - inUse };
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
