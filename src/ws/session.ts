import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';

import WebSocket from 'ws';

import { describeError, silentLogger, type Logger } from '../bootstrap/logger.js';
import {
  DEFAULT_OPEN_OPTIONS,
  DEFAULT_STREAM_LIMITS,
  KEEPALIVE_TIMEOUT_MS,
  type OpenOptions,
  type StreamLimits,
} from '../config.js';
import { toFrame, type Frame } from './frame.js';
import type { SessionConfig } from './session-config.js';

export type SessionState = 'idle' | 'connecting' | 'open' | 'closed';

/** Lo mínimo que el pool necesita de una sesión. */
export interface ManagedSession {
  readonly id: string;
  open(options?: Partial<OpenOptions>): Promise<boolean>;
  close(): Promise<void>;
  isAlive(): boolean;
}

/** Lo que un driver de extracción necesita de una sesión arrendada. */
export interface StreamingSession extends ManagedSession {
  send(data: Uint8Array | string): Promise<boolean>;
  receiveStream(limits?: Partial<StreamLimits>): AsyncGenerator<Frame, void, undefined>;
  ping(timeoutMs?: number): Promise<boolean>;
  /** Descarta los frames recibidos que nadie consumió; devuelve cuántos. */
  discardPending(): number;
}

export type SocketFactory = (
  url: string,
  protocols: readonly string[],
  options: WebSocket.ClientOptions,
) => WebSocket;

export type SessionDependencies = {
  readonly logger?: Logger;
  readonly createSocket?: SocketFactory;
};

type FrameWaiter = (frame: Frame | null) => void;

const CLOSE_HANDSHAKE_TIMEOUT_MS = 2_000;

const defaultSocketFactory: SocketFactory = (url, protocols, options) =>
  new WebSocket(url, [...protocols], options);

const minDefined = (...values: ReadonlyArray<number | undefined>): number | undefined => {
  const defined = values.filter((value): value is number => value !== undefined);
  return defined.length ? Math.min(...defined) : undefined;
};

/**
 * Una conexión WebSocket persistente con el backend de Streamlit.
 *
 * Los frames entrantes se encolan en orden de llegada desde que el socket se
 * abre; `receive` y `receiveStream` consumen esa cola. Ninguna operación lanza
 * por timeouts o por cierre del transporte: devuelven `false`/`null` o terminan
 * el iterador.
 */
export class HashdiveSession implements StreamingSession {
  readonly id: string;
  readonly config: SessionConfig;
  readonly createdAt: number;

  private readonly logger: Logger;
  private readonly createSocket: SocketFactory;
  private socket: WebSocket | null = null;
  private currentState: SessionState = 'idle';
  private lastActivity: number;
  private readonly inbox: Frame[] = [];
  private readonly waiters: FrameWaiter[] = [];

  constructor(config: SessionConfig, dependencies: SessionDependencies = {}) {
    this.id = randomUUID().slice(0, 8);
    this.config = config;
    this.logger = dependencies.logger ?? silentLogger;
    this.createSocket = dependencies.createSocket ?? defaultSocketFactory;
    this.createdAt = Date.now();
    this.lastActivity = this.createdAt;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  async open(options: Partial<OpenOptions> = {}): Promise<boolean> {
    const { timeoutMs, maxRetries, backoffBaseMs } = { ...DEFAULT_OPEN_OPTIONS, ...options };

    if (this.isAlive()) {
      return true;
    }
    if (this.currentState === 'closed') {
      this.logger.warn('session-reopen-refused', { session: this.id });
      return false;
    }

    const attempts = Math.max(1, Math.floor(maxRetries));
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      if (attempt > 0) {
        const waitMs = backoffBaseMs * attempt;
        this.logger.info('session-retry', { session: this.id, attempt: attempt + 1, attempts, waitMs });
        await delay(waitMs);
      } else {
        this.logger.info('session-connect', { session: this.id, url: this.config.url });
      }

      if (this.currentState === 'closed') {
        return false;
      }

      this.currentState = 'connecting';
      try {
        const socket = await this.connectOnce(timeoutMs);
        if (this.currentState === 'closed') {
          socket.terminate();
          return false;
        }
        this.attach(socket);
        this.logger.info('session-open', { session: this.id, attempt: attempt + 1 });
        return true;
      } catch (error) {
        this.currentState = 'idle';
        this.logger.warn('session-open-failed', {
          session: this.id,
          attempt: attempt + 1,
          attempts,
          message: describeError(error),
        });
      }
    }

    this.logger.error('session-open-exhausted', { session: this.id, attempts });
    return false;
  }

  async send(data: Uint8Array | string): Promise<boolean> {
    const socket = this.socket;
    if (!socket || !this.isAlive()) {
      this.logger.error('session-send-not-open', { session: this.id, state: this.currentState });
      return false;
    }

    return new Promise<boolean>((resolve) => {
      try {
        socket.send(data, (error?: Error) => {
          if (error) {
            this.logger.error('session-send-failed', { session: this.id, message: error.message });
            resolve(false);
            return;
          }
          this.touch();
          this.logger.debug('session-sent', {
            session: this.id,
            size: typeof data === 'string' ? data.length : data.byteLength,
          });
          resolve(true);
        });
      } catch (error) {
        this.logger.error('session-send-failed', { session: this.id, message: describeError(error) });
        resolve(false);
      }
    });
  }

  /**
   * Espera el siguiente frame como mucho `timeoutMs` (sin límite si se omite).
   * Devuelve `null` por timeout o si la sesión ya no está abierta.
   */
  async receive(timeoutMs?: number): Promise<Frame | null> {
    const buffered = this.inbox.shift();
    if (buffered) {
      return buffered;
    }
    if (this.currentState !== 'open') {
      this.logger.debug('session-receive-not-open', { session: this.id, state: this.currentState });
      return null;
    }

    return new Promise<Frame | null>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter: FrameWaiter = (frame) => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(frame);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.removeWaiter(waiter);
          resolve(null);
        }, Math.max(0, timeoutMs));
      }
    });
  }

  async *receiveStream(limits: Partial<StreamLimits> = {}): AsyncGenerator<Frame, void, undefined> {
    const { maxFrames, perFrameTimeoutMs, totalTimeoutMs } = { ...DEFAULT_STREAM_LIMITS, ...limits };
    const frameLimit = maxFrames ?? Number.POSITIVE_INFINITY;
    const startedAt = Date.now();
    let count = 0;

    const remainingMs = (): number | undefined =>
      totalTimeoutMs === undefined ? undefined : totalTimeoutMs - (Date.now() - startedAt);

    while (true) {
      if (count >= frameLimit) {
        this.logger.debug('stream-max-frames', { session: this.id, maxFrames: frameLimit });
        return;
      }

      const before = remainingMs();
      if (before !== undefined && before <= 0) {
        this.logger.debug('stream-total-timeout', { session: this.id, totalTimeoutMs });
        return;
      }

      const frame = await this.receive(minDefined(perFrameTimeoutMs, before));
      if (frame) {
        count += 1;
        this.logger.debug('stream-frame', { session: this.id, index: count, kind: frame.kind, size: frame.size });
        yield frame;
        continue;
      }

      if (!this.isAlive()) {
        this.logger.info('stream-session-closed', { session: this.id, frames: count });
        return;
      }

      const after = remainingMs();
      if (after !== undefined && after <= 0) {
        this.logger.debug('stream-total-timeout', { session: this.id, totalTimeoutMs });
        return;
      }

      // Un frame lento no implica una conexión muerta: se sondea con ping.
      const alive = await this.ping(minDefined(KEEPALIVE_TIMEOUT_MS, after));
      if (!alive) {
        this.logger.warn('stream-keepalive-failed', { session: this.id, frames: count });
        this.terminate();
        return;
      }
    }
  }

  discardPending(): number {
    const dropped = this.inbox.splice(0, this.inbox.length).length;
    if (dropped) {
      this.logger.debug('session-discarded', { session: this.id, frames: dropped });
    }
    return dropped;
  }

  async ping(timeoutMs: number = KEEPALIVE_TIMEOUT_MS): Promise<boolean> {
    const socket = this.socket;
    if (!socket || !this.isAlive()) {
      return false;
    }

    return new Promise<boolean>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (ok: boolean): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        socket.off('pong', onPong);
        socket.off('close', onClose);
        resolve(ok);
      };
      const onPong = (): void => finish(true);
      const onClose = (): void => finish(false);

      timer = setTimeout(() => finish(false), Math.max(0, timeoutMs));
      socket.on('pong', onPong);
      socket.on('close', onClose);

      try {
        socket.ping();
        this.logger.debug('session-ping', { session: this.id });
      } catch (error) {
        this.logger.warn('session-ping-failed', { session: this.id, message: describeError(error) });
        finish(false);
      }
    });
  }

  async close(): Promise<void> {
    if (this.currentState === 'closed') {
      return;
    }

    const socket = this.socket;
    this.socket = null;
    this.markClosed();

    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, CLOSE_HANDSHAKE_TIMEOUT_MS);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.close(1000);
    });
    this.logger.info('session-closed', { session: this.id });
  }

  isAlive(): boolean {
    return this.currentState === 'open' && this.socket?.readyState === WebSocket.OPEN;
  }

  private connectOnce(timeoutMs: number): Promise<WebSocket> {
    return new Promise<WebSocket>((resolve, reject) => {
      const socket = this.createSocket(this.config.url, this.config.subprotocols, {
        headers: { ...this.config.headers },
        maxPayload: this.config.maxPayload,
        handshakeTimeout: timeoutMs,
      });

      let settled = false;
      const finish = (error: Error | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.off('open', onOpen);
        socket.off('close', onClose);
        if (error) {
          reject(error);
          return;
        }
        resolve(socket);
      };

      const onOpen = (): void => finish(null);
      const onClose = (code: number): void => finish(new Error(`Conexión cerrada durante el handshake (code=${code}).`));
      // Queda registrado durante toda la vida del socket: un 'error' sin oyente tumbaría el proceso.
      socket.on('error', (error: Error) => {
        if (!settled) {
          finish(error);
          return;
        }
        this.logger.warn('session-transport-error', { session: this.id, message: error.message });
      });
      socket.on('open', onOpen);
      socket.on('close', onClose);

      const timer = setTimeout(() => {
        finish(new Error(`Tiempo de conexión agotado tras ${timeoutMs} ms.`));
        socket.terminate();
      }, timeoutMs);
    });
  }

  private attach(socket: WebSocket): void {
    this.socket = socket;
    this.currentState = 'open';
    this.touch();

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      this.touch();
      this.deliver(toFrame(data, isBinary));
    });
    socket.on('pong', () => this.touch());
    socket.on('close', (code: number) => {
      if (this.currentState !== 'closed') {
        this.logger.info('session-closed-remote', { session: this.id, code });
      }
      this.markClosed();
    });
  }

  private deliver(frame: Frame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private removeWaiter(waiter: FrameWaiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }

  /** Corta el socket sin handshake; la sesión queda cerrada. */
  private terminate(): void {
    const socket = this.socket;
    this.socket = null;
    this.markClosed();
    socket?.terminate();
  }

  private markClosed(): void {
    this.currentState = 'closed';
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter(null);
    }
  }

  private touch(): void {
    this.lastActivity = Date.now();
  }
}
