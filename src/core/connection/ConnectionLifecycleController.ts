// === src/core/connection/ConnectionLifecycleController.ts ===
import { randomUUID } from 'crypto';

import { STATUS_STR } from '../../shared/const.js';
import { ErrorCategory, XError, errorMessage, invalidArgument } from '../../shared/errors.js';
import type { Disposer, LogContext } from '../../shared/types.js';
import { notifyAll } from '../../shared/utils.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { measure } from '../logging/perf.js';
import { DEFAULT_RETRY_POLICY, canRetry, computeBackoffDelay, type RetryPolicy } from './RetryPolicy.js';
import type { Transport, TransportClosed } from './transport.js';

export type ConnectionState =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'disconnected'
  | 'failed';

export type ConnectionStatusEvent = Readonly<{
  state: ConnectionState;
  previous: ConnectionState;
  /** retry number while connecting/reconnecting, 0 otherwise */
  attempt: number;
  maxAttempts: number;
  /** backoff before the next connect, on reconnecting events */
  delayMs?: number;
  message?: string;
  /** transport failure text behind a reconnecting/failed event */
  error?: string;
  paused: boolean;
  at: number;
  context: LogContext;
}>;

export type ConnectionSnapshot = Readonly<{
  state: ConnectionState;
  attempt: number;
  maxAttempts: number;
  paused: boolean;
  lastError?: string;
}>;

export type StatusListener = (e: ConnectionStatusEvent) => void;
export type DataListener = (chunk: string | Buffer) => void;

export type ControllerOptions<TTarget> = {
  transport: Transport<TTarget>;
  target: TTarget;
  retryPolicy?: RetryPolicy;
  context?: Partial<LogContext>;
  /** jitter source, injectable for deterministic delays */
  random?: () => number;
};

type TransitionInfo = { message?: string; error?: string; delayMs?: number };

/** States in which a transport operation is outstanding */
const BUSY: ReadonlySet<ConnectionState> = new Set(['connecting', 'connected', 'reconnecting']);

/**
 * Owns the connection state of one session.
 *
 *   idle ─connect→ connecting ─ok→ connected ─clean close→ disconnected
 *                      │  ▲            │
 *                 fail │  │ backoff    │ drop
 *                      ▼  │            ▼
 *                   reconnecting ◀─────┘      (attempts exhausted → failed)
 *
 * disconnect() wins from any state: it bumps the generation (stale transport
 * results are dropped), aborts a pending connect and clears the retry timer
 * before its first await, so no retry can fire once it has been called.
 *
 * Transitions are applied one at a time; a transition requested by an
 * observer while another is being delivered is queued behind it.
 */
export class ConnectionLifecycleController<TTarget = unknown> {
  readonly context: LogContext;
  readonly retryPolicy: RetryPolicy;

  private log: Logger;
  private transport: Transport<TTarget>;
  private target: TTarget;
  private random: () => number;

  private _state: ConnectionState = 'idle';
  private attempt = 0;
  private generation = 0;
  private lastError?: string;
  private paused = false;
  private retryPending = false; // a retry held back by pause()
  private retryTimer?: NodeJS.Timeout;
  private connectAbort?: AbortController;

  private transitioning = false;
  private queued: Array<() => void> = [];

  private statusListeners = new Set<StatusListener>();
  private dataListeners = new Set<DataListener>();
  private detachTransport: Disposer;
  private disposed = false;

  constructor(opts: ControllerOptions<TTarget>) {
    if (!opts?.transport) throw invalidArgument('ConnectionLifecycleController requires a transport');
    if (opts.target === undefined || opts.target === null) {
      throw invalidArgument('ConnectionLifecycleController requires a target');
    }
    this.transport = opts.transport;
    this.target = opts.target;
    this.retryPolicy = opts.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.random = opts.random ?? Math.random;
    this.context = Object.freeze({
      ...opts.context,
      sessionId: opts.context?.sessionId ?? randomUUID(),
    });
    this.log = getLogger('ConnectionLifecycle', this.context);

    this.detachTransport = this.transport.subscribe({
      onData: (chunk) => this.handleData(chunk),
      onClosed: (info) => this.handleClosed(info),
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  snapshot(): ConnectionSnapshot {
    return Object.freeze({
      state: this._state,
      attempt: this.attempt,
      maxAttempts: this.retryPolicy.maxAttempts,
      paused: this.paused,
      lastError: this.lastError,
    });
  }

  subscribe(listener: StatusListener): Disposer {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  onData(listener: DataListener): Disposer {
    this.dataListeners.add(listener);
    return () => {
      this.dataListeners.delete(listener);
    };
  }

  /**
   * Starts a connection from idle/disconnected and resolves once the first
   * attempt settles. While connecting/connected/reconnecting this is a no-op
   * returning the current state; from failed it throws until reset().
   */
  @measure('ConnectionLifecycle.connect')
  async connect(): Promise<ConnectionState> {
    this.assertAlive();
    if (BUSY.has(this._state)) {
      this.log.debug(`connect ignored: already ${this._state}`);
      return this._state;
    }
    if (this._state === 'failed') {
      throw new XError(
        ErrorCategory.InvalidState,
        'Connection has failed; call reset() before connecting again.',
        this.lastError,
      );
    }
    this.attempt = 0;
    this.lastError = undefined;
    return this.beginAttempt();
  }

  /** Always lands in disconnected; cancels any pending retry immediately */
  @measure('ConnectionLifecycle.disconnect')
  async disconnect(message: string = STATUS_STR.DISCONNECTED_BY_USER): Promise<ConnectionState> {
    this.generation++;
    this.cancelRetryTimer();
    this.retryPending = false;
    this.connectAbort?.abort();
    this.connectAbort = undefined;

    const hadTransport = BUSY.has(this._state);
    if (this._state !== 'disconnected') this.transition('disconnected', { message });
    if (hadTransport) await this.closeTransport();
    return this._state;
  }

  /** failed/disconnected → idle with a fresh attempt counter */
  reset(): ConnectionState {
    this.assertAlive();
    if (BUSY.has(this._state)) {
      throw new XError(ErrorCategory.InvalidState, `Cannot reset while ${this._state}`);
    }
    this.attempt = 0;
    this.lastError = undefined;
    if (this._state !== 'idle') this.transition('idle', { message: 'Reset' });
    return this._state;
  }

  /** Holds reconnection (e.g. network down); a due retry waits for resume() */
  pause() {
    if (this.paused) return;
    this.paused = true;
    if (this.retryTimer) {
      this.cancelRetryTimer();
      this.retryPending = true;
    }
    this.log.info('reconnection paused');
    if (this._state === 'reconnecting') {
      this.transition('reconnecting', { message: STATUS_STR.RECONNECT_PAUSED });
    }
  }

  resume() {
    if (!this.paused) return;
    this.paused = false;
    this.log.info('reconnection resumed');
    if (this.retryPending && this._state === 'reconnecting') {
      this.retryPending = false;
      const delayMs = computeBackoffDelay(this.retryPolicy, this.attempt, this.random);
      this.transition('reconnecting', { delayMs, message: retryMessage(delayMs, this.attempt, this.retryPolicy) });
      this.armRetryTimer(delayMs);
    }
  }

  /** Keystrokes to the remote shell; false when there is no live session */
  write(data: string | Buffer): boolean {
    if (this._state !== 'connected') return false;
    this.transport.write(data);
    return true;
  }

  resize(cols: number, rows: number) {
    if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols <= 0 || rows <= 0) {
      throw invalidArgument(`resize(${cols}, ${rows}): positive integers expected`);
    }
    if (this._state === 'connected') this.transport.resize?.(cols, rows);
  }

  async dispose() {
    if (this.disposed) return;
    if (BUSY.has(this._state)) await this.disconnect('Disposed');
    this.cancelRetryTimer();
    this.detachTransport();
    this.statusListeners.clear();
    this.dataListeners.clear();
    this.disposed = true;
  }

  // ── attempt / retry ───────────────────────────────────────────
  private async beginAttempt(): Promise<ConnectionState> {
    const gen = ++this.generation;
    const abort = new AbortController();
    this.connectAbort = abort;
    this.transition('connecting', {
      message: this.attempt
        ? `Connecting (attempt ${this.attempt}/${this.retryPolicy.maxAttempts})...`
        : STATUS_STR.CONNECTING,
    });

    try {
      await this.transport.connect(this.target, abort.signal);
    } catch (e) {
      if (gen !== this.generation) return this._state;
      this.connectAbort = undefined;
      this.lastError = errorMessage(e);
      this.log.warn(`connect failed (attempt ${this.attempt}): ${this.lastError}`);
      this.onFailure(this.lastError);
      return this._state;
    }

    if (gen !== this.generation) {
      // superseded by disconnect(); drop the link unless a newer attempt owns the transport
      if (!BUSY.has(this._state)) await this.closeTransport();
      return this._state;
    }
    this.connectAbort = undefined;
    this.attempt = 0;
    this.transition('connected', { message: STATUS_STR.CONNECTED });
    return this._state;
  }

  private onFailure(error: string) {
    if (canRetry(this.retryPolicy, this.attempt)) {
      this.scheduleRetry(error);
      return;
    }
    this.transition('failed', {
      error,
      message: this.retryPolicy.maxAttempts
        ? `Reconnection failed after ${this.retryPolicy.maxAttempts} attempts`
        : `Connection failed: ${error}`,
    });
  }

  private scheduleRetry(error: string) {
    this.attempt++;
    const delayMs = computeBackoffDelay(this.retryPolicy, this.attempt, this.random);
    this.transition('reconnecting', {
      delayMs,
      error,
      message: retryMessage(delayMs, this.attempt, this.retryPolicy),
    });
    if (this._state !== 'reconnecting') return; // an observer already moved us on
    if (this.paused) {
      this.retryPending = true;
      return;
    }
    this.armRetryTimer(delayMs);
  }

  private armRetryTimer(delayMs: number) {
    this.cancelRetryTimer();
    const gen = this.generation;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      if (gen !== this.generation || this._state !== 'reconnecting') return;
      this.beginAttempt().catch((e) => this.log.error('retry attempt crashed', e));
    }, delayMs);
  }

  private cancelRetryTimer() {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
  }

  // ── transport events ──────────────────────────────────────────
  private handleData(chunk: string | Buffer) {
    if (!BUSY.has(this._state)) return; // late bytes from a link we already let go
    notifyAll(this.dataListeners, chunk, (e) => this.log.error('data listener threw', e));
  }

  private handleClosed(info: TransportClosed) {
    if (this._state !== 'connected') {
      this.log.debug(`transport closed while ${this._state}; ignored`);
      return;
    }
    if (info.clean) {
      this.transition('disconnected', { message: info.reason ?? STATUS_STR.DISCONNECTED });
      return;
    }
    const error = info.reason ?? STATUS_STR.CONNECTION_LOST;
    this.lastError = error;
    this.log.warn(`connection dropped: ${error}`);
    if (this.retryPolicy.maxAttempts === 0) {
      this.transition('reconnecting', { error, message: STATUS_STR.CONNECTION_LOST });
      this.transition('failed', { error, message: STATUS_STR.RECONNECT_DISABLED });
      return;
    }
    this.attempt = 0;
    this.scheduleRetry(error);
  }

  private async closeTransport() {
    try {
      await this.transport.disconnect();
    } catch (e) {
      // already in disconnected; a failing close only gets logged
      this.log.warn(`transport disconnect failed: ${errorMessage(e)}`);
    }
  }

  // ── state ─────────────────────────────────────────────────────
  private transition(next: ConnectionState, info: TransitionInfo = {}) {
    const apply = () => {
      const previous = this._state;
      this._state = next;
      const ev: ConnectionStatusEvent = Object.freeze({
        state: next,
        previous,
        attempt: next === 'connecting' || next === 'reconnecting' ? this.attempt : 0,
        maxAttempts: this.retryPolicy.maxAttempts,
        delayMs: info.delayMs,
        message: info.message,
        error: info.error,
        paused: this.paused,
        at: Date.now(),
        context: this.context,
      });
      this.log.info(
        `${previous} → ${next}` +
          (ev.attempt ? ` attempt=${ev.attempt}/${ev.maxAttempts}` : '') +
          (ev.delayMs !== undefined ? ` delay=${ev.delayMs}ms` : '') +
          (ev.message ? ` "${ev.message}"` : ''),
      );
      notifyAll(this.statusListeners, ev, (e) => this.log.error('status listener threw', e));
    };

    if (this.transitioning) {
      this.queued.push(apply);
      return;
    }
    this.transitioning = true;
    try {
      apply();
      let job: (() => void) | undefined;
      while ((job = this.queued.shift())) job();
    } finally {
      this.transitioning = false;
    }
  }

  private assertAlive() {
    if (this.disposed) throw new XError(ErrorCategory.InvalidState, 'Controller has been disposed');
  }
}

function retryMessage(delayMs: number, attempt: number, policy: RetryPolicy): string {
  return `Reconnecting in ${Math.ceil(delayMs / 1000)}s (attempt ${attempt}/${policy.maxAttempts})...`;
}
