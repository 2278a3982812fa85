import type { Disposer } from '../../shared/types.js';
import type { Transport, TransportClosed, TransportListener } from '../../core/connection/transport.js';

export type FakeTarget = { host: string };

/** How the next connect() settles: ok, fail with a message, or wait (manual / abort) */
export type ConnectStep = 'ok' | 'hang' | { fail: string };

/**
 * In-process transport. connect() outcomes are scripted; data and closes are
 * pushed from the test with emitData/drop/exit.
 */
export class FakeTransport implements Transport<FakeTarget> {
  connectCalls = 0;
  disconnectCalls = 0;
  written: Array<string | Buffer> = [];
  sizes: Array<[number, number]> = [];
  lastSignal?: AbortSignal;

  private steps: ConnectStep[] = [];
  private listeners = new Set<TransportListener>();
  private pending?: { resolve: () => void; reject: (e: Error) => void };

  script(...steps: ConnectStep[]) {
    this.steps.push(...steps);
    return this;
  }

  connect(_target: FakeTarget, signal: AbortSignal): Promise<void> {
    this.connectCalls++;
    this.lastSignal = signal;
    if (signal.aborted) return Promise.reject(new Error('aborted'));
    const step = this.steps.shift() ?? 'ok';
    if (step === 'ok') return Promise.resolve();
    if (step === 'hang') {
      return new Promise<void>((resolve, reject) => {
        this.pending = { resolve, reject };
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    return Promise.reject(new Error(step.fail));
  }

  /** Settles a 'hang' step */
  completePending(error?: string) {
    const p = this.pending;
    this.pending = undefined;
    if (!p) throw new Error('no pending connect');
    if (error) p.reject(new Error(error));
    else p.resolve();
  }

  disconnect(): Promise<void> {
    this.disconnectCalls++;
    return Promise.resolve();
  }

  write(data: string | Buffer): void {
    this.written.push(data);
  }

  resize(cols: number, rows: number): void {
    this.sizes.push([cols, rows]);
  }

  subscribe(listener: TransportListener): Disposer {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emitData(chunk: string | Buffer) {
    for (const l of Array.from(this.listeners)) l.onData?.(chunk);
  }

  drop(reason = 'Connection reset by peer') {
    this.close({ clean: false, reason });
  }

  exit(code = 0) {
    this.close({ clean: true, reason: `Shell exited (${code})`, exitCode: code });
  }

  get listenerCount() {
    return this.listeners.size;
  }

  private close(info: TransportClosed) {
    for (const l of Array.from(this.listeners)) l.onClosed?.(info);
  }
}

/** Lets chained promise callbacks run (works with fake timers) */
export async function settle(rounds = 10) {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}
