// === src/core/sessions/SessionOrchestrator.ts ===
import { ErrorCategory, XError, errorMessage, invalidArgument } from '../../shared/errors.js';
import type { Disposer } from '../../shared/types.js';
import { notifyAll } from '../../shared/utils.js';
import { LineAssembler } from '../buffer/LineAssembler.js';
import type { IOutputBuffer, Line } from '../buffer/OutputBuffer.js';
import type { ScrollbackConfig } from '../config/schema.js';
import type {
  ConnectionLifecycleController,
  ConnectionState,
  ConnectionStatusEvent,
} from '../connection/ConnectionLifecycleController.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { measure } from '../logging/perf.js';
import type { SearchObserver, SearchSession } from '../search/SearchSession.js';
import { toStatusView, type StatusView } from '../state/statusView.js';

export type SessionCallbacks = {
  onStatus?: (e: ConnectionStatusEvent, view: StatusView) => void;
  /** lines just appended to the scrollback */
  onLines?: (lines: readonly Line[]) => void;
  /** data-path faults; never thrown back into the transport */
  onError?: (e: XError) => void;
};

export type SessionOrchestratorOptions<TTarget> = {
  controller: ConnectionLifecycleController<TTarget>;
  buffer: IOutputBuffer;
  search: SearchSession;
  assembler?: LineAssembler;
  scrollback?: Partial<Pick<ScrollbackConfig, 'clearOnEnd' | 'clearOnReconnect'>>;
};

/**
 * One terminal session: lifecycle controller + scrollback + search.
 *
 * Transport bytes are assembled into lines, appended to the buffer and the
 * active search is invalidated once per chunk. When the session ends
 * (disconnected/failed) the partial line is flushed; the buffer is cleared only
 * with `clearOnEnd`. `clearOnReconnect` clears when a drop starts a retry cycle.
 */
export class SessionOrchestrator<TTarget = unknown> {
  readonly controller: ConnectionLifecycleController<TTarget>;
  readonly buffer: IOutputBuffer;
  readonly search: SearchSession;

  private log: Logger;
  private assembler: LineAssembler;
  private clearOnEnd: boolean;
  private clearOnReconnect: boolean;

  private statusListeners = new Set<NonNullable<SessionCallbacks['onStatus']>>();
  private lineListeners = new Set<NonNullable<SessionCallbacks['onLines']>>();
  private errorListeners = new Set<NonNullable<SessionCallbacks['onError']>>();
  private disposers: Disposer[] = [];
  private disposed = false;

  constructor(opts: SessionOrchestratorOptions<TTarget>) {
    if (!opts?.controller || !opts.buffer || !opts.search) {
      throw invalidArgument('SessionOrchestrator requires controller, buffer and search');
    }
    this.controller = opts.controller;
    this.buffer = opts.buffer;
    this.search = opts.search;
    this.assembler = opts.assembler ?? new LineAssembler();
    this.clearOnEnd = opts.scrollback?.clearOnEnd ?? false;
    this.clearOnReconnect = opts.scrollback?.clearOnReconnect ?? false;
    this.log = getLogger('SessionOrchestrator', this.controller.context);

    this.disposers.push(
      this.controller.onData((chunk) => this.handleData(chunk)),
      this.controller.subscribe((e) => this.handleStatus(e)),
    );
  }

  get state(): ConnectionState {
    return this.controller.state;
  }

  connect(): Promise<ConnectionState> {
    return this.controller.connect();
  }

  disconnect(): Promise<ConnectionState> {
    return this.controller.disconnect();
  }

  write(data: string | Buffer): boolean {
    return this.controller.write(data);
  }

  /** Subscribe to every callback at once; returns one disposer */
  observe(cb: SessionCallbacks & SearchObserver): Disposer {
    const ds: Disposer[] = [];
    if (cb.onStatus) ds.push(this.onStatus(cb.onStatus));
    if (cb.onLines) ds.push(this.onLines(cb.onLines));
    if (cb.onError) ds.push(this.onError(cb.onError));
    if (cb.onResultsChanged || cb.onNavigate || cb.onInvalidQuery) ds.push(this.search.subscribe(cb));
    return () => ds.forEach((d) => d());
  }

  onStatus(listener: NonNullable<SessionCallbacks['onStatus']>): Disposer {
    return addTo(this.statusListeners, listener);
  }

  onLines(listener: NonNullable<SessionCallbacks['onLines']>): Disposer {
    return addTo(this.lineListeners, listener);
  }

  onError(listener: NonNullable<SessionCallbacks['onError']>): Disposer {
    return addTo(this.errorListeners, listener);
  }

  async dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.disposers.splice(0).forEach((d) => d());
    await this.controller.dispose();
    this.search.close();
    this.statusListeners.clear();
    this.lineListeners.clear();
    this.errorListeners.clear();
  }

  // ── data path ─────────────────────────────────────────────────
  @measure('SessionOrchestrator.handleData')
  private handleData(chunk: string | Buffer) {
    try {
      const texts = this.assembler.push(chunk);
      if (texts.length) this.appendLines(texts);
      if (this.search.isActive) this.search.invalidate();
    } catch (e) {
      this.report(e, 'data path');
    }
  }

  private appendLines(texts: readonly string[]) {
    const lines = this.buffer.appendMany(texts);
    notifyAll(this.lineListeners, lines, (e) => this.log.error('lines listener threw', e));
  }

  // ── lifecycle ─────────────────────────────────────────────────
  private handleStatus(e: ConnectionStatusEvent) {
    try {
      if (e.state === 'disconnected' || e.state === 'failed') {
        this.endOfSession(this.clearOnEnd);
      } else if (e.state === 'reconnecting' && e.previous === 'connected') {
        this.endOfSession(this.clearOnReconnect);
      }
    } catch (err) {
      this.report(err, `status ${e.state}`);
    }
    const view = toStatusView(e);
    for (const l of Array.from(this.statusListeners)) {
      try {
        l(e, view);
      } catch (err) {
        this.log.error('status listener threw', err);
      }
    }
  }

  private endOfSession(clear: boolean) {
    const tail = this.assembler.flush();
    if (tail !== undefined) this.appendLines([tail]);
    if (clear) {
      this.buffer.clear();
      this.log.info('scrollback cleared');
    }
    if (this.search.isActive) this.search.invalidate();
  }

  private report(e: unknown, where: string) {
    const xe = e instanceof XError ? e : new XError(ErrorCategory.Unknown, errorMessage(e), e);
    this.log.error(`${where}: ${xe.message}`);
    notifyAll(this.errorListeners, xe, (err) => this.log.error('error listener threw', err));
  }
}

function addTo<T>(set: Set<T>, item: T): Disposer {
  set.add(item);
  return () => {
    set.delete(item);
  };
}
