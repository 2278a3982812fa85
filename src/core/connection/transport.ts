// === src/core/connection/transport.ts ===
import type { Disposer } from '../../shared/types.js';

export type TransportClosed = Readonly<{
  /** remote side ended the session normally (shell exit) vs. a dropped link */
  clean: boolean;
  reason?: string;
  exitCode?: number | null;
}>;

export interface TransportListener {
  onData?(chunk: string | Buffer): void;
  onClosed?(info: TransportClosed): void;
}

/**
 * Opaque channel to the remote shell. Wire protocol and crypto live behind
 * it; the lifecycle controller only sees connect/disconnect/data/closed.
 *
 * connect() resolves once the session is usable and rejects on failure;
 * aborting `signal` must make a pending connect settle promptly.
 */
export interface Transport<TTarget = unknown> {
  connect(target: TTarget, signal: AbortSignal): Promise<void>;
  disconnect(): Promise<void>;
  write(data: string | Buffer): void;
  resize?(cols: number, rows: number): void;
  subscribe(listener: TransportListener): Disposer;
}
