// === src/core/state/statusView.ts ===
import { STATUS_STR } from '../../shared/const.js';
import type { ConnectionState, ConnectionStatusEvent } from '../connection/ConnectionLifecycleController.js';

export type StatusKind = ConnectionState | 'error';

export type StatusView = Readonly<{
  kind: StatusKind;
  message: string;
  /** spinner / indeterminate progress */
  showProgress: boolean;
  /** status strip shown at all; hidden once connected or idle */
  visible: boolean;
}>;

/** Lifecycle event → what a status strip should display */
export function toStatusView(e: ConnectionStatusEvent): StatusView {
  switch (e.state) {
    case 'idle':
      return view('idle', '', false, false);
    case 'connecting':
      return view(
        'connecting',
        e.attempt ? `Reconnecting (${e.attempt}/${e.maxAttempts})...` : STATUS_STR.CONNECTING,
        true,
        true,
      );
    case 'connected':
      return view('connected', STATUS_STR.CONNECTED, false, false);
    case 'reconnecting':
      if (e.maxAttempts === 0) return view('reconnecting', STATUS_STR.CONNECTION_LOST, false, true);
      if (e.paused) return view('reconnecting', STATUS_STR.RECONNECT_PAUSED, false, true);
      return view('reconnecting', `Reconnecting (${e.attempt}/${e.maxAttempts})...`, true, true);
    case 'disconnected':
      return view('disconnected', STATUS_STR.DISCONNECTED, false, true);
    case 'failed':
      if (e.maxAttempts === 0) {
        return view('error', e.error ? `Connection failed: ${e.error}` : 'Connection failed', false, true);
      }
      return view('failed', `Reconnection failed after ${e.maxAttempts} attempts`, false, true);
  }
}

function view(kind: StatusKind, message: string, showProgress: boolean, visible: boolean): StatusView {
  return Object.freeze({ kind, message, showProgress, visible });
}
