// === src/shared/const.ts ===

// Shared constants (core + tests)

// Logger
export const LOG_LEVEL_DEFAULT = 'info' as const; // 'debug' | 'info' | 'warn' | 'error'
export const LOG_LEVEL_ENV = 'SSH_SCROLLBACK_LOG_LEVEL' as const;
export const LOG_TO_CONSOLE_ENV = 'SSH_SCROLLBACK_LOG_TO_CONSOLE' as const;
export const LOG_MAX_BUFFER = 500;

// ── SSH ───────────────────────────────────────────────────────────
export const DEFAULT_SSH_PORT = 22;
export const MIN_SSH_PORT = 1;
export const MAX_SSH_PORT = 65535;
export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
export const DEFAULT_KEEPALIVE_INTERVAL_MS = 60_000;
export const DEFAULT_TERMINAL_NAME = 'xterm-256color' as const;
export const DEFAULT_TERMINAL_COLS = 80;
export const DEFAULT_TERMINAL_ROWS = 24;

// ── Scrollback ────────────────────────────────────────────────────
/** Lines kept in memory before FIFO eviction kicks in */
export const SCROLLBACK_DEFAULT_LINES = 10_000;
export const SCROLLBACK_MIN_LINES = 1;
export const SCROLLBACK_MAX_LINES = 100_000;
/** Hard per-line limit; longer lines are truncated on append */
export const LINE_MAX_LENGTH = 16_384;

// ── Reconnection ──────────────────────────────────────────────────
export const RETRY_DEFAULT_MAX_ATTEMPTS = 3;
export const RETRY_DEFAULT_BASE_DELAY_MS = 1_000;
export const RETRY_DEFAULT_MULTIPLIER = 2;
export const RETRY_DEFAULT_MAX_DELAY_MS = 30_000;
export const RETRY_DEFAULT_JITTER = 0;

// ── Config file ───────────────────────────────────────────────────
export const CONFIG_DIR_NAME = '.config';
export const SESSION_CONFIG_FILENAME = 'session_config.json';
/** Recent connection history cap */
export const MAX_RECENT_CONNECTIONS = 5;

// ─────────────────────────────────────────────────────────────
// Status strings (SSOT)
// ─────────────────────────────────────────────────────────────
export const STATUS_STR = {
  CONNECTING: 'Connecting...',
  CONNECTED: 'Connected',
  DISCONNECTED: 'Disconnected',
  DISCONNECTED_BY_USER: 'Disconnected by user',
  CONNECTION_LOST: 'Connection lost',
  RECONNECT_DISABLED: 'Reconnection disabled',
  RECONNECT_PAUSED: 'Reconnection paused',
} as const;
