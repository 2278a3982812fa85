// === src/core/logging/logger.ts ===
import { LOG_LEVEL_DEFAULT, LOG_LEVEL_ENV, LOG_MAX_BUFFER } from '../../shared/const.js';
import type { LogContext } from '../../shared/types.js';
import { safeJson } from '../../shared/utils.js';
import { isConsoleForced, isTestMode } from './test-mode.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogSink = (line: string, level: LogLevel) => void;

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  /** Same scope, extra correlation fields */
  with(ctx: Partial<LogContext>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SHORT_LEVEL: Record<LogLevel, string> = { debug: 'D', info: 'I', warn: 'W', error: 'E' };

export function parseLogLevel(v: string | undefined): LogLevel | undefined {
  const s = (v ?? '').trim().toLowerCase();
  return s === 'debug' || s === 'info' || s === 'warn' || s === 'error' ? s : undefined;
}

const consoleSink: LogSink = (line, level) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

function formatContext(ctx: Partial<LogContext>): string {
  const parts: string[] = [];
  if (ctx.sessionId) parts.push(`session=${ctx.sessionId}`);
  if (ctx.host) parts.push(`host=${ctx.host}`);
  if (ctx.operation) parts.push(`op=${ctx.operation}`);
  return parts.length ? `{${parts.join(' ')}} ` : '';
}

function formatArg(a: unknown): string {
  if (a instanceof Error) return a.stack || a.message;
  if (typeof a === 'object' && a !== null) return safeJson(a);
  return String(a);
}

class LoggerCore {
  private level: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? LOG_LEVEL_DEFAULT;
  private sinks = new Set<LogSink>();
  private buffer: string[] = [];

  constructor() {
    // test runs keep logs in memory only (getBufferedLogs) unless forced to the console
    if (!isTestMode() || isConsoleForced()) this.sinks.add(consoleSink);
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }
  getLevel() {
    return this.level;
  }

  addSink(sink: LogSink) {
    this.sinks.add(sink);
  }
  removeSink(sink: LogSink) {
    this.sinks.delete(sink);
  }

  getLogger(scope: string, ctx: Partial<LogContext> = {}): Logger {
    const emit = (lvl: LogLevel, args: unknown[]) => this.emit(lvl, scope, ctx, args);
    return {
      debug: (...a: unknown[]) => emit('debug', a),
      info: (...a: unknown[]) => emit('info', a),
      warn: (...a: unknown[]) => emit('warn', a),
      error: (...a: unknown[]) => emit('error', a),
      with: (extra: Partial<LogContext>) => this.getLogger(scope, { ...ctx, ...extra }),
    };
  }

  getBuffer(): string[] {
    return [...this.buffer];
  }

  clearBuffer() {
    this.buffer = [];
  }

  private emit(level: LogLevel, scope: string, ctx: Partial<LogContext>, args: unknown[]) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const now = new Date();
    const ts =
      now.toTimeString().split(' ')[0] + '.' + now.getMilliseconds().toString().padStart(3, '0');
    const body = args.map(formatArg).join(' ');
    const line = `[${ts}] [${SHORT_LEVEL[level]}] [${scope}] ${formatContext(ctx)}${body}`;

    // 1) memory ring
    this.buffer.push(line);
    if (this.buffer.length > LOG_MAX_BUFFER) {
      this.buffer.splice(0, this.buffer.length - LOG_MAX_BUFFER);
    }

    // 2) sinks (a broken sink must not break the caller)
    for (const sink of this.sinks) {
      try {
        sink(line, level);
      } catch {
        /* noop: nowhere left to report a failing log sink */
      }
    }
  }
}

const core = new LoggerCore();

export function setLogLevel(level: LogLevel) {
  core.setLevel(level);
}
export function getLogLevel() {
  return core.getLevel();
}
export function getLogger(scope: string, ctx?: Partial<LogContext>): Logger {
  return core.getLogger(scope, ctx);
}
export function addLogSink(sink: LogSink) {
  core.addSink(sink);
}
export function removeLogSink(sink: LogSink) {
  core.removeSink(sink);
}
/** Recent lines (restore / test assertions) */
export function getBufferedLogs(): string[] {
  return core.getBuffer();
}
export function clearBufferedLogs() {
  core.clearBuffer();
}
