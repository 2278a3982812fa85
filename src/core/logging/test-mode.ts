import { LOG_TO_CONSOLE_ENV } from '../../shared/const.js';

/**
 * Detects the test runner environment.
 * - npm_lifecycle_event === 'test'
 * - NODE_ENV === 'test'
 * - runner hints (JEST_WORKER_ID / VITEST)
 */
export function isTestMode(): boolean {
  const ev = (process.env.npm_lifecycle_event || '').toLowerCase();
  return (
    ev === 'test' ||
    process.env.NODE_ENV === 'test' ||
    !!process.env.VITEST ||
    !!process.env.JEST_WORKER_ID
  );
}

/** Forced console output even under the test runner: SSH_SCROLLBACK_LOG_TO_CONSOLE=1 */
export function isConsoleForced(): boolean {
  return process.env[LOG_TO_CONSOLE_ENV] === '1';
}
