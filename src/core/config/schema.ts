// === src/core/config/schema.ts ===
import { z } from 'zod';

import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_SSH_PORT,
  DEFAULT_TERMINAL_COLS,
  DEFAULT_TERMINAL_NAME,
  DEFAULT_TERMINAL_ROWS,
  MAX_SSH_PORT,
  MIN_SSH_PORT,
  RETRY_DEFAULT_BASE_DELAY_MS,
  RETRY_DEFAULT_JITTER,
  RETRY_DEFAULT_MAX_ATTEMPTS,
  RETRY_DEFAULT_MAX_DELAY_MS,
  RETRY_DEFAULT_MULTIPLIER,
  SCROLLBACK_DEFAULT_LINES,
  SCROLLBACK_MAX_LINES,
  SCROLLBACK_MIN_LINES,
} from '../../shared/const.js';
import { ErrorCategory, XError } from '../../shared/errors.js';

export const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(0).default(RETRY_DEFAULT_MAX_ATTEMPTS),
    baseDelayMs: z.number().min(0).default(RETRY_DEFAULT_BASE_DELAY_MS),
    multiplier: z.number().min(1).default(RETRY_DEFAULT_MULTIPLIER),
    maxDelayMs: z.number().min(0).default(RETRY_DEFAULT_MAX_DELAY_MS),
    /** 0..1, delay varies within ±factor around the computed value */
    jitterFactor: z.number().min(0).max(1).default(RETRY_DEFAULT_JITTER),
  })
  .strict()
  .refine((p) => p.maxDelayMs >= p.baseDelayMs, {
    message: 'maxDelayMs must be >= baseDelayMs',
    path: ['maxDelayMs'],
  });

export const ScrollbackSchema = z
  .object({
    capacity: z
      .number()
      .int()
      .min(SCROLLBACK_MIN_LINES)
      .max(SCROLLBACK_MAX_LINES)
      .default(SCROLLBACK_DEFAULT_LINES),
    /** keep history after Disconnected/Failed (default) or drop it */
    clearOnEnd: z.boolean().default(false),
    clearOnReconnect: z.boolean().default(false),
  })
  .strict();

export const SshTargetSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(MIN_SSH_PORT).max(MAX_SSH_PORT).default(DEFAULT_SSH_PORT),
    user: z.string().min(1),
    password: z.string().optional(),
    privateKeyPath: z.string().optional(),
    passphrase: z.string().optional(),
    connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
    keepaliveIntervalMs: z.number().int().min(0).default(DEFAULT_KEEPALIVE_INTERVAL_MS),
    term: z.string().min(1).default(DEFAULT_TERMINAL_NAME),
    cols: z.number().int().positive().default(DEFAULT_TERMINAL_COLS),
    rows: z.number().int().positive().default(DEFAULT_TERMINAL_ROWS),
  })
  .strict();

export const SessionConfigSchema = z
  .object({
    sessionId: z.string().min(1).optional(),
    target: SshTargetSchema,
    retry: RetryPolicySchema.default({}),
    scrollback: ScrollbackSchema.default({}),
  })
  .strict();

export type RetryPolicy = Readonly<z.output<typeof RetryPolicySchema>>;
export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;
export type ScrollbackConfig = Readonly<z.output<typeof ScrollbackSchema>>;
export type ScrollbackInput = z.input<typeof ScrollbackSchema>;
export type SshTarget = Readonly<z.output<typeof SshTargetSchema>>;
export type SshTargetInput = z.input<typeof SshTargetSchema>;
export type SessionConfig = z.output<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

/**
 * Validates `input` against `schema`; a failure is a configuration error and
 * surfaces immediately as XError/CONFIGURATION carrying the zod issues.
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const r = schema.safeParse(input);
  if (!r.success) {
    const issues = r.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new XError(ErrorCategory.Configuration, `Invalid ${what}: ${issues}`, r.error.issues);
  }
  return r.data;
}
