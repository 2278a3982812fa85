// === src/core/sessions/createSshSession.ts ===
import { randomUUID } from 'crypto';

import { OutputBuffer } from '../buffer/OutputBuffer.js';
import { SessionConfigSchema, parseConfig, type SessionConfigInput, type SshTarget } from '../config/schema.js';
import { ConnectionLifecycleController } from '../connection/ConnectionLifecycleController.js';
import { createRetryPolicy } from '../connection/RetryPolicy.js';
import { SshTransport } from '../connection/SshTransport.js';
import type { Transport } from '../connection/transport.js';
import { SearchSession } from '../search/SearchSession.js';
import { SessionOrchestrator } from './SessionOrchestrator.js';

export type CreateSessionOptions = {
  /** defaults to an ssh2-backed SshTransport */
  transport?: Transport<SshTarget>;
  random?: () => number;
};

/**
 * Validates `input` and wires a ready-to-connect session. Invalid config
 * throws XError/CONFIGURATION here, before anything is opened.
 */
export function createSshSession(
  input: SessionConfigInput,
  opts: CreateSessionOptions = {},
): SessionOrchestrator<SshTarget> {
  const cfg = parseConfig(SessionConfigSchema, input, 'session config');
  const context = {
    sessionId: cfg.sessionId ?? randomUUID(),
    host: `${cfg.target.host}:${cfg.target.port}`,
  };

  const controller = new ConnectionLifecycleController<SshTarget>({
    transport: opts.transport ?? new SshTransport(),
    target: Object.freeze(cfg.target),
    retryPolicy: createRetryPolicy(cfg.retry),
    context,
    random: opts.random,
  });
  const buffer = new OutputBuffer(cfg.scrollback.capacity);
  const search = new SearchSession(buffer, { context });

  return new SessionOrchestrator({ controller, buffer, search, scrollback: cfg.scrollback });
}
