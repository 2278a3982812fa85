// === src/core/connection/SshTransport.ts ===
import * as fs from 'fs';
import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';

import { ErrorCategory, XError, errorMessage } from '../../shared/errors.js';
import type { Disposer } from '../../shared/types.js';
import type { SshTarget } from '../config/schema.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { measureBlock } from '../logging/perf.js';
import type { Transport, TransportClosed, TransportListener } from './transport.js';

const CLOSE_WAIT_MS = 2000;

type Link = {
  client: Client;
  channel?: ClientChannel;
  exited: boolean;
  exitCode?: number | null;
  lastError?: string;
};

/**
 * Interactive shell over ssh2. One Client per connect(); the previous one is
 * ended first. A shell `exit` ends the link cleanly, anything else that closes
 * it (socket error, keepalive timeout, server reset) is a drop.
 */
export class SshTransport implements Transport<SshTarget> {
  private link?: Link;
  private listeners = new Set<TransportListener>();
  private log: Logger = getLogger('SshTransport');

  async connect(target: SshTarget, signal: AbortSignal): Promise<void> {
    if (signal.aborted) throw new XError(ErrorCategory.Connection, 'Connect aborted');
    this.drop();
    this.log = getLogger('SshTransport', { host: `${target.host}:${target.port}` });

    const privateKey = target.privateKeyPath ? await readKey(target.privateKeyPath) : undefined;
    if (signal.aborted) throw new XError(ErrorCategory.Connection, 'Connect aborted');

    await measureBlock('ssh.connect', () => this.open(target, privateKey, signal));
  }

  async disconnect(): Promise<void> {
    const link = this.link;
    this.link = undefined; // detached: its close is not reported
    if (!link) return;
    this.log.debug('disconnect: ending client');
    await new Promise<void>((resolve) => {
      const t = setTimeout(resolve, CLOSE_WAIT_MS);
      t.unref?.();
      link.client.once('close', () => {
        clearTimeout(t);
        resolve();
      });
      link.client.end();
    });
  }

  write(data: string | Buffer): void {
    const channel = this.link?.channel;
    if (!channel) throw new XError(ErrorCategory.InvalidState, 'SSH shell is not open');
    channel.write(data);
  }

  resize(cols: number, rows: number): void {
    this.link?.channel?.setWindow(rows, cols, 0, 0);
  }

  subscribe(listener: TransportListener): Disposer {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── internals ─────────────────────────────────────────────────
  private open(target: SshTarget, privateKey: Buffer | undefined, signal: AbortSignal) {
    return new Promise<void>((resolve, reject) => {
      const client = new Client();
      const link: Link = { client, exited: false };
      this.link = link;
      let settled = false;

      const fail = (e: XError) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        if (this.link === link) this.link = undefined;
        client.end();
        reject(e);
      };
      const onAbort = () => fail(new XError(ErrorCategory.Connection, 'Connect aborted'));
      signal.addEventListener('abort', onAbort, { once: true });

      client
        .once('ready', () => {
          client.shell({ term: target.term, cols: target.cols, rows: target.rows }, (err, channel) => {
            if (settled) {
              if (!err) channel.end();
              return;
            }
            if (err) {
              fail(new XError(ErrorCategory.Transport, `Shell request failed: ${err.message}`, err));
              return;
            }
            settled = true;
            signal.removeEventListener('abort', onAbort);
            this.attach(link, channel);
            this.log.info('shell open');
            resolve();
          });
        })
        .on('error', (e: Error) => {
          link.lastError = e.message;
          if (!settled) {
            fail(
              new XError(
                ErrorCategory.Connection,
                `SSH ${target.user}@${target.host}:${target.port}: ${e.message}`,
                e,
              ),
            );
            return;
          }
          this.log.warn(`ssh error: ${e.message}`);
        })
        .on('close', () => {
          if (!settled) {
            fail(new XError(ErrorCategory.Connection, link.lastError ?? 'Connection closed before ready'));
            return;
          }
          this.finish(link);
        });

      const config: ConnectConfig = {
        host: target.host,
        port: target.port,
        username: target.user,
        password: target.password,
        privateKey,
        passphrase: target.passphrase,
        readyTimeout: target.connectTimeoutMs,
        keepaliveInterval: target.keepaliveIntervalMs,
        tryKeyboard: false,
      };
      try {
        client.connect(config);
      } catch (e) {
        // ssh2 throws synchronously on malformed keys/options
        fail(new XError(ErrorCategory.Configuration, `SSH connect rejected: ${errorMessage(e)}`, e));
      }
    });
  }

  private attach(link: Link, channel: ClientChannel) {
    link.channel = channel;
    const forward = (chunk: Buffer) => {
      if (this.link !== link) return;
      for (const l of Array.from(this.listeners)) {
        try {
          l.onData?.(chunk);
        } catch (e) {
          this.log.error('data listener threw', e);
        }
      }
    };
    channel.on('data', forward);
    channel.stderr.on('data', forward);
    channel.on('exit', (code: number | null) => {
      link.exited = true;
      link.exitCode = code;
    });
    channel.on('close', () => {
      // shell gone; end the connection so 'close' on the client reports it once
      link.client.end();
    });
  }

  private finish(link: Link) {
    if (this.link !== link) return;
    this.link = undefined;
    const info: TransportClosed = Object.freeze({
      clean: link.exited,
      reason: link.exited
        ? `Shell exited${link.exitCode !== undefined && link.exitCode !== null ? ` (${link.exitCode})` : ''}`
        : link.lastError ?? 'Connection lost',
      exitCode: link.exitCode,
    });
    this.log.info(`closed clean=${info.clean} reason="${info.reason}"`);
    for (const l of Array.from(this.listeners)) {
      try {
        l.onClosed?.(info);
      } catch (e) {
        this.log.error('close listener threw', e);
      }
    }
  }

  private drop() {
    const prev = this.link;
    if (!prev) return;
    this.link = undefined;
    prev.client.end();
  }
}

async function readKey(p: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(p);
  } catch (e) {
    throw new XError(ErrorCategory.Configuration, `Cannot read private key ${p}: ${errorMessage(e)}`, e);
  }
}
