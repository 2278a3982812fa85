// === src/core/config/session-config.ts ===
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import {
  CONFIG_DIR_NAME,
  MAX_RECENT_CONNECTIONS,
  SESSION_CONFIG_FILENAME,
} from '../../shared/const.js';
import { safeParseJson } from '../../shared/utils.js';
import { getLogger } from '../logging/logger.js';
import {
  RetryPolicySchema,
  ScrollbackSchema,
  SshTargetSchema,
  parseConfig,
  type SessionConfig,
} from './schema.js';

const log = getLogger('session-config');

/** One remembered host; secrets are never persisted */
const SavedConnectionSchema = z.object({
  id: z.string().min(1), // "ssh:<user>@<host>:<port>"
  alias: z.string().optional(),
  target: SshTargetSchema.omit({ password: true, passphrase: true }),
  lastUsed: z.string(), // ISO string
});

const SessionConfigFileSchema = z.object({
  recent: z.string().optional(), // id of last used
  connections: z.array(SavedConnectionSchema).default([]),
  retry: RetryPolicySchema.optional(),
  scrollback: ScrollbackSchema.optional(),
});

export type SavedConnection = z.output<typeof SavedConnectionSchema>;
export type SessionConfigFile = z.output<typeof SessionConfigFileSchema>;

export function getConfigFilePath(workspacePath: string): string {
  return path.join(workspacePath, CONFIG_DIR_NAME, SESSION_CONFIG_FILENAME);
}

export function ensureConfigDir(workspacePath: string): void {
  const dir = path.join(workspacePath, CONFIG_DIR_NAME);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

export function connectionId(t: { user: string; host: string; port: number }): string {
  return `ssh:${t.user}@${t.host}:${t.port}`;
}

/**
 * Reads the config file; a missing file is created empty. A file that is not
 * JSON or does not match the schema is a configuration error (thrown), the
 * user's file is left untouched.
 */
export async function readSessionConfig(workspacePath: string): Promise<SessionConfigFile> {
  ensureConfigDir(workspacePath);
  const filePath = getConfigFilePath(workspacePath);
  if (!fs.existsSync(filePath)) {
    const fresh: SessionConfigFile = { connections: [] };
    await fs.promises.writeFile(filePath, JSON.stringify(fresh, null, 2), 'utf8');
    log.info(`created ${filePath}`);
    return fresh;
  }
  const raw = await fs.promises.readFile(filePath, 'utf8');
  const parsed = safeParseJson(raw);
  return parseConfig(SessionConfigFileSchema, parsed, `config file ${filePath}`);
}

export async function saveSessionConfig(
  workspacePath: string,
  cfg: SessionConfigFile,
): Promise<void> {
  ensureConfigDir(workspacePath);
  const filePath = getConfigFilePath(workspacePath);
  await fs.promises.writeFile(filePath, JSON.stringify(cfg, null, 2), 'utf8');
}

export function upsertConnection(
  cfg: SessionConfigFile,
  entry: SavedConnection,
): SessionConfigFile {
  const connections = [...cfg.connections];
  const existingIdx = connections.findIndex((c) => c.id === entry.id);
  if (existingIdx >= 0) {
    // update fields but keep id
    const prev = connections[existingIdx];
    connections[existingIdx] = { ...prev, ...entry, id: prev.id };
  } else {
    connections.unshift(entry);
  }
  // sort by lastUsed desc, then cap
  connections.sort((a, b) => new Date(b.lastUsed).getTime() - new Date(a.lastUsed).getTime());
  return {
    ...cfg,
    connections: connections.slice(0, MAX_RECENT_CONNECTIONS),
    recent: entry.id,
  };
}

export function markRecent(
  cfg: SessionConfigFile,
  id: string,
  now: Date = new Date(),
): SessionConfigFile {
  const idx = cfg.connections.findIndex((c) => c.id === id);
  if (idx < 0) return cfg;
  const connections = cfg.connections.map((c, i) =>
    i === idx ? { ...c, lastUsed: now.toISOString() } : c,
  );
  connections.sort((a, b) => new Date(b.lastUsed).getTime() - new Date(a.lastUsed).getTime());
  return { ...cfg, connections, recent: id };
}

/**
 * Builds session input for a saved connection: file-level retry/scrollback
 * settings apply, secrets come from the caller.
 */
export function toSessionConfig(
  cfg: SessionConfigFile,
  id: string,
  secrets: { password?: string; passphrase?: string } = {},
): SessionConfig | undefined {
  const saved = cfg.connections.find((c) => c.id === id);
  if (!saved) return undefined;
  return {
    target: { ...saved.target, ...secrets },
    retry: cfg.retry ?? RetryPolicySchema.parse({}),
    scrollback: cfg.scrollback ?? ScrollbackSchema.parse({}),
  };
}
