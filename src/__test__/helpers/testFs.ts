import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function cleanDir(p: string) {
  fs.rmSync(p, { recursive: true, force: true });
}

/** Fresh temp directory per test: <tmp>/ssh-scrollback-<prefix>-XXXXXX */
export function prepareUniqueOutDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `ssh-scrollback-${prefix}-`));
}
