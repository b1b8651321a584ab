import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { IdentityState, IdentityStorage } from '../../domain/index.js';
import { parseIdentityState } from '../../application/event-schema.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Persists the identity record as a JSON file.
 *
 * Writes go to a sibling temp file first and are renamed into place, so a
 * crash mid-write leaves the previous record intact. A missing file loads as
 * `null`; unreadable or malformed content is logged and also loads as `null`.
 */
export class FileIdentityStorage implements IdentityStorage {
  private readonly filePath: string;
  private readonly log: Logger;

  constructor(filePath: string, log: Logger) {
    this.filePath = filePath;
    this.log = log;
  }

  async load(): Promise<IdentityState | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err: unknown) {
      this.log.warn({ err, path: this.filePath }, 'Identity file is not valid JSON');
      return null;
    }

    const state = parseIdentityState(raw);
    if (state === null) {
      this.log.warn({ path: this.filePath }, 'Identity file does not match the expected shape');
    }
    return state;
  }

  async save(state: IdentityState): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(state), 'utf-8');
    await rename(tmpPath, this.filePath);
  }
}
