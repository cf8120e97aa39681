/**
 * JSON file persistence
 * Writes go to a temp file first and are renamed into place.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { PersistenceStore } from './persistence.types.js';

export class JsonFilePersistenceStore implements PersistenceStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async loadState(): Promise<string | undefined> {
    try {
      return await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async saveState(blob: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmp, blob, 'utf8');
    await rename(tmp, this.filePath);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
