/**
 * File-backed persistence port for the store: one JSON document, rewritten whole.
 * Writes go to a sibling temp file first and are renamed over the target.
 */

import fs from 'fs';
import path from 'path';
import { PersistenceError, errorMessage } from '../lib/errors';

export interface StorePersistence {
  /** Raw document text, or null when nothing has been stored yet */
  read(): string | null;
  write(contents: string): void;
  /** Move an unreadable document aside; returns where it went */
  quarantine(): string;
  /** Human-readable location, for logs */
  describe(): string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonFilePersistence implements StorePersistence {
  constructor(private readonly filePath: string) {}

  read(): string | null {
    try {
      return fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new PersistenceError(`Cannot read store file ${this.filePath}: ${errorMessage(err)}`, err);
    }
  }

  write(contents: string): void {
    const dir = path.dirname(this.filePath);
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(tmp, contents, 'utf-8');
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      throw new PersistenceError(`Cannot write store file ${this.filePath}: ${errorMessage(err)}`, err);
    }
  }

  quarantine(): string {
    const target = `${this.filePath}.corrupt-${Date.now()}`;
    try {
      fs.renameSync(this.filePath, target);
    } catch (err) {
      throw new PersistenceError(`Cannot move corrupt store file aside: ${errorMessage(err)}`, err);
    }
    return target;
  }

  describe(): string {
    return this.filePath;
  }
}

/** In-process persistence, used by tests and dry runs. */
export class MemoryPersistence implements StorePersistence {
  contents: string | null;
  writes = 0;
  quarantined: string[] = [];
  failWrites = false;

  constructor(initial: string | null = null) {
    this.contents = initial;
  }

  read(): string | null {
    return this.contents;
  }

  write(contents: string): void {
    if (this.failWrites) throw new PersistenceError('Disk full');
    this.contents = contents;
    this.writes++;
  }

  quarantine(): string {
    if (this.contents !== null) this.quarantined.push(this.contents);
    this.contents = null;
    return `memory.corrupt-${this.quarantined.length}`;
  }

  describe(): string {
    return 'memory';
  }
}
