// ═══════════════════════════════════════════════════════════════════════════════
// FILE STORE — JSON Documents in the Data Directory
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { DOCUMENT_FILES, StorageError, type DocumentName, type DocumentStore } from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileDocumentStore implements DocumentStore {
  readonly location: string;

  constructor(dataDir: string) {
    this.location = resolve(dataDir);
  }

  private pathOf(name: DocumentName): string {
    return join(this.location, DOCUMENT_FILES[name]);
  }

  async read(name: DocumentName): Promise<string | null> {
    try {
      return await readFile(this.pathOf(name), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StorageError('IO_ERROR', name, `Failed to read ${DOCUMENT_FILES[name]}`, { cause: error });
    }
  }

  /**
   * Write to a temp file, then rename over the document.
   */
  async write(name: DocumentName, content: string): Promise<void> {
    const target = this.pathOf(name);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(this.location, { recursive: true });
      await writeFile(temp, content, 'utf8');
      await rename(temp, target);
    } catch (error) {
      throw new StorageError('IO_ERROR', name, `Failed to write ${DOCUMENT_FILES[name]}`, { cause: error });
    }
  }

  async delete(name: DocumentName): Promise<boolean> {
    try {
      await rm(this.pathOf(name));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new StorageError('IO_ERROR', name, `Failed to delete ${DOCUMENT_FILES[name]}`, { cause: error });
    }
  }
}
