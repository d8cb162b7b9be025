// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Memory DocumentStore for Tests
// ═══════════════════════════════════════════════════════════════════════════════

import type { DocumentName, DocumentStore } from './types.js';

export class MemoryDocumentStore implements DocumentStore {
  readonly location = 'memory';
  private documents: Map<DocumentName, string> = new Map();

  async read(name: DocumentName): Promise<string | null> {
    return this.documents.get(name) ?? null;
  }

  async write(name: DocumentName, content: string): Promise<void> {
    this.documents.set(name, content);
  }

  async delete(name: DocumentName): Promise<boolean> {
    return this.documents.delete(name);
  }

  /** Number of stored documents */
  get size(): number {
    return this.documents.size;
  }
}
