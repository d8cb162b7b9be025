// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Named JSON Documents
// ═══════════════════════════════════════════════════════════════════════════════

export const DOCUMENT_FILES = {
  mappingHistory: 'mapping-history.json',
  formulaTemplates: 'formula-templates.json',
  importTemplates: 'import-templates.json',
  workInProgress: 'work-in-progress.json',
} as const;

export type DocumentName = keyof typeof DOCUMENT_FILES;

/**
 * Raw document persistence. Content is JSON text; validation happens above.
 */
export interface DocumentStore {
  /** Null when the document does not exist */
  read(name: DocumentName): Promise<string | null>;
  write(name: DocumentName, content: string): Promise<void>;
  /** True when a document was removed */
  delete(name: DocumentName): Promise<boolean>;
  /** Where documents live, for logs and health output */
  readonly location: string;
}

export type StorageErrorCode = 'INVALID_DOCUMENT' | 'IO_ERROR';

export class StorageError extends Error {
  readonly name = 'StorageError';
  readonly code: StorageErrorCode;
  readonly document: DocumentName;

  constructor(code: StorageErrorCode, document: DocumentName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.document = document;
  }
}
