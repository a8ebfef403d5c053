import type { DocumentMetadata } from '../documents/document.types.js';

/**
 * Outcome of a clean-up call. `missing` is benign (already gone);
 * `failed` carries the I/O error so the caller can report it.
 */
export type StorageDeleteResult =
  | { status: 'deleted' }
  | { status: 'missing' }
  | { status: 'failed'; error: Error };

export interface DocumentStorage {
  saveUpload(documentId: string, extension: string, content: Buffer): Promise<string>;
  deleteUpload(filePath: string): Promise<StorageDeleteResult>;
  writeMetadata(metadata: DocumentMetadata): Promise<void>;
  deleteMetadata(documentId: string): Promise<StorageDeleteResult>;
}

export const DOCUMENT_STORAGE_TOKEN = Symbol('DOCUMENT_STORAGE');
