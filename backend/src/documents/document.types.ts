import type { SearchableIndex } from '../retrieval/retrieval.types.js';

export const DOCUMENT_KINDS = ['PDF', 'DOCX', 'TEXT', 'RAW_TEXT'] as const;

/** `TEXT` is an uploaded .txt file, `RAW_TEXT` is pasted text. */
export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export interface Document {
  readonly id: string;
  readonly title: string;
  readonly chunks: readonly string[];
  readonly index: SearchableIndex;
  readonly kind: DocumentKind;
  /** Stored upload backing this document, if any. */
  readonly filePath?: string;
  readonly createdAt: Date;
}

export interface DocumentSummary {
  id: string;
  title: string;
  chunkCount: number;
  kind: DocumentKind;
}

export interface DocumentMetadata extends DocumentSummary {
  createdAt: string;
}

export const toDocumentSummary = (document: Document): DocumentSummary => ({
  id: document.id,
  title: document.title,
  chunkCount: document.chunks.length,
  kind: document.kind,
});
