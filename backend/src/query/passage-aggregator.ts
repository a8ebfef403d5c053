import { invalidArgument, notFound } from '../common/retrieval.errors.js';
import type { DocumentRegistry } from '../documents/document-registry.js';
import type { AggregatedSearch, ScoredPassage, SearchWarning } from './query.types.js';

export interface AggregateSearchOptions {
  /** Restrict the search to these documents. Empty means all. */
  documentIds?: readonly string[];
  /** Local top-k requested from each document; defaults to `k`. */
  perDocumentK?: number;
}

/**
 * Fans a query out to every candidate document's index and merges the
 * local top-k lists into one globally ranked list.
 */
export class PassageAggregator {
  constructor(private readonly registry: DocumentRegistry) {}

  search(
    query: string,
    k: number,
    options: AggregateSearchOptions = {},
  ): AggregatedSearch {
    if (this.registry.size === 0) {
      throw notFound('No documents available. Upload documents first.');
    }
    if (!query.trim()) {
      throw invalidArgument('Query cannot be empty');
    }
    assertPositiveInteger('k', k);
    const perDocumentK = options.perDocumentK ?? k;
    assertPositiveInteger('perDocumentK', perDocumentK);

    const candidates = this.registry.filter(options.documentIds);
    const aggregated: ScoredPassage[] = [];
    const warnings: SearchWarning[] = [];

    for (const document of candidates) {
      // 单个文档出错只记一条警告，不影响整体查询
      try {
        for (const match of document.index.topK(query, perDocumentK)) {
          aggregated.push({
            documentId: document.id,
            chunkIndex: match.chunkIndex,
            score: match.score,
            text: match.text,
            source: document.title,
          });
        }
      } catch (error) {
        warnings.push({
          documentId: document.id,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    aggregated.sort((a, b) => b.score - a.score);
    return { passages: aggregated.slice(0, k), warnings };
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalidArgument(`${name} must be a positive integer (got ${value})`);
  }
}
