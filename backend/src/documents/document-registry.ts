import { invalidArgument, notFound } from '../common/retrieval.errors.js';
import type { Document, DocumentSummary } from './document.types.js';
import { toDocumentSummary } from './document.types.js';

type DocumentMap = ReadonlyMap<string, Document>;

/**
 * Read-only set of documents taken from a registry at one point in time.
 * Iteration follows insertion order.
 */
export class RegistryView implements Iterable<Document> {
  constructor(private readonly documents: DocumentMap) {}

  get size(): number {
    return this.documents.size;
  }

  [Symbol.iterator](): Iterator<Document> {
    return this.documents.values();
  }
}

/**
 * 文档注册表
 * 每次写操作都替换整张 Map（copy-on-write），读操作只看快照，
 * 所以检索过程中并发的 add/remove 不会影响正在迭代的数据。
 */
export class DocumentRegistry {
  private documents: DocumentMap = new Map();

  get size(): number {
    return this.documents.size;
  }

  add(document: Document): void {
    if (document.chunks.length !== document.index.size) {
      throw invalidArgument(
        `document ${document.id} has ${document.chunks.length} chunks but its index holds ${document.index.size}`,
      );
    }
    if (this.documents.has(document.id)) {
      throw invalidArgument(`document ${document.id} is already registered`);
    }

    const next = new Map(this.documents);
    next.set(document.id, document);
    this.documents = next;
  }

  get(id: string): Document | undefined {
    return this.documents.get(id);
  }

  remove(id: string): Document | undefined {
    const document = this.documents.get(id);
    if (!document) {
      return undefined;
    }

    const next = new Map(this.documents);
    next.delete(id);
    this.documents = next;
    return document;
  }

  /** Removes everything and returns what was removed. */
  clear(): Document[] {
    const removed = [...this.documents.values()];
    this.documents = new Map();
    return removed;
  }

  list(): DocumentSummary[] {
    return [...this.documents.values()].map(toDocumentSummary);
  }

  snapshot(): RegistryView {
    return new RegistryView(this.documents);
  }

  /**
   * View restricted to `ids`. An empty or missing set means every document.
   * Unknown ids are skipped; if none match the view would be empty and a
   * NOT_FOUND error is raised instead.
   */
  filter(ids?: Iterable<string>): RegistryView {
    const wanted = new Set(ids ?? []);
    if (wanted.size === 0) {
      return this.snapshot();
    }

    const current = this.documents;
    const matched = new Map<string, Document>();
    for (const [id, document] of current) {
      if (wanted.has(id)) {
        matched.set(id, document);
      }
    }
    if (matched.size === 0) {
      throw notFound('Specified documents not found');
    }
    return new RegistryView(matched);
  }
}
