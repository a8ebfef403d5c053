import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  emptyInput,
  invalidArgument,
  notFound,
} from '../common/retrieval.errors.js';
import type {
  AppConfig,
  ChunkingConfig,
  RetrievalConfig,
} from '../config/index.js';
import { SimilarityIndex, chunkText } from '../retrieval/index.js';
import { DOCUMENT_STORAGE_TOKEN } from '../storage/index.js';
import type { DocumentStorage, StorageDeleteResult } from '../storage/index.js';
import { DocumentRegistry } from './document-registry.js';
import type {
  Document,
  DocumentKind,
  DocumentSummary,
} from './document.types.js';
import { toDocumentSummary } from './document.types.js';
import {
  SUPPORTED_EXTENSIONS,
  TextExtractor,
  isSupportedExtension,
  kindForExtension,
} from './text-extractor.js';

export interface AddDocumentOptions {
  title: string;
  text: string;
  kind: DocumentKind;
  id?: string;
  filePath?: string;
}

export interface UploadedDocumentFile {
  originalname: string;
  buffer: Buffer;
}

export interface CleanupWarning {
  documentId: string;
  resource: 'upload' | 'metadata';
  message: string;
}

export interface RemoveDocumentResult {
  removed: boolean;
  warnings: CleanupWarning[];
}

export interface ClearDocumentsResult {
  count: number;
  warnings: CleanupWarning[];
}

/**
 * 文档入库与生命周期管理
 * 文本 -> 分块 -> 构建 TF-IDF 索引 -> 注册；删除时同时清理上传文件和元数据
 */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly chunking: ChunkingConfig;
  private readonly maxDocumentFrequency: number;

  constructor(
    configService: ConfigService<AppConfig>,
    private readonly registry: DocumentRegistry,
    private readonly textExtractor: TextExtractor,
    @Inject(DOCUMENT_STORAGE_TOKEN)
    private readonly storage: DocumentStorage,
  ) {
    const chunking = configService.get<ChunkingConfig>('chunking');
    const retrieval = configService.get<RetrievalConfig>('retrieval');
    if (!chunking || !retrieval) {
      throw new Error('Chunking or retrieval configuration is missing');
    }
    this.chunking = chunking;
    this.maxDocumentFrequency = retrieval.maxDocumentFrequency;
  }

  async addDocument(options: AddDocumentOptions): Promise<DocumentSummary> {
    const chunks = chunkText(options.text, this.chunking);
    if (chunks.length === 0) {
      throw emptyInput('Text too short to process');
    }

    const document: Document = {
      id: options.id ?? randomUUID(),
      title: options.title,
      chunks,
      index: new SimilarityIndex(chunks, {
        maxDocumentFrequency: this.maxDocumentFrequency,
      }),
      kind: options.kind,
      filePath: options.filePath,
      createdAt: new Date(),
    };

    this.registry.add(document);
    const summary = toDocumentSummary(document);

    try {
      await this.storage.writeMetadata({
        ...summary,
        createdAt: document.createdAt.toISOString(),
      });
    } catch (error) {
      this.registry.remove(document.id);
      throw error;
    }

    // 写元数据期间文档可能已被删除，此时删除刚写入的元数据
    if (this.registry.get(document.id) !== document) {
      const result = await this.storage.deleteMetadata(document.id);
      this.collectWarning(document.id, 'metadata', result);
      return summary;
    }

    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(
        `Indexed "${summary.title}" (${summary.kind}) into ${summary.chunkCount} chunks as ${summary.id}`,
      );
    }
    return summary;
  }

  async ingestUpload(file: UploadedDocumentFile): Promise<DocumentSummary> {
    const extension = path.extname(file.originalname).toLowerCase();
    if (!isSupportedExtension(extension)) {
      throw invalidArgument(
        `Supported formats: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      );
    }

    const documentId = randomUUID();
    const filePath = await this.storage.saveUpload(
      documentId,
      extension,
      file.buffer,
    );

    try {
      const text = await this.textExtractor.extract(file.buffer, extension);
      if (!text.trim()) {
        throw emptyInput('Document appears to be empty or unreadable');
      }
      return await this.addDocument({
        id: documentId,
        title: file.originalname,
        text,
        kind: kindForExtension(extension),
        filePath,
      });
    } catch (error) {
      const result = await this.storage.deleteUpload(filePath);
      this.collectWarning(documentId, 'upload', result);
      throw error;
    }
  }

  async removeDocument(documentId: string): Promise<RemoveDocumentResult> {
    const document = this.registry.remove(documentId);
    if (!document) {
      return { removed: false, warnings: [] };
    }
    return { removed: true, warnings: await this.cleanup(document) };
  }

  /** Same as {@link removeDocument} but raises NOT_FOUND for unknown ids. */
  async removeDocumentOrFail(documentId: string): Promise<RemoveDocumentResult> {
    const result = await this.removeDocument(documentId);
    if (!result.removed) {
      throw notFound('Document not found');
    }
    return result;
  }

  async clearAll(): Promise<ClearDocumentsResult> {
    const removed = this.registry.clear();
    const warnings: CleanupWarning[] = [];
    for (const document of removed) {
      warnings.push(...(await this.cleanup(document)));
    }
    return { count: removed.length, warnings };
  }

  listDocuments(): DocumentSummary[] {
    return this.registry.list();
  }

  private async cleanup(document: Document): Promise<CleanupWarning[]> {
    const warnings: CleanupWarning[] = [];
    if (document.filePath) {
      const result = await this.storage.deleteUpload(document.filePath);
      warnings.push(...this.collectWarning(document.id, 'upload', result));
    }
    const result = await this.storage.deleteMetadata(document.id);
    warnings.push(...this.collectWarning(document.id, 'metadata', result));
    return warnings;
  }

  private collectWarning(
    documentId: string,
    resource: CleanupWarning['resource'],
    result: StorageDeleteResult,
  ): CleanupWarning[] {
    if (result.status !== 'failed') {
      return [];
    }
    this.logger.warn(
      `Failed to delete ${resource} of document ${documentId}: ${result.error.message}`,
      result.error.stack,
    );
    return [{ documentId, resource, message: result.error.message }];
  }
}
