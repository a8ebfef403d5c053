import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig, StorageConfig } from '../config/index.js';
import type { DocumentMetadata } from '../documents/document.types.js';
import type {
  DocumentStorage,
  StorageDeleteResult,
} from './document-storage.js';

@Injectable()
export class FileSystemDocumentStorage implements DocumentStorage {
  private readonly logger = new Logger(FileSystemDocumentStorage.name);
  private readonly uploadDir: string;
  private readonly dataDir: string;

  constructor(configService: ConfigService<AppConfig>) {
    const storage = configService.get<StorageConfig>('storage');
    if (!storage) {
      throw new Error('Storage configuration is missing');
    }
    this.uploadDir = storage.uploadDir;
    this.dataDir = storage.dataDir;
  }

  async saveUpload(
    documentId: string,
    extension: string,
    content: Buffer,
  ): Promise<string> {
    await fs.mkdir(this.uploadDir, { recursive: true });
    const filePath = path.join(this.uploadDir, `${documentId}${extension}`);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  deleteUpload(filePath: string): Promise<StorageDeleteResult> {
    return this.unlink(filePath);
  }

  async writeMetadata(metadata: DocumentMetadata): Promise<void> {
    // 元数据只用于排查和恢复，索引本身不持久化
    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.writeFile(
      this.metadataPath(metadata.id),
      JSON.stringify(metadata),
      'utf-8',
    );
  }

  deleteMetadata(documentId: string): Promise<StorageDeleteResult> {
    return this.unlink(this.metadataPath(documentId));
  }

  private metadataPath(documentId: string): string {
    return path.join(this.dataDir, `${documentId}.json`);
  }

  private async unlink(filePath: string): Promise<StorageDeleteResult> {
    try {
      await fs.unlink(filePath);
      return { status: 'deleted' };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'missing' };
      }
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Failed to delete ${filePath}: ${failure.message}`);
      return { status: 'failed', error: failure };
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
