import { Module } from '@nestjs/common';
import { DOCUMENT_STORAGE_TOKEN } from './document-storage.js';
import { FileSystemDocumentStorage } from './file-system-document-storage.js';

@Module({
  providers: [
    {
      provide: DOCUMENT_STORAGE_TOKEN,
      useClass: FileSystemDocumentStorage,
    },
  ],
  exports: [DOCUMENT_STORAGE_TOKEN],
})
export class StorageModule {}
