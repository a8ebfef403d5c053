import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import type { AppConfig, StorageConfig } from '../config/index.js';
import { StorageModule } from '../storage/index.js';
import { DocumentRegistry } from './document-registry.js';
import { DocumentsController } from './documents.controller.js';
import { DocumentsService } from './documents.service.js';
import { TextExtractor } from './text-extractor.js';

@Module({
  imports: [
    StorageModule,
    MulterModule.registerAsync({
      useFactory: (configService: ConfigService<AppConfig>) => {
        const storage = configService.get<StorageConfig>('storage');
        return {
          limits: { fileSize: storage?.maxUploadBytes },
        };
      },
      inject: [ConfigService],
    }),
  ],
  providers: [DocumentRegistry, DocumentsService, TextExtractor],
  controllers: [DocumentsController],
  exports: [DocumentRegistry, DocumentsService],
})
export class DocumentsModule {}
