import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { invalidArgument } from '../common/retrieval.errors.js';
import { DocumentsService } from './documents.service.js';
import type { UploadedDocumentFile } from './documents.service.js';
import { textInputSchema } from './dto/text-input.dto.js';

@Controller()
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  @Post('upload')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('file'))
  async upload(@UploadedFile() file: UploadedDocumentFile | undefined) {
    if (!file) {
      throw invalidArgument('File must be provided in the "file" field');
    }

    const summary = await this.documentsService.ingestUpload(file);
    return {
      documentId: summary.id,
      title: summary.title,
      chunkCount: summary.chunkCount,
      message: `Successfully processed ${summary.title} into ${summary.chunkCount} searchable chunks`,
    };
  }

  @Post('text-input')
  @HttpCode(HttpStatus.CREATED)
  async textInput(@Body() body: unknown) {
    const payload = textInputSchema.parse(body);
    if (!payload.text.trim()) {
      throw invalidArgument('Text cannot be empty');
    }

    const summary = await this.documentsService.addDocument({
      title: payload.title,
      text: payload.text,
      kind: 'RAW_TEXT',
    });
    return {
      documentId: summary.id,
      title: summary.title,
      chunkCount: summary.chunkCount,
      message: `Text processed into ${summary.chunkCount} searchable chunks`,
    };
  }

  @Get('documents')
  listDocuments() {
    const documents = this.documentsService.listDocuments();
    return { documents, totalCount: documents.length };
  }

  @Delete('documents/:id')
  async deleteDocument(@Param('id') id: string) {
    const { warnings } = await this.documentsService.removeDocumentOrFail(id);
    return { detail: 'Document deleted successfully', documentId: id, warnings };
  }

  @Delete('documents')
  async clearDocuments() {
    const { count, warnings } = await this.documentsService.clearAll();
    return {
      detail: `Cleared ${count} documents from knowledge base`,
      count,
      warnings,
    };
  }
}
