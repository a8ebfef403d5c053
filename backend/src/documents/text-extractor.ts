import { Injectable, Logger } from '@nestjs/common';
import mammoth from 'mammoth';
import pdf from 'pdf-parse';
import type { DocumentKind } from './document.types.js';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const KIND_BY_EXTENSION: Record<SupportedExtension, DocumentKind> = {
  '.pdf': 'PDF',
  '.docx': 'DOCX',
  '.txt': 'TEXT',
};

export const isSupportedExtension = (
  extension: string,
): extension is SupportedExtension =>
  (SUPPORTED_EXTENSIONS as readonly string[]).includes(extension);

export const kindForExtension = (extension: SupportedExtension): DocumentKind =>
  KIND_BY_EXTENSION[extension];

@Injectable()
export class TextExtractor {
  private readonly logger = new Logger(TextExtractor.name);

  async extract(content: Buffer, extension: SupportedExtension): Promise<string> {
    switch (extension) {
      case '.pdf': {
        const result = await pdf(content);
        return result.text;
      }
      case '.docx': {
        const result = await mammoth.extractRawText({ buffer: content });
        if (result.messages.length > 0) {
          this.logger.warn(
            `DOCX extraction reported ${result.messages.length} message(s): ${result.messages
              .map((message) => message.message)
              .join('; ')}`,
          );
        }
        return result.value;
      }
      case '.txt':
        return content.toString('utf-8');
    }
  }
}
