import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AnswerConfig, AppConfig } from '../config/index.js';
import { DocumentRegistry, DocumentsModule } from '../documents/index.js';
import { AnswerComposer } from './answer-composer.js';
import { PassageAggregator } from './passage-aggregator.js';
import { QueryController } from './query.controller.js';
import { QueryService } from './query.service.js';

@Module({
  imports: [DocumentsModule],
  providers: [
    {
      provide: PassageAggregator,
      useFactory: (registry: DocumentRegistry) => new PassageAggregator(registry),
      inject: [DocumentRegistry],
    },
    {
      provide: AnswerComposer,
      useFactory: (configService: ConfigService<AppConfig>) => {
        const answer = configService.get<AnswerConfig>('answer');
        if (!answer) {
          throw new Error('Answer configuration is missing');
        }
        return new AnswerComposer({
          thresholds: answer.confidence,
          maxChars: answer.maxChars,
        });
      },
      inject: [ConfigService],
    },
    QueryService,
  ],
  controllers: [QueryController],
  exports: [QueryService],
})
export class QueryModule {}
