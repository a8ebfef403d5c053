import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller.js';
import { RetrievalExceptionFilter } from './common/index.js';
import { AppConfigModule } from './config/index.js';
import { DocumentsModule } from './documents/index.js';
import { QueryModule } from './query/index.js';

@Module({
  imports: [AppConfigModule, DocumentsModule, QueryModule],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: RetrievalExceptionFilter,
    },
  ],
})
export class AppModule {}
