import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { queryRequestSchema } from './dto/query-request.dto.js';
import { QueryService } from './query.service.js';

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

@Controller()
export class QueryController {
  constructor(private readonly queryService: QueryService) {}

  @Post('extract')
  @HttpCode(HttpStatus.OK)
  extract(@Body() body: unknown) {
    const payload = queryRequestSchema.parse(body);
    const { passages, warnings } = this.queryService.extract(
      payload.query,
      payload.topK,
      payload.documentIds,
    );

    return {
      query: payload.query,
      results: passages.map((passage) => ({
        documentId: passage.documentId,
        chunkIndex: passage.chunkIndex,
        score: round4(passage.score),
        text: passage.text,
        source: passage.source,
        highlightStart: passage.highlights[0]?.start ?? null,
        highlightEnd: passage.highlights[0]?.end ?? null,
        highlights: passage.highlights,
      })),
      warnings,
    };
  }

  @Post('answer')
  @HttpCode(HttpStatus.OK)
  answer(@Body() body: unknown) {
    const payload = queryRequestSchema.parse(body);
    const result = this.queryService.answer(
      payload.query,
      payload.topK,
      payload.documentIds,
    );

    return {
      query: payload.query,
      answer: result.answer,
      sources: result.sources.map((source) => ({
        ...source,
        score: round4(source.score),
      })),
      confidence: round4(result.confidence),
      warnings: result.warnings,
    };
  }
}
