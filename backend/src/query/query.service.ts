import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { invalidArgument } from '../common/retrieval.errors.js';
import type { AppConfig, RetrievalConfig } from '../config/index.js';
import { AnswerComposer } from './answer-composer.js';
import { findHighlights } from './highlights.js';
import { PassageAggregator } from './passage-aggregator.js';
import type {
  ExtractResult,
  QueryAnswer,
  SearchWarning,
} from './query.types.js';

/**
 * 检索问答服务
 * - extract: 只返回排序后的原文段落和高亮位置
 * - answer: 每个文档多取 overfetch 倍候选，全局排序后组装回答
 * 单个文档检索失败时记录日志，并随结果一起返回 warnings
 */
@Injectable()
export class QueryService {
  private readonly logger = new Logger(QueryService.name);
  private readonly retrieval: RetrievalConfig;

  constructor(
    configService: ConfigService<AppConfig>,
    private readonly aggregator: PassageAggregator,
    private readonly composer: AnswerComposer,
  ) {
    const retrieval = configService.get<RetrievalConfig>('retrieval');
    if (!retrieval) {
      throw new Error('Retrieval configuration is missing');
    }
    this.retrieval = retrieval;
  }

  extract(
    query: string,
    topK?: number,
    documentIds?: readonly string[],
  ): ExtractResult {
    const k = this.resolveTopK(topK);
    const { passages, warnings } = this.aggregator.search(query, k, {
      documentIds,
      perDocumentK: k,
    });
    this.reportWarnings(warnings);

    return {
      passages: passages.map((passage) => ({
        ...passage,
        highlights: findHighlights(passage.text, query),
      })),
      warnings,
    };
  }

  answer(
    query: string,
    topK?: number,
    documentIds?: readonly string[],
  ): QueryAnswer {
    const k = this.resolveTopK(topK);
    const { passages, warnings } = this.aggregator.search(query, k, {
      documentIds,
      perDocumentK: k * this.retrieval.answerOverfetchFactor,
    });
    this.reportWarnings(warnings);

    return { ...this.composer.compose(passages, query), warnings };
  }

  private resolveTopK(topK: number | undefined): number {
    const k = topK ?? this.retrieval.defaultTopK;
    if (!Number.isInteger(k) || k < 1 || k > this.retrieval.maxTopK) {
      throw invalidArgument(
        `topK must be an integer between 1 and ${this.retrieval.maxTopK} (got ${k})`,
      );
    }
    return k;
  }

  private reportWarnings(warnings: SearchWarning[]): void {
    for (const warning of warnings) {
      this.logger.warn(
        `Document ${warning.documentId} skipped during search: ${warning.reason}`,
      );
    }
  }
}
