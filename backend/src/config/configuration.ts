import path from 'node:path';
import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // ConfigModule 的 validate 已经先执行过一次，这里再解析一次拿到带默认值的结果
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
    },
    chunking: {
      size: env.CHUNK_SIZE,
      overlap: env.CHUNK_OVERLAP,
    },
    retrieval: {
      defaultTopK: env.DEFAULT_TOP_K,
      maxTopK: env.MAX_TOP_K,
      maxDocumentFrequency: env.MAX_DOCUMENT_FREQUENCY,
      answerOverfetchFactor: env.ANSWER_OVERFETCH_FACTOR,
    },
    answer: {
      maxChars: env.ANSWER_MAX_CHARS,
      confidence: {
        high: env.HIGH_CONFIDENCE_THRESHOLD,
        medium: env.MEDIUM_CONFIDENCE_THRESHOLD,
      },
    },
    storage: {
      uploadDir: path.resolve(env.UPLOAD_DIR),
      dataDir: path.resolve(env.DATA_DIR),
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    },
  };
};

export type ChunkingConfig = AppConfig['chunking'];
export type RetrievalConfig = AppConfig['retrieval'];
export type AnswerConfig = AppConfig['answer'];
export type StorageConfig = AppConfig['storage'];
