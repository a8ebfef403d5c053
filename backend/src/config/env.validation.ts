import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const ratio = (fallback: number) =>
  z.coerce.number().min(0).max(1).default(fallback);

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    CHUNK_SIZE: positiveInt(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    DEFAULT_TOP_K: positiveInt(4),
    MAX_TOP_K: positiveInt(10),
    ANSWER_OVERFETCH_FACTOR: positiveInt(2),
    ANSWER_MAX_CHARS: positiveInt(4000),
    MAX_DOCUMENT_FREQUENCY: z.coerce
      .number()
      .gt(0)
      .max(1)
      .default(0.9),
    HIGH_CONFIDENCE_THRESHOLD: ratio(0.5),
    MEDIUM_CONFIDENCE_THRESHOLD: ratio(0.2),
    UPLOAD_DIR: z.string().trim().min(1).default('uploads'),
    DATA_DIR: z.string().trim().min(1).default('data'),
    MAX_UPLOAD_BYTES: positiveInt(20 * 1024 * 1024),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: `CHUNK_OVERLAP (${env.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`,
      });
    }
    if (env.MEDIUM_CONFIDENCE_THRESHOLD > env.HIGH_CONFIDENCE_THRESHOLD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MEDIUM_CONFIDENCE_THRESHOLD'],
        message:
          'MEDIUM_CONFIDENCE_THRESHOLD must not exceed HIGH_CONFIDENCE_THRESHOLD',
      });
    }
    if (env.DEFAULT_TOP_K > env.MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DEFAULT_TOP_K'],
        message: 'DEFAULT_TOP_K must not exceed MAX_TOP_K',
      });
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const messages = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed - ${messages}`);
  }
  return parsed.data;
};
