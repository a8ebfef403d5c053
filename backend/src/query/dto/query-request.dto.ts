import { z } from 'zod';

// 上限由 QueryService 按配置校验
export const queryRequestSchema = z.object({
  query: z.string().min(1, 'query is required'),
  topK: z.number().int().min(1).optional(),
  documentIds: z.array(z.string().min(1)).optional(),
});

export type QueryRequestDto = z.infer<typeof queryRequestSchema>;
