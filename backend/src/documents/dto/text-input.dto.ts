import { z } from 'zod';

export const DEFAULT_TEXT_INPUT_TITLE = 'Direct Text Input';

export const textInputSchema = z.object({
  text: z.string().min(1, 'text is required'),
  title: z.string().trim().min(1).default(DEFAULT_TEXT_INPUT_TITLE),
});

export type TextInputDto = z.infer<typeof textInputSchema>;
