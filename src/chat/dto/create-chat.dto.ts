import { z } from 'zod';

export const createChatSchema = z.object({
  prompt: z
    .string()
    .refine((prompt) => prompt.trim().length > 0, 'Prompt must not be empty'),
  stream: z.boolean().default(true),
});

export type CreateChatDto = z.infer<typeof createChatSchema>;
