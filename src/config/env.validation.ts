import { z } from 'zod';

const DEFAULT_GREETING = 'How can I help you?';

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),

  DOCUMENT_STORE_DIR: z.string().min(1).default('data'),
  // 200 MiB
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(200 * 1024 * 1024),

  /** Seeded as the first assistant turn of every session; empty disables it. */
  CHAT_GREETING: z.string().default(DEFAULT_GREETING),
  /** Sessions untouched for longer than this are discarded. */
  SESSION_IDLE_TTL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(24 * 60 * 60 * 1000),

  GENERATION_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
  GENERATION_MODEL: z.string().min(1).default('llama2'),
  // the local model server ignores it, the OpenAI client requires one
  GENERATION_API_KEY: z.string().min(1).default('ollama'),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),

  EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
  CHROMADB_URL: z.string().url().default('http://localhost:8000'),
  COLLECTION_NAME: z.string().min(1).default('documents'),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(2),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
