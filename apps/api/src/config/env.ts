import { z } from 'zod';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .default('true')
  .transform((value) => value === 'true' || value === '1');

// Empty strings in .env files count as "not configured"
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_ORIGIN: z.string().default('*'),

  OPENAI_API_KEY: optionalSecret,
  GEMINI_API_KEY: optionalSecret,
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  GEMINI_EMBEDDING_MODEL: z.string().default('text-embedding-004'),
  GEMINI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),
  LOCAL_EMBEDDING_MODEL: z.string().default('Xenova/all-MiniLM-L6-v2'),
  LOCAL_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),
  LOCAL_EMBEDDING_DTYPE: z.enum(['fp32', 'fp16', 'q8', 'q4']).default('q8'),

  ENABLE_RERANKING: booleanFlag,
  RERANK_GEMINI_MODEL: z.string().default('gemini-1.5-pro'),
  RERANK_OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  RERANK_OVERFETCH: z.coerce.number().int().min(1).default(2),

  DEFAULT_TOP_K: z.coerce.number().int().positive().default(10),
  MAX_TOP_K: z.coerce.number().int().positive().default(50),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  CATALOG_PATH: z.string().default('data/catalog.json'),
  INDEX_PATH: z.string().default('data/catalog_embeddings.idx'),
  METADATA_PATH: z.string().default('data/catalog_metadata.json'),
});

export type ServerEnv = z.infer<typeof envSchema>;

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  if (cachedEnv && source === process.env) {
    return cachedEnv;
  }

  try {
    const parsed = envSchema.parse(source);
    if (source === process.env) {
      cachedEnv = parsed;
    }
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error('Missing/invalid server env: ' + JSON.stringify(error.format()));
    }
    throw error;
  }
}

export function resetServerEnv(): void {
  cachedEnv = null;
}
