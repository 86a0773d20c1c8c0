/** App configuration, parsed once from the environment. */
import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v.length > 0 ? v : undefined));

const appConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  VECTOR_BACKEND: z.enum(['sqlite', 'supabase']).default('sqlite'),
  SQLITE_PATH: z.string().default('data/vectors.sqlite'),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_TABLE: z.string().default('products'),
  SUPABASE_MATCH_FUNCTION: z.string().default('match_products'),

  EMBEDDING_PROVIDER: z.enum(['tei', 'openai']).default('tei'),
  EMBEDDING_URL: z.string().url().default('http://localhost:8080'),
  EMBEDDING_MODEL: z.string().default('intfloat/e5-base-v2'),
  EMBEDDING_FALLBACK_URL: optionalString,
  EMBEDDING_FALLBACK_MODEL: optionalString,
  RERANKER_URL: optionalString,
  RERANKER_MODEL: z.string().default('BAAI/bge-reranker-v2-m3'),

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  PARSE_MODEL: z.string().default('gpt-4o-mini'),
  NLG_MODEL: z.string().default('gpt-4o-mini'),

  REDIS_URL: optionalString,
  ANSWER_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),

  PARSE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RERANK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  SUMMARIZE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Parse the given environment into an AppConfig. Throws with every offending key listed.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = appConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors
      .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const config = result.data;
  if (config.VECTOR_BACKEND === 'supabase' && (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error('Invalid configuration: VECTOR_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
  }
  return config;
}
