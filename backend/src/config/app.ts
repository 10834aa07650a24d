import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

loadEnv();

const reasoningEffort = z.enum(['low', 'medium', 'high']).optional();

const envSchema = z
  .object({
    PROJECT_NAME: z.string().default('srag-surveillance-agent'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(8787),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
    AZURE_OPENAI_API_VERSION: z
      .string()
      .default('v1')
      .refine((value) => value === 'v1' || value === 'preview', {
        message: 'AZURE_OPENAI_API_VERSION must be one of: v1, preview'
      })
      .transform(() => 'v1'),
    AZURE_OPENAI_API_QUERY: z.string().default('api-version=preview'),
    AZURE_OPENAI_API_KEY: z.string().optional(),
    AZURE_OPENAI_GPT_DEPLOYMENT: z.string().default('gpt-4o'),
    AZURE_OPENAI_EMBEDDING_DEPLOYMENT: z.string().default('text-embedding-3-small'),
    AZURE_OPENAI_EMBEDDING_ENDPOINT: z.string().url().optional(),
    AZURE_OPENAI_EMBEDDING_API_KEY: z.string().optional(),
    MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),

    REASONING_DEFAULT_EFFORT: reasoningEffort,
    REASONING_CONTROLLER_EFFORT: reasoningEffort,
    REASONING_QUERY_EFFORT: reasoningEffort,
    REASONING_SYNTHESIS_EFFORT: reasoningEffort,

    SEARCH_PROVIDER: z.enum(['tavily', 'google']).default('tavily'),
    TAVILY_API_KEY: z.string().optional(),
    TAVILY_ENDPOINT: z.string().url().default('https://api.tavily.com/search'),
    GOOGLE_SEARCH_API_KEY: z.string().optional(),
    GOOGLE_SEARCH_ENGINE_ID: z.string().optional(),
    GOOGLE_SEARCH_ENDPOINT: z.string().url().default('https://customsearch.googleapis.com/customsearch/v1'),
    WEB_RESULTS_MAX: z.coerce.number().int().min(1).max(20).default(5),
    WEB_SEARCH_TIMEOUT_MS: z.coerce.number().default(10000),
    WEB_DEFAULT_RECENCY_DAYS: z.coerce.number().int().positive().optional(),
    WEB_EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(16),

    RETRIEVAL_TOP_K: z.coerce.number().int().min(1).max(20).default(5),
    CHUNK_SIZE: z.coerce.number().int().min(100).default(800),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(100),
    BM25_K1: z.coerce.number().positive().default(1.2),
    BM25_B: z.coerce.number().min(0).max(1).default(0.75),
    FUSION_METHOD: z.enum(['rrf', 'weighted']).default('rrf'),
    FUSION_SEMANTIC_WEIGHT: z.coerce.number().min(0).default(0.5),
    FUSION_LEXICAL_WEIGHT: z.coerce.number().min(0).default(0.5),
    RRF_K_CONSTANT: z.coerce.number().positive().default(60),

    ANALYTIC_DB_PATH: z.string().default('./backend/data/srag_data.db'),
    ANALYTIC_SCHEMA_PATH: z.string().default('./backend/data/analytic-schema.json'),
    STOPWORDS_PATH: z.string().default('./backend/data/stopwords.json'),
    SQL_MAX_ROWS: z.coerce.number().int().min(1).default(50),
    SQL_MAX_BYTES: z.coerce.number().int().min(256).default(8000),

    AGENT_MAX_ITERATIONS: z.coerce.number().int().min(1).default(8),
    MODEL_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    EMPTY_SEARCH_RETRY_LIMIT: z.coerce.number().int().min(0).default(1),
    OBSERVATION_MAX_TOKENS: z.coerce.number().int().min(100).default(1500),
    SESSION_LOCALE: z.string().default('pt-BR'),

    RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(10),
    REQUEST_TIMEOUT_MS: z.coerce.number().default(300000),
    CORS_ORIGIN: z.string().default('http://localhost:5173')
  })
  .refine((env) => env.FUSION_SEMANTIC_WEIGHT + env.FUSION_LEXICAL_WEIGHT > 0, {
    message: 'FUSION_SEMANTIC_WEIGHT and FUSION_LEXICAL_WEIGHT cannot both be 0',
    path: ['FUSION_SEMANTIC_WEIGHT']
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP']
  });

export type AppConfig = z.infer<typeof envSchema>;

export const config = envSchema.parse({ ...process.env });
export const isDevelopment = config.NODE_ENV === 'development';
export const isProduction = config.NODE_ENV === 'production';
export const isTest = config.NODE_ENV === 'test';
