import { z } from 'zod';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['false', '0', 'no', 'off', ''].includes(normalized)) {
      return false;
    }
  }
  return value;
}, z.boolean());

const optionalUrl = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().url().optional(),
);

const cronExpression = z
  .string()
  .min(1, 'cron expression must not be empty')
  .regex(
    /^([^\s]+\s){4}[^\s]+$/,
    'cron expression must contain five sections',
  );

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  NOTION_TOKEN: z.string().min(1, 'NOTION_TOKEN is required'),
  NOTION_BASE_URL: z.string().url('NOTION_BASE_URL must be a valid URL').default('https://api.notion.com/v1'),
  NOTION_VERSION: z.string().default('2022-06-28'),
  NOTION_RATE_LIMIT_SECONDS: z.coerce.number().nonnegative().max(10).default(0.5),
  NOTION_TIMEOUT_MS: z.coerce.number().int().positive().max(120_000).default(30_000),
  AUTHORS_DATABASE_ID: z.string().min(1, 'AUTHORS_DATABASE_ID is required'),
  FIELDS_DATABASE_ID: z.string().min(1, 'FIELDS_DATABASE_ID is required'),
  ARTICLES_DATABASE_ID: z.string().min(1, 'ARTICLES_DATABASE_ID is required'),
  LLM_ENDPOINT_URL: z.string().url('LLM_ENDPOINT_URL must be a valid URL').default('https://api.deepseek.com'),
  LLM_API_KEY: z.string().default(''),
  LLM_MODEL: z.string().min(1).default('deepseek-chat'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().max(600_000).default(120_000),
  SEARCH_BASE_URL: optionalUrl,
  SEARCH_API_KEY: z.string().optional(),
  SEARCH_MAX_RETRIES: z.coerce.number().int().nonnegative().max(5).default(2),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().max(120_000).default(60_000),
  SEARCH_RESULT_LIMIT: z.coerce.number().int().min(3).max(5).default(5),
  WORKSPACE_DIR: z.string().min(1).default('tmp/workspace'),
  DECODE_LOG_DIR: z.string().min(1).default('tmp'),
  ARTICLE_STATUS_FILTER: z.string().min(1).default('未开始'),
  USE_FIELD_CATEGORIES: booleanFromEnv.default(true),
  REFRESH_FIELDS: booleanFromEnv.default(false),
  TRANSLATION_CONCURRENCY: z.coerce.number().int().positive().max(10).default(2),
  ENABLE_INTERNAL_CRON: booleanFromEnv.default(false),
  CURATION_CRON: cronExpression.default('*/30 * * * *'),
  HTTP_PORT: z.coerce.number().int().positive().max(65_535).default(8000),
});

export type AppEnv = z.infer<typeof envSchema>;

export function loadEnv(
  input: NodeJS.ProcessEnv = process.env,
): AppEnv {
  const result = envSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid environment variables: ${messages.join(', ')}`);
  }
  return result.data;
}

let cachedEnv: AppEnv | null = null;

export function getEnv(): AppEnv {
  if (!cachedEnv) {
    cachedEnv = loadEnv();
  }
  return cachedEnv;
}

export function resetEnvCache(): void {
  cachedEnv = null;
}

export interface CurationConfig {
  endpointUrl: string;
  apiKey: string;
  modelName: string;
  modelTimeoutMs: number;
  rateLimitSeconds: number;
  searchBaseUrl: string | null;
  searchApiKey: string | null;
  maxSearchRetries: number;
  searchTimeoutMs: number;
  searchResultLimit: number;
  workspaceDir: string;
  decodeLogDir: string;
  databases: {
    authors: string;
    fields: string;
    articles: string;
  };
}

export function buildCurationConfig(env: AppEnv): CurationConfig {
  return {
    endpointUrl: env.LLM_ENDPOINT_URL,
    apiKey: env.LLM_API_KEY,
    modelName: env.LLM_MODEL,
    modelTimeoutMs: env.LLM_TIMEOUT_MS,
    rateLimitSeconds: env.NOTION_RATE_LIMIT_SECONDS,
    searchBaseUrl: env.SEARCH_BASE_URL ?? null,
    searchApiKey: env.SEARCH_API_KEY ?? null,
    maxSearchRetries: env.SEARCH_MAX_RETRIES,
    searchTimeoutMs: env.SEARCH_TIMEOUT_MS,
    searchResultLimit: env.SEARCH_RESULT_LIMIT,
    workspaceDir: env.WORKSPACE_DIR,
    decodeLogDir: env.DECODE_LOG_DIR,
    databases: {
      authors: env.AUTHORS_DATABASE_ID,
      fields: env.FIELDS_DATABASE_ID,
      articles: env.ARTICLES_DATABASE_ID,
    },
  };
}
