import { z } from 'zod';
import { ConfigError } from './errors';

export const PROVIDER_KINDS = ['ollama', 'claude_code', 'gemini_cli', 'codex'] as const;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export const DISTANCE_METRICS = ['COSINE', 'IP', 'L2'] as const;
export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://localhost:5173';
const DEFAULT_EMBEDDING_MODEL = 'paraphrase-multilingual';
const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';
const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
const CLI_TIMEOUT_MS = 180_000;

const csv = (value: string | undefined) =>
  (value ?? '')
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);

const intFrom = (fallback: number, min = 1) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? String(fallback) : v.trim()))
    .pipe(z.coerce.number().int().min(min));

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: intFrom(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS),

  REDIS_URL: z.string().url().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: intFrom(6379),
  COLLECTION_NAME: z.string().regex(/^[A-Za-z0-9_-]+$/, 'letters, digits, _ and - only').default('fables'),
  VECTOR_DISTANCE: z.enum(DISTANCE_METRICS).default('COSINE'),
  INDEX_RETRY_BACKOFF_MS: intFrom(250, 0),

  EMBEDDING_PROVIDER: z.enum(['ollama', 'openai']).default('ollama'),
  EMBEDDING_MODEL: z.string().optional(),
  EMBEDDING_MAX_TOKENS: intFrom(512),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_EMBEDDING_MODEL: z.string().optional(),
  OLLAMA_HOST: z.string().url().default(DEFAULT_OLLAMA_HOST),

  LLM_PROVIDERS: z.string().default('ollama'),
  LLM_DEFAULT_PROVIDER: z.string().optional(),
  OLLAMA_MODELS: z.string().default('llama3.2'),
  OLLAMA_TIMEOUT_MS: intFrom(120_000),
  CLAUDE_CODE_PATH: z.string().default('claude'),
  CLAUDE_CODE_MODEL: z.string().default('sonnet'),
  CLAUDE_CODE_TIMEOUT_MS: intFrom(CLI_TIMEOUT_MS),
  GEMINI_CLI_PATH: z.string().default('gemini'),
  GEMINI_CLI_MODEL: z.string().default('gemini-2.5-pro'),
  GEMINI_CLI_TIMEOUT_MS: intFrom(CLI_TIMEOUT_MS),
  CODEX_PATH: z.string().default('codex'),
  CODEX_MODEL: z.string().default('gpt-5'),
  CODEX_TIMEOUT_MS: intFrom(CLI_TIMEOUT_MS),

  PROCESS_MAX_CONCURRENCY: intFrom(2),
  PROCESS_KILL_GRACE_MS: intFrom(2000, 0),
  PROCESS_MAX_OUTPUT_BYTES: intFrom(4 * 1024 * 1024),

  CONTEXT_CHAR_BUDGET: intFrom(6000, 200),
  DATA_PATH: z.string().default('data/fables.json'),
});

interface ProviderConfigBase {
  name: ProviderKind;
  defaultModel: string;
  /** Empty means any model name is accepted. */
  models: string[];
  timeoutMs: number;
}

export interface OllamaProviderConfig extends ProviderConfigBase {
  kind: 'ollama';
  host: string;
}

export interface CliProviderConfig extends ProviderConfigBase {
  kind: Exclude<ProviderKind, 'ollama'>;
  executable: string;
}

export type ProviderConfig = OllamaProviderConfig | CliProviderConfig;

export interface Config {
  host: string;
  port: number;
  logLevel: string;
  corsOrigins: string[];
  index: {
    redisUrl: string;
    collection: string;
    distance: DistanceMetric;
    retryBackoffMs: number;
  };
  embeddings: {
    provider: 'ollama' | 'openai';
    model: string;
    maxTokens: number;
    ollama: { host: string };
    openai: { apiKey: string };
  };
  generation: {
    defaultProvider: ProviderKind;
    providers: ProviderConfig[];
  };
  process: {
    maxConcurrency: number;
    killGraceMs: number;
    maxOutputBytes: number;
  };
  contextCharBudget: number;
  dataPath: string;
}

/**
 * Reads and validates the environment once. Any problem is a ConfigError:
 * the service refuses to start on a configuration it cannot honour.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid environment', issues);
  }
  const e = parsed.data;

  const enabled = csv(e.LLM_PROVIDERS);
  if (enabled.length === 0) {
    throw new ConfigError('LLM_PROVIDERS must name at least one provider');
  }
  const unknown = enabled.filter((name) => !isProviderKind(name));
  if (unknown.length > 0) {
    throw new ConfigError('Unknown provider in LLM_PROVIDERS', unknown.map((name) => `${name} (known: ${PROVIDER_KINDS.join(', ')})`));
  }
  const kinds = [...new Set(enabled.filter(isProviderKind))];

  const defaultProvider = e.LLM_DEFAULT_PROVIDER?.trim() || kinds[0];
  if (!isProviderKind(defaultProvider) || !kinds.includes(defaultProvider)) {
    throw new ConfigError(`LLM_DEFAULT_PROVIDER '${defaultProvider}' is not one of LLM_PROVIDERS (${kinds.join(', ')})`);
  }

  const ollamaModels = csv(e.OLLAMA_MODELS);
  const providers = kinds.map((kind): ProviderConfig => {
    switch (kind) {
      case 'ollama':
        if (ollamaModels.length === 0) {
          throw new ConfigError('OLLAMA_MODELS must list at least one model when ollama is enabled');
        }
        return {
          kind,
          name: kind,
          host: e.OLLAMA_HOST,
          defaultModel: ollamaModels[0],
          models: ollamaModels,
          timeoutMs: e.OLLAMA_TIMEOUT_MS,
        };
      case 'claude_code':
        return { kind, name: kind, executable: e.CLAUDE_CODE_PATH, defaultModel: e.CLAUDE_CODE_MODEL, models: [], timeoutMs: e.CLAUDE_CODE_TIMEOUT_MS };
      case 'gemini_cli':
        return { kind, name: kind, executable: e.GEMINI_CLI_PATH, defaultModel: e.GEMINI_CLI_MODEL, models: [], timeoutMs: e.GEMINI_CLI_TIMEOUT_MS };
      case 'codex':
        return { kind, name: kind, executable: e.CODEX_PATH, defaultModel: e.CODEX_MODEL, models: [], timeoutMs: e.CODEX_TIMEOUT_MS };
    }
  });

  const embeddingModel =
    e.EMBEDDING_MODEL ??
    (e.EMBEDDING_PROVIDER === 'openai' ? e.OPENAI_EMBEDDING_MODEL ?? DEFAULT_OPENAI_EMBEDDING_MODEL : DEFAULT_EMBEDDING_MODEL);

  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigins: csv(e.CORS_ORIGINS),
    index: {
      redisUrl: e.REDIS_URL ?? `redis://${e.REDIS_HOST}:${e.REDIS_PORT}`,
      collection: e.COLLECTION_NAME,
      distance: e.VECTOR_DISTANCE,
      retryBackoffMs: e.INDEX_RETRY_BACKOFF_MS,
    },
    embeddings: {
      provider: e.EMBEDDING_PROVIDER,
      model: embeddingModel,
      maxTokens: e.EMBEDDING_MAX_TOKENS,
      ollama: { host: e.OLLAMA_HOST },
      openai: { apiKey: e.OPENAI_API_KEY },
    },
    generation: { defaultProvider, providers },
    process: {
      maxConcurrency: e.PROCESS_MAX_CONCURRENCY,
      killGraceMs: e.PROCESS_KILL_GRACE_MS,
      maxOutputBytes: e.PROCESS_MAX_OUTPUT_BYTES,
    },
    contextCharBudget: e.CONTEXT_CHAR_BUDGET,
    dataPath: e.DATA_PATH,
  };
}

export function isProviderKind(value: string): value is ProviderKind {
  return (PROVIDER_KINDS as readonly string[]).includes(value);
}
