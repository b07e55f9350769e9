import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

// Configuration schema with validation
const ConfigSchema = z.object({
  // Slack Configuration
  slack: z.object({
    botToken: z.string().min(1, 'SLACK_BOT_TOKEN is required'),
    teamId: z.string().optional(), // Workspace to index when the token spans several
  }),

  // AI Model Configuration
  ai: z.object({
    openaiApiKey: z.string().min(1, 'OPENAI_API_KEY is required'),
    chatModel: z.string().default('gpt-4o-mini'),
    maxTokens: z.number().int().positive().default(1000),
    temperature: z.number().min(0).max(2).default(0.7),
    embeddingModel: z.string().default('text-embedding-3-small'),
  }),

  // RAG Configuration
  rag: z.object({
    vectorDbPath: z.string().default('./data/vectors'),
    collectionName: z.string().regex(/^[\w-]+$/, 'collection name may only contain letters, digits, _ and -').default('slack_knowledge'),
    maxResults: z.number().int().positive().default(5),
  }),

  // Indexing Configuration
  indexing: z.object({
    maxMessagesPerRequest: z.number().int().min(1).max(999).default(100), // conversations.history caps at 999
    rateLimitDelayMs: z.number().int().nonnegative().default(1000),
    chunkSize: z.number().int().positive().default(1000),
    batchSize: z.number().int().positive().default(50),
    batchDelayMs: z.number().int().nonnegative().default(100),
  }),

  // Application Settings
  app: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Build and validate the configuration from environment variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    slack: {
      botToken: env.SLACK_BOT_TOKEN || '',
      teamId: env.SLACK_TEAM_ID || undefined,
    },
    ai: {
      openaiApiKey: env.OPENAI_API_KEY || '',
      chatModel: env.OPENAI_CHAT_MODEL || undefined,
      maxTokens: parseNumber(env.OPENAI_MAX_TOKENS),
      temperature: parseNumber(env.OPENAI_TEMPERATURE),
      embeddingModel: env.RAG_EMBEDDING_MODEL || undefined,
    },
    rag: {
      vectorDbPath: env.RAG_VECTOR_DB_PATH || undefined,
      collectionName: env.RAG_COLLECTION_NAME || undefined,
      maxResults: parseNumber(env.RAG_MAX_RESULTS),
    },
    indexing: {
      maxMessagesPerRequest: parseNumber(env.INDEX_MAX_MESSAGES_PER_REQUEST),
      rateLimitDelayMs: parseNumber(env.INDEX_RATE_LIMIT_DELAY_MS),
      chunkSize: parseNumber(env.INDEX_CHUNK_SIZE),
      batchSize: parseNumber(env.INDEX_BATCH_SIZE),
      batchDelayMs: parseNumber(env.INDEX_BATCH_DELAY_MS),
    },
    app: {
      logLevel: env.LOG_LEVEL || undefined,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`)
    );
  }

  return result.data;
}

let cachedConfig: Config | null = null;

/**
 * Configuration for the current process, loaded on first use.
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
