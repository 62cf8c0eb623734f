import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenvConfig();

/**
 * Schema for validating environment variables.
 * All required variables must be present or a ZodError will be thrown.
 */
const configSchema = z.object({
  // Server
  PORT: z.string().default('3000'),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  // Optional base URL for OpenAI-compatible gateways
  OPENAI_API_BASE: z.string().url('OPENAI_API_BASE must be a valid URL').optional(),
  CHAT_MODEL: z.string().default('gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  // Timeouts are enforced by withTimeout, so SDK retries default to off
  OPENAI_MAX_RETRIES: z.string().default('0'),
  LLM_MAX_TOKENS_ORCHESTRATOR: z.string().default('1000'),
  LLM_MAX_TOKENS_AGENT: z.string().default('1500'),

  // Persistence (checked at startup; also backs the vector store)
  DATABASE_URL: z.string().optional(),

  // Conversation memory
  MEMORY_STORE: z.enum(['memory', 'redis']).default('memory'),
  MEMORY_MAX_TURNS: z.string().default('10'),
  // Redis configuration (required when MEMORY_STORE=redis)
  REDIS_URL: z.string().optional(),
  REDIS_PREFIX: z.string().default('agent:memory:'),

  // Retrieval
  DEFAULT_SIMILARITY_THRESHOLD: z.string().default('0.7'),
  PRODUCT_COLLECTION: z.string().default('products'),
  HANDBOOK_COLLECTION: z.string().default('general_handbook'),

  // Agent configuration
  AGENT_MAX_STEPS: z.string().default('6'),
  DEBUG: z.string().default('0'),

  // Timeout configuration (in milliseconds)
  LLM_TIMEOUT_MS: z.string().default('20000'),
  DB_TIMEOUT_MS: z.string().default('5000'),
  SEARCH_TIMEOUT_MS: z.string().default('15000'),
  PURCHASE_TIMEOUT_MS: z.string().default('15000'),
  ORDERS_TIMEOUT_MS: z.string().default('10000'),

  // Vouchers
  VOUCHER_AMOUNT: z.string().default('2000.00'),

  // Async quality evaluation (LLM judge)
  EVALUATION_ENABLED: z.string().default('1'),
  EVALUATION_MODEL: z.string().optional(),

  // CORS configuration
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),

  // Request/body limits
  BODY_LIMIT_BYTES: z.string().default('65536'),
  MAX_QUERY_CHARS: z.string().default('2000'),
});

/**
 * Parse and validate environment variables.
 * Throws a descriptive error if validation fails.
 */
function parseConfig() {
  try {
    return configSchema.parse({
      PORT: process.env.PORT,
      OPENAI_API_KEY: process.env.OPENAI_API_KEY,
      OPENAI_API_BASE: process.env.OPENAI_API_BASE || undefined,
      CHAT_MODEL: process.env.CHAT_MODEL,
      EMBEDDING_MODEL: process.env.EMBEDDING_MODEL,
      OPENAI_MAX_RETRIES: process.env.OPENAI_MAX_RETRIES,
      LLM_MAX_TOKENS_ORCHESTRATOR: process.env.LLM_MAX_TOKENS_ORCHESTRATOR,
      LLM_MAX_TOKENS_AGENT: process.env.LLM_MAX_TOKENS_AGENT,
      DATABASE_URL: process.env.DATABASE_URL,
      MEMORY_STORE: process.env.MEMORY_STORE,
      MEMORY_MAX_TURNS: process.env.MEMORY_MAX_TURNS,
      REDIS_URL: process.env.REDIS_URL,
      REDIS_PREFIX: process.env.REDIS_PREFIX,
      DEFAULT_SIMILARITY_THRESHOLD: process.env.DEFAULT_SIMILARITY_THRESHOLD,
      PRODUCT_COLLECTION: process.env.PRODUCT_COLLECTION,
      HANDBOOK_COLLECTION: process.env.HANDBOOK_COLLECTION,
      AGENT_MAX_STEPS: process.env.AGENT_MAX_STEPS,
      DEBUG: process.env.DEBUG,
      LLM_TIMEOUT_MS: process.env.LLM_TIMEOUT_MS,
      DB_TIMEOUT_MS: process.env.DB_TIMEOUT_MS,
      SEARCH_TIMEOUT_MS: process.env.SEARCH_TIMEOUT_MS,
      PURCHASE_TIMEOUT_MS: process.env.PURCHASE_TIMEOUT_MS,
      ORDERS_TIMEOUT_MS: process.env.ORDERS_TIMEOUT_MS,
      VOUCHER_AMOUNT: process.env.VOUCHER_AMOUNT,
      EVALUATION_ENABLED: process.env.EVALUATION_ENABLED,
      EVALUATION_MODEL: process.env.EVALUATION_MODEL,
      CORS_ORIGINS: process.env.CORS_ORIGINS,
      BODY_LIMIT_BYTES: process.env.BODY_LIMIT_BYTES,
      MAX_QUERY_CHARS: process.env.MAX_QUERY_CHARS,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((err) => `  - ${err.path.join('.')}: ${err.message}`);
      throw new Error(`Configuration validation failed:\n${messages.join('\n')}`);
    }
    throw error;
  }
}

const env = parseConfig();

/**
 * Typed configuration object exported for use throughout the application.
 */
export const config = {
  port: parseInt(env.PORT, 10),

  openai: {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_API_BASE,
    chatModel: env.CHAT_MODEL,
    embeddingModel: env.EMBEDDING_MODEL,
    maxRetries: parseInt(env.OPENAI_MAX_RETRIES, 10),
    maxTokens: {
      orchestrator: parseInt(env.LLM_MAX_TOKENS_ORCHESTRATOR, 10),
      agent: parseInt(env.LLM_MAX_TOKENS_AGENT, 10),
    },
  },

  commerce: {
    databaseUrl: env.DATABASE_URL,
    // Stored as integer cents
    voucherAmountCents: Math.round(parseFloat(env.VOUCHER_AMOUNT) * 100),
  },

  memory: {
    store: env.MEMORY_STORE,
    maxTurns: parseInt(env.MEMORY_MAX_TURNS, 10),
    redis: {
      url: env.REDIS_URL,
      prefix: env.REDIS_PREFIX,
    },
  },

  retrieval: {
    defaultSimilarityThreshold: parseFloat(env.DEFAULT_SIMILARITY_THRESHOLD),
    productCollection: env.PRODUCT_COLLECTION,
    handbookCollection: env.HANDBOOK_COLLECTION,
  },

  agent: {
    maxSteps: parseInt(env.AGENT_MAX_STEPS, 10),
  },

  timeouts: {
    llmMs: parseInt(env.LLM_TIMEOUT_MS, 10),
    dbMs: parseInt(env.DB_TIMEOUT_MS, 10),
    searchMs: parseInt(env.SEARCH_TIMEOUT_MS, 10),
    purchaseMs: parseInt(env.PURCHASE_TIMEOUT_MS, 10),
    ordersMs: parseInt(env.ORDERS_TIMEOUT_MS, 10),
  },

  evaluation: {
    enabled: env.EVALUATION_ENABLED === '1' || env.EVALUATION_ENABLED === 'true',
    model: env.EVALUATION_MODEL ?? env.CHAT_MODEL,
  },

  debug: env.DEBUG === '1' || env.DEBUG === 'true',

  cors: {
    origins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
      : ['http://localhost:5173', 'http://127.0.0.1:5173'],
  },

  limits: {
    bodyLimitBytes: parseInt(env.BODY_LIMIT_BYTES, 10),
    maxQueryChars: parseInt(env.MAX_QUERY_CHARS, 10),
  },
} as const;

export type Config = typeof config;
