import { z } from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

const envSchema = z.object({
  // SQLite file path, or ":memory:" for tests.
  DATABASE_URL: z.string().min(1).default('./local.db'),
  MIGRATIONS_DIR: z.string().min(1).default('migrations'),
  // How often a file-backed database is written back to disk.
  DB_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  PORT: z.coerce.number().default(4001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // WhatsApp Cloud API
  WHATSAPP_TOKEN: z.string().optional().default(''),
  WHATSAPP_PHONE_NUMBER_ID: z.string().optional().default(''),
  WHATSAPP_VERIFY_TOKEN: z.string().optional().default(''),
  WHATSAPP_APP_SECRET: z.string().optional().default(''), // empty = skip X-Hub-Signature-256 check
  GRAPH_API_URL: z.string().url().default('https://graph.facebook.com/v20.0'),
  WHATSAPP_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  // Admin surface + inbox
  ADMIN_TOKEN: z.string().min(1),
  DEFAULT_TENANT_ID: z.coerce.number().int().positive().default(1),
  SESSION_SECRET: z.string().min(1),
  SEED_ADMIN_EMAIL: z.string().email().optional(),
  SEED_ADMIN_PASSWORD: z.string().min(8).optional(),

  // Completion API (OpenAI-compatible). Disabled while LLM_API_KEY is empty.
  LLM_API_URL: z.string().url().default('https://api.openai.com/v1/chat/completions'),
  LLM_API_KEY: z.string().optional().default(''),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_HISTORY_MAX_USERS: z.coerce.number().int().positive().default(500),
  LLM_HISTORY_MAX_TURNS: z.coerce.number().int().positive().default(10),

  // Observability
  SENTRY_DSN: z.string().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

const baseConfig = parsed.data;

// The verify token doubles as the webhook's only shared secret in production.
if (baseConfig.NODE_ENV === 'production' && !baseConfig.WHATSAPP_VERIFY_TOKEN) {
  console.error('❌ Invalid environment variables: WHATSAPP_VERIFY_TOKEN is required when NODE_ENV=production');
  process.exit(1);
}

export const config = baseConfig;
