import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

const flag = (fallback: 'true' | 'false') => z.enum(['true', 'false']).optional().default(fallback);

export const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  PORT: z.coerce.number().default(4001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  SENTRY_DSN: z.string().url().optional(),

  // Reference-data (ERP) tool server
  ERP_TOOLS_URL: z.string().url().default('http://localhost:8001'),
  ERP_TOOLS_API_KEY: z.string().optional(),
  ERP_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ERP_TOOL_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  ERP_TOOL_RETRY_BASE_MS: z.coerce.number().int().min(0).default(250),

  // Decision policy
  PIPELINE_ROUTING_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  PIPELINE_FIELD_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  // Number of ToolError outcomes tolerated before review is forced (0 = any ToolError forces review)
  PIPELINE_MAX_TOOL_ERRORS: z.coerce.number().int().min(0).default(0),
  PIPELINE_SUPPLIER_LOOKUP_FALLBACK: flag('true'),

  // Execution
  PIPELINE_PROCESSOR_ENABLED: flag('true'),
  PIPELINE_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  PIPELINE_STALE_MINUTES: z.coerce.number().int().positive().default(10),
  CRON_ENABLED: flag('true'),
  ENABLE_RATE_LIMIT: flag('true'),
  FRONTEND_URL: z.string().url().optional(),

  // Infrastructure
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().optional(),
  REDIS_PASSWORD: z.string().optional(),
  DB_SLOW_QUERY_MS: z.coerce.number().optional().default(800),

  // Pusher (realtime review notifications)
  PUSHER_APP_ID: z.string().optional(),
  PUSHER_KEY: z.string().optional(),
  PUSHER_SECRET: z.string().optional(),
  PUSHER_CLUSTER: z.string().optional().default('eu'),
  PUSHER_CHANNEL: z.string().optional().default('invoice-review'),

  // Email (Gmail SMTP) for review notifications
  GMAIL_ALERTS_USER: z.string().optional(),
  GMAIL_APP_PASSWORD: z.string().optional(),
  EMAIL_FROM_NAME: z.string().optional().default('Invoice pipeline'),
  EMAIL_REPLY_TO: z.string().optional(),
  REVIEW_NOTIFICATION_EMAIL: z.string().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

const baseConfig = parsed.data;

// Redis backs the run queue and cron locks in production.
if (baseConfig.NODE_ENV === 'production' && !baseConfig.REDIS_URL) {
  console.error('❌ Invalid environment variables: REDIS_URL is required when NODE_ENV=production');
  process.exit(1);
}

export const config = baseConfig;
