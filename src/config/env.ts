import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const intWithDefault = (fallback: number, min: number, max?: number) => {
  const base = z.coerce.number().int().min(min);
  return (max === undefined ? base : base.max(max)).default(fallback);
};

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),
  AI_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_ORG_ID: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
  PROVIDER_TIMEOUT_MS: intWithDefault(15000, 1),
  PROVIDER_MAX_CONCURRENCY: intWithDefault(4, 1),
  PROVIDER_RETRY_DELAY_MS: intWithDefault(1000, 0),
  BUSINESS_TYPE: z.enum(['default', 'ecommerce', 'services', 'b2b', 'real_estate']).default('default'),
  REQUIRED_FIELDS: z.string().default('name,phone,interest'),
  QUALIFICATION_MIN_SCORE: intWithDefault(50, 0, 100),
  QUALIFICATION_MAX_ATTEMPTS: intWithDefault(5, 1),
  QUALIFICATION_TIMEOUT_MINUTES: intWithDefault(30, 1),
  REAPER_INTERVAL_MS: intWithDefault(60000, 1000),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  TWILIO_WHATSAPP_NUMBER: optionalString,
  API_KEYS: optionalString,
  SENTRY_DSN: z.string().optional(),
  WEBHOOK_BASE_URL: z.string().default('http://localhost:3000'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = typeof env;
