import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  BUSINESS_NAME: z.string().default('our office'),
  BUSINESS_TIMEZONE: z.string().default('Europe/Paris'),
  FALLBACK_CONTACT_EMAIL: z.string().default('info@example.com'),
  KNOWLEDGE_FILE: z.string().default('data/knowledge.json'),
  FORWARDING_NUMBER: optionalString,
  WEBHOOK_BASE_URL: z.string().default('http://localhost:3000'),
  API_KEYS: optionalString,
  STATUS_API_KEY: optionalString,
  REDIS_URL: z.string().default('redis://localhost:6379'),
  ANTHROPIC_API_KEY: optionalString,
  SUMMARY_MODEL: z.string().default('claude-3-5-haiku-latest'),
  SMS_PROVIDER: z.enum(['twilio', 'bandwidth']).default('twilio'),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  BANDWIDTH_ACCOUNT_ID: optionalString,
  BANDWIDTH_API_TOKEN: optionalString,
  BANDWIDTH_API_SECRET: optionalString,
  BANDWIDTH_APPLICATION_ID: optionalString,
  BANDWIDTH_PHONE_NUMBER: optionalString,
  SENDGRID_API_KEY: optionalString,
  SENDGRID_FROM_EMAIL: optionalString,
  GOOGLE_SERVICE_ACCOUNT_JSON: optionalString,
  GOOGLE_CALENDAR_ID: z.string().default('primary'),
  LEADS_SPREADSHEET_ID: optionalString,
  CALL_LOGS_SPREADSHEET_ID: optionalString,
  REMINDER_LEAD_HOURS: z.coerce.number().int().positive().default(24),
  SENTRY_DSN: optionalString,
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
