import 'dotenv/config';
import { IANAZone } from 'luxon';
import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .preprocess((value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value), z.enum(['true', 'false', '1', '0']))
    .default(fallback)
    .transform((value) => value === 'true' || value === '1');

const optionalString = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value: unknown) => {
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed.length === 0 ? undefined : trimmed;
  }, schema.optional());

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3000),
  DEV_POLLING: booleanFlag('false'),
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_WEBHOOK_URL: optionalString(z.string().url()),
  SUPABASE_URL: z.string().url('SUPABASE_URL must be a valid URL'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),
  SUPABASE_DB_CONNECTION: optionalString(z.string()),
  DB_MIGRATIONS_ENABLED: booleanFlag('true'),
  DEFAULT_TIMEZONE: z
    .string()
    .default('Asia/Taipei')
    .refine((zone) => IANAZone.isValidZone(zone), 'DEFAULT_TIMEZONE must be an IANA timezone name')
});

const env = envSchema.parse(process.env);

export const config = {
  server: {
    host: env.HOST,
    port: env.PORT
  },
  telegram: {
    botToken: env.TELEGRAM_BOT_TOKEN,
    webhookUrl: env.TELEGRAM_WEBHOOK_URL,
    devPolling: env.DEV_POLLING
  },
  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY
  },
  db: {
    connectionString: env.SUPABASE_DB_CONNECTION,
    migrationsEnabled: env.DB_MIGRATIONS_ENABLED
  },
  defaultTimezone: env.DEFAULT_TIMEZONE
};
