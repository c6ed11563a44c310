import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load .env file from the api directory
loadDotenv({ path: resolve(__dirname, '../../.env') });

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).or(z.literal('local')).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  API_BASE_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017/mailhost'),
  REDIS_URL: optionalString,
  SITE_SECRET: z.string().min(16),

  ENABLE_EMAIL_ACCOUNTS: booleanFlag,
  EMAIL_DEFAULT_QUOTA_MB: z.coerce.number().int().nonnegative().default(1024),
  ENABLE_EMAIL_PER_ACCOUNT_PURCHASE: booleanFlag,
  EMAIL_ACCOUNT_PRICE: z.coerce.number().nonnegative().default(5),
  EMAIL_PROVIDERS_ENABLED: z
    .string()
    .default('')
    .transform((value) => value.split(',').map((entry) => entry.trim()).filter(Boolean)),

  CPANEL_HOST: optionalString,
  CPANEL_USERNAME: optionalString,
  CPANEL_PASSWORD: optionalString,
  CPANEL_PORT: z.coerce.number().int().positive().default(2083),
  PURELYMAIL_API_KEY: optionalString,
  MS365_TENANT_ID: optionalString,
  MS365_CLIENT_ID: optionalString,
  MS365_CLIENT_SECRET: optionalString,
  MS365_LICENSE_SKU: optionalString,
  // Either the service account key JSON itself or a path to the key file
  GOOGLE_SERVICE_ACCOUNT_JSON: optionalString,
  GOOGLE_ADMIN_EMAIL: optionalString,
  GOOGLE_CUSTOMER_ID: optionalString,
});

const parsed = environmentSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment configuration', parsed.error.format());
  throw new Error('Invalid environment configuration');
}

export const env = parsed.data;

export type Environment = typeof env;
