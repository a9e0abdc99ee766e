import dotenv from 'dotenv';
import { z } from 'zod';
import { isValidTimeZone } from '../utils/datetime';

dotenv.config();

export type Currency = 'USD' | 'EUR' | 'BDT';
export type NegativeStockPolicy = 'reject' | 'allow';

// Currency configuration
export const CURRENCY_CONFIG: Record<Currency, { symbol: string; code: string; decimals: number }> = {
  USD: { symbol: '$', code: 'USD', decimals: 2 },
  EUR: { symbol: '€', code: 'EUR', decimals: 2 },
  BDT: { symbol: '৳', code: 'BDT', decimals: 2 }
};

export const envSchema = z.object({
  // Server
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Database (SQLite)
  DB_PATH: z.string().min(1).default('./data/cafe.db'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_POOL_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10 * 60 * 1000), // 10 minutes
  DB_POOL_MAX_LIFETIME_MS: z.coerce.number().int().nonnegative().default(30 * 60 * 1000), // 30 minutes
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),

  // Billing
  INVENTORY_NEGATIVE_STOCK: z.enum(['reject', 'allow']).default('reject'),
  INVOICE_TIMEZONE: z.string().refine(isValidTimeZone, 'Unknown time zone').default('UTC'),
  CURRENCY: z.enum(['USD', 'EUR', 'BDT']).default('USD')
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Environment validation failed:');
  for (const issue of parsed.error.issues) {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

export const config = {
  server: {
    port: parsed.data.PORT,
    nodeEnv: parsed.data.NODE_ENV,
    isDev: parsed.data.NODE_ENV === 'development',
    isProd: parsed.data.NODE_ENV === 'production',
    isTest: parsed.data.NODE_ENV === 'test'
  },
  logging: {
    level: parsed.data.LOG_LEVEL
  },
  database: {
    path: parsed.data.DB_PATH,
    busyTimeoutMs: parsed.data.DB_BUSY_TIMEOUT_MS,
    pool: {
      max: parsed.data.DB_POOL_MAX,
      acquireTimeoutMs: parsed.data.DB_POOL_ACQUIRE_TIMEOUT_MS,
      idleTimeoutMs: parsed.data.DB_POOL_IDLE_TIMEOUT_MS,
      maxLifetimeMs: parsed.data.DB_POOL_MAX_LIFETIME_MS
    }
  },
  billing: {
    negativeStock: parsed.data.INVENTORY_NEGATIVE_STOCK,
    invoiceTimezone: parsed.data.INVOICE_TIMEZONE,
    currency: parsed.data.CURRENCY
  }
} as const;

export type Config = typeof config;
