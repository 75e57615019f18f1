import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

export const DialectSchema = z.enum(['native', 'postgresql']);

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_DIR: z.string().min(1).default('./logs'),
  CATALOG_DIALECT: DialectSchema.default('native'),
  CACHE_TTL: z.coerce.number().int().nonnegative().default(3600),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(100),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse(env);
}

export const config: AppConfig = loadConfig();
