import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .transform(value => value.trim().toLowerCase())
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  REDIS_NAMESPACE: z.string().default('event-suite'),
  ADMIN_API_TOKEN: z.string().optional(),
  // Comma-separated list of browser origins allowed by CORS
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform(value => value.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)),
  ENABLE_DASHBOARD_CACHE: booleanFlag.default(true),
  DASHBOARD_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(30),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
