import { z } from 'zod';
import { ConfigError } from './errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DB_PATH: z.string().min(1).optional(),

  // Worker stop conditions; 0 means unlimited
  WORKER_MAX_JOBS: z.coerce.number().int().min(0).default(0),
  WORKER_MAX_TIME: z.coerce.number().int().min(0).default(0),
  WORKER_SLEEP: z.coerce.number().int().min(0).default(3),
  // Seconds a popped record stays claimed before another worker may take it
  WORKER_VISIBILITY_TIMEOUT: z.coerce.number().int().positive().default(300),

  APP_URL: z.string().url().default('http://localhost:3000'),
  VERIFICATION_TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24),
  SMTP_URL: z.string().min(1).optional(),
  MAIL_FROM: z.string().min(1).default('no-reply@localhost'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // `KEY=` in a .env file means "not set"
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const result = envSchema.safeParse(defined);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid environment: ${issues.map(i => i.path).join(', ')}`,
      issues
    );
  }
  return result.data;
}
