import { z } from 'zod';
import { logger } from '../utils/logger.js';

const csv = z
  .string()
  .optional()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim().toLowerCase().replace(/^#+/, ''))
      .filter(Boolean)
  );

export const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),

  CHAT_BOT_LOGIN: z.string().min(1),
  CHAT_BOT_OAUTH_TOKEN: z.string().min(1),
  CHAT_BOT_CHANNELS: csv,
  CHAT_BOT_SUPER_ADMINS: csv,

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  MODERATION_CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().optional().default(5 * 60_000),
  MODERATION_CLEANUP_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().optional().default(60_000),
  MESSAGE_CACHE_TTL_MS: z.coerce.number().int().positive().optional().default(10 * 60_000),
  POLICY_CACHE_TTL_MS: z.coerce.number().int().positive().optional().default(60_000),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    logger.error('env.invalid', { issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) });
    process.exit(1);
  }
  return parsed.data;
}
