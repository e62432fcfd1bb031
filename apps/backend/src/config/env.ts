import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .union([
    z.boolean(),
    z
      .string()
      .transform(value => value.trim().toLowerCase())
      .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
  ]);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  // Without Redis the key-value tier (cache, quota counters, request limits) lives in process memory
  REDIS_URL: z.string().optional(),
  REDIS_NAMESPACE: z.string().default('tubepulse'),
  YOUTUBE_API_KEY: z.string().min(1, 'YOUTUBE_API_KEY is required'),
  YOUTUBE_API_BASE_URL: z.string().url().default('https://www.googleapis.com/youtube/v3'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),
  TELEGRAM_ALLOWED_IPS: z.string().optional(),
  ADMIN_TELEGRAM_ID: z.coerce.number().int().positive(),
  ADMIN_API_TOKEN: z.string().optional(),
  // Comma-separated `channelId:Display Name:@handle` entries; name and handle are optional
  TRACKED_CHANNELS: z.string().default(''),
  QUOTA_LIMIT: z.coerce.number().int().positive().default(10_000),
  QUOTA_WINDOW_HOURS: z.coerce.number().positive().default(24),
  // Upstream quota resets at midnight Pacific time
  QUOTA_WINDOW_ANCHOR: z.string().datetime().default('1970-01-01T08:00:00Z'),
  CACHE_TTL_CHANNEL_STATS: z.coerce.number().int().positive().default(3600),
  CACHE_TTL_VIDEO_STATS: z.coerce.number().int().positive().default(1800),
  CACHE_TTL_VIDEO_LIST: z.coerce.number().int().positive().default(1800),
  CACHE_TTL_COMMENTS: z.coerce.number().int().positive().default(900),
  CACHE_TTL_TREND: z.coerce.number().int().positive().default(900),
  CACHE_TTL_TRENDING: z.coerce.number().int().positive().default(1800),
  TRENDING_REGION: z.string().regex(/^[A-Z]{2}$/, 'TRENDING_REGION must be a two-letter region code').default('US'),
  // Publish hours in /trending are reported at this offset from UTC
  TRENDING_UTC_OFFSET_HOURS: z.coerce.number().int().min(-12).max(14).default(0),
  SNAPSHOT_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  USER_DAILY_REQUEST_LIMIT: z.coerce.number().int().positive().default(15),
  USER_REQUEST_COOLDOWN_SECONDS: z.coerce.number().int().nonnegative().default(120),
  ENABLE_SCHEDULER: booleanFlag.default(true)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
