import { z } from "zod";

const weight = z.coerce.number().min(0).max(1);
const threshold = z.coerce.number().min(0).max(1);
const utcHour = z.coerce.number().int().min(0).max(23);

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_SSL_MODE: z.enum(["require", "disable"]).default("require"),
  DATABASE_PREPARE: z.enum(["true", "false"]).default("false"),
  CRON_SECRET: z.string().min(16),
  MARKETPLACE_BASE_URL: z.string().url().default("https://www.ozon.ru"),
  SCRAPER_USER_AGENT: z
    .string()
    .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36"),
  FIRECRAWL_API_KEY: z.string().optional(),
  FIRECRAWL_API_BASE_URL: z.string().url().default("https://api.firecrawl.dev/v2"),
  FETCH_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  FETCH_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().positive().max(5).default(3),
  COLLECTOR_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  COLLECTOR_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(2_000),
  COLLECTOR_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(5_000),
  COLLECTOR_DAILY_UTC_HOUR: utcHour.default(3),
  COMPARISON_REFRESH_UTC_HOUR: utcHour.default(4),
  RETENTION_UTC_HOUR: utcHour.default(5),
  ROLLING_WINDOW_DAYS: z.coerce.number().int().positive().default(7),
  COMPARISON_FRESHNESS_MINUTES: z.coerce.number().int().positive().default(60),
  PRICE_HISTORY_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  COMPARISON_SNAPSHOT_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  JOB_EVENT_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  JOB_RUN_STALE_MINUTES: z.coerce.number().int().positive().default(30),
  COMPETITIVENESS_WEIGHT_PRICE: weight.default(0.35),
  COMPETITIVENESS_WEIGHT_RATING: weight.default(0.25),
  COMPETITIVENESS_WEIGHT_DISCOUNT: weight.default(0.2),
  COMPETITIVENESS_WEIGHT_REVIEWS: weight.default(0.1),
  COMPETITIVENESS_WEIGHT_AVAILABILITY: weight.default(0.1),
  GRADE_THRESHOLD_A: threshold.default(0.85),
  GRADE_THRESHOLD_B: threshold.default(0.7),
  GRADE_THRESHOLD_C: threshold.default(0.5),
  GRADE_THRESHOLD_D: threshold.default(0.3),
  RESEND_API_KEY: z.string().optional(),
  ALERT_FROM_EMAIL: z.string().email().optional(),
  ALERT_TO_EMAIL: z.string().email().optional()
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse({
  DATABASE_URL: process.env.DATABASE_URL,
  DATABASE_SSL_MODE: process.env.DATABASE_SSL_MODE,
  DATABASE_PREPARE: process.env.DATABASE_PREPARE,
  CRON_SECRET: process.env.CRON_SECRET,
  MARKETPLACE_BASE_URL: process.env.MARKETPLACE_BASE_URL,
  SCRAPER_USER_AGENT: process.env.SCRAPER_USER_AGENT,
  FIRECRAWL_API_KEY: process.env.FIRECRAWL_API_KEY,
  FIRECRAWL_API_BASE_URL: process.env.FIRECRAWL_API_BASE_URL,
  FETCH_CACHE_TTL_SECONDS: process.env.FETCH_CACHE_TTL_SECONDS,
  FETCH_RATE_LIMIT_PER_MINUTE: process.env.FETCH_RATE_LIMIT_PER_MINUTE,
  FETCH_TIMEOUT_MS: process.env.FETCH_TIMEOUT_MS,
  FETCH_MAX_ATTEMPTS: process.env.FETCH_MAX_ATTEMPTS,
  COLLECTOR_BATCH_SIZE: process.env.COLLECTOR_BATCH_SIZE,
  COLLECTOR_DELAY_MIN_MS: process.env.COLLECTOR_DELAY_MIN_MS,
  COLLECTOR_DELAY_MAX_MS: process.env.COLLECTOR_DELAY_MAX_MS,
  COLLECTOR_DAILY_UTC_HOUR: process.env.COLLECTOR_DAILY_UTC_HOUR,
  COMPARISON_REFRESH_UTC_HOUR: process.env.COMPARISON_REFRESH_UTC_HOUR,
  RETENTION_UTC_HOUR: process.env.RETENTION_UTC_HOUR,
  ROLLING_WINDOW_DAYS: process.env.ROLLING_WINDOW_DAYS,
  COMPARISON_FRESHNESS_MINUTES: process.env.COMPARISON_FRESHNESS_MINUTES,
  PRICE_HISTORY_RETENTION_DAYS: process.env.PRICE_HISTORY_RETENTION_DAYS,
  COMPARISON_SNAPSHOT_RETENTION_DAYS: process.env.COMPARISON_SNAPSHOT_RETENTION_DAYS,
  JOB_EVENT_RETENTION_DAYS: process.env.JOB_EVENT_RETENTION_DAYS,
  JOB_RUN_STALE_MINUTES: process.env.JOB_RUN_STALE_MINUTES,
  COMPETITIVENESS_WEIGHT_PRICE: process.env.COMPETITIVENESS_WEIGHT_PRICE,
  COMPETITIVENESS_WEIGHT_RATING: process.env.COMPETITIVENESS_WEIGHT_RATING,
  COMPETITIVENESS_WEIGHT_DISCOUNT: process.env.COMPETITIVENESS_WEIGHT_DISCOUNT,
  COMPETITIVENESS_WEIGHT_REVIEWS: process.env.COMPETITIVENESS_WEIGHT_REVIEWS,
  COMPETITIVENESS_WEIGHT_AVAILABILITY: process.env.COMPETITIVENESS_WEIGHT_AVAILABILITY,
  GRADE_THRESHOLD_A: process.env.GRADE_THRESHOLD_A,
  GRADE_THRESHOLD_B: process.env.GRADE_THRESHOLD_B,
  GRADE_THRESHOLD_C: process.env.GRADE_THRESHOLD_C,
  GRADE_THRESHOLD_D: process.env.GRADE_THRESHOLD_D,
  RESEND_API_KEY: process.env.RESEND_API_KEY,
  ALERT_FROM_EMAIL: process.env.ALERT_FROM_EMAIL,
  ALERT_TO_EMAIL: process.env.ALERT_TO_EMAIL
});
