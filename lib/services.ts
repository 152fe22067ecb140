import { sendAdminAlertWithTimeout } from "@/lib/alerts";
import { comparisonConfigFromEnv } from "@/lib/comparison/config";
import { createComparisonEngine, type ComparisonEngine } from "@/lib/comparison/engine";
import { env } from "@/lib/env";
import { createCollectorJob, type CollectorJob } from "@/lib/jobs/collector";
import { runComparisonRefreshJob } from "@/lib/jobs/comparison-refresh";
import { runRetentionJob } from "@/lib/jobs/retention";
import { createScheduler, type Scheduler } from "@/lib/jobs/scheduler";
import { createAggregator, type Aggregator } from "@/lib/pricing/aggregator";
import { TtlCache } from "@/lib/scraping/cache";
import { createFetchClient, type FetchClient } from "@/lib/scraping/fetch-client";
import { RateLimiter } from "@/lib/scraping/rate-limiter";
import { DEFAULT_RETRY_POLICY } from "@/lib/scraping/retry";
import { createHttpTransport } from "@/lib/scraping/transport";
import type { ProductSnapshot } from "@/lib/types";

export interface Services {
  fetchClient: FetchClient;
  aggregator: Aggregator;
  engine: ComparisonEngine;
  collector: CollectorJob;
  runComparisonRefresh: (triggeredBy: string) => ReturnType<typeof runComparisonRefreshJob>;
  runRetention: (triggeredBy: string) => ReturnType<typeof runRetentionJob>;
}

function buildServices(): Services {
  const transport = createHttpTransport({
    baseUrl: env.MARKETPLACE_BASE_URL,
    userAgent: env.SCRAPER_USER_AGENT,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    firecrawl: env.FIRECRAWL_API_KEY
      ? { apiKey: env.FIRECRAWL_API_KEY, baseUrl: env.FIRECRAWL_API_BASE_URL }
      : null
  });

  const fetchClient = createFetchClient({
    transport,
    cache: new TtlCache<ProductSnapshot>(env.FETCH_CACHE_TTL_SECONDS * 1000),
    limiter: new RateLimiter({ maxRequests: env.FETCH_RATE_LIMIT_PER_MINUTE, windowMs: 60_000 }),
    retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: env.FETCH_MAX_ATTEMPTS }
  });

  const aggregator = createAggregator({ windowDays: env.ROLLING_WINDOW_DAYS });
  const engine = createComparisonEngine({
    fetchClient,
    aggregator,
    config: comparisonConfigFromEnv(env)
  });

  const collector = createCollectorJob({
    fetchClient,
    aggregator,
    batchSize: env.COLLECTOR_BATCH_SIZE,
    delayMinMs: env.COLLECTOR_DELAY_MIN_MS,
    delayMaxMs: env.COLLECTOR_DELAY_MAX_MS,
    notify: sendAdminAlertWithTimeout,
    staleRunMinutes: env.JOB_RUN_STALE_MINUTES
  });

  return {
    fetchClient,
    aggregator,
    engine,
    collector,
    runComparisonRefresh: (triggeredBy) => runComparisonRefreshJob({ engine, triggeredBy, staleRunMinutes: env.JOB_RUN_STALE_MINUTES }),
    runRetention: (triggeredBy) =>
      runRetentionJob({
        triggeredBy,
        staleRunMinutes: env.JOB_RUN_STALE_MINUTES,
        policy: {
          priceHistoryDays: env.PRICE_HISTORY_RETENTION_DAYS,
          comparisonSnapshotDays: env.COMPARISON_SNAPSHOT_RETENTION_DAYS,
          jobEventDays: env.JOB_EVENT_RETENTION_DAYS
        }
      })
  };
}

let services: Services | null = null;

/** One fetch client, cache and rate limiter per process. */
export function getServices(): Services {
  services ??= buildServices();
  return services;
}

export function buildScheduler(source: Services = getServices()): Scheduler {
  const scheduler = createScheduler();

  scheduler.register({
    name: "collector",
    trigger: { type: "daily", utcHour: env.COLLECTOR_DAILY_UTC_HOUR },
    handler: ({ triggeredBy }) => source.collector.run({ triggeredBy })
  });

  scheduler.register({
    name: "comparisons",
    trigger: { type: "daily", utcHour: env.COMPARISON_REFRESH_UTC_HOUR },
    handler: ({ triggeredBy }) => source.runComparisonRefresh(triggeredBy)
  });

  scheduler.register({
    name: "retention",
    trigger: { type: "daily", utcHour: env.RETENTION_UTC_HOUR },
    handler: ({ triggeredBy }) => source.runRetention(triggeredBy)
  });

  return scheduler;
}
