import { finishJobRun, recordJobEvent, type JobEventSeverity } from "@/lib/db/job-runs";
import { appendPriceSnapshot } from "@/lib/db/price-history";
import { listActiveArticles, markArticleProblematic } from "@/lib/db/products";
import { errorMessage, isFetchError } from "@/lib/errors";
import { DEFAULT_STALE_RUN_MINUTES, claimJobRun, pulseJobRun } from "@/lib/jobs/run-lock";
import { roundTo } from "@/lib/pricing/aggregate";
import type { Aggregator } from "@/lib/pricing/aggregator";
import type { FetchClient } from "@/lib/scraping/fetch-client";
import type { FetchErrorKind, JobStatus, PriceSnapshotInput, ProductSnapshot } from "@/lib/types";

export interface CollectorDeps {
  fetchClient: Pick<FetchClient, "fetch">;
  aggregator: Pick<Aggregator, "observe" | "refreshMany">;
  batchSize: number;
  delayMinMs: number;
  delayMaxMs: number;
  notify: (subject: string, html: string) => Promise<void>;
  /** A running row whose heartbeat is older than this belongs to a dead process. */
  staleRunMinutes?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface CollectorRunSummary {
  runId: string;
  status: JobStatus;
  attempted: number;
  succeeded: number;
  failed: number;
  storageErrors: number;
  markedProblematic: number;
  aggregatesRefreshed: number;
  successRate: number;
  durationMs: number;
}

export type CollectorRunResult =
  | ({ skipped: false } & CollectorRunSummary)
  | { skipped: true; reason: "already_running" };

export interface CollectorJob {
  run(input?: { triggeredBy?: string }): Promise<CollectorRunResult>;
  isRunning(): boolean;
}

const PERMANENT_FAILURES: ReadonlySet<FetchErrorKind> = new Set(["not_found", "parse_failure"]);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}

function successRow(snapshot: ProductSnapshot): PriceSnapshotInput {
  return {
    article: snapshot.article,
    capturedAt: snapshot.fetchedAt,
    price: snapshot.price,
    normalPrice: snapshot.normalPrice,
    cardPrice: snapshot.cardPrice,
    oldPrice: snapshot.oldPrice,
    available: snapshot.available,
    rating: snapshot.rating,
    reviewCount: snapshot.reviewCount,
    success: true,
    errorKind: null,
    errorMessage: null,
    durationMs: snapshot.durationMs,
    source: snapshot.source
  };
}

function failureRow(input: {
  article: string;
  capturedAt: string;
  errorKind: FetchErrorKind;
  message: string;
  durationMs: number;
}): PriceSnapshotInput {
  return {
    article: input.article,
    capturedAt: input.capturedAt,
    price: null,
    normalPrice: null,
    cardPrice: null,
    oldPrice: null,
    available: null,
    rating: null,
    reviewCount: null,
    success: false,
    errorKind: input.errorKind,
    errorMessage: input.message.slice(0, 500),
    durationMs: input.durationMs,
    source: null
  };
}

/**
 * Daily price collection. One run at a time: a trigger while a run is in
 * flight, in this process or any other sharing the database, returns
 * `{ skipped: true }`. Every article gets a snapshot
 * row, failed fetches included, and no single failure ends the run.
 */
export function createCollectorJob(deps: CollectorDeps): CollectorJob {
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? Date.now;
  let running = false;

  function nextDelayMs(): number {
    const min = Math.min(deps.delayMinMs, deps.delayMaxMs);
    const max = Math.max(deps.delayMinMs, deps.delayMaxMs);
    return Math.round(min + random() * (max - min));
  }

  async function recordEventSafely(input: {
    runId: string;
    severity: JobEventSeverity;
    code: string;
    message: string;
    payload?: Record<string, unknown>;
  }): Promise<void> {
    try {
      await recordJobEvent(input);
    } catch (error) {
      console.warn("[job:collector] failed to record job event", { code: input.code, error: errorMessage(error) });
    }
  }

  async function appendWithRetry(runId: string, row: PriceSnapshotInput): Promise<boolean> {
    try {
      await appendPriceSnapshot(row);
      return true;
    } catch (firstError) {
      console.warn(`[job:collector] snapshot append failed for ${row.article}; retrying once`, {
        error: errorMessage(firstError)
      });
    }

    try {
      await appendPriceSnapshot(row);
      return true;
    } catch (secondError) {
      console.error(`[job:collector] snapshot append failed twice for ${row.article}`, {
        error: errorMessage(secondError)
      });
      await recordEventSafely({
        runId,
        severity: "error",
        code: "SNAPSHOT_APPEND_FAILED",
        message: `Could not store the price snapshot for ${row.article}`,
        payload: { article: row.article, success: row.success, error: errorMessage(secondError) }
      });
      return false;
    }
  }

  async function execute(runId: string): Promise<CollectorRunSummary> {
    const startedAt = now();

    const counters = {
      attempted: 0,
      succeeded: 0,
      failed: 0,
      storageErrors: 0,
      markedProblematic: 0,
      aggregatesRefreshed: 0
    };

    try {
      const articles = await listActiveArticles();
      const batches = chunk(articles, Math.max(1, deps.batchSize));
      const processed: string[] = [];

      console.log(`[job:collector] run ${runId} started`, { articles: articles.length, batches: batches.length });

      for (const [batchIndex, batch] of batches.entries()) {
        for (const article of batch) {
          if (counters.attempted > 0) {
            await sleep(nextDelayMs());
          }

          counters.attempted += 1;
          const fetchStartedAt = now();
          let row: PriceSnapshotInput;
          let snapshot: ProductSnapshot | null = null;

          try {
            snapshot = await deps.fetchClient.fetch(article, { skipCache: true });
            row = successRow(snapshot);
            counters.succeeded += 1;
          } catch (error) {
            const kind: FetchErrorKind = isFetchError(error) ? error.kind : "transport";
            counters.failed += 1;
            row = failureRow({
              article,
              capturedAt: new Date(now()).toISOString(),
              errorKind: kind,
              message: errorMessage(error),
              durationMs: now() - fetchStartedAt
            });

            await recordEventSafely({
              runId,
              severity: "warn",
              code: "FETCH_FAILED",
              message: `Fetch failed for ${article}`,
              payload: { article, kind, error: errorMessage(error) }
            });

            if (PERMANENT_FAILURES.has(kind)) {
              try {
                await markArticleProblematic(article);
                counters.markedProblematic += 1;
              } catch (markError) {
                console.warn(`[job:collector] failed to flag ${article}`, { error: errorMessage(markError) });
              }
            }
          }

          if (!(await appendWithRetry(runId, row))) {
            counters.storageErrors += 1;
          }

          if (snapshot) {
            try {
              await deps.aggregator.observe(snapshot);
            } catch (error) {
              console.warn(`[job:collector] failed to update attributes for ${article}`, {
                error: errorMessage(error)
              });
            }
          }

          processed.push(article);
        }

        console.log(`[job:collector] run ${runId} batch ${batchIndex + 1}/${batches.length} done`, {
          attempted: counters.attempted,
          succeeded: counters.succeeded,
          failed: counters.failed
        });
        await pulseJobRun(runId, "collector");
      }

      try {
        const refreshed = await deps.aggregator.refreshMany(processed);
        counters.aggregatesRefreshed = refreshed.refreshed;
      } catch (error) {
        console.warn(`[job:collector] rolling average refresh failed`, { error: errorMessage(error) });
      }

      const status: JobStatus = counters.storageErrors > 0 ? "degraded" : counters.failed > 0 ? "partial" : "success";
      const summary: CollectorRunSummary = {
        runId,
        status,
        ...counters,
        successRate: counters.attempted > 0 ? roundTo(counters.succeeded / counters.attempted, 4) : 0,
        durationMs: now() - startedAt
      };

      await finishJobRun({ runId, status, summary: { ...summary } });

      console.log(`[job:collector] run ${runId} finished with status ${status}`, {
        attempted: summary.attempted,
        succeeded: summary.succeeded,
        failed: summary.failed,
        storageErrors: summary.storageErrors,
        durationMs: summary.durationMs
      });

      if (status === "degraded") {
        await deps.notify(
          "Price monitor collector run degraded",
          `<p>Run ID: ${runId}</p><p>${summary.storageErrors} snapshot(s) could not be stored.</p>`
        );
      }

      return summary;
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[job:collector] run ${runId} failed`, { error: message });

      await recordEventSafely({
        runId,
        severity: "error",
        code: "COLLECTOR_RUN_FAILED",
        message: "Collector run failed",
        payload: { error: message }
      });

      try {
        await finishJobRun({ runId, status: "failed", summary: { ...counters, error: message } });
      } catch (finishError) {
        console.warn(`[job:collector] failed to close run ${runId}`, { error: errorMessage(finishError) });
      }

      await deps.notify("Price monitor collector run failed", `<p>Run ID: ${runId}</p><p>Error: ${message}</p>`);
      throw error;
    }
  }

  return {
    isRunning: () => running,
    async run(input = {}) {
      if (running) {
        console.warn("[job:collector] run already in progress; trigger skipped", {
          triggeredBy: input.triggeredBy ?? "manual"
        });
        return { skipped: true, reason: "already_running" };
      }

      running = true;
      try {
        const runId = await claimJobRun({
          job: "collector",
          triggeredBy: input.triggeredBy ?? "manual",
          staleAfterMinutes: deps.staleRunMinutes ?? DEFAULT_STALE_RUN_MINUTES
        });
        if (!runId) {
          return { skipped: true, reason: "already_running" };
        }

        const summary = await execute(runId);
        return { skipped: false, ...summary };
      } finally {
        running = false;
      }
    }
  };
}
