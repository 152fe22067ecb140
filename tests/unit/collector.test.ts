import { beforeEach, describe, expect, it, vi } from "vitest";

import { FetchError } from "@/lib/errors";
import { createCollectorJob } from "@/lib/jobs/collector";
import { createAggregator } from "@/lib/pricing/aggregator";
import type { FetchClient } from "@/lib/scraping/fetch-client";
import type { FetchErrorKind } from "@/lib/types";
import { memoryDb } from "@/tests/helpers/memory-db";

vi.mock("@/lib/db/products", async () => (await import("@/tests/helpers/memory-db")).memoryDb.productsModule());
vi.mock("@/lib/db/price-history", async () =>
  (await import("@/tests/helpers/memory-db")).memoryDb.priceHistoryModule()
);
vi.mock("@/lib/db/job-runs", async () => (await import("@/tests/helpers/memory-db")).memoryDb.jobRunsModule());

const NOW = Date.parse("2026-03-02T03:00:00.000Z");
const failures = new Map<string, FetchErrorKind>();

const fetchClient = {
  fetch: vi.fn<FetchClient["fetch"]>(async (article) => {
    const kind = failures.get(article);
    if (kind) {
      throw new FetchError({ kind, article, message: `${kind} for ${article}` });
    }

    return {
      article,
      name: `Product ${article}`,
      price: 1000,
      normalPrice: 1000,
      cardPrice: null,
      oldPrice: null,
      rating: 4.2,
      reviewCount: 10,
      available: true,
      imageUrl: null,
      productUrl: null,
      source: "http",
      fetchedAt: new Date(NOW).toISOString(),
      durationMs: 250
    };
  })
};

const notify = vi.fn(async (_subject: string, _html: string) => undefined);
const sleep = vi.fn(async (_ms: number) => undefined);

function buildJob() {
  return createCollectorJob({
    fetchClient,
    aggregator: createAggregator({ windowDays: 7, now: () => NOW }),
    batchSize: 4,
    delayMinMs: 2_000,
    delayMaxMs: 5_000,
    notify,
    sleep,
    random: () => 0.5,
    now: () => NOW
  });
}

function seedArticles(count: number): string[] {
  return Array.from({ length: count }, (_, index) => {
    const article = `10000${index}`;
    memoryDb.seedProduct({ ownerId: "owner-1", article });
    return article;
  });
}

describe("collector job", () => {
  beforeEach(() => {
    memoryDb.reset();
    memoryDb.now = () => NOW;
    failures.clear();
    fetchClient.fetch.mockClear();
    notify.mockClear();
    sleep.mockClear();

    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("records a snapshot for every article when 3 of 10 fetches fail", async () => {
    seedArticles(10);
    failures.set("100002", "not_found");
    failures.set("100005", "timeout");
    failures.set("100008", "parse_failure");

    const result = await buildJob().run({ triggeredBy: "test" });

    expect(result).toMatchObject({
      skipped: false,
      status: "partial",
      attempted: 10,
      succeeded: 7,
      failed: 3,
      storageErrors: 0,
      markedProblematic: 2,
      aggregatesRefreshed: 10,
      successRate: 0.7
    });
    expect(memoryDb.priceSnapshots).toHaveLength(10);
    expect(memoryDb.priceSnapshots.filter((row) => row.success)).toHaveLength(7);
    expect(memoryDb.priceSnapshots.filter((row) => !row.success).map((row) => row.errorKind)).toEqual([
      "not_found",
      "timeout",
      "parse_failure"
    ]);
    expect(fetchClient.fetch).toHaveBeenCalledWith("100000", { skipCache: true });
    expect(sleep).toHaveBeenCalledTimes(9);
    expect(sleep).toHaveBeenCalledWith(3_500);

    const flagged = memoryDb.products.filter((product) => product.isProblematic).map((product) => product.article);
    expect(flagged).toEqual(["100002", "100008"]);
    expect(memoryDb.products.find((product) => product.article === "100000")?.rollingAvgPrice).toBe(1000);

    expect(memoryDb.jobRuns).toHaveLength(1);
    expect(memoryDb.jobRuns[0]).toMatchObject({ job: "collector", status: "partial", triggeredBy: "test" });
    expect(memoryDb.jobEvents.filter((event) => event.code === "FETCH_FAILED")).toHaveLength(3);
    expect(notify).not.toHaveBeenCalled();
  });

  it("skips a trigger that overlaps a running collection", async () => {
    seedArticles(2);
    const job = buildJob();

    const first = job.run();
    const second = await job.run();

    expect(second).toEqual({ skipped: true, reason: "already_running" });
    await expect(first).resolves.toMatchObject({ skipped: false, status: "success", attempted: 2 });
    expect(job.isRunning()).toBe(false);
    expect(memoryDb.jobRuns).toHaveLength(1);
  });

  it("never runs two collector instances that share the database at once", async () => {
    seedArticles(2);
    const first = buildJob();
    const second = buildJob();

    const running = first.run({ triggeredBy: "api" });
    const overlapping = second.run({ triggeredBy: "schedule" });

    await expect(overlapping).resolves.toEqual({ skipped: true, reason: "already_running" });
    await expect(running).resolves.toMatchObject({ skipped: false, status: "success", attempted: 2 });
    expect(memoryDb.jobRuns).toHaveLength(1);
    expect(fetchClient.fetch).toHaveBeenCalledTimes(2);
  });

  it("skips while another process holds a live run", async () => {
    seedArticles(2);
    const fiveMinutesAgo = new Date(NOW - 5 * 60_000).toISOString();
    memoryDb.jobRuns.push({
      id: "run-elsewhere",
      job: "collector",
      status: "running",
      triggeredBy: "schedule",
      summary: null,
      startedAt: fiveMinutesAgo,
      heartbeatAt: fiveMinutesAgo
    });

    const result = await buildJob().run({ triggeredBy: "api" });

    expect(result).toEqual({ skipped: true, reason: "already_running" });
    expect(fetchClient.fetch).not.toHaveBeenCalled();
    expect(memoryDb.jobRuns.map((run) => [run.id, run.status])).toEqual([["run-elsewhere", "running"]]);
  });

  it("fails a run left behind by a crashed process and takes over", async () => {
    seedArticles(1);
    const twoHoursAgo = new Date(NOW - 2 * 60 * 60_000).toISOString();
    memoryDb.jobRuns.push({
      id: "run-crashed",
      job: "collector",
      status: "running",
      triggeredBy: "schedule",
      summary: null,
      startedAt: twoHoursAgo,
      heartbeatAt: null
    });

    const result = await buildJob().run({ triggeredBy: "api" });

    expect(result).toMatchObject({ skipped: false, status: "success", attempted: 1 });
    expect(memoryDb.jobRuns.map((run) => [run.id, run.status])).toEqual([
      ["run-crashed", "failed"],
      ["run-2", "success"]
    ]);
    expect(memoryDb.jobRuns[0].summary).toEqual({ error: "stale run reconciled" });
    expect(memoryDb.jobEvents.map((event) => [event.code, event.payload])).toEqual([
      ["STALE_RUN_RECONCILED", { staleAfterMinutes: 30, staleRunIds: ["run-crashed"] }]
    ]);
  });

  it("retries a failed snapshot append once", async () => {
    seedArticles(2);
    memoryDb.failNext("appendPriceSnapshot", new Error("connection reset"));

    const result = await buildJob().run();

    expect(result).toMatchObject({ status: "success", storageErrors: 0 });
    expect(memoryDb.priceSnapshots).toHaveLength(2);
  });

  it("marks the run degraded and alerts when a snapshot cannot be stored", async () => {
    seedArticles(3);
    memoryDb.failNext("appendPriceSnapshot", new Error("connection reset"), 2);

    const result = await buildJob().run();

    expect(result).toMatchObject({ status: "degraded", storageErrors: 1, succeeded: 3 });
    expect(memoryDb.priceSnapshots).toHaveLength(2);
    expect(memoryDb.jobEvents.map((event) => event.code)).toEqual(["SNAPSHOT_APPEND_FAILED"]);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify.mock.calls[0][0]).toBe("Price monitor collector run degraded");
  });

  it("fails the run, alerts and releases the lock on a fatal error", async () => {
    memoryDb.failNext("listActiveArticles", new Error("database unavailable"));
    const job = buildJob();

    await expect(job.run()).rejects.toThrow("database unavailable");

    expect(memoryDb.jobRuns[0].status).toBe("failed");
    expect(memoryDb.jobEvents.map((event) => event.code)).toEqual(["COLLECTOR_RUN_FAILED"]);
    expect(notify.mock.calls[0][0]).toBe("Price monitor collector run failed");
    expect(job.isRunning()).toBe(false);
  });
});
