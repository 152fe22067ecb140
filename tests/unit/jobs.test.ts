import { beforeEach, describe, expect, it, vi } from "vitest";

import type { ComparisonEngine } from "@/lib/comparison/engine";
import { JobAlreadyRunningError } from "@/lib/errors";
import { runComparisonRefreshJob } from "@/lib/jobs/comparison-refresh";
import { runRetentionJob } from "@/lib/jobs/retention";
import type { ComparisonResult, GroupType } from "@/lib/types";
import { memoryDb } from "@/tests/helpers/memory-db";

vi.mock("@/lib/db/price-history", async () =>
  (await import("@/tests/helpers/memory-db")).memoryDb.priceHistoryModule()
);
vi.mock("@/lib/db/groups", async () => (await import("@/tests/helpers/memory-db")).memoryDb.groupsModule());
vi.mock("@/lib/db/comparison-snapshots", async () =>
  (await import("@/tests/helpers/memory-db")).memoryDb.comparisonSnapshotsModule()
);
vi.mock("@/lib/db/job-runs", async () => (await import("@/tests/helpers/memory-db")).memoryDb.jobRunsModule());

const NOW = Date.parse("2026-06-01T02:00:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): string {
  return new Date(NOW - days * DAY_MS).toISOString();
}

function addGroup(id: string, groupType: GroupType, memberArticles: string[]): void {
  memoryDb.groups.push({
    id,
    ownerId: "owner-1",
    name: id,
    groupType,
    createdAt: daysAgo(3),
    updatedAt: daysAgo(3)
  });

  memberArticles.forEach((article, position) => {
    const product = memoryDb.seedProduct({ ownerId: "owner-1", article });
    memoryDb.memberships.push({
      id: `${id}-m${position}`,
      groupId: id,
      productId: product.id,
      role: position === 0 ? "own" : "competitor",
      position,
      addedAt: daysAgo(3)
    });
  });
}

function result(groupId: string, overrides: Partial<ComparisonResult> = {}): ComparisonResult {
  return {
    groupId,
    groupName: groupId,
    groupType: "comparison",
    own: null,
    competitors: [],
    items: [],
    metrics: null,
    comparedAt: new Date(NOW).toISOString(),
    isFresh: true,
    staleMembers: [],
    snapshotId: `snapshot-${groupId}`,
    snapshotError: null,
    historyErrors: [],
    ...overrides
  };
}

beforeEach(() => {
  memoryDb.reset();
  memoryDb.now = () => NOW;
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("comparison refresh job", () => {
  it("recomputes every comparison group and records per-group failures", async () => {
    addGroup("fresh", "comparison", ["100", "200"]);
    addGroup("lonely", "comparison", ["300"]);
    addGroup("broken", "comparison", ["400", "500"]);
    addGroup("variants", "variants", ["600", "700"]);
    addGroup("unsaved", "comparison", ["800", "900"]);

    const computeComparison = vi.fn<ComparisonEngine["computeComparison"]>(async (_ownerId, groupId) => {
      if (groupId === "broken") {
        throw new Error("competitor fetch exhausted retries");
      }

      if (groupId === "unsaved") {
        return result(groupId, {
          isFresh: false,
          staleMembers: ["900"],
          snapshotId: null,
          snapshotError: { code: "PERSISTENCE_ERROR", message: "Failed to store comparison snapshot: disk full" }
        });
      }

      return result(groupId, {
        historyErrors: [{ article: "200", code: "PERSISTENCE_ERROR", message: "Failed to record the price of 200: timeout" }]
      });
    });

    const summary = await runComparisonRefreshJob({
      engine: { computeComparison },
      triggeredBy: "schedule",
      now: () => NOW
    });

    expect(summary).toMatchObject({
      status: "partial",
      groupsTotal: 4,
      computed: 2,
      skipped: 1,
      errors: 2,
      staleResults: 1
    });
    expect(computeComparison.mock.calls.map((call) => call[1])).toEqual(["fresh", "broken", "unsaved"]);
    expect(computeComparison).toHaveBeenCalledWith("owner-1", "fresh", { refresh: true });
    expect(memoryDb.jobEvents.map((event) => [event.severity, event.code])).toEqual([
      ["warn", "PERSISTENCE_ERROR"],
      ["warn", "GROUP_COMPUTE_FAILED"],
      ["error", "PERSISTENCE_ERROR"]
    ]);
    expect(memoryDb.jobRuns).toHaveLength(1);
    expect(memoryDb.jobRuns[0]).toMatchObject({ job: "comparisons", status: "partial", triggeredBy: "schedule" });
  });

  it("keeps going when a group's members or its error event cannot be read or written", async () => {
    addGroup("first", "comparison", ["100", "200"]);
    addGroup("second", "comparison", ["300", "400"]);
    addGroup("third", "comparison", ["500", "600"]);
    memoryDb.failNext("listGroupMembers", new Error("connection reset"));
    memoryDb.failNext("recordJobEvent", new Error("connection reset"));

    const computeComparison = vi.fn<ComparisonEngine["computeComparison"]>(async (_ownerId, groupId) => result(groupId));

    const summary = await runComparisonRefreshJob({ engine: { computeComparison }, triggeredBy: "schedule" });

    expect(summary).toMatchObject({ status: "partial", groupsTotal: 3, computed: 2, skipped: 0, errors: 1 });
    expect(computeComparison.mock.calls.map((call) => call[1])).toEqual(["second", "third"]);
    expect(memoryDb.jobEvents).toEqual([]);
    expect(memoryDb.jobRuns[0]).toMatchObject({ job: "comparisons", status: "partial" });
  });

  it("refuses to start while another process is refreshing", async () => {
    memoryDb.jobRuns.push({
      id: "run-elsewhere",
      job: "comparisons",
      status: "running",
      triggeredBy: "schedule",
      summary: null,
      startedAt: daysAgo(0),
      heartbeatAt: daysAgo(0)
    });
    const computeComparison = vi.fn<ComparisonEngine["computeComparison"]>();

    await expect(
      runComparisonRefreshJob({ engine: { computeComparison }, triggeredBy: "api", now: () => NOW })
    ).rejects.toBeInstanceOf(JobAlreadyRunningError);
    expect(memoryDb.jobRuns).toHaveLength(1);
  });

  it("marks the run failed when the group listing breaks", async () => {
    const computeComparison = vi.fn<ComparisonEngine["computeComparison"]>();
    memoryDb.failNext("listComparisonGroups", new Error("relation does not exist"));

    await expect(
      runComparisonRefreshJob({ engine: { computeComparison }, triggeredBy: "manual" })
    ).rejects.toThrow("relation does not exist");

    expect(computeComparison).not.toHaveBeenCalled();
    expect(memoryDb.jobRuns[0]).toMatchObject({ job: "comparisons", status: "failed" });
    expect(memoryDb.jobRuns[0]?.summary).toMatchObject({ error: "relation does not exist" });
  });
});

describe("retention job", () => {
  it("prunes rows older than each horizon and records the run", async () => {
    memoryDb.priceSnapshots.push(
      {
        id: "old",
        article: "100",
        capturedAt: daysAgo(120),
        price: 1000,
        normalPrice: 1000,
        cardPrice: null,
        oldPrice: null,
        available: true,
        rating: null,
        reviewCount: null,
        success: true,
        errorKind: null,
        errorMessage: null,
        durationMs: 80,
        source: "http"
      },
      {
        id: "recent",
        article: "100",
        capturedAt: daysAgo(10),
        price: 1100,
        normalPrice: 1100,
        cardPrice: null,
        oldPrice: null,
        available: true,
        rating: null,
        reviewCount: null,
        success: true,
        errorKind: null,
        errorMessage: null,
        durationMs: 80,
        source: "http"
      }
    );
    memoryDb.jobEvents.push(
      { runId: "run-old", severity: "warn", code: "FETCH_FAILED", message: "old", payload: {}, createdAt: daysAgo(45) },
      { runId: "run-new", severity: "warn", code: "FETCH_FAILED", message: "new", payload: {}, createdAt: daysAgo(1) }
    );

    const policy = { priceHistoryDays: 90, comparisonSnapshotDays: 180, jobEventDays: 30 };
    const summary = await runRetentionJob({ policy, triggeredBy: "schedule", now: () => NOW });

    expect(summary).toMatchObject({
      status: "success",
      priceSnapshotsDeleted: 1,
      comparisonSnapshotsDeleted: 0,
      jobEventsDeleted: 1,
      durationMs: 0
    });
    expect(memoryDb.priceSnapshots.map((row) => row.id)).toEqual(["recent"]);
    expect(memoryDb.jobEvents.map((row) => row.message)).toEqual(["new"]);
    expect(memoryDb.jobRuns[0]).toMatchObject({ job: "retention", status: "success" });
    expect(memoryDb.jobRuns[0]?.summary).toMatchObject({ policy });
  });
});
