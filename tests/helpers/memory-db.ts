import { DuplicateMemberError } from "@/lib/errors";
import { summarizePriceWindow, windowStart } from "@/lib/pricing/aggregate";
import type {
  ComparisonGroup,
  ComparisonMetrics,
  ComparisonPayload,
  ComparisonSnapshot,
  GroupMember,
  GroupMembership,
  GroupType,
  JobName,
  JobStatus,
  MemberRole,
  PriceSnapshot,
  PriceSnapshotInput,
  ProductSnapshot,
  TrackedProduct,
  WindowAggregate
} from "@/lib/types";

export interface JobRunRecord {
  id: string;
  job: JobName;
  status: JobStatus;
  triggeredBy: string | null;
  summary: Record<string, unknown> | null;
  startedAt: string;
  heartbeatAt: string | null;
}

export interface JobEventRecord {
  runId: string;
  severity: string;
  code: string;
  message: string;
  payload: Record<string, unknown>;
  createdAt: string;
}

/**
 * In-process stand-in for the postgres repositories. Tests route the db modules
 * here with `vi.mock(..., () => memoryDb.<module>Module())`.
 */
export class MemoryDb {
  products: TrackedProduct[] = [];
  priceSnapshots: PriceSnapshot[] = [];
  groups: ComparisonGroup[] = [];
  memberships: GroupMembership[] = [];
  comparisonSnapshots: ComparisonSnapshot[] = [];
  jobRuns: JobRunRecord[] = [];
  jobEvents: JobEventRecord[] = [];
  now: () => number = Date.now;

  private sequence = 0;
  private readonly faults = new Map<string, { error: Error; remaining: number }>();

  reset(): void {
    this.products = [];
    this.priceSnapshots = [];
    this.groups = [];
    this.memberships = [];
    this.comparisonSnapshots = [];
    this.jobRuns = [];
    this.jobEvents = [];
    this.now = Date.now;
    this.sequence = 0;
    this.faults.clear();
  }

  /** Makes the next `times` calls of the named operation reject. */
  failNext(operation: string, error: Error, times = 1): void {
    this.faults.set(operation, { error, remaining: times });
  }

  seedProduct(input: Partial<TrackedProduct> & { ownerId: string; article: string }): TrackedProduct {
    const product: TrackedProduct = {
      id: this.nextId("product"),
      status: "active",
      isProblematic: false,
      name: null,
      price: null,
      normalPrice: null,
      cardPrice: null,
      oldPrice: null,
      rating: null,
      reviewCount: null,
      available: false,
      imageUrl: null,
      productUrl: null,
      lastCheckedAt: null,
      rollingAvgPrice: null,
      rollingAvgComputedAt: null,
      createdAt: this.isoNow(),
      ...input
    };

    this.products.push(product);
    return product;
  }

  productsModule() {
    return {
      toIso: (value: Date | string | null) =>
        value === null ? null : value instanceof Date ? value.toISOString() : new Date(value).toISOString(),
      getProductById: async (productId: string) => this.copy(this.products.find((product) => product.id === productId)),
      getProductByOwnerArticle: async (ownerId: string, article: string) =>
        this.copy(this.products.find((product) => product.ownerId === ownerId && product.article === article)),
      insertTrackedProduct: async (input: { ownerId: string; article: string; snapshot: ProductSnapshot | null }) => {
        this.maybeFail("insertTrackedProduct");
        const existing = this.products.find(
          (product) => product.ownerId === input.ownerId && product.article === input.article
        );
        if (existing) {
          existing.status = "active";
          return { ...existing };
        }

        const snapshot = input.snapshot;
        return {
          ...this.seedProduct({
            ownerId: input.ownerId,
            article: input.article,
            name: snapshot?.name ?? null,
            price: snapshot?.price ?? null,
            normalPrice: snapshot?.normalPrice ?? null,
            cardPrice: snapshot?.cardPrice ?? null,
            oldPrice: snapshot?.oldPrice ?? null,
            rating: snapshot?.rating ?? null,
            reviewCount: snapshot?.reviewCount ?? null,
            available: snapshot?.available ?? false,
            imageUrl: snapshot?.imageUrl ?? null,
            productUrl: snapshot?.productUrl ?? null,
            lastCheckedAt: snapshot?.fetchedAt ?? null
          })
        };
      },
      applyFetchedAttributes: async (snapshot: ProductSnapshot) => {
        this.maybeFail("applyFetchedAttributes");
        const rows = this.products.filter((product) => product.article === snapshot.article);
        for (const product of rows) {
          product.name = snapshot.name ?? product.name;
          product.price = snapshot.price;
          product.normalPrice = snapshot.normalPrice;
          product.cardPrice = snapshot.cardPrice;
          product.oldPrice = snapshot.oldPrice;
          product.rating = snapshot.rating;
          product.reviewCount = snapshot.reviewCount;
          product.available = snapshot.available;
          product.imageUrl = snapshot.imageUrl ?? product.imageUrl;
          product.productUrl = snapshot.productUrl ?? product.productUrl;
          product.lastCheckedAt = snapshot.fetchedAt;
          product.isProblematic = false;
        }
        return rows.length;
      },
      markArticleProblematic: async (article: string) => {
        for (const product of this.products.filter((row) => row.article === article)) {
          product.isProblematic = true;
        }
      },
      deactivateUngroupedProducts: async (ownerId: string) => {
        const grouped = new Set(this.memberships.map((membership) => membership.productId));
        const orphaned = this.products.filter(
          (row) => row.ownerId === ownerId && row.status === "active" && !grouped.has(row.id)
        );
        for (const product of orphaned) {
          product.status = "inactive";
        }
        return orphaned.length;
      },
      listActiveArticles: async () => {
        this.maybeFail("listActiveArticles");
        return [...new Set(this.products.filter((row) => row.status === "active").map((row) => row.article))].sort();
      },
      writeRollingAverage: async (input: { article: string; avgPrice: number | null; computedAt: string }) => {
        this.maybeFail("writeRollingAverage");
        for (const product of this.products.filter((row) => row.article === input.article)) {
          product.rollingAvgPrice = input.avgPrice;
          product.rollingAvgComputedAt = input.computedAt;
        }
      },
      countProductsForOwner: async (ownerId: string) =>
        this.products.filter((row) => row.ownerId === ownerId && row.status !== "inactive").length
    };
  }

  priceHistoryModule() {
    return {
      appendPriceSnapshot: async (input: PriceSnapshotInput) => {
        this.maybeFail("appendPriceSnapshot");
        const id = this.nextId("snapshot");
        this.priceSnapshots.push({ ...input, id });
        return id;
      },
      queryPriceWindow: async (input: { article: string; days: number; asOf?: Date }): Promise<WindowAggregate> =>
        summarizePriceWindow({
          article: input.article,
          days: input.days,
          asOf: input.asOf ?? new Date(this.now()),
          samples: this.priceSnapshots.filter((row) => row.article === input.article)
        }),
      queryRecentPriceSnapshots: async (input: {
        article: string;
        days: number;
        limit: number;
        includeFailed: boolean;
      }) => {
        const from = windowStart(new Date(this.now()), input.days).getTime();
        return this.priceSnapshots
          .filter((row) => row.article === input.article)
          .filter((row) => new Date(row.capturedAt).getTime() > from)
          .filter((row) => input.includeFailed || row.success)
          .sort((a, b) => b.capturedAt.localeCompare(a.capturedAt))
          .slice(0, input.limit);
      },
      prunePriceHistory: async (olderThanDays: number) => {
        const cutoff = windowStart(new Date(this.now()), olderThanDays).getTime();
        const before = this.priceSnapshots.length;
        this.priceSnapshots = this.priceSnapshots.filter((row) => new Date(row.capturedAt).getTime() >= cutoff);
        return before - this.priceSnapshots.length;
      }
    };
  }

  groupsModule() {
    const listMembers = (groupId: string): GroupMember[] =>
      this.memberships
        .filter((membership) => membership.groupId === groupId)
        .sort((a, b) => a.position - b.position)
        .flatMap((membership) => {
          const product = this.products.find((row) => row.id === membership.productId);
          return product ? [{ membership: { ...membership }, product: { ...product } }] : [];
        });

    return {
      insertGroup: async (input: { ownerId: string; name: string | null; groupType: GroupType }) => {
        const createdAt = this.isoNow();
        const group: ComparisonGroup = { id: this.nextId("group"), ...input, createdAt, updatedAt: createdAt };
        this.groups.push(group);
        return { ...group };
      },
      getGroupForOwner: async (ownerId: string, groupId: string) =>
        this.copy(this.groups.find((group) => group.id === groupId && group.ownerId === ownerId)),
      listGroupsForOwner: async (ownerId: string) =>
        this.groups
          .filter((group) => group.ownerId === ownerId)
          .map((group) => ({ ...group, memberCount: listMembers(group.id).length })),
      listComparisonGroups: async () => {
        this.maybeFail("listComparisonGroups");
        return this.groups.filter((group) => group.groupType === "comparison");
      },
      deleteGroup: async (ownerId: string, groupId: string) => {
        const before = this.groups.length;
        this.groups = this.groups.filter((group) => !(group.id === groupId && group.ownerId === ownerId));
        if (this.groups.length === before) {
          return false;
        }

        this.memberships = this.memberships.filter((membership) => membership.groupId !== groupId);
        this.comparisonSnapshots = this.comparisonSnapshots.filter((snapshot) => snapshot.groupId !== groupId);
        return true;
      },
      listGroupMembers: async (groupId: string) => {
        this.maybeFail("listGroupMembers");
        return listMembers(groupId);
      },
      insertMembership: async (input: {
        groupId: string;
        productId: string;
        article: string;
        role: MemberRole;
        position: number | null;
      }) => {
        const existing = this.memberships.filter((membership) => membership.groupId === input.groupId);
        if (existing.some((membership) => membership.productId === input.productId)) {
          throw new DuplicateMemberError({ groupId: input.groupId, article: input.article });
        }

        const membership: GroupMembership = {
          id: this.nextId("membership"),
          groupId: input.groupId,
          productId: input.productId,
          role: input.role,
          position: input.position ?? existing.reduce((max, row) => Math.max(max, row.position + 1), 0),
          addedAt: this.isoNow()
        };
        this.memberships.push(membership);
        return { ...membership };
      },
      deleteMembership: async (groupId: string, productId: string) => {
        const before = this.memberships.length;
        this.memberships = this.memberships.filter(
          (membership) => !(membership.groupId === groupId && membership.productId === productId)
        );
        return this.memberships.length < before;
      },
      countGroupsForOwner: async (ownerId: string) => {
        const owned = this.groups.filter((group) => group.ownerId === ownerId);
        return { total: owned.length, comparison: owned.filter((group) => group.groupType === "comparison").length };
      }
    };
  }

  comparisonSnapshotsModule() {
    return {
      insertComparisonSnapshot: async (input: {
        groupId: string;
        createdAt: string;
        payload: ComparisonPayload;
        metrics: ComparisonMetrics;
      }) => {
        this.maybeFail("insertComparisonSnapshot");
        const id = this.nextId("comparison");
        this.comparisonSnapshots.push({
          id,
          groupId: input.groupId,
          createdAt: input.createdAt,
          payload: structuredClone(input.payload),
          metrics: structuredClone(input.metrics),
          competitivenessIndex: input.metrics.competitivenessIndex,
          grade: input.metrics.grade
        });
        return id;
      },
      listComparisonSnapshots: async (input: { groupId: string; days: number }) => {
        const from = windowStart(new Date(this.now()), input.days).getTime();
        return this.comparisonSnapshots
          .filter((row) => row.groupId === input.groupId && new Date(row.createdAt).getTime() >= from)
          .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
      },
      pruneComparisonSnapshots: async (olderThanDays: number) => {
        const cutoff = windowStart(new Date(this.now()), olderThanDays).getTime();
        const before = this.comparisonSnapshots.length;
        this.comparisonSnapshots = this.comparisonSnapshots.filter(
          (row) => new Date(row.createdAt).getTime() >= cutoff
        );
        return before - this.comparisonSnapshots.length;
      },
      summarizeLatestSnapshots: async (ownerId: string) => {
        const owned = new Set(this.groups.filter((group) => group.ownerId === ownerId).map((group) => group.id));
        const latest = new Map<string, ComparisonSnapshot>();
        for (const snapshot of this.comparisonSnapshots.filter((row) => owned.has(row.groupId))) {
          const current = latest.get(snapshot.groupId);
          if (!current || snapshot.createdAt > current.createdAt) {
            latest.set(snapshot.groupId, snapshot);
          }
        }

        const rows = [...latest.values()];
        if (rows.length === 0) {
          return { avgCompetitivenessIndex: null, lastComparisonAt: null };
        }

        return {
          avgCompetitivenessIndex: rows.reduce((sum, row) => sum + row.competitivenessIndex, 0) / rows.length,
          lastComparisonAt: rows.map((row) => row.createdAt).sort().at(-1) ?? null
        };
      }
    };
  }

  jobRunsModule() {
    return {
      acquireJobRun: async (input: { job: JobName; triggeredBy: string | null }) => {
        if (this.jobRuns.some((run) => run.job === input.job && run.status === "running")) {
          return null;
        }

        const id = this.nextId("run");
        const startedAt = this.isoNow();
        this.jobRuns.push({
          id,
          job: input.job,
          status: "running",
          triggeredBy: input.triggeredBy,
          summary: null,
          startedAt,
          heartbeatAt: startedAt
        });
        return id;
      },
      heartbeatJobRun: async (runId: string) => {
        for (const run of this.jobRuns.filter((row) => row.id === runId && row.status === "running")) {
          run.heartbeatAt = this.isoNow();
        }
      },
      reconcileStaleJobRuns: async (input: { job: JobName; staleAfterMinutes: number }) => {
        const cutoff = this.now() - input.staleAfterMinutes * 60_000;
        const stale = this.jobRuns.filter(
          (run) =>
            run.job === input.job &&
            run.status === "running" &&
            new Date(run.heartbeatAt ?? run.startedAt).getTime() <= cutoff
        );
        for (const run of stale) {
          run.status = "failed";
          run.summary = { ...run.summary, error: "stale run reconciled" };
        }
        return stale.map((run) => ({ id: run.id }));
      },
      finishJobRun: async (input: { runId: string; status: JobStatus; summary: Record<string, unknown> }) => {
        for (const run of this.jobRuns.filter((row) => row.id === input.runId)) {
          run.status = input.status;
          run.summary = input.summary;
        }
      },
      recordJobEvent: async (input: {
        runId: string;
        severity: string;
        code: string;
        message: string;
        payload?: Record<string, unknown>;
      }) => {
        this.maybeFail("recordJobEvent");
        this.jobEvents.push({ ...input, payload: input.payload ?? {}, createdAt: this.isoNow() });
      },
      pruneJobEvents: async (olderThanDays: number) => {
        const cutoff = windowStart(new Date(this.now()), olderThanDays).getTime();
        const before = this.jobEvents.length;
        this.jobEvents = this.jobEvents.filter((row) => new Date(row.createdAt).getTime() >= cutoff);
        return before - this.jobEvents.length;
      }
    };
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }

  private isoNow(): string {
    return new Date(this.now()).toISOString();
  }

  private copy<T extends object>(row: T | undefined): T | null {
    return row ? { ...row } : null;
  }

  private maybeFail(operation: string): void {
    const fault = this.faults.get(operation);
    if (!fault) {
      return;
    }

    fault.remaining -= 1;
    if (fault.remaining <= 0) {
      this.faults.delete(operation);
    }

    throw fault.error;
  }
}

export const memoryDb = new MemoryDb();
