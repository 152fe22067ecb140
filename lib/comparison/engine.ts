import type { ComparisonConfig } from "@/lib/comparison/config";
import { computeComparisonMetrics, type MetricInput } from "@/lib/comparison/metrics";
import {
  insertComparisonSnapshot,
  listComparisonSnapshots,
  summarizeLatestSnapshots
} from "@/lib/db/comparison-snapshots";
import {
  countGroupsForOwner,
  deleteGroup as deleteGroupRow,
  deleteMembership,
  getGroupForOwner,
  insertGroup,
  insertMembership,
  listGroupMembers,
  listGroupsForOwner
} from "@/lib/db/groups";
import { appendPriceSnapshot } from "@/lib/db/price-history";
import {
  countProductsForOwner,
  deactivateUngroupedProducts,
  getProductByOwnerArticle,
  insertTrackedProduct
} from "@/lib/db/products";
import {
  DuplicateMemberError,
  GroupNotFoundError,
  InsufficientMembersError,
  PersistenceError,
  ProductNotFoundError,
  errorMessage,
  isFetchError
} from "@/lib/errors";
import { computeDiscountIndex, roundTo } from "@/lib/pricing/aggregate";
import type { Aggregator } from "@/lib/pricing/aggregator";
import type { FetchClient } from "@/lib/scraping/fetch-client";
import { isValidArticle, normalizeArticle } from "@/lib/scraping/normalize";
import type {
  ComparisonGroup,
  ComparisonMember,
  ComparisonResult,
  ComparisonSnapshot,
  GroupMember,
  GroupType,
  MemberRole,
  PriceSnapshotInput,
  ProductAttributes,
  ProductSnapshot,
  UserComparisonStats
} from "@/lib/types";

export interface ComparisonEngineDeps {
  fetchClient: Pick<FetchClient, "fetch">;
  aggregator: Pick<Aggregator, "observe" | "refreshArticle">;
  config: ComparisonConfig;
  now?: () => number;
}

export interface AddMemberInput {
  article: string;
  role: MemberRole;
  scrapeNow?: boolean;
  position?: number | null;
}

export interface QuickCompareInput {
  ownArticle: string;
  competitorArticle: string;
  groupName?: string | null;
  groupId?: string | null;
}

export type ComparisonEngine = ReturnType<typeof createComparisonEngine>;

export function toMetricInput(member: ComparisonMember): MetricInput {
  return {
    price: member.price,
    normalPrice: member.normalPrice,
    cardPrice: member.cardPrice,
    rating: member.rating,
    reviewCount: member.reviewCount,
    available: member.available,
    rollingAvgPrice: member.rollingAvgPrice
  };
}

function pickAttributes(source: ProductAttributes): ProductAttributes {
  return {
    name: source.name,
    price: source.price,
    normalPrice: source.normalPrice,
    cardPrice: source.cardPrice,
    oldPrice: source.oldPrice,
    rating: source.rating,
    reviewCount: source.reviewCount,
    available: source.available,
    imageUrl: source.imageUrl,
    productUrl: source.productUrl
  };
}

function toPriceSnapshotInput(snapshot: ProductSnapshot): PriceSnapshotInput {
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

export function createComparisonEngine(deps: ComparisonEngineDeps) {
  const now = deps.now ?? Date.now;

  async function requireGroup(ownerId: string, groupId: string): Promise<ComparisonGroup> {
    const group = await getGroupForOwner(ownerId, groupId);
    if (!group) {
      throw new GroupNotFoundError(groupId);
    }

    return group;
  }

  /**
   * Records a live fetch: appends the price snapshot, hands the attributes to
   * the aggregator and returns the refreshed rolling average.
   */
  async function recordLiveFetch(snapshot: ProductSnapshot): Promise<number | null> {
    await appendPriceSnapshot(toPriceSnapshotInput(snapshot));
    await deps.aggregator.observe(snapshot);
    const window = await deps.aggregator.refreshArticle(snapshot.article);
    return window.avg;
  }

  /**
   * Same as `recordLiveFetch`, but a storage failure is logged and returned as
   * a `PersistenceError` instead of rejecting; the fetched attributes stay usable.
   */
  async function recordLiveFetchSafely(
    snapshot: ProductSnapshot,
    context: Record<string, unknown>
  ): Promise<{ rollingAvgPrice: number | null } | { error: PersistenceError }> {
    try {
      return { rollingAvgPrice: await recordLiveFetch(snapshot) };
    } catch (error) {
      console.error(`[comparison] price history write failed for ${snapshot.article}`, {
        ...context,
        error: errorMessage(error)
      });
      return { error: new PersistenceError(`Failed to record the price of ${snapshot.article}: ${errorMessage(error)}`) };
    }
  }

  async function createGroup(
    ownerId: string,
    input: { name?: string | null; type?: GroupType } = {}
  ): Promise<ComparisonGroup> {
    const group = await insertGroup({
      ownerId,
      name: input.name?.trim() || null,
      groupType: input.type ?? "comparison"
    });

    console.log(`[comparison] group ${group.id} created`, { ownerId, groupType: group.groupType });
    return group;
  }

  async function addMember(ownerId: string, groupId: string, input: AddMemberInput): Promise<GroupMember> {
    const group = await requireGroup(ownerId, groupId);
    const article = normalizeArticle(input.article);

    let product = await getProductByOwnerArticle(ownerId, article);
    if (!product) {
      if (!isValidArticle(article)) {
        throw new ProductNotFoundError(article);
      }

      let snapshot: ProductSnapshot | null = null;
      if (input.scrapeNow ?? true) {
        try {
          snapshot = await deps.fetchClient.fetch(article);
        } catch (error) {
          if (isFetchError(error)) {
            throw new ProductNotFoundError(article, error);
          }

          throw error;
        }
      }

      product = await insertTrackedProduct({ ownerId, article, snapshot });
      if (snapshot && snapshot.source !== "cache") {
        const recorded = await recordLiveFetchSafely(snapshot, { groupId: group.id });
        if ("rollingAvgPrice" in recorded) {
          product = { ...product, rollingAvgPrice: recorded.rollingAvgPrice };
        }
      }
    } else if (product.status === "inactive") {
      product = await insertTrackedProduct({ ownerId, article, snapshot: null });
    }

    const membership = await insertMembership({
      groupId: group.id,
      productId: product.id,
      article,
      role: input.role,
      position: input.position ?? null
    });

    console.log(`[comparison] ${article} added to group ${group.id}`, { role: input.role });
    return { membership, product };
  }

  async function removeMember(ownerId: string, groupId: string, productId: string): Promise<boolean> {
    await requireGroup(ownerId, groupId);
    const removed = await deleteMembership(groupId, productId);
    if (removed) {
      await deactivateUngroupedProducts(ownerId);
    }

    return removed;
  }

  async function loadMember(
    member: GroupMember,
    refresh: boolean,
    nowMs: number
  ): Promise<{ member: ComparisonMember; stale: boolean; historyError: PersistenceError | null }> {
    const { membership, product } = member;
    let attributes = pickAttributes(product);
    let lastCheckedAt = product.lastCheckedAt;
    let rollingAvgPrice = product.rollingAvgPrice;
    let stale = false;
    let historyError: PersistenceError | null = null;

    const ageMs = lastCheckedAt ? nowMs - new Date(lastCheckedAt).getTime() : Number.POSITIVE_INFINITY;
    if (refresh || ageMs > deps.config.freshnessMs) {
      let snapshot: ProductSnapshot | null = null;
      try {
        snapshot = await deps.fetchClient.fetch(product.article, { skipCache: refresh });
      } catch (error) {
        stale = true;
        console.warn(`[comparison] using last-known attributes for ${product.article}`, {
          groupId: membership.groupId,
          error: errorMessage(error)
        });
      }

      if (snapshot) {
        attributes = pickAttributes(snapshot);
        lastCheckedAt = snapshot.fetchedAt;
        if (snapshot.source !== "cache") {
          const recorded = await recordLiveFetchSafely(snapshot, { groupId: membership.groupId });
          if ("rollingAvgPrice" in recorded) {
            rollingAvgPrice = recorded.rollingAvgPrice;
          } else {
            historyError = recorded.error;
          }
        }
      }
    }

    return {
      stale,
      historyError,
      member: {
        productId: product.id,
        article: product.article,
        role: membership.role,
        position: membership.position,
        ...attributes,
        rollingAvgPrice,
        discountIndex: computeDiscountIndex({
          rollingAvgPrice,
          price: attributes.normalPrice ?? attributes.price,
          cardPrice: attributes.cardPrice
        }),
        lastCheckedAt
      }
    };
  }

  async function computeComparison(
    ownerId: string,
    groupId: string,
    options: { refresh?: boolean } = {}
  ): Promise<ComparisonResult> {
    const group = await requireGroup(ownerId, groupId);
    const groupMembers = await listGroupMembers(group.id);
    if (groupMembers.length < 2) {
      throw new InsufficientMembersError({ groupId: group.id, memberCount: groupMembers.length });
    }

    const nowMs = now();
    const members: ComparisonMember[] = [];
    const staleMembers: string[] = [];
    const historyErrors: ComparisonResult["historyErrors"] = [];
    for (const groupMember of groupMembers) {
      const loaded = await loadMember(groupMember, options.refresh ?? false, nowMs);
      members.push(loaded.member);
      if (loaded.stale) {
        staleMembers.push(loaded.member.article);
      }
      if (loaded.historyError) {
        historyErrors.push({
          article: loaded.member.article,
          code: loaded.historyError.code,
          message: loaded.historyError.message
        });
      }
    }

    const owns = members.filter((member) => member.role === "own");
    const competitors = members.filter((member) => member.role === "competitor");
    const items = members.filter((member) => member.role === "item");

    const metrics =
      owns.length === 1 && competitors.length === 1
        ? computeComparisonMetrics(toMetricInput(owns[0]), toMetricInput(competitors[0]), deps.config)
        : null;

    const comparedAt = new Date(now()).toISOString();
    let snapshotId: string | null = null;
    let snapshotError: ComparisonResult["snapshotError"] = null;

    if (metrics) {
      try {
        snapshotId = await insertComparisonSnapshot({
          groupId: group.id,
          createdAt: comparedAt,
          payload: { members },
          metrics
        });
      } catch (error) {
        const persistenceError = new PersistenceError(`Failed to store comparison snapshot: ${errorMessage(error)}`);
        snapshotError = { code: persistenceError.code, message: persistenceError.message };
        console.error(`[comparison] snapshot write failed for group ${group.id}`, { error: errorMessage(error) });
      }
    }

    console.log(`[comparison] group ${group.id} computed`, {
      members: members.length,
      index: metrics?.competitivenessIndex ?? null,
      grade: metrics?.grade ?? null,
      stale: staleMembers.length
    });

    return {
      groupId: group.id,
      groupName: group.name,
      groupType: group.groupType,
      own: owns.length === 1 ? owns[0] : null,
      competitors,
      items,
      metrics,
      comparedAt,
      isFresh: staleMembers.length === 0,
      staleMembers,
      snapshotId,
      snapshotError,
      historyErrors
    };
  }

  async function quickCompare(ownerId: string, input: QuickCompareInput): Promise<ComparisonResult> {
    const ownArticle = normalizeArticle(input.ownArticle);
    const competitorArticle = normalizeArticle(input.competitorArticle);

    const existingGroupId = input.groupId ?? null;
    const group = existingGroupId
      ? await requireGroup(ownerId, existingGroupId)
      : await createGroup(ownerId, {
          name: input.groupName ?? `${ownArticle} vs ${competitorArticle}`,
          type: "comparison"
        });

    try {
      for (const [article, role] of [
        [ownArticle, "own"],
        [competitorArticle, "competitor"]
      ] as const) {
        try {
          await addMember(ownerId, group.id, { article, role, scrapeNow: true });
        } catch (error) {
          // Re-running against a supplied group keeps its existing members.
          if (!(existingGroupId && error instanceof DuplicateMemberError)) {
            throw error;
          }
        }
      }
    } catch (error) {
      if (!existingGroupId) {
        await deleteGroupRow(ownerId, group.id);
      }

      throw error;
    }

    return computeComparison(ownerId, group.id);
  }

  async function getHistory(ownerId: string, groupId: string, days: number): Promise<ComparisonSnapshot[]> {
    const group = await requireGroup(ownerId, groupId);
    return listComparisonSnapshots({ groupId: group.id, days });
  }

  async function getUserStats(ownerId: string): Promise<UserComparisonStats> {
    const [groups, trackedProducts, latest] = await Promise.all([
      countGroupsForOwner(ownerId),
      countProductsForOwner(ownerId),
      summarizeLatestSnapshots(ownerId)
    ]);

    return {
      totalGroups: groups.total,
      comparisonGroups: groups.comparison,
      trackedProducts,
      avgCompetitivenessIndex:
        latest.avgCompetitivenessIndex === null ? null : roundTo(latest.avgCompetitivenessIndex, 4),
      lastComparisonAt: latest.lastComparisonAt
    };
  }

  async function getGroup(ownerId: string, groupId: string): Promise<{ group: ComparisonGroup; members: GroupMember[] }> {
    const group = await requireGroup(ownerId, groupId);
    return { group, members: await listGroupMembers(group.id) };
  }

  async function deleteGroup(ownerId: string, groupId: string): Promise<void> {
    const deleted = await deleteGroupRow(ownerId, groupId);
    if (!deleted) {
      throw new GroupNotFoundError(groupId);
    }

    const deactivated = await deactivateUngroupedProducts(ownerId);
    console.log(`[comparison] group ${groupId} deleted`, { ownerId, deactivatedProducts: deactivated });
  }

  return {
    createGroup,
    addMember,
    removeMember,
    quickCompare,
    computeComparison,
    getHistory,
    getUserStats,
    listGroups: (ownerId: string) => listGroupsForOwner(ownerId),
    getGroup,
    deleteGroup
  };
}
