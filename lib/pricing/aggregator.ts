import { queryPriceWindow } from "@/lib/db/price-history";
import { applyFetchedAttributes, getProductById, listActiveArticles, writeRollingAverage } from "@/lib/db/products";
import { ProductNotFoundError, errorMessage } from "@/lib/errors";
import type { ProductSnapshot, WindowAggregate } from "@/lib/types";

export interface RefreshManyResult {
  refreshed: number;
  failed: number;
  aggregates: WindowAggregate[];
}

export interface Aggregator {
  refresh(productId: string): Promise<WindowAggregate>;
  refreshArticle(article: string): Promise<WindowAggregate>;
  refreshMany(articles: readonly string[]): Promise<RefreshManyResult>;
  refreshAll(): Promise<RefreshManyResult>;
  /** Writes the last-known attributes from a successful fetch onto the tracked rows. */
  observe(snapshot: ProductSnapshot): Promise<void>;
}

/**
 * Sole writer of the denormalized fields on tracked products: the rolling
 * average pair and the last-known attributes. Never touches snapshot rows.
 */
export function createAggregator(deps: { windowDays: number; now?: () => number }): Aggregator {
  const now = deps.now ?? Date.now;

  async function refreshArticle(article: string): Promise<WindowAggregate> {
    const asOf = new Date(now());
    const aggregate = await queryPriceWindow({ article, days: deps.windowDays, asOf });

    await writeRollingAverage({
      article,
      avgPrice: aggregate.avg,
      computedAt: asOf.toISOString()
    });

    return aggregate;
  }

  async function refresh(productId: string): Promise<WindowAggregate> {
    const product = await getProductById(productId);
    if (!product) {
      throw new ProductNotFoundError(productId);
    }

    return refreshArticle(product.article);
  }

  async function refreshMany(articles: readonly string[]): Promise<RefreshManyResult> {
    const result: RefreshManyResult = { refreshed: 0, failed: 0, aggregates: [] };

    for (const article of new Set(articles)) {
      try {
        result.aggregates.push(await refreshArticle(article));
        result.refreshed += 1;
      } catch (error) {
        result.failed += 1;
        console.warn(`[aggregator] failed to refresh ${article}`, { error: errorMessage(error) });
      }
    }

    return result;
  }

  return {
    refresh,
    refreshArticle,
    refreshMany,
    refreshAll: async () => refreshMany(await listActiveArticles()),
    observe: async (snapshot) => {
      await applyFetchedAttributes(snapshot);
    }
  };
}
