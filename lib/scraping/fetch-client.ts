import { FetchError } from "@/lib/errors";
import type { TtlCache } from "@/lib/scraping/cache";
import { defaultExtractors, extractProductAttributes, loadProductPage, type Extractor } from "@/lib/scraping/extractors";
import { isValidArticle, normalizeArticle } from "@/lib/scraping/normalize";
import type { RateLimiter } from "@/lib/scraping/rate-limiter";
import { DEFAULT_RETRY_POLICY, withFetchRetry, type RetryPolicy } from "@/lib/scraping/retry";
import type { PageResponse, ProductTransport } from "@/lib/scraping/transport";
import type { ProductSnapshot } from "@/lib/types";

export interface FetchOptions {
  skipCache?: boolean;
}

export interface FetchClientStats {
  cacheHits: number;
  cacheMisses: number;
  cacheSize: number;
  liveFetches: number;
  renderFetches: number;
  retries: number;
  failures: number;
}

export interface FetchClient {
  fetch(article: string, options?: FetchOptions): Promise<ProductSnapshot>;
  clearCache(): void;
  stats(): FetchClientStats;
}

export interface FetchClientDeps {
  transport: ProductTransport;
  cache: TtlCache<ProductSnapshot>;
  limiter: RateLimiter;
  extractors?: readonly Extractor[];
  retryPolicy?: RetryPolicy;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createFetchClient(deps: FetchClientDeps): FetchClient {
  const extractors = deps.extractors ?? defaultExtractors;
  const retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;

  const counters = {
    liveFetches: 0,
    renderFetches: 0,
    retries: 0,
    failures: 0
  };

  function parse(page: PageResponse) {
    return extractProductAttributes(loadProductPage({ url: page.url, html: page.html }), extractors);
  }

  async function fetchOnce(article: string, startedAt: number): Promise<ProductSnapshot> {
    await deps.limiter.acquire();
    counters.liveFetches += 1;
    let page = await deps.transport.fetchPage(article);
    let extracted = parse(page);

    if (!extracted && page.source === "http") {
      await deps.limiter.acquire();
      const rendered = await deps.transport.renderPage(article);
      if (rendered) {
        counters.renderFetches += 1;
        page = rendered;
        extracted = parse(rendered);
      }
    }

    if (!extracted) {
      throw new FetchError({ kind: "parse_failure", article, message: `No price found on the page for ${article}` });
    }

    const fetchedAt = now();
    return {
      article,
      ...extracted.attributes,
      source: page.source,
      fetchedAt: new Date(fetchedAt).toISOString(),
      durationMs: Math.max(0, fetchedAt - startedAt)
    };
  }

  async function fetchProduct(rawArticle: string, options: FetchOptions = {}): Promise<ProductSnapshot> {
    const article = normalizeArticle(rawArticle);
    if (!isValidArticle(article)) {
      counters.failures += 1;
      throw new FetchError({ kind: "not_found", article, message: `Invalid product identifier "${article}"` });
    }

    if (!options.skipCache) {
      const cached = deps.cache.get(article);
      if (cached) {
        return { ...cached, source: "cache", durationMs: 0 };
      }
    }

    const startedAt = now();
    try {
      const snapshot = await withFetchRetry(() => fetchOnce(article, startedAt), {
        policy: retryPolicy,
        sleep,
        random: deps.random,
        onRetry: (info) => {
          counters.retries += 1;
          console.warn(`[fetch] retrying ${article}`, {
            attempt: info.attempt,
            delayMs: info.delayMs,
            kind: info.error.kind
          });
        }
      });

      deps.cache.set(article, snapshot);
      return snapshot;
    } catch (error) {
      counters.failures += 1;
      if (error instanceof FetchError) {
        console.warn(`[fetch] ${article} failed`, { kind: error.kind, message: error.message });
        throw error;
      }

      const message = error instanceof Error ? error.message : "unknown";
      console.error(`[fetch] ${article} failed unexpectedly`, { message });
      throw new FetchError({ kind: "transport", article, message });
    }
  }

  return {
    fetch: fetchProduct,
    clearCache: () => deps.cache.clear(),
    stats: () => {
      const cache = deps.cache.stats();
      return {
        cacheHits: cache.hits,
        cacheMisses: cache.misses,
        cacheSize: cache.size,
        ...counters
      };
    }
  };
}
