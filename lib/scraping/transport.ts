import { FetchError } from "@/lib/errors";
import { parseRetryAfter } from "@/lib/scraping/retry";
import type { SnapshotSource } from "@/lib/types";

export interface PageResponse {
  url: string;
  html: string;
  source: Exclude<SnapshotSource, "cache">;
}

export interface ProductTransport {
  fetchPage(article: string): Promise<PageResponse>;
  /** Renders the page through a JavaScript-capable service; null when none is configured. */
  renderPage(article: string): Promise<PageResponse | null>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  firecrawl: { apiKey: string; baseUrl: string } | null;
  fetchImpl?: FetchLike;
  now?: () => number;
}

const RENDER_TIMEOUT_MS = 60_000;

export function buildProductUrl(baseUrl: string, article: string): string {
  return `${baseUrl.replace(/\/$/, "")}/product/${encodeURIComponent(article)}/`;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function classifyHttpStatus(input: {
  article: string;
  status: number;
  retryAfter: string | null;
  nowMs: number;
}): FetchError {
  const { article, status } = input;
  if (status === 404 || status === 410) {
    return new FetchError({ kind: "not_found", article, message: `HTTP ${status} for ${article}` });
  }

  if (status === 429) {
    return new FetchError({
      kind: "rate_limited_by_remote",
      article,
      message: `HTTP 429 for ${article}`,
      retryAfterMs: parseRetryAfter(input.retryAfter, input.nowMs)
    });
  }

  return new FetchError({ kind: "transport", article, message: `HTTP ${status} for ${article}` });
}

async function fetchWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetchImpl(url, {
      ...init,
      signal: controller.signal
    });
  } finally {
    clearTimeout(timeout);
  }
}

function toTransportError(article: string, error: unknown, timeoutMs: number): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (isAbortError(error)) {
    return new FetchError({ kind: "timeout", article, message: `Timed out after ${timeoutMs}ms fetching ${article}` });
  }

  const message = error instanceof Error ? error.message : "unknown";
  return new FetchError({ kind: "transport", article, message: `Network error fetching ${article}: ${message}` });
}

function readRenderedHtml(payload: unknown): string | null {
  if (!payload || typeof payload !== "object" || !("data" in payload)) {
    return null;
  }

  const data = payload.data;
  if (!data || typeof data !== "object" || !("html" in data)) {
    return null;
  }

  return typeof data.html === "string" && data.html.trim().length > 0 ? data.html : null;
}

/**
 * Plain HTTP GET of the product page, with the Firecrawl scrape API as the
 * rendering path for pages that only produce their prices client-side or that
 * refuse plain clients with 403.
 */
export function createHttpTransport(options: HttpTransportOptions): ProductTransport {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const now = options.now ?? Date.now;

  async function renderPage(article: string): Promise<PageResponse | null> {
    const firecrawl = options.firecrawl;
    if (!firecrawl) {
      return null;
    }

    const url = buildProductUrl(options.baseUrl, article);
    const endpoint = `${firecrawl.baseUrl.replace(/\/$/, "")}/scrape`;

    let response: Response;
    try {
      response = await fetchWithTimeout(
        fetchImpl,
        endpoint,
        {
          method: "POST",
          headers: {
            authorization: `Bearer ${firecrawl.apiKey}`,
            "content-type": "application/json"
          },
          body: JSON.stringify({
            url,
            formats: ["html"],
            onlyMainContent: false,
            timeout: 45_000,
            proxy: "auto",
            headers: {
              "user-agent": options.userAgent
            }
          })
        },
        RENDER_TIMEOUT_MS
      );
    } catch (error) {
      throw toTransportError(article, error, RENDER_TIMEOUT_MS);
    }

    if (!response.ok) {
      if (response.status === 429 || response.status >= 500) {
        throw classifyHttpStatus({
          article,
          status: response.status,
          retryAfter: response.headers.get("retry-after"),
          nowMs: now()
        });
      }

      return null;
    }

    const html = readRenderedHtml(await response.json());
    return html ? { url, html, source: "render" } : null;
  }

  async function fetchPage(article: string): Promise<PageResponse> {
    const url = buildProductUrl(options.baseUrl, article);

    let response: Response;
    try {
      response = await fetchWithTimeout(
        fetchImpl,
        url,
        {
          headers: {
            "user-agent": options.userAgent,
            accept: "text/html,application/xhtml+xml",
            "accept-language": "ru-RU,ru;q=0.9,en;q=0.8"
          },
          redirect: "follow"
        },
        options.timeoutMs
      );
    } catch (error) {
      throw toTransportError(article, error, options.timeoutMs);
    }

    if (response.status === 403 && options.firecrawl) {
      const rendered = await renderPage(article);
      if (rendered) {
        return rendered;
      }
    }

    if (!response.ok) {
      throw classifyHttpStatus({
        article,
        status: response.status,
        retryAfter: response.headers.get("retry-after"),
        nowMs: now()
      });
    }

    try {
      return { url: response.url || url, html: await response.text(), source: "http" };
    } catch (error) {
      throw toTransportError(article, error, options.timeoutMs);
    }
  }

  return { fetchPage, renderPage };
}
