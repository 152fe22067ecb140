const ARTICLE_PATTERN = /^[A-Za-z0-9]{5,20}$/;

const OUT_OF_STOCK_PATTERNS = [/нет в наличии/, /закончился/, /out of stock/, /sold out/, /unavailable/];

export function cleanupText(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function normalizeArticle(raw: string): string {
  return raw.trim();
}

export function isValidArticle(article: string): boolean {
  return ARTICLE_PATTERN.test(article);
}

/**
 * Parses a storefront price string such as "1 999 ₽", "1999,50" or "1,999.00".
 * Everything except digits and separators is dropped, commas become dots and
 * only the last dot is kept as the decimal separator.
 */
export function parsePriceText(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }

  const cleaned = raw.replace(/[^\d,.]/g, "").replace(/,/g, ".");
  if (!cleaned) {
    return null;
  }

  const parts = cleaned.split(".");
  const normalized = parts.length > 2 ? `${parts.slice(0, -1).join("")}.${parts[parts.length - 1]}` : cleaned;

  const value = Number(normalized);
  if (!Number.isFinite(value) || value <= 0) {
    return null;
  }

  return value;
}

export function parsePriceValue(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw > 0 ? raw : null;
  }

  if (typeof raw === "string") {
    return parsePriceText(raw);
  }

  return null;
}

export function parseRating(raw: unknown): number | null {
  const value = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw.replace(",", ".").match(/\d+(?:\.\d+)?/)?.[0]) : NaN;
  if (!Number.isFinite(value)) {
    return null;
  }

  return Math.min(5, Math.max(0, value));
}

export function parseReviewCount(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? Math.floor(raw) : null;
  }

  if (typeof raw !== "string") {
    return null;
  }

  const digits = raw.replace(/[\s ]/g, "").match(/\d+/);
  return digits ? Number(digits[0]) : null;
}

export function isInStock(text: string): boolean {
  const lowered = text.toLowerCase();
  return !OUT_OF_STOCK_PATTERNS.some((pattern) => pattern.test(lowered));
}

export function toAbsoluteUrl(baseUrl: string, href: string | null | undefined): string | null {
  if (!href) {
    return null;
  }

  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}
