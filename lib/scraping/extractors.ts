import * as cheerio from "cheerio";

import {
  cleanupText,
  isInStock,
  parsePriceText,
  parsePriceValue,
  parseRating,
  parseReviewCount,
  toAbsoluteUrl
} from "@/lib/scraping/normalize";
import type { ProductAttributes } from "@/lib/types";

export interface ProductPage {
  url: string;
  html: string;
  $: cheerio.CheerioAPI;
}

export type PricedAttributes = ProductAttributes & { price: number };

export interface Extractor {
  name: string;
  tryExtract(page: ProductPage): ProductAttributes | null;
}

interface JsonMap {
  [key: string]: unknown;
}

function isJsonMap(value: unknown): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(node: JsonMap, key: string): string | null {
  const value = node[key];
  return typeof value === "string" && value.trim().length > 0 ? cleanupText(value) : null;
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }

  if (value === null || value === undefined) {
    return [];
  }

  return [value];
}

function parseJson(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }

  try {
    return JSON.parse(trimmed);
  } catch {
    // Some pages inject control chars in script blocks.
    const sanitized = trimmed.replace(/\u0000/g, "").trim();
    try {
      return sanitized ? JSON.parse(sanitized) : null;
    } catch {
      return null;
    }
  }
}

function hasType(node: JsonMap, expected: string): boolean {
  const rawType = node["@type"];
  if (typeof rawType === "string") {
    return rawType.toLowerCase() === expected.toLowerCase();
  }

  if (Array.isArray(rawType)) {
    return rawType.some((value) => typeof value === "string" && value.toLowerCase() === expected.toLowerCase());
  }

  return false;
}

function collectProductNodes(value: unknown, out: JsonMap[]): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      collectProductNodes(item, out);
    }
    return;
  }

  if (!isJsonMap(value)) {
    return;
  }

  if (hasType(value, "Product")) {
    out.push(value);
  }

  for (const nested of Object.values(value)) {
    if (typeof nested === "object" && nested !== null) {
      collectProductNodes(nested, out);
    }
  }
}

function readOfferPrice(offer: JsonMap): number | null {
  const direct = parsePriceValue(offer.price) ?? parsePriceValue(offer.lowPrice);
  if (direct !== null) {
    return direct;
  }

  const spec = offer.priceSpecification;
  for (const entry of asArray(spec)) {
    if (isJsonMap(entry)) {
      const specPrice = parsePriceValue(entry.price);
      if (specPrice !== null) {
        return specPrice;
      }
    }
  }

  return null;
}

function readImage(value: unknown): string | null {
  for (const entry of asArray(value)) {
    if (typeof entry === "string" && entry.length > 0) {
      return entry;
    }

    if (isJsonMap(entry)) {
      const url = readString(entry, "url") ?? readString(entry, "contentUrl");
      if (url) {
        return url;
      }
    }
  }

  return null;
}

function buildAttributes(input: {
  name: string | null;
  normalPrice: number | null;
  cardPrice: number | null;
  oldPrice: number | null;
  rating: number | null;
  reviewCount: number | null;
  available: boolean;
  imageUrl: string | null;
  productUrl: string | null;
}): ProductAttributes | null {
  const price = input.cardPrice ?? input.normalPrice;
  if (price === null || price <= 0) {
    return null;
  }

  return {
    name: input.name,
    price,
    normalPrice: input.normalPrice ?? price,
    cardPrice: input.cardPrice,
    oldPrice: input.oldPrice,
    rating: input.rating,
    reviewCount: input.reviewCount,
    available: input.available,
    imageUrl: input.imageUrl,
    productUrl: input.productUrl
  };
}

/**
 * schema.org `Product` blocks. The offer price is the base price; structured
 * data carries no loyalty price.
 */
export const jsonLdExtractor: Extractor = {
  name: "json_ld",
  tryExtract(page) {
    const products: JsonMap[] = [];
    page.$('script[type="application/ld+json"]').each((_, node) => {
      collectProductNodes(parseJson(page.$(node).contents().text()), products);
    });

    for (const product of products) {
      const offers = asArray(product.offers).filter(isJsonMap);
      for (const offer of offers.length > 0 ? offers : [product]) {
        const normalPrice = readOfferPrice(offer);
        if (normalPrice === null) {
          continue;
        }

        const rating = isJsonMap(product.aggregateRating) ? product.aggregateRating : null;
        const availability = (readString(offer, "availability") ?? "").toLowerCase();

        return buildAttributes({
          name: readString(product, "name"),
          normalPrice,
          cardPrice: null,
          oldPrice: parsePriceValue(offer.highPrice),
          rating: rating ? parseRating(rating.ratingValue) : null,
          reviewCount: rating ? parseReviewCount(rating.reviewCount ?? rating.ratingCount) : null,
          available: !/outofstock|soldout|discontinued/.test(availability),
          imageUrl: readImage(product.image),
          productUrl: toAbsoluteUrl(page.url, readString(offer, "url") ?? readString(product, "url")) ?? page.url
        });
      }
    }

    return null;
  }
};

function readWidgetState(page: ProductPage, widget: string): JsonMap | null {
  const node = page.$(`[id^="state-${widget}"]`).first();
  if (node.length === 0) {
    return null;
  }

  const parsed = parseJson(node.attr("data-state") ?? "");
  return isJsonMap(parsed) ? parsed : null;
}

/**
 * Widget state the storefront embeds as JSON in `data-state` attributes for
 * client-side hydration (`state-webPrice-*`, `state-webProductHeading-*`,
 * `state-webReviewProductScore-*`).
 */
export const widgetStateExtractor: Extractor = {
  name: "widget_state",
  tryExtract(page) {
    const priceState = readWidgetState(page, "webPrice");
    if (!priceState) {
      return null;
    }

    const heading = readWidgetState(page, "webProductHeading");
    const score = readWidgetState(page, "webReviewProductScore");
    const gallery = readWidgetState(page, "webGallery");

    return buildAttributes({
      name: heading ? readString(heading, "title") : null,
      normalPrice: parsePriceValue(priceState.price),
      cardPrice: parsePriceValue(priceState.cardPrice),
      oldPrice: parsePriceValue(priceState.originalPrice),
      rating: score ? parseRating(score.score) : null,
      reviewCount: score ? parseReviewCount(score.reviewsCount) : null,
      available: priceState.isAvailable !== false,
      imageUrl: gallery ? readString(gallery, "coverImage") : null,
      productUrl: page.url
    });
  }
};

/**
 * Visual selectors on the rendered page, the last resort when no structured
 * data survived.
 */
export const selectorExtractor: Extractor = {
  name: "selectors",
  tryExtract(page) {
    const $ = page.$;
    const normalPrice = parsePriceText($('[data-widget="webPrice"]').first().text());
    const cardPrice = parsePriceText($('[data-widget="webOzonCardPrice"]').first().text());
    const oldPrice = parsePriceText($('[class*="line-through"]').first().text() || $("s").first().text());

    const name =
      cleanupText($('[data-widget="webProductHeading"] h1').first().text()) ||
      cleanupText($("h1").first().text()) ||
      null;

    const ratingText = $('[class*="rating"]').first().text();
    const reviewsText = $("span, a, div")
      .filter((_, node) => /отзыв|review/i.test($(node).children().length === 0 ? $(node).text() : ""))
      .first()
      .text();

    const href = $('a[href*="/product/"]').first().attr("href");
    const image = $('img[src*="cdn"]').first().attr("src") ?? null;

    return buildAttributes({
      name,
      normalPrice,
      cardPrice,
      oldPrice,
      rating: ratingText ? parseRating(ratingText) : null,
      reviewCount: reviewsText ? parseReviewCount(reviewsText) : null,
      available: isInStock(cleanupText($("body").text())),
      imageUrl: image,
      productUrl: toAbsoluteUrl(page.url, href) ?? page.url
    });
  }
};

export const defaultExtractors: readonly Extractor[] = [jsonLdExtractor, widgetStateExtractor, selectorExtractor];

export function loadProductPage(input: { url: string; html: string }): ProductPage {
  return { url: input.url, html: input.html, $: cheerio.load(input.html) };
}

/**
 * Runs strategies in order; the first one producing a price wins.
 */
export function extractProductAttributes(
  page: ProductPage,
  extractors: readonly Extractor[] = defaultExtractors
): { attributes: PricedAttributes; extractor: string } | null {
  for (const extractor of extractors) {
    const attributes = extractor.tryExtract(page);
    if (attributes && attributes.price !== null && attributes.price > 0) {
      return { attributes: { ...attributes, price: attributes.price }, extractor: extractor.name };
    }
  }

  return null;
}
