import { describe, expect, it } from "vitest";

import {
  cleanupText,
  isInStock,
  isValidArticle,
  normalizeArticle,
  parsePriceText,
  parsePriceValue,
  parseRating,
  parseReviewCount,
  toAbsoluteUrl
} from "@/lib/scraping/normalize";

describe("article identifiers", () => {
  it("accepts 5 to 20 alphanumeric characters after trimming", () => {
    expect(isValidArticle(normalizeArticle("  1234567 "))).toBe(true);
    expect(isValidArticle("abc12")).toBe(true);
    expect(isValidArticle("1234")).toBe(false);
    expect(isValidArticle("123456789012345678901")).toBe(false);
    expect(isValidArticle("12345-678")).toBe(false);
    expect(isValidArticle("")).toBe(false);
  });
});

describe("parsePriceText", () => {
  it("parses storefront price strings", () => {
    expect(parsePriceText("1 999 ₽")).toBe(1999);
    expect(parsePriceText("1999,50")).toBe(1999.5);
    expect(parsePriceText("1,999.00")).toBe(1999);
    expect(parsePriceText("12 345,90 ₽")).toBe(12345.9);
  });

  it("rejects empty and non-positive prices", () => {
    expect(parsePriceText("")).toBeNull();
    expect(parsePriceText("free")).toBeNull();
    expect(parsePriceText("0 ₽")).toBeNull();
    expect(parsePriceText(null)).toBeNull();
  });

  it("accepts numeric values directly", () => {
    expect(parsePriceValue(1800)).toBe(1800);
    expect(parsePriceValue(-5)).toBeNull();
    expect(parsePriceValue("2 000 ₽")).toBe(2000);
    expect(parsePriceValue({ amount: 5 })).toBeNull();
  });
});

describe("parseRating", () => {
  it("reads decimal commas and clamps to the 0..5 scale", () => {
    expect(parseRating("4,7")).toBe(4.7);
    expect(parseRating("Рейтинг 4.5 из 5")).toBe(4.5);
    expect(parseRating(7)).toBe(5);
    expect(parseRating(-1)).toBe(0);
    expect(parseRating("нет оценок")).toBeNull();
    expect(parseRating(undefined)).toBeNull();
  });
});

describe("parseReviewCount", () => {
  it("reads counts with thousands separators", () => {
    expect(parseReviewCount("1 234 отзыва")).toBe(1234);
    expect(parseReviewCount("12 345 reviews")).toBe(12345);
    expect(parseReviewCount(42.9)).toBe(42);
    expect(parseReviewCount(-3)).toBeNull();
    expect(parseReviewCount("no reviews")).toBeNull();
  });
});

describe("page text helpers", () => {
  it("detects out-of-stock wording", () => {
    expect(isInStock("Товар закончился")).toBe(false);
    expect(isInStock("Out of Stock")).toBe(false);
    expect(isInStock("В корзину")).toBe(true);
  });

  it("collapses whitespace and resolves relative links", () => {
    expect(cleanupText("  Беспроводные \n  наушники ")).toBe("Беспроводные наушники");
    expect(toAbsoluteUrl("https://market.test/product/123456/", "/product/123456/")).toBe(
      "https://market.test/product/123456/"
    );
    expect(toAbsoluteUrl("https://market.test/", null)).toBeNull();
  });
});
