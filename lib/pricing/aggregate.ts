import type { WindowAggregate } from "@/lib/types";

export interface PriceSample {
  price: number | null;
  capturedAt: string;
  success: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function emptyWindow(article: string, days: number): WindowAggregate {
  return {
    article,
    days,
    avg: null,
    min: null,
    max: null,
    sampleCount: 0,
    firstDate: null,
    lastDate: null
  };
}

export function windowStart(asOf: Date, days: number): Date {
  return new Date(asOf.getTime() - days * DAY_MS);
}

export function toWindowAggregate(input: {
  article: string;
  days: number;
  row: {
    avg: number | null;
    min: number | null;
    max: number | null;
    sampleCount: number;
    firstDate: string | null;
    lastDate: string | null;
  } | null;
}): WindowAggregate {
  const row = input.row;
  if (!row || row.sampleCount === 0 || row.avg === null) {
    return emptyWindow(input.article, input.days);
  }

  return {
    article: input.article,
    days: input.days,
    avg: roundTo(row.avg, 2),
    min: row.min,
    max: row.max,
    sampleCount: row.sampleCount,
    firstDate: row.firstDate,
    lastDate: row.lastDate
  };
}

/**
 * Aggregates successful samples whose timestamp falls in (asOf - days, asOf].
 * Failed rows and rows without a price never count towards the window.
 */
export function summarizePriceWindow(input: {
  article: string;
  days: number;
  asOf: Date;
  samples: PriceSample[];
}): WindowAggregate {
  const from = windowStart(input.asOf, input.days).getTime();
  const to = input.asOf.getTime();

  const included = input.samples.filter((sample): sample is PriceSample & { price: number } => {
    if (!sample.success || sample.price === null || !Number.isFinite(sample.price)) {
      return false;
    }

    const at = new Date(sample.capturedAt).getTime();
    return at > from && at <= to;
  });

  if (included.length === 0) {
    return emptyWindow(input.article, input.days);
  }

  const prices = included.map((sample) => sample.price);
  const timestamps = included.map((sample) => new Date(sample.capturedAt).getTime());
  const sum = prices.reduce((total, price) => total + price, 0);

  return toWindowAggregate({
    article: input.article,
    days: input.days,
    row: {
      avg: sum / prices.length,
      min: Math.min(...prices),
      max: Math.max(...prices),
      sampleCount: prices.length,
      firstDate: new Date(Math.min(...timestamps)).toISOString(),
      lastDate: new Date(Math.max(...timestamps)).toISOString()
    }
  });
}

/**
 * Discount index: how far the promotional (card) price, or the base price when
 * there is no card price, sits below the rolling average, in percent.
 */
export function computeDiscountIndex(input: {
  rollingAvgPrice: number | null;
  price: number | null;
  cardPrice: number | null;
}): number | null {
  const avg = input.rollingAvgPrice;
  const effective = input.cardPrice ?? input.price;
  if (avg === null || avg <= 0 || effective === null) {
    return null;
  }

  return roundTo(((avg - effective) / avg) * 100, 1);
}

export interface DiscountBreakdown {
  vsAverage: number | null;
  cardVsNormal: number | null;
  total: number | null;
}

export function computeDiscountBreakdown(input: {
  rollingAvgPrice: number | null;
  normalPrice: number | null;
  cardPrice: number | null;
}): DiscountBreakdown {
  const avg = input.rollingAvgPrice !== null && input.rollingAvgPrice > 0 ? input.rollingAvgPrice : null;
  const normal = input.normalPrice !== null && input.normalPrice > 0 ? input.normalPrice : null;

  return {
    vsAverage: avg !== null && input.normalPrice !== null ? roundTo(((avg - input.normalPrice) / avg) * 100, 1) : null,
    cardVsNormal: normal !== null && input.cardPrice !== null ? roundTo(((normal - input.cardPrice) / normal) * 100, 1) : null,
    total: avg !== null && input.cardPrice !== null ? roundTo(((avg - input.cardPrice) / avg) * 100, 1) : null
  };
}
