import type { ComparisonConfig, GradeThresholds } from "@/lib/comparison/config";
import { computeDiscountIndex, roundTo } from "@/lib/pricing/aggregate";
import type {
  ComparisonMetrics,
  DiscountDifference,
  Grade,
  MetricKey,
  MetricScore,
  MetricScores,
  PriceDifference,
  RatingDifference,
  ReviewsDifference,
  Side
} from "@/lib/types";

export interface MetricInput {
  price: number | null;
  normalPrice: number | null;
  cardPrice: number | null;
  rating: number | null;
  reviewCount: number | null;
  available: boolean;
  rollingAvgPrice: number | null;
}

const METRIC_KEYS: readonly MetricKey[] = ["price", "rating", "discount", "reviews", "availability"];

const UNKNOWN: MetricScore = { value: 0.5, known: false };

const PRICE_EQUAL_BAND_PCT = 1;
const PRICE_LOWER_ADVICE_PCT = 10;
const RATING_EQUAL_BAND = 0.1;
const REVIEWS_LAGGING_PCT = 50;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function known(value: number): MetricScore {
  return { value: clamp01(value), known: true };
}

/** Loyalty-card price when present, else the base price. */
export function effectivePrice(input: Pick<MetricInput, "price" | "normalPrice" | "cardPrice">): number | null {
  const value = input.cardPrice ?? input.normalPrice ?? input.price;
  return value !== null && value > 0 ? value : null;
}

export function computePriceDifference(own: number, competitor: number): PriceDifference {
  const absolute = roundTo(own - competitor, 2);
  const percentage = roundTo(((own - competitor) / competitor) * 100, 2);

  let whoCheaper: Side;
  let recommendation: string;
  if (Math.abs(percentage) < PRICE_EQUAL_BAND_PCT) {
    whoCheaper = "equal";
    recommendation = "Prices are roughly equal";
  } else if (absolute > 0) {
    whoCheaper = "competitor";
    recommendation =
      percentage > PRICE_LOWER_ADVICE_PCT
        ? `Lower your price by ${percentage.toFixed(1)}% to stay competitive`
        : "Your price is slightly higher, but the gap is small";
  } else {
    whoCheaper = "own";
    recommendation = `Your price is ${Math.abs(percentage).toFixed(1)}% lower than the competitor's`;
  }

  return { own, competitor, absolute, percentage, whoCheaper, recommendation };
}

export function computeRatingDifference(own: number | null, competitor: number | null): RatingDifference | null {
  if (own === null || competitor === null) {
    return null;
  }

  const absolute = roundTo(own - competitor, 2);
  const percentage = competitor > 0 ? roundTo(((own - competitor) / competitor) * 100, 2) : 0;

  if (Math.abs(absolute) < RATING_EQUAL_BAND) {
    return { own, competitor, absolute, percentage, whoBetter: "equal", recommendation: "Ratings are roughly equal" };
  }

  return absolute > 0
    ? {
        own,
        competitor,
        absolute,
        percentage,
        whoBetter: "own",
        recommendation: `Your rating is higher by ${absolute.toFixed(2)}`
      }
    : {
        own,
        competitor,
        absolute,
        percentage,
        whoBetter: "competitor",
        recommendation: `Work on product quality: your rating is lower by ${Math.abs(absolute).toFixed(2)}`
      };
}

export function computeDiscountDifference(own: number | null, competitor: number | null): DiscountDifference | null {
  if (own === null || competitor === null) {
    return null;
  }

  const absolute = roundTo(own - competitor, 1);
  const percentage = competitor !== 0 ? roundTo(((own - competitor) / Math.abs(competitor)) * 100, 2) : null;

  if (absolute === 0) {
    return { own, competitor, absolute, percentage, whoBetter: "equal", recommendation: "Discount depth is the same" };
  }

  return absolute > 0
    ? {
        own,
        competitor,
        absolute,
        percentage,
        whoBetter: "own",
        recommendation: `Your discount is ${absolute.toFixed(1)} points deeper`
      }
    : {
        own,
        competitor,
        absolute,
        percentage,
        whoBetter: "competitor",
        recommendation: `The competitor's discount is ${Math.abs(absolute).toFixed(1)} points deeper; consider a promotion`
      };
}

export function computeReviewsDifference(own: number | null, competitor: number | null): ReviewsDifference | null {
  if (own === null || competitor === null) {
    return null;
  }

  const absolute = own - competitor;
  const percentage = competitor > 0 ? roundTo((absolute / competitor) * 100, 2) : null;

  if (absolute === 0) {
    return { own, competitor, absolute, percentage, whoMore: "equal", recommendation: "Review counts are equal" };
  }

  if (absolute > 0) {
    return { own, competitor, absolute, percentage, whoMore: "own", recommendation: `You have ${absolute} more reviews` };
  }

  const recommendation =
    percentage !== null && Math.abs(percentage) > REVIEWS_LAGGING_PCT
      ? `Encourage reviews: you have ${Math.abs(percentage).toFixed(0)}% fewer`
      : `The competitor has ${Math.abs(absolute)} more reviews`;

  return { own, competitor, absolute, percentage, whoMore: "competitor", recommendation };
}

export function computeMetricScores(input: {
  ownPrice: number;
  competitorPrice: number;
  own: MetricInput;
  competitor: MetricInput;
  ownDiscountIndex: number | null;
  competitorDiscountIndex: number | null;
}): MetricScores {
  const { own, competitor } = input;

  const price =
    input.ownPrice <= input.competitorPrice
      ? known(1)
      : known(1 - (input.ownPrice - input.competitorPrice) / input.competitorPrice);

  const rating =
    own.rating !== null && competitor.rating !== null ? known(0.5 + (own.rating - competitor.rating) / 2) : UNKNOWN;

  const discount =
    input.ownDiscountIndex !== null && input.competitorDiscountIndex !== null
      ? known(0.5 + (input.ownDiscountIndex - input.competitorDiscountIndex) / 40)
      : UNKNOWN;

  const totalReviews = (own.reviewCount ?? 0) + (competitor.reviewCount ?? 0);
  const reviews =
    own.reviewCount !== null && competitor.reviewCount !== null && totalReviews > 0
      ? known(own.reviewCount / totalReviews)
      : UNKNOWN;

  const availability =
    own.available === competitor.available ? known(0.5) : own.available ? known(1) : known(0);

  return { price, rating, discount, reviews, availability };
}

/**
 * Weighted mean of the metric scores; unknown metrics contribute their neutral
 * 0.5. Weights are normalised so they need not sum to 1.
 */
export function computeCompetitivenessIndex(scores: MetricScores, weights: Record<MetricKey, number>): number {
  const totalWeight = METRIC_KEYS.reduce((sum, key) => sum + Math.max(0, weights[key]), 0);
  if (totalWeight <= 0) {
    return 0.5;
  }

  const weighted = METRIC_KEYS.reduce((sum, key) => sum + Math.max(0, weights[key]) * scores[key].value, 0);
  return roundTo(clamp01(weighted / totalWeight), 4);
}

export function gradeFor(index: number, thresholds: GradeThresholds): Grade {
  if (index >= thresholds.A) {
    return "A";
  }

  if (index >= thresholds.B) {
    return "B";
  }

  if (index >= thresholds.C) {
    return "C";
  }

  if (index >= thresholds.D) {
    return "D";
  }

  return "F";
}

/**
 * The known metric below neutral with the largest weighted shortfall.
 * Ties keep the first metric in price, rating, discount, reviews, availability order.
 */
export function findWeakestMetric(scores: MetricScores, weights: Record<MetricKey, number>): MetricKey | null {
  let weakest: MetricKey | null = null;
  let largestShortfall = 0;

  for (const key of METRIC_KEYS) {
    const score = scores[key];
    if (!score.known || score.value >= 0.5) {
      continue;
    }

    const shortfall = Math.max(0, weights[key]) * (1 - score.value);
    if (shortfall > largestShortfall) {
      largestShortfall = shortfall;
      weakest = key;
    }
  }

  return weakest;
}

const METRIC_ADVICE: Record<MetricKey, string> = {
  price: "your price is the primary disadvantage; consider a 5–10% reduction.",
  rating: "your rating is the primary disadvantage; work on product quality and answer negative reviews.",
  discount: "your discount depth is the primary disadvantage; consider a loyalty-card price or a promotion.",
  reviews: "review volume is the primary disadvantage; encourage buyers to leave reviews.",
  availability: "availability is the primary disadvantage; restock to stay visible in search."
};

const GRADE_ADVICE: Record<Grade, string> = {
  A: "you lead on the tracked metrics; keep monitoring.",
  B: "your position is solid with no single clear disadvantage.",
  C: "no single metric stands out; review price and listing quality together.",
  D: "you trail across several metrics; review price and listing quality together.",
  F: "you trail across several metrics; review price and listing quality together."
};

export function buildOverallRecommendation(grade: Grade, weakest: MetricKey | null): string {
  return `Grade ${grade} — ${weakest ? METRIC_ADVICE[weakest] : GRADE_ADVICE[grade]}`;
}

/**
 * Metrics for one own product against one competitor. Returns null when either
 * side has no usable price: no index or grade is produced without one.
 */
export function computeComparisonMetrics(
  own: MetricInput,
  competitor: MetricInput,
  config: ComparisonConfig
): ComparisonMetrics | null {
  const ownPrice = effectivePrice(own);
  const competitorPrice = effectivePrice(competitor);
  if (ownPrice === null || competitorPrice === null) {
    return null;
  }

  const ownDiscountIndex = computeDiscountIndex({
    rollingAvgPrice: own.rollingAvgPrice,
    price: own.normalPrice ?? own.price,
    cardPrice: own.cardPrice
  });
  const competitorDiscountIndex = computeDiscountIndex({
    rollingAvgPrice: competitor.rollingAvgPrice,
    price: competitor.normalPrice ?? competitor.price,
    cardPrice: competitor.cardPrice
  });

  const scores = computeMetricScores({
    ownPrice,
    competitorPrice,
    own,
    competitor,
    ownDiscountIndex,
    competitorDiscountIndex
  });
  const competitivenessIndex = computeCompetitivenessIndex(scores, config.weights);
  const grade = gradeFor(competitivenessIndex, config.gradeThresholds);
  const weakestMetric = findWeakestMetric(scores, config.weights);

  return {
    price: computePriceDifference(ownPrice, competitorPrice),
    rating: computeRatingDifference(own.rating, competitor.rating),
    discount: computeDiscountDifference(ownDiscountIndex, competitorDiscountIndex),
    reviews: computeReviewsDifference(own.reviewCount, competitor.reviewCount),
    scores,
    competitivenessIndex,
    grade,
    weakestMetric,
    overallRecommendation: buildOverallRecommendation(grade, weakestMetric)
  };
}
