import type { Env } from "@/lib/env";
import type { Grade, MetricKey } from "@/lib/types";

export type GradeThresholds = Record<Exclude<Grade, "F">, number>;

export interface ComparisonConfig {
  weights: Record<MetricKey, number>;
  gradeThresholds: GradeThresholds;
  /** Member attributes older than this are refetched before computing. */
  freshnessMs: number;
}

export const DEFAULT_COMPARISON_CONFIG: ComparisonConfig = {
  weights: {
    price: 0.35,
    rating: 0.25,
    discount: 0.2,
    reviews: 0.1,
    availability: 0.1
  },
  gradeThresholds: {
    A: 0.85,
    B: 0.7,
    C: 0.5,
    D: 0.3
  },
  freshnessMs: 60 * 60 * 1000
};

export function comparisonConfigFromEnv(
  source: Pick<
    Env,
    | "COMPETITIVENESS_WEIGHT_PRICE"
    | "COMPETITIVENESS_WEIGHT_RATING"
    | "COMPETITIVENESS_WEIGHT_DISCOUNT"
    | "COMPETITIVENESS_WEIGHT_REVIEWS"
    | "COMPETITIVENESS_WEIGHT_AVAILABILITY"
    | "GRADE_THRESHOLD_A"
    | "GRADE_THRESHOLD_B"
    | "GRADE_THRESHOLD_C"
    | "GRADE_THRESHOLD_D"
    | "COMPARISON_FRESHNESS_MINUTES"
  >
): ComparisonConfig {
  const thresholds: GradeThresholds = {
    A: source.GRADE_THRESHOLD_A,
    B: source.GRADE_THRESHOLD_B,
    C: source.GRADE_THRESHOLD_C,
    D: source.GRADE_THRESHOLD_D
  };

  if (!(thresholds.A >= thresholds.B && thresholds.B >= thresholds.C && thresholds.C >= thresholds.D)) {
    throw new Error("Grade thresholds must be non-increasing from A to D");
  }

  return {
    weights: {
      price: source.COMPETITIVENESS_WEIGHT_PRICE,
      rating: source.COMPETITIVENESS_WEIGHT_RATING,
      discount: source.COMPETITIVENESS_WEIGHT_DISCOUNT,
      reviews: source.COMPETITIVENESS_WEIGHT_REVIEWS,
      availability: source.COMPETITIVENESS_WEIGHT_AVAILABILITY
    },
    gradeThresholds: thresholds,
    freshnessMs: source.COMPARISON_FRESHNESS_MINUTES * 60 * 1000
  };
}
