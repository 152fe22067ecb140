export type ProductStatus = "active" | "inactive";

export type GroupType = "comparison" | "variants" | "similar";

export type MemberRole = "own" | "competitor" | "item";

export type Grade = "A" | "B" | "C" | "D" | "F";

export type Side = "own" | "competitor" | "equal";

export type FetchErrorKind = "not_found" | "timeout" | "rate_limited_by_remote" | "parse_failure" | "transport";

export type SnapshotSource = "http" | "render" | "cache";

export type JobName = "collector" | "comparisons" | "retention";

export type JobStatus = "running" | "success" | "partial" | "degraded" | "failed";

export interface ProductAttributes {
  name: string | null;
  price: number | null;
  normalPrice: number | null;
  cardPrice: number | null;
  oldPrice: number | null;
  rating: number | null;
  reviewCount: number | null;
  available: boolean;
  imageUrl: string | null;
  productUrl: string | null;
}

export interface ProductSnapshot extends ProductAttributes {
  article: string;
  price: number;
  source: SnapshotSource;
  fetchedAt: string;
  durationMs: number;
}

export interface TrackedProduct extends ProductAttributes {
  id: string;
  ownerId: string;
  article: string;
  status: ProductStatus;
  isProblematic: boolean;
  lastCheckedAt: string | null;
  rollingAvgPrice: number | null;
  rollingAvgComputedAt: string | null;
  createdAt: string;
}

export interface PriceSnapshotInput {
  article: string;
  capturedAt: string;
  price: number | null;
  normalPrice: number | null;
  cardPrice: number | null;
  oldPrice: number | null;
  available: boolean | null;
  rating: number | null;
  reviewCount: number | null;
  success: boolean;
  errorKind: FetchErrorKind | null;
  errorMessage: string | null;
  durationMs: number;
  source: SnapshotSource | null;
}

export interface PriceSnapshot extends PriceSnapshotInput {
  id: string;
}

export interface WindowAggregate {
  article: string;
  days: number;
  avg: number | null;
  min: number | null;
  max: number | null;
  sampleCount: number;
  firstDate: string | null;
  lastDate: string | null;
}

export interface ComparisonGroup {
  id: string;
  ownerId: string;
  name: string | null;
  groupType: GroupType;
  createdAt: string;
  updatedAt: string;
}

export interface GroupMembership {
  id: string;
  groupId: string;
  productId: string;
  role: MemberRole;
  position: number;
  addedAt: string;
}

export interface GroupMember {
  membership: GroupMembership;
  product: TrackedProduct;
}

export interface PriceDifference {
  own: number;
  competitor: number;
  absolute: number;
  percentage: number;
  whoCheaper: Side;
  recommendation: string;
}

export interface RatingDifference {
  own: number;
  competitor: number;
  absolute: number;
  percentage: number;
  whoBetter: Side;
  recommendation: string;
}

export interface DiscountDifference {
  own: number;
  competitor: number;
  absolute: number;
  percentage: number | null;
  whoBetter: Side;
  recommendation: string;
}

export interface ReviewsDifference {
  own: number;
  competitor: number;
  absolute: number;
  percentage: number | null;
  whoMore: Side;
  recommendation: string;
}

export type MetricKey = "price" | "rating" | "discount" | "reviews" | "availability";

export interface MetricScore {
  value: number;
  known: boolean;
}

export type MetricScores = Record<MetricKey, MetricScore>;

export interface ComparisonMetrics {
  price: PriceDifference;
  rating: RatingDifference | null;
  discount: DiscountDifference | null;
  reviews: ReviewsDifference | null;
  scores: MetricScores;
  competitivenessIndex: number;
  grade: Grade;
  weakestMetric: MetricKey | null;
  overallRecommendation: string;
}

export interface ComparisonMember extends ProductAttributes {
  productId: string;
  article: string;
  role: MemberRole;
  position: number;
  rollingAvgPrice: number | null;
  discountIndex: number | null;
  lastCheckedAt: string | null;
}

export interface ComparisonResult {
  groupId: string;
  groupName: string | null;
  groupType: GroupType;
  own: ComparisonMember | null;
  competitors: ComparisonMember[];
  items: ComparisonMember[];
  metrics: ComparisonMetrics | null;
  comparedAt: string;
  isFresh: boolean;
  staleMembers: string[];
  snapshotId: string | null;
  snapshotError: { code: string; message: string } | null;
  /** Members whose live fetch succeeded but whose price snapshot was not stored. */
  historyErrors: Array<{ article: string; code: string; message: string }>;
}

export interface ComparisonPayload {
  members: ComparisonMember[];
}

export interface ComparisonSnapshot {
  id: string;
  groupId: string;
  createdAt: string;
  payload: ComparisonPayload;
  metrics: ComparisonMetrics;
  competitivenessIndex: number;
  grade: Grade;
}

export interface UserComparisonStats {
  totalGroups: number;
  comparisonGroups: number;
  trackedProducts: number;
  avgCompetitivenessIndex: number | null;
  lastComparisonAt: string | null;
}

