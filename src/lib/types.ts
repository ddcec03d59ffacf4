/** Brand used when no brand could be read or inferred */
export const UNKNOWN_BRAND = "N/A";

// ===== Normalized products (output of catalog extraction) =====

interface NormalizedProductBase {
  product_name: string;
  brand: string; // normalized, or UNKNOWN_BRAND
  price: number;
  size: string | null; // free-form e.g. "20 oz", "large"
  quantity: string | null; // integer count as text e.g. "4"
}

export interface StoreAProduct extends NormalizedProductBase {
  product_id: string;
}

export interface StoreBProduct extends NormalizedProductBase {
  sku: string;
  multi_buy_deal: string | null; // raw offer text e.g. "2/$6.00"
}

export type NormalizedProduct = StoreAProduct | StoreBProduct;

export function productIdentifier(product: NormalizedProduct): string {
  return "product_id" in product ? product.product_id : product.sku;
}

// ===== Matching =====

export interface BrandPartition {
  brand: string;
  storeAProducts: StoreAProduct[];
  storeBProducts: StoreBProduct[];
}

/** Identifier pair as returned by the matcher, not yet checked against the catalogs */
export interface MatchCandidatePair {
  product_a_id: string;
  product_b_id: string;
}

export type MatchResponse =
  | { kind: "ok"; pairs: MatchCandidatePair[] }
  | { kind: "empty" };

export interface MatchRecord {
  readonly product_a: StoreAProduct;
  readonly product_b: StoreBProduct;
  readonly price_a: number;
  readonly price_b: number;
  readonly price_diff: string; // "+$2.50"
  readonly price_diff_percent: string; // "+25.0%"
}

// ===== Run statistics =====

export interface PartitionStats {
  matchingBrands: number;
  matchedBrandProducts: number;
}

export interface DispatchStats {
  dispatched: number;
  succeeded: number;
  exhausted: number; // transient errors on every attempt
  failed: number; // unclassified error
  attempts: number;
}

export interface MatchingStats {
  emptyResponses: number;
  pairsReturned: number;
  unresolvedPairs: number;
  matchesAssembled: number;
}

export interface ValidationStats {
  removedForSize: number;
  removedForQuantity: number;
  kept: number;
}

export interface RunStats {
  partition: PartitionStats;
  dispatch: DispatchStats;
  matching: MatchingStats;
  validation: ValidationStats;
  finalMatches: number;
  durationsMs: {
    partition: number;
    matching: number;
    total: number;
  };
}

export interface RunResult {
  matches: MatchRecord[];
  stats: RunStats;
  outputPaths: OutputPaths;
}

export interface OutputPaths {
  final: string;
  noCleanup: string;
  error: string;
}

// ===== Extraction summaries =====

export interface FieldSummary {
  totalItems: number;
  kept: number;
  fieldCounts: Record<string, number>;
}
