import type {
  BrandPartition,
  MatchCandidatePair,
  MatchRecord,
  StoreAProduct,
  StoreBProduct,
} from "../types";

const EXPANSION_DIGITS = 25;

/**
 * Magnitude to `digits` places, with exact ties going to the even digit
 * (0.125 → "0.12", 0.375 → "0.38"). toFixed alone sends them away from zero.
 */
function toFixedHalfEven(magnitude: number, digits: number): string {
  const rounded = magnitude.toFixed(digits);
  const expanded = magnitude.toFixed(digits + EXPANSION_DIGITS);
  if (!/^50*$/.test(expanded.slice(-EXPANSION_DIGITS))) return rounded;

  const truncated = expanded.slice(0, -EXPANSION_DIGITS);
  return Number(truncated[truncated.length - 1]) % 2 === 0 ? truncated : rounded;
}

export function formatPriceDiff(value: number): string {
  return `${value >= 0 ? "+" : "-"}$${toFixedHalfEven(Math.abs(value), 2)}`;
}

export function formatPercentDiff(value: number): string {
  return `${value >= 0 ? "+" : "-"}${toFixedHalfEven(Math.abs(value), 1)}%`;
}

/** Missing or non-numeric prices count as 0 */
export function coercePrice(price: unknown): number {
  const n = typeof price === "number" ? price : Number(price);
  return Number.isFinite(n) ? n : 0;
}

export function buildMatchRecord(productA: StoreAProduct, productB: StoreBProduct): MatchRecord {
  const priceA = coercePrice(productA.price);
  const priceB = coercePrice(productB.price);
  const diff = priceB - priceA;
  const diffPercent = priceA ? (diff / priceA) * 100 : 0;

  return {
    product_a: productA,
    product_b: productB,
    price_a: priceA,
    price_b: priceB,
    price_diff: formatPriceDiff(diff),
    price_diff_percent: formatPercentDiff(diffPercent),
  };
}

/**
 * Resolve candidate pairs against one partition's products. Pairs naming an
 * id that is not in the partition (typically hallucinated) are dropped and
 * only counted. Output follows pair order.
 */
export function assembleMatches(
  partition: BrandPartition,
  pairs: MatchCandidatePair[]
): { matches: MatchRecord[]; unresolved: number } {
  const storeAMap = new Map(partition.storeAProducts.map((p) => [p.product_id, p]));
  const storeBMap = new Map(partition.storeBProducts.map((p) => [p.sku, p]));

  const matches: MatchRecord[] = [];
  let unresolved = 0;

  for (const pair of pairs) {
    const productA = storeAMap.get(pair.product_a_id);
    const productB = storeBMap.get(pair.product_b_id);
    if (!productA || !productB) {
      unresolved++;
      continue;
    }
    matches.push(buildMatchRecord(productA, productB));
  }

  return { matches, unresolved };
}
