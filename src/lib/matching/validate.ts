import type { MatchRecord, ValidationStats } from "../types";

/** First number in a size string: "20 oz" → 20, "1.5L" → 1.5, "large" → null */
export function extractNumericSize(size: string | null | undefined): number | null {
  if (!size) return null;
  const match = size.match(/(\d+(?:\.\d+)?|\.\d+)/);
  return match ? parseFloat(match[1]) : null;
}

/** Whole-number quantity, or null when the text is not one ("4" → 4, "4.5" → null) */
export function parseQuantity(quantity: string | null | undefined): number | null {
  if (!quantity) return null;
  if (!/^\s*[+-]?\d+\s*$/.test(quantity)) return null;
  return parseInt(quantity, 10);
}

// Units are not compared: "20 oz" and "20 lb" count as the same size.
function sizesConflict(match: MatchRecord): boolean {
  const sizeA = extractNumericSize(match.product_a.size);
  const sizeB = extractNumericSize(match.product_b.size);
  return Boolean(sizeA && sizeB && sizeA !== sizeB);
}

function quantitiesConflict(match: MatchRecord): boolean {
  const qtyA = parseQuantity(match.product_a.quantity);
  const qtyB = parseQuantity(match.product_b.quantity);
  return qtyA !== null && qtyB !== null && qtyA !== qtyB;
}

/**
 * Drop matches whose sizes or quantities disagree. A match is kept unless a
 * check can show a conflict; missing or unreadable values never disqualify.
 */
export function filterMatches(matches: MatchRecord[]): {
  kept: MatchRecord[];
  stats: ValidationStats;
} {
  const kept: MatchRecord[] = [];
  let removedForSize = 0;
  let removedForQuantity = 0;

  for (const match of matches) {
    if (sizesConflict(match)) {
      removedForSize++;
      continue;
    }
    if (quantitiesConflict(match)) {
      removedForQuantity++;
      continue;
    }
    kept.push(match);
  }

  console.log(
    `[validate] Filtered out ${removedForSize + removedForQuantity} matches (${removedForSize} size, ${removedForQuantity} quantity), keeping ${kept.length}`
  );

  return {
    kept,
    stats: { removedForSize, removedForQuantity, kept: kept.length },
  };
}
