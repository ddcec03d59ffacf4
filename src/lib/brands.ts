import { UNKNOWN_BRAND } from "./types";

// Values the upstream extractors and the brand-inference prompt use for "no brand"
const NO_BRAND_VALUES = new Set(["", "N/A", "NA", "NONE", "NO BRAND", "UNKNOWN"]);

/**
 * Canonical partition key for a brand: zero-width characters and wrapping
 * quotes removed, whitespace collapsed, uppercased. Aliases map a canonical
 * key onto another (e.g. "KRAFT HEINZ" → "KRAFT").
 */
export function normalizeBrand(
  raw: string | null | undefined,
  aliases: Record<string, string> = {}
): string {
  if (!raw) return UNKNOWN_BRAND;

  const key = raw
    .replace(/[\u200b\u200c\u200d\ufeff\u00ad]/g, "")
    .trim()
    .replace(/^['"]+|['"]+$/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();

  if (NO_BRAND_VALUES.has(key)) return UNKNOWN_BRAND;
  return aliases[key] ?? key;
}

export function normalizeCatalogBrands<T extends { brand: string }>(
  products: T[],
  aliases: Record<string, string> = {}
): T[] {
  return products.map((p) => {
    const brand = normalizeBrand(p.brand, aliases);
    return brand === p.brand ? p : { ...p, brand };
  });
}
