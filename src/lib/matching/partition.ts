import { UNKNOWN_BRAND } from "../types";
import type { BrandPartition, PartitionStats, StoreAProduct, StoreBProduct } from "../types";

/**
 * Group both catalogs by brand, keeping only brands carried by both stores.
 * Brands compare by exact string equality; run normalizeCatalogBrands first.
 * Products under UNKNOWN_BRAND are never partitioned: "no brand" on both
 * sides is not a shared brand.
 * Partitions come out in order of first appearance in store A, and products
 * keep their input order within each side.
 */
export function partitionByBrand(
  storeA: StoreAProduct[],
  storeB: StoreBProduct[]
): { partitions: BrandPartition[]; stats: PartitionStats } {
  const byBrand = new Map<string, BrandPartition>();

  for (const product of storeA) {
    if (product.brand === UNKNOWN_BRAND) continue;
    let partition = byBrand.get(product.brand);
    if (!partition) {
      partition = { brand: product.brand, storeAProducts: [], storeBProducts: [] };
      byBrand.set(product.brand, partition);
    }
    partition.storeAProducts.push(product);
  }

  let matchedBrandProducts = 0;
  for (const product of storeB) {
    const partition = byBrand.get(product.brand);
    if (!partition) continue;
    partition.storeBProducts.push(product);
    matchedBrandProducts++;
  }

  const partitions = Array.from(byBrand.values()).filter(
    (p) => p.storeBProducts.length > 0
  );

  console.log(
    `[partition] Found ${partitions.length} matching brands with ${matchedBrandProducts} store B products`
  );

  return {
    partitions,
    stats: { matchingBrands: partitions.length, matchedBrandProducts },
  };
}
