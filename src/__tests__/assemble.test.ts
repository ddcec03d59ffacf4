import { describe, it, expect } from "vitest";
import {
  assembleMatches,
  buildMatchRecord,
  coercePrice,
  formatPercentDiff,
  formatPriceDiff,
} from "../lib/matching/assemble";
import type { BrandPartition, StoreAProduct, StoreBProduct } from "../lib/types";

function makeA(id: string, price: number): StoreAProduct {
  return { product_id: id, product_name: `Item ${id}`, brand: "ACME", price, size: null, quantity: null };
}

function makeB(sku: string, price: number): StoreBProduct {
  return {
    sku,
    product_name: `Item ${sku}`,
    brand: "ACME",
    price,
    size: null,
    quantity: null,
    multi_buy_deal: null,
  };
}

describe("buildMatchRecord", () => {
  it("formats a price increase relative to store A", () => {
    const record = buildMatchRecord(makeA("a1", 10), makeB("b1", 12.5));

    expect(record.price_a).toBe(10);
    expect(record.price_b).toBe(12.5);
    expect(record.price_diff).toBe("+$2.50");
    expect(record.price_diff_percent).toBe("+25.0%");
  });

  it("formats a price decrease with a leading minus", () => {
    const record = buildMatchRecord(makeA("a1", 12.5), makeB("b1", 10));

    expect(record.price_diff).toBe("-$2.50");
    expect(record.price_diff_percent).toBe("-20.0%");
  });

  it("reports a zero percentage when store A's price is zero", () => {
    const record = buildMatchRecord(makeA("a1", 0), makeB("b1", 3));

    expect(record.price_diff).toBe("+$3.00");
    expect(record.price_diff_percent).toBe("+0.0%");
  });

  it("embeds both full product records", () => {
    const a = makeA("a1", 5);
    const b = makeB("b1", 6);
    const record = buildMatchRecord(a, b);

    expect(record.product_a).toEqual(a);
    expect(record.product_b).toEqual(b);
  });
});

describe("formatting helpers", () => {
  it("prints equal prices as positive", () => {
    expect(formatPriceDiff(0)).toBe("+$0.00");
    expect(formatPercentDiff(0)).toBe("+0.0%");
  });

  it("rounds exact halves to the even digit", () => {
    expect(formatPriceDiff(0.125)).toBe("+$0.12");
    expect(formatPriceDiff(-0.125)).toBe("-$0.12");
    expect(formatPriceDiff(0.375)).toBe("+$0.38");
    expect(formatPercentDiff(0.25)).toBe("+0.2%");
    expect(formatPercentDiff(0.75)).toBe("+0.8%");
  });

  it("rounds values that only look like halves to the nearest digit", () => {
    expect(formatPriceDiff(2.675)).toBe("+$2.67");
    expect(formatPriceDiff(1.005)).toBe("+$1.00");
  });

  it("formats a multi-buy unit price tie the way it displays", () => {
    const record = buildMatchRecord(makeA("a1", 0.25), makeB("b1", 1.125 / 3));

    expect(record.price_diff).toBe("+$0.12");
    expect(record.price_diff_percent).toBe("+50.0%");
  });

  it("coerces missing prices to zero", () => {
    expect(coercePrice("3.5")).toBe(3.5);
    expect(coercePrice(undefined)).toBe(0);
    expect(coercePrice("abc")).toBe(0);
  });
});

describe("assembleMatches", () => {
  const partition: BrandPartition = {
    brand: "ACME",
    storeAProducts: [makeA("a1", 5), makeA("a2", 4)],
    storeBProducts: [makeB("b1", 6), makeB("b2", 3)],
  };

  it("resolves pairs in pair order", () => {
    const { matches, unresolved } = assembleMatches(partition, [
      { product_a_id: "a2", product_b_id: "b2" },
      { product_a_id: "a1", product_b_id: "b1" },
    ]);

    expect(matches.map((m) => [m.product_a.product_id, m.product_b.sku])).toEqual([
      ["a2", "b2"],
      ["a1", "b1"],
    ]);
    expect(unresolved).toBe(0);
  });

  it("drops pairs that name ids outside the partition", () => {
    const { matches, unresolved } = assembleMatches(partition, [
      { product_a_id: "a1", product_b_id: "b999" },
      { product_a_id: "b1", product_b_id: "a1" },
      { product_a_id: "a1", product_b_id: "b1" },
    ]);

    expect(matches).toHaveLength(1);
    expect(matches[0].product_a.product_id).toBe("a1");
    expect(matches[0].product_b.sku).toBe("b1");
    expect(unresolved).toBe(2);
  });
});
