import { describe, it, expect } from "vitest";
import { buildMatchRecord } from "../lib/matching/assemble";
import { priceDiffMagnitude, rankMatches } from "../lib/matching/rank";
import type { MatchRecord } from "../lib/types";

function makeMatch(id: string, priceA: number, priceB: number): MatchRecord {
  return buildMatchRecord(
    { product_id: id, product_name: "Item", brand: "ACME", price: priceA, size: null, quantity: null },
    {
      sku: `b-${id}`,
      product_name: "Item",
      brand: "ACME",
      price: priceB,
      size: null,
      quantity: null,
      multi_buy_deal: null,
    }
  );
}

describe("rankMatches", () => {
  it("orders by absolute price gap, largest first", () => {
    const ranked = rankMatches([
      makeMatch("small", 10, 11),
      makeMatch("up", 10, 15),
      makeMatch("down", 15, 10),
      makeMatch("mid", 10, 12),
    ]);

    expect(ranked.map((m) => m.product_a.product_id)).toEqual(["up", "down", "mid", "small"]);
  });

  it("keeps input order for equal gaps", () => {
    const ranked = rankMatches([makeMatch("first", 3, 1), makeMatch("second", 1, 3), makeMatch("third", 2, 4)]);

    expect(ranked.map((m) => m.product_a.product_id)).toEqual(["first", "second", "third"]);
  });

  it("compares gaps at cent precision", () => {
    expect(priceDiffMagnitude(makeMatch("x", 0.1, 0.3))).toBe(0.2);
    expect(rankMatches([])).toEqual([]);
  });

  it("does not reorder its input", () => {
    const input = [makeMatch("small", 1, 2), makeMatch("big", 1, 9)];
    rankMatches(input);

    expect(input.map((m) => m.product_a.product_id)).toEqual(["small", "big"]);
  });
});
