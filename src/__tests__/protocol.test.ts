import { describe, it, expect } from "vitest";
import { buildMatchPrompt, parseMatchResponse } from "../lib/matching/protocol";
import { extractJsonArray, extractJsonObject } from "../lib/llm/json-extract";
import type { BrandPartition } from "../lib/types";

const partition: BrandPartition = {
  brand: "ACME",
  storeAProducts: [
    { product_id: "a1", product_name: "Acme Pineapple Coffee Cake", brand: "ACME", price: 5, size: "20 oz", quantity: null },
  ],
  storeBProducts: [
    {
      sku: "b1",
      product_name: "Acme Pineapple Coffee Cake",
      brand: "ACME",
      price: 6,
      size: "20 oz",
      quantity: null,
      multi_buy_deal: null,
    },
  ],
};

describe("buildMatchPrompt", () => {
  it("lists both stores' candidates by id and states the output format", () => {
    const prompt = buildMatchPrompt(partition);

    expect(prompt).toContain("Brand: ACME");
    expect(prompt).toContain(
      'store_a_products = [{"id":"a1","name":"Acme Pineapple Coffee Cake","size":"20 oz","quantity":null,"price":5}]'
    );
    expect(prompt).toContain(
      'store_b_products = [{"id":"b1","name":"Acme Pineapple Coffee Cake","size":"20 oz","quantity":null,"price":6}]'
    );
    expect(prompt).toContain('{"product_a_id": "ID_FROM_STORE_A", "product_b_id": "ID_FROM_STORE_B"}');
    expect(prompt).toContain("Return an empty array [] if there are no matches.");
  });
});

describe("parseMatchResponse", () => {
  it("reads the array out of prose and markdown fences", () => {
    const text = 'Here are the matches:\n```json\n[{"product_a_id": "a1", "product_b_id": "b1"}]\n```\nLet me know!';

    expect(parseMatchResponse(text)).toEqual({
      kind: "ok",
      pairs: [{ product_a_id: "a1", product_b_id: "b1" }],
    });
  });

  it("stringifies numeric ids", () => {
    expect(parseMatchResponse('[{"product_a_id": 101, "product_b_id": 7501000111206}]')).toEqual({
      kind: "ok",
      pairs: [{ product_a_id: "101", product_b_id: "7501000111206" }],
    });
  });

  it("skips entries missing an id", () => {
    const text = '[{"product_a_id": "a1"}, "a1,b1", {"product_a_id": "a2", "product_b_id": "b2"}]';

    expect(parseMatchResponse(text)).toEqual({
      kind: "ok",
      pairs: [{ product_a_id: "a2", product_b_id: "b2" }],
    });
  });

  it.each([
    ["no array at all", "No matching products were found."],
    ["an empty array", "[]"],
    ["brackets in the wrong order", "] nothing here ["],
    ["broken JSON", "[{product_a_id: a1, product_b_id: b1}]"],
    ["an array with no usable pairs", '[{"a": 1}]'],
  ])("treats %s as an empty response", (_label, text) => {
    expect(parseMatchResponse(text)).toEqual({ kind: "empty" });
  });
});

describe("extractJsonObject", () => {
  it("reads an object between the outermost braces", () => {
    expect(extractJsonObject('Result:\n{"b1": "BIMBO"}\nDone')).toEqual({ b1: "BIMBO" });
  });

  it("rejects arrays and unparseable spans", () => {
    expect(extractJsonObject("{not json}")).toBeUndefined();
    expect(extractJsonObject("no braces")).toBeUndefined();
    expect(extractJsonArray('{"a": 1}')).toBeUndefined();
  });
});
