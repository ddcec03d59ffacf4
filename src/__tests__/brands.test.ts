import { describe, it, expect } from "vitest";
import { normalizeBrand, normalizeCatalogBrands } from "../lib/brands";
import { UNKNOWN_BRAND } from "../lib/types";

describe("normalizeBrand", () => {
  it("uppercases and collapses whitespace", () => {
    expect(normalizeBrand("  Great   Value ")).toBe("GREAT VALUE");
  });

  it("strips wrapping quotes", () => {
    expect(normalizeBrand("'Goya'")).toBe("GOYA");
    expect(normalizeBrand('"Bimbo"')).toBe("BIMBO");
  });

  it("removes zero-width characters", () => {
    expect(normalizeBrand("Ac\u200bme")).toBe("ACME");
  });

  it("maps missing and no-brand values to the unknown sentinel", () => {
    expect(normalizeBrand(undefined)).toBe(UNKNOWN_BRAND);
    expect(normalizeBrand("")).toBe(UNKNOWN_BRAND);
    expect(normalizeBrand("NO BRAND")).toBe(UNKNOWN_BRAND);
    expect(normalizeBrand("unknown")).toBe(UNKNOWN_BRAND);
    expect(normalizeBrand("n/a")).toBe(UNKNOWN_BRAND);
  });

  it("resolves aliases after canonicalizing", () => {
    expect(normalizeBrand("Kraft Heinz", { "KRAFT HEINZ": "KRAFT" })).toBe("KRAFT");
  });
});

describe("normalizeCatalogBrands", () => {
  it("returns new records only where the brand changed", () => {
    const same = { brand: "ACME", id: 1 };
    const changed = { brand: "goya", id: 2 };

    const result = normalizeCatalogBrands([same, changed]);

    expect(result[0]).toBe(same);
    expect(result[1]).toEqual({ brand: "GOYA", id: 2 });
    expect(changed.brand).toBe("goya");
  });
});
