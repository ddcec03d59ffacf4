import { z } from "zod";
import { extractJsonArray } from "../llm/json-extract";
import { productIdentifier } from "../types";
import type { BrandPartition, MatchCandidatePair, MatchResponse, NormalizedProduct } from "../types";

// Models sometimes emit numeric ids; catalog identifiers are strings
const idSchema = z.union([z.string(), z.number()]).transform(String);

const candidatePairSchema = z.object({
  product_a_id: idSchema,
  product_b_id: idSchema,
});

function describeCandidate(product: NormalizedProduct) {
  return {
    id: productIdentifier(product),
    name: product.product_name,
    size: product.size,
    quantity: product.quantity,
    price: product.price,
  };
}

/**
 * Instruction text for one brand: both stores' candidates plus the output
 * contract. Ids are all the model has to return; full records are looked up
 * locally afterwards.
 */
export function buildMatchPrompt(partition: BrandPartition): string {
  const storeA = JSON.stringify(partition.storeAProducts.map(describeCandidate));
  const storeB = JSON.stringify(partition.storeBProducts.map(describeCandidate));

  return `You are a diligent merchandiser working at a grocery store chain with strong attention to detail.

Brand: ${partition.brand}

store_a_products = ${storeA}
store_b_products = ${storeB}

Identify which items in these two lists are the same item.

To be the same item, the two products must satisfy the following:
(1) Be of the same brand
(2) Be of the same type and flavor (e.g. flavor = pineapple, type = coffee cake).

Return ONLY a JSON array of matching ID pairs:
[
  {"product_a_id": "ID_FROM_STORE_A", "product_b_id": "ID_FROM_STORE_B"}
]

Return an empty array [] if there are no matches.`;
}

/**
 * Read candidate pairs out of raw model output. Anything unusable (no array,
 * broken JSON, entries without both ids) is skipped; an unusable response
 * and "no matches" both come back as { kind: "empty" }.
 */
export function parseMatchResponse(text: string): MatchResponse {
  const items = extractJsonArray(text);
  if (!items) return { kind: "empty" };

  const pairs: MatchCandidatePair[] = [];
  for (const item of items) {
    const parsed = candidatePairSchema.safeParse(item);
    if (parsed.success) pairs.push(parsed.data);
  }

  return pairs.length > 0 ? { kind: "ok", pairs } : { kind: "empty" };
}
