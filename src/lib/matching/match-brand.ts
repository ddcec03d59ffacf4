import type { TextCompletion } from "../llm/client";
import type { BrandPartition, MatchRecord } from "../types";
import { assembleMatches } from "./assemble";
import { buildMatchPrompt, parseMatchResponse } from "./protocol";

export interface BrandMatchOutcome {
  brand: string;
  matches: MatchRecord[];
  emptyResponse: boolean;
  pairsReturned: number;
  unresolvedPairs: number;
}

export function emptyOutcome(brand: string): BrandMatchOutcome {
  return { brand, matches: [], emptyResponse: true, pairsReturned: 0, unresolvedPairs: 0 };
}

/**
 * One matcher request for one brand. Errors from the completion propagate so
 * the dispatcher can retry them.
 */
export async function matchBrandPartition(
  partition: BrandPartition,
  complete: TextCompletion
): Promise<BrandMatchOutcome> {
  const responseText = await complete(buildMatchPrompt(partition));
  console.log(
    `[match] API call for ${partition.brand} complete. Response length: ${responseText.length} chars`
  );

  const response = parseMatchResponse(responseText);
  if (response.kind === "empty") {
    console.log(`[match] No matches for ${partition.brand}`);
    return emptyOutcome(partition.brand);
  }

  const { matches, unresolved } = assembleMatches(partition, response.pairs);
  console.log(`[match] Found ${matches.length} matches for ${partition.brand}`);

  return {
    brand: partition.brand,
    matches,
    emptyResponse: false,
    pairsReturned: response.pairs.length,
    unresolvedPairs: unresolved,
  };
}
