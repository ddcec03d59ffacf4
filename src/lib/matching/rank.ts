import type { MatchRecord } from "../types";

/** |price_b - price_a| rounded to cents, the value price_diff displays */
export function priceDiffMagnitude(match: MatchRecord): number {
  return Math.round(Math.abs(match.price_b - match.price_a) * 100) / 100;
}

/**
 * Largest price gap first. Equal gaps keep their input order.
 */
export function rankMatches(matches: MatchRecord[]): MatchRecord[] {
  return matches
    .map((match, index) => ({ match, index, magnitude: priceDiffMagnitude(match) }))
    .sort((a, b) => b.magnitude - a.magnitude || a.index - b.index)
    .map(({ match }) => match);
}
