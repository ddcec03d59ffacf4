import { normalizeCatalogBrands } from "./brands";
import { loadStoreACatalog, loadStoreBCatalog } from "./catalogs/io";
import { config } from "./config";
import type { DispatchSettings } from "./config";
import type { TextCompletion } from "./llm/client";
import { dispatchAll } from "./llm/dispatch";
import { isTransientLlmError } from "./llm/errors";
import { TokenBucketLimiter } from "./llm/rate-limiter";
import type { RateLimiter } from "./llm/rate-limiter";
import { emptyOutcome, matchBrandPartition } from "./matching/match-brand";
import type { BrandMatchOutcome } from "./matching/match-brand";
import { partitionByBrand } from "./matching/partition";
import { rankMatches } from "./matching/rank";
import { filterMatches } from "./matching/validate";
import { deriveOutputPaths, saveResults } from "./output";
import type { MatchingStats, MatchRecord, OutputPaths, RunResult, RunStats } from "./types";
import { elapsedSeconds, errorMessage } from "./utils";

export interface MatchPipelineOptions {
  storeAPath: string;
  storeBPath: string;
  outputPath: string;
  complete: TextCompletion;
  limiter?: RateLimiter;
  settings?: Partial<DispatchSettings>;
  /** Only dispatch the first N brand partitions (trial runs) */
  brandLimit?: number;
  brandAliases?: Record<string, string>;
  isTransient?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/** Matches gathered so far, readable while the run is still in flight */
export interface RunState {
  matches: MatchRecord[];
}

export function createRunState(): RunState {
  return { matches: [] };
}

/**
 * Flush whatever has been matched so far to the recovery artifact.
 * Returns false when there was nothing to write or the write failed.
 */
export async function writeRecoveryArtifact(state: RunState, paths: OutputPaths): Promise<boolean> {
  if (state.matches.length === 0) return false;
  return saveResults(state.matches, paths.error, "Saved results before error");
}

function summarizeOutcomes(outcomes: BrandMatchOutcome[]): MatchingStats {
  return outcomes.reduce<MatchingStats>(
    (acc, o) => ({
      emptyResponses: acc.emptyResponses + (o.emptyResponse ? 1 : 0),
      pairsReturned: acc.pairsReturned + o.pairsReturned,
      unresolvedPairs: acc.unresolvedPairs + o.unresolvedPairs,
      matchesAssembled: acc.matchesAssembled + o.matches.length,
    }),
    { emptyResponses: 0, pairsReturned: 0, unresolvedPairs: 0, matchesAssembled: 0 }
  );
}

/**
 * Load both normalized catalogs, match products brand by brand through the
 * LLM, drop size/quantity conflicts, rank by price gap and write the
 * artifacts. On any failure the matches collected so far go to the
 * "_error" file before the error is rethrown.
 */
export async function runMatchPipeline(
  options: MatchPipelineOptions,
  state: RunState = createRunState()
): Promise<RunResult> {
  const startTime = Date.now();
  const settings: DispatchSettings = { ...config.matching, ...options.settings };
  const outputPaths = deriveOutputPaths(options.outputPath);

  try {
    const storeA = normalizeCatalogBrands(
      (await loadStoreACatalog(options.storeAPath)).products,
      options.brandAliases
    );
    const storeB = normalizeCatalogBrands(
      (await loadStoreBCatalog(options.storeBPath)).products,
      options.brandAliases
    );

    const { partitions: allPartitions, stats: partitionStats } = partitionByBrand(storeA, storeB);
    const partitionMs = Date.now() - startTime;
    console.log(`[pipeline] Grouping products took ${Math.round(partitionMs / 1000)} seconds`);

    const partitions =
      options.brandLimit !== undefined ? allPartitions.slice(0, options.brandLimit) : allPartitions;
    for (const p of partitions) {
      console.log(
        `[pipeline] Processing ${p.brand}: ${p.storeAProducts.length} products in store A, ${p.storeBProducts.length} in store B`
      );
    }

    const limiter =
      options.limiter ??
      new TokenBucketLimiter({
        rate: settings.rate,
        intervalMs: settings.intervalMs,
        capacity: settings.capacity,
      });

    const matchingStart = Date.now();
    const { results, stats: dispatchStats } = await dispatchAll<BrandMatchOutcome>(
      partitions.map((partition) => ({
        key: partition.brand,
        run: () => matchBrandPartition(partition, options.complete),
      })),
      {
        limiter,
        maxAttempts: settings.maxAttempts,
        baseDelayMs: settings.retryBaseDelayMs,
        isTransient: options.isTransient ?? isTransientLlmError,
        label: "match",
        fallback: emptyOutcome,
        onSettled: (_brand, outcome) => {
          state.matches.push(...outcome.matches);
        },
        sleep: options.sleep,
      }
    );
    const matchingMs = Date.now() - matchingStart;
    console.log(`[pipeline] API calls took ${Math.round(matchingMs / 1000)} seconds`);

    // Partition order, not completion order
    const outcomes = partitions.map((p) => results.get(p.brand) ?? emptyOutcome(p.brand));
    const allMatches = outcomes.flatMap((o) => o.matches);
    state.matches = allMatches;

    await saveResults(allMatches, outputPaths.noCleanup, "Saved raw matches");

    const { kept, stats: validationStats } = filterMatches(allMatches);
    const ranked = rankMatches(kept);

    await saveResults(ranked, outputPaths.final);

    const stats: RunStats = {
      partition: partitionStats,
      dispatch: dispatchStats,
      matching: summarizeOutcomes(outcomes),
      validation: validationStats,
      finalMatches: ranked.length,
      durationsMs: {
        partition: partitionMs,
        matching: matchingMs,
        total: Date.now() - startTime,
      },
    };

    console.log(
      `[pipeline] Completed in ${elapsedSeconds(startTime)} seconds. Found ${ranked.length} matches across ${partitions.length} brands.`
    );

    return { matches: ranked, stats, outputPaths };
  } catch (error) {
    console.error(`[pipeline] Error during processing: ${errorMessage(error)}`);
    await writeRecoveryArtifact(state, outputPaths);
    throw error;
  }
}
