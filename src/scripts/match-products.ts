import "dotenv/config";
import { createAnthropicCompletion } from "../lib/llm/client";
import { deriveOutputPaths } from "../lib/output";
import { createRunState, runMatchPipeline, writeRecoveryArtifact } from "../lib/pipeline";

const USAGE =
  "Usage: match-products --store-a <store_a.json> --store-b <store_b.json> --output <match_results.json> [--limit <brands>]";

function parseArgs(args: string[]): {
  storeAPath: string;
  storeBPath: string;
  outputPath: string;
  brandLimit?: number;
} {
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--") && args[i + 1] !== undefined) {
      flags.set(args[i], args[i + 1]);
      i++;
    }
  }

  const storeAPath = flags.get("--store-a");
  const storeBPath = flags.get("--store-b");
  const outputPath = flags.get("--output") ?? "match_results.json";
  if (!storeAPath || !storeBPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const limit = flags.get("--limit");
  const brandLimit = limit !== undefined ? parseInt(limit, 10) : undefined;
  if (brandLimit !== undefined && (isNaN(brandLimit) || brandLimit < 0)) {
    console.error(`Invalid --limit: ${limit}`);
    process.exit(1);
  }

  return { storeAPath, storeBPath, outputPath, brandLimit };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const state = createRunState();
  const outputPaths = deriveOutputPaths(args.outputPath);

  process.once("SIGINT", () => {
    console.log("\nProgram terminated by user.");
    writeRecoveryArtifact(state, outputPaths)
      .catch((err) => console.error("Failed to save partial results:", err))
      .finally(() => process.exit(0));
  });

  const complete = createAnthropicCompletion();

  const { stats } = await runMatchPipeline({ ...args, complete }, state);

  console.log(`\n=== Summary ===`);
  console.log(`Matching brands: ${stats.partition.matchingBrands} (${stats.partition.matchedBrandProducts} store B products)`);
  console.log(
    `Requests: ${stats.dispatch.succeeded} succeeded, ${stats.dispatch.exhausted} exhausted retries, ${stats.dispatch.failed} failed (${stats.dispatch.attempts} attempts)`
  );
  console.log(
    `Pairs: ${stats.matching.pairsReturned} returned, ${stats.matching.unresolvedPairs} unresolved, ${stats.matching.emptyResponses} empty responses`
  );
  console.log(
    `Matches: ${stats.matching.matchesAssembled} assembled, ${stats.validation.removedForSize} removed for size, ${stats.validation.removedForQuantity} removed for quantity`
  );
  console.log(`Final: ${stats.finalMatches} matches`);

  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
