import "dotenv/config";
import { extractStoreBCatalog } from "../lib/catalogs/store-b";
import { formatFieldSummary } from "../lib/catalogs/summary";
import { loadStoreACatalog, readJsonFile } from "../lib/catalogs/io";
import { config } from "../lib/config";
import { collectBrands, inferBrands } from "../lib/enrichment/brand-inference";
import { createAnthropicCompletion } from "../lib/llm/client";
import { TokenBucketLimiter } from "../lib/llm/rate-limiter";
import { writeJson } from "../lib/output";
import { elapsedSeconds } from "../lib/utils";

async function main() {
  const args = process.argv.slice(2);
  const positional: string[] = [];
  let referencePath: string | undefined;
  let skipInference = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--reference" && args[i + 1]) {
      referencePath = args[i + 1];
      i++;
    } else if (args[i] === "--skip-inference") {
      skipInference = true;
    } else {
      positional.push(args[i]);
    }
  }

  const [inputPath, outputPath] = positional;
  if (!inputPath || !outputPath || (!referencePath && !skipInference)) {
    console.error(
      "Usage: extract-store-b <grocery_store_b.json> <store_b_products.json> --reference <store_a_products.json> [--skip-inference]"
    );
    process.exit(1);
  }

  const raw = await readJsonFile(inputPath);
  if (!Array.isArray(raw)) {
    console.error(`${inputPath}: expected a JSON array`);
    process.exit(1);
  }
  console.log(`Successfully loaded JSON with ${raw.length} items`);

  const parseStart = Date.now();
  const extracted = extractStoreBCatalog(raw);
  console.log(`Extracted ${extracted.products.length} products. Parsing took ${elapsedSeconds(parseStart)} seconds`);

  let products = extracted.products;
  if (!skipInference && referencePath) {
    const reference = await loadStoreACatalog(referencePath);
    const inferenceStart = Date.now();

    const result = await inferBrands(products, collectBrands(reference.products), {
      complete: createAnthropicCompletion(),
      limiter: new TokenBucketLimiter({
        rate: config.brandInference.rate,
        intervalMs: config.brandInference.intervalMs,
        capacity: config.brandInference.capacity,
      }),
      chunkSize: config.brandInference.chunkSize,
      maxAttempts: config.brandInference.maxAttempts,
      retryBaseDelayMs: config.brandInference.retryBaseDelayMs,
    });
    products = result.products;

    const rate = result.stats.sent > 0 ? (result.stats.inferred / result.stats.sent) * 100 : 0;
    console.log(`\nLLM brand inference:`);
    console.log(`  - Total products sent for inference: ${result.stats.sent}`);
    console.log(`  - Products with successful brand inference: ${result.stats.inferred}`);
    console.log(`  - Success rate: ${rate.toFixed(1)}%`);
    console.log(`  - Inference time: ${elapsedSeconds(inferenceStart)} seconds`);
  }

  console.log(formatFieldSummary("STORE B DATA EXTRACTION SUMMARY", extracted.summary));

  await writeJson(outputPath, products);
  console.log(`\nOutput saved to: ${outputPath}`);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
