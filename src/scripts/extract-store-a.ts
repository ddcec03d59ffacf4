import { extractStoreACatalog } from "../lib/catalogs/store-a";
import { formatFieldSummary } from "../lib/catalogs/summary";
import { readJsonFile } from "../lib/catalogs/io";
import { writeJson } from "../lib/output";

async function main() {
  const [inputPath, outputPath] = process.argv.slice(2);
  if (!inputPath || !outputPath) {
    console.error("Usage: extract-store-a <grocery_store_a.json> <store_a_products.json>");
    process.exit(1);
  }

  const raw = await readJsonFile(inputPath);
  if (!Array.isArray(raw)) {
    console.error(`${inputPath}: expected a JSON array`);
    process.exit(1);
  }

  const { products, summary } = extractStoreACatalog(raw);
  console.log(formatFieldSummary("STORE A DATA EXTRACTION SUMMARY", summary));

  await writeJson(outputPath, products);
  console.log(`\nOutput saved to: ${outputPath}`);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
