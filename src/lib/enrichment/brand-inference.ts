import type { TextCompletion } from "../llm/client";
import { dispatchAll } from "../llm/dispatch";
import type { DispatchTask } from "../llm/dispatch";
import { isTransientLlmError } from "../llm/errors";
import { extractJsonObject } from "../llm/json-extract";
import type { RateLimiter } from "../llm/rate-limiter";
import type { DispatchStats, StoreBProduct } from "../types";

export interface BrandInferenceOptions {
  complete: TextCompletion;
  limiter: RateLimiter;
  chunkSize: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  isTransient?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface BrandInferenceStats {
  sent: number;
  inferred: number;
  chunks: number;
  dispatch: DispatchStats;
}

export function buildBrandPrompt(
  chunk: Pick<StoreBProduct, "sku" | "product_name">[],
  referenceBrands: string[]
): string {
  const products = chunk.map((p) => ({ [p.sku]: p.product_name }));

  return `You are a merchandiser at a large grocery store chain with expertise on the brands your store carries.
I have a list of brands carried at a competing grocery store:
${JSON.stringify(referenceBrands)}

You have the following dictionaries of grocery product data for your store, which include product names but not product brands:
${JSON.stringify(products)}

Identify the brand name of each product based on its product name, your knowledge of existing grocery product brands, and the list of brands carried at the competing store.
If the same brand is carried at the competing grocery store, MAKE SURE to match the EXACT SPELLING of the brand name that the competing store uses, including spaces and special characters.

Some product names are in Spanish - please adjust your thinking accordingly.

If the product appears to have no brand, return NO BRAND instead of UNKNOWN.
Output the results as JSON containing a single object where the keys are the SKUs and the values are the corresponding brands.`;
}

/** SKU → brand pairs from the model's reply; non-string or blank brands are ignored */
export function parseBrandResponse(text: string): Record<string, string> {
  const parsed = extractJsonObject(text);
  if (!parsed) {
    const head = text.slice(0, 10);
    const tail = text.slice(-10);
    console.warn(`[brands] Could not find JSON in response. Start: ${head} End: ${tail}`);
    return {};
  }

  const brands: Record<string, string> = {};
  for (const [sku, brand] of Object.entries(parsed)) {
    if (typeof brand === "string" && brand.trim()) brands[sku] = brand.trim();
  }
  return brands;
}

/**
 * Replace store B's provisional brands with model-inferred ones, spelled the
 * way store A spells them where the brand is shared. Products go out in
 * chunks; a chunk that fails for good leaves its products unchanged.
 */
export async function inferBrands(
  products: StoreBProduct[],
  referenceBrands: string[],
  options: BrandInferenceOptions
): Promise<{ products: StoreBProduct[]; stats: BrandInferenceStats }> {
  const chunkSize = Math.max(1, options.chunkSize);
  const tasks: DispatchTask<Record<string, string>>[] = [];
  for (let i = 0; i < products.length; i += chunkSize) {
    const chunk = products.slice(i, i + chunkSize);
    tasks.push({
      key: `chunk-${i / chunkSize + 1}`,
      run: async () => {
        console.log(`[brands] ${new Date().toISOString()} - Submitting brand request for ${chunk.length} products`);
        const text = await options.complete(buildBrandPrompt(chunk, referenceBrands));
        return parseBrandResponse(text);
      },
    });
  }

  const { results, stats: dispatch } = await dispatchAll<Record<string, string>>(tasks, {
    limiter: options.limiter,
    maxAttempts: options.maxAttempts,
    baseDelayMs: options.retryBaseDelayMs,
    isTransient: options.isTransient ?? isTransientLlmError,
    label: "brands",
    fallback: () => ({}),
    sleep: options.sleep,
  });

  const inferredBySku = new Map<string, string>();
  for (const response of results.values()) {
    for (const [sku, brand] of Object.entries(response)) inferredBySku.set(sku, brand);
  }

  let inferred = 0;
  const updated = products.map((product) => {
    const brand = inferredBySku.get(product.sku);
    if (!brand) return product;
    inferred++;
    return { ...product, brand };
  });

  return {
    products: updated,
    stats: { sent: products.length, inferred, chunks: tasks.length, dispatch },
  };
}

/** Distinct brands of a reference catalog, in first-seen order */
export function collectBrands(products: { brand: string }[]): string[] {
  return Array.from(new Set(products.map((p) => p.brand)));
}
