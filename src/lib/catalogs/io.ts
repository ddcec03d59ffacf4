import fs from "fs/promises";
import { z } from "zod";
import { UNKNOWN_BRAND } from "../types";
import type { StoreAProduct, StoreBProduct } from "../types";
import { errorMessage } from "../utils";

export class CatalogLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${filePath}: ${message}`, options);
    this.name = "CatalogLoadError";
  }
}

const identifierSchema = z.union([z.string().min(1), z.number()]).transform(String);

const priceSchema = z
  .union([z.number(), z.string().min(1)])
  .transform(Number)
  .pipe(z.number().finite());

const optionalTextSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined || v === "" ? null : String(v)));

const productFields = {
  product_name: z.string().min(1),
  brand: z
    .string()
    .nullish()
    .transform((v) => v || UNKNOWN_BRAND),
  price: priceSchema,
  size: optionalTextSchema,
  quantity: optionalTextSchema,
};

export const storeAProductSchema = z.object({
  product_id: identifierSchema,
  ...productFields,
});

export const storeBProductSchema = z.object({
  sku: identifierSchema,
  multi_buy_deal: optionalTextSchema,
  ...productFields,
});

export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new CatalogLoadError(filePath, `cannot read file (${errorMessage(err)})`, { cause: err });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CatalogLoadError(filePath, `invalid JSON (${errorMessage(err)})`, { cause: err });
  }
}

/**
 * Load a normalized catalog. Records without a name, a price or an
 * identifier cannot be matched and are dropped; a file that is not a JSON
 * array fails the load.
 */
async function loadCatalog<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): Promise<{ products: T[]; dropped: number }> {
  const data = await readJsonFile(filePath);
  if (!Array.isArray(data)) {
    throw new CatalogLoadError(filePath, "expected a JSON array of products");
  }

  const products: T[] = [];
  let dropped = 0;
  for (const item of data) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      products.push(parsed.data);
    } else {
      dropped++;
    }
  }

  console.log(
    `[catalog] Loaded ${products.length} ${label} products from ${filePath}` +
      (dropped > 0 ? ` (dropped ${dropped} unusable records)` : "")
  );
  return { products, dropped };
}

export function loadStoreACatalog(filePath: string): Promise<{ products: StoreAProduct[]; dropped: number }> {
  return loadCatalog(filePath, storeAProductSchema, "store A");
}

export function loadStoreBCatalog(filePath: string): Promise<{ products: StoreBProduct[]; dropped: number }> {
  return loadCatalog(filePath, storeBProductSchema, "store B");
}
