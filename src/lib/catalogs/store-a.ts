import { z } from "zod";
import { UNKNOWN_BRAND } from "../types";
import type { FieldSummary, StoreAProduct } from "../types";

const rawProductSchema = z.object({
  data: z.object({
    product: z.object({
      id: z.union([z.string(), z.number()]).nullish(),
      name: z.string().nullish(),
      brand: z.string().nullish(),
      shortDescription: z.string().nullish(),
      priceInfo: z
        .object({
          currentPrice: z
            .object({ price: z.union([z.number(), z.string()]).nullish() })
            .nullish(),
        })
        .nullish(),
    }),
  }),
});

type RawProduct = z.infer<typeof rawProductSchema>["data"]["product"];

const MEASURED_SIZE =
  /(\d+(?:\.\d+)?)\s*(?:oz|fl\s*oz|fluid\s*oz|fluid\s*ounce|ounce|gallon|ml|l|g|kg|lb|lbs|square feet)\b/i;
const DESCRIPTIVE_SIZE = /\b(mini|small|medium|large|x-large)\b/i;
const COUNT = /\b(\d+)\s*(?:count|ct|pk|pc|piece|roll|pack)s?\b/i;
const BARE_NUMBER = /\b(\d+)\b/;

const FIELDS = ["product_name", "brand", "product_id", "price", "size", "quantity"] as const;

/** Uppercased brand with wrapping single quotes removed, "N/A" when missing */
export function normalizeStoreABrand(brand: string | null | undefined): string {
  if (!brand) return UNKNOWN_BRAND;
  return brand.replace(/^'+|'+$/g, "").toUpperCase();
}

function normalizeUnits(size: string): string {
  return size
    .toLowerCase()
    .replace("ounce", "oz")
    .replace("pound", "lb")
    .replace("liter", "l")
    .replace("gram", "g");
}

/**
 * Size and count from the product title, falling back to the short
 * description for a measured size. A bare number in the title is taken as
 * the count only when nothing else was found.
 */
export function parseSizeAndQuantity(
  name: string,
  shortDescription?: string | null
): { size: string | null; quantity: string | null } {
  const measured = name.match(MEASURED_SIZE) ?? shortDescription?.match(MEASURED_SIZE) ?? null;

  let size: string | null = null;
  if (measured) {
    size = normalizeUnits(measured[0]);
  } else {
    const descriptive = name.match(DESCRIPTIVE_SIZE);
    if (descriptive) size = descriptive[0].toLowerCase();
  }

  let count = name.match(COUNT);
  if (!measured && !count) count = name.match(BARE_NUMBER);

  return { size, quantity: count ? count[1] : null };
}

function parsePrice(raw: RawProduct): number | null {
  const price = raw.priceInfo?.currentPrice?.price;
  if (price === null || price === undefined || price === "") return null;
  const n = Number(price);
  return Number.isFinite(n) ? n : null;
}

/**
 * Map store A's product feed ({ data: { product } } items) onto the
 * normalized schema. Products need a name, an id and a price to be kept.
 */
export function extractStoreACatalog(items: unknown[]): {
  products: StoreAProduct[];
  summary: FieldSummary;
} {
  const products: StoreAProduct[] = [];
  const fieldCounts: Record<string, number> = Object.fromEntries(FIELDS.map((f) => [f, 0]));
  let totalItems = 0;

  for (const item of items) {
    const parsed = rawProductSchema.safeParse(item);
    if (!parsed.success) continue;
    totalItems++;

    const raw = parsed.data.data.product;
    const name = raw.name?.trim() || null;
    const productId = raw.id === null || raw.id === undefined || raw.id === "" ? null : String(raw.id);
    const price = parsePrice(raw);
    const { size, quantity } = name ? parseSizeAndQuantity(name, raw.shortDescription) : { size: null, quantity: null };

    if (name) fieldCounts.product_name++;
    if (raw.brand) fieldCounts.brand++;
    if (productId) fieldCounts.product_id++;
    if (price !== null) fieldCounts.price++;
    if (size) fieldCounts.size++;
    if (quantity) fieldCounts.quantity++;

    if (!name || !productId || price === null) continue;

    products.push({
      product_id: productId,
      product_name: name,
      brand: normalizeStoreABrand(raw.brand),
      price,
      size,
      quantity,
    });
  }

  return { products, summary: { totalItems, kept: products.length, fieldCounts } };
}
