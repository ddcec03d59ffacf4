import * as cheerio from "cheerio";
import { z } from "zod";
import { UNKNOWN_BRAND } from "../types";
import type { FieldSummary, StoreBProduct } from "../types";
import { countFields } from "./summary";

const rawItemSchema = z.object({
  data: z.object({ html_data: z.string() }),
});

/** Product block as read from the page, before records are filtered */
export interface ParsedProductBlock {
  sku: string | null;
  product_name: string;
  brand: string | null;
  size: string | null;
  price: number | null;
  quantity: string | null;
  multi_buy_deal: string | null;
}

const COUNT = /\b(\d+)\s*(?:count|ct|pk|pc|piece|roll|pack)?s?\b/i;
const DOLLARS = /\$(\d+\.\d+|\d+)/;

/**
 * Shelf price text to a unit price:
 *   "2/$6.00" → 3 (multi-buy deal kept), "95¢" → 0.95,
 *   "$3.49 LB" → 3.49, "$3.49" → 3.49.
 */
export function parseStoreBPrice(raw: string | null | undefined): {
  price: number | null;
  multiBuyDeal: string | null;
} {
  if (!raw) return { price: null, multiBuyDeal: null };
  const text = raw.trim();

  if (text.includes("/")) {
    const multiBuy = text.match(/(\d+)\/\$(\d+\.\d+|\d+)/);
    if (!multiBuy) return { price: null, multiBuyDeal: null };
    const quantity = parseInt(multiBuy[1], 10);
    const total = parseFloat(multiBuy[2]);
    if (quantity === 0) return { price: null, multiBuyDeal: null };
    return { price: total / quantity, multiBuyDeal: text };
  }

  if (text.includes("¢")) {
    const cents = text.match(/(\d+)¢/);
    return { price: cents ? parseInt(cents[1], 10) / 100 : null, multiBuyDeal: null };
  }

  if (text.includes("LB") || text.startsWith("$")) {
    const dollars = text.match(DOLLARS);
    return { price: dollars ? parseFloat(dollars[1]) : null, multiBuyDeal: null };
  }

  const plain = Number(text);
  return { price: text !== "" && Number.isFinite(plain) ? plain : null, multiBuyDeal: null };
}

// html_data usually arrives entity-escaped ("&lt;div ...&gt;"); a fragment that
// already holds tags is markup, and any "&lt;" in it is text
function decodeEscapedMarkup(html: string): string {
  if (/<[a-z]/i.test(html) || !/&lt;/i.test(html)) return html;
  return cheerio.load(html, null, false).root().text();
}

/**
 * Product tiles (div.product-grid-item) in one HTML fragment. Tiles without
 * a name are skipped. The brand is provisionally the first word of the name;
 * brand inference replaces it later.
 */
export function parseProductBlocks(html: string): ParsedProductBlock[] {
  const $ = cheerio.load(decodeEscapedMarkup(html));
  const blocks: ParsedProductBlock[] = [];

  $("div.product-grid-item").each((_, el) => {
    const $el = $(el);

    const name =
      $el.find("a[title]").first().attr("title")?.trim() ||
      $el.find("h3 a").first().text().trim();
    if (!name) return;

    const sku = $el.find('input[name="sku"]').first().attr("value")?.trim() || null;
    const size = $el.find("p.text-center.text-muted").first().text().trim() || null;
    const priceText = $el.find("p.text-center.precio").first().text().trim();
    const { price, multiBuyDeal } = parseStoreBPrice(priceText);
    const count = name.match(COUNT);

    blocks.push({
      sku,
      product_name: name,
      brand: name.split(/\s+/)[0] || null,
      size,
      price,
      quantity: count ? count[1] : null,
      multi_buy_deal: multiBuyDeal,
    });
  });

  return blocks;
}

/**
 * Map store B's page dump ({ data: { html_data } } items) onto the
 * normalized schema. Tiles without a SKU or a readable price are dropped.
 */
export function extractStoreBCatalog(items: unknown[]): {
  products: StoreBProduct[];
  summary: FieldSummary;
} {
  const blocks: ParsedProductBlock[] = [];

  for (const item of items) {
    const parsed = rawItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const found = parseProductBlocks(parsed.data.data.html_data);
    console.log(`[store-b] Found ${found.length} product blocks in this item`);
    blocks.push(...found);
  }

  const products: StoreBProduct[] = [];
  for (const block of blocks) {
    if (!block.sku || block.price === null) continue;
    products.push({
      sku: block.sku,
      product_name: block.product_name,
      brand: block.brand ?? UNKNOWN_BRAND,
      price: block.price,
      size: block.size,
      quantity: block.quantity,
      multi_buy_deal: block.multi_buy_deal,
    });
  }

  return {
    products,
    summary: {
      totalItems: blocks.length,
      kept: products.length,
      fieldCounts: countFields(blocks, [
        "sku",
        "product_name",
        "brand",
        "size",
        "price",
        "quantity",
        "multi_buy_deal",
      ]),
    },
  };
}
