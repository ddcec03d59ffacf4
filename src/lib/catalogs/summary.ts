import type { FieldSummary } from "../types";

export function countFields<T extends object>(
  records: T[],
  fields: (keyof T & string)[]
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const field of fields) counts[field] = 0;

  for (const record of records) {
    for (const field of fields) {
      const value = record[field];
      if (value !== null && value !== undefined && value !== "") counts[field]++;
    }
  }
  return counts;
}

export function formatFieldSummary(title: string, summary: FieldSummary): string {
  const rule = "=".repeat(60);
  const lines = [
    rule,
    ` ${title} `,
    rule,
    `Total items processed: ${summary.totalItems}`,
    `Items with valid product name and price (extracted): ${summary.kept}`,
    "",
    "Field population statistics:",
  ];

  for (const [field, count] of Object.entries(summary.fieldCounts)) {
    const percentage = summary.totalItems > 0 ? (count / summary.totalItems) * 100 : 0;
    lines.push(
      `  - ${field.padEnd(14)}: ${String(count).padStart(6)} / ${summary.totalItems} (${percentage.toFixed(1)}%)`
    );
  }

  lines.push("", `Discarded items: ${summary.totalItems - summary.kept}`, rule);
  return lines.join("\n");
}
