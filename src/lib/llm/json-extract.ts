/**
 * Pull a JSON array out of free-form model output: everything from the first
 * "[" to the last "]". Prose or markdown fences around it are ignored.
 * Returns undefined when there is no such span or it is not valid JSON.
 */
export function extractJsonArray(text: string): unknown[] | undefined {
  const start = text.indexOf("[");
  const end = text.lastIndexOf("]");
  if (start < 0 || end <= start) return undefined;

  const parsed = parseJson(text.slice(start, end + 1));
  return Array.isArray(parsed) ? parsed : undefined;
}

/** Same as extractJsonArray, for a "{...}" object */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) return undefined;

  const parsed = parseJson(text.slice(start, end + 1));
  if (!isRecord(parsed)) return undefined;
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    console.warn(`[llm] Failed to parse JSON from response: ${err instanceof Error ? err.message : err}`);
    return undefined;
  }
}
