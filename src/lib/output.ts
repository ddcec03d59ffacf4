import fs from "fs/promises";
import path from "path";
import type { OutputPaths } from "./types";
import { errorMessage } from "./utils";

/**
 * "out/match_results.json" → final "out/match_results.json", unfiltered
 * "out/match_results_no_cleanup.json", recovery "out/match_results_error.json".
 */
export function deriveOutputPaths(outputPath: string): OutputPaths {
  const ext = path.extname(outputPath);
  const base = ext ? outputPath.slice(0, -ext.length) : outputPath;
  const suffix = ext || ".json";

  return {
    final: `${base}${suffix}`,
    noCleanup: `${base}_no_cleanup${suffix}`,
    error: `${base}_error${suffix}`,
  };
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/**
 * Write results as pretty JSON. A failed write is logged and reported
 * through the return value so it never ends a run.
 */
export async function saveResults(
  data: unknown,
  filePath: string,
  message = "Saved results"
): Promise<boolean> {
  try {
    await writeJson(filePath, data);
    console.log(`[output] ${message} to ${filePath}`);
    return true;
  } catch (err) {
    console.error(`[output] Error saving to ${filePath}: ${errorMessage(err)}`);
    return false;
  }
}
