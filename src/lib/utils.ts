export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function elapsedSeconds(startMs: number): number {
  return Math.round((Date.now() - startMs) / 1000);
}
