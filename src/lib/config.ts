export const config = {
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  llmModel: process.env.LLM_MODEL || "claude-haiku-4-5-20251001",
  llmMaxTokens: parseInt(process.env.LLM_MAX_TOKENS || "8192", 10),
  llmTemperature: parseFloat(process.env.LLM_TEMPERATURE || "1"),
  matching: {
    rate: parseInt(process.env.MATCH_RATE || "12", 10),
    intervalMs: parseInt(process.env.MATCH_RATE_INTERVAL_MS || "60000", 10),
    capacity: parseInt(process.env.MATCH_CAPACITY || "12", 10),
    maxAttempts: parseInt(process.env.MATCH_MAX_ATTEMPTS || "3", 10),
    retryBaseDelayMs: parseInt(process.env.MATCH_RETRY_BASE_MS || "4000", 10),
  },
  brandInference: {
    rate: parseInt(process.env.BRAND_RATE || "14", 10),
    intervalMs: parseInt(process.env.BRAND_RATE_INTERVAL_MS || "60000", 10),
    capacity: parseInt(process.env.BRAND_CAPACITY || "14", 10),
    maxAttempts: parseInt(process.env.BRAND_MAX_ATTEMPTS || "5", 10),
    retryBaseDelayMs: parseInt(process.env.BRAND_RETRY_BASE_MS || "2000", 10),
    chunkSize: parseInt(process.env.BRAND_CHUNK_SIZE || "400", 10),
  },
};

export type DispatchSettings = typeof config.matching;
