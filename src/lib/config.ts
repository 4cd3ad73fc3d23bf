export const config = {
  headless: process.env.HEADLESS !== "false",
  navigationTimeoutMs: parseInt(process.env.NAVIGATION_TIMEOUT_MS || "45000", 10),
  readyTimeoutMs: parseInt(process.env.READY_TIMEOUT_MS || "30000", 10),
  settleDelayMs: parseInt(process.env.SETTLE_DELAY_MS || "1500", 10),
  parseTimeoutMs: parseInt(process.env.PARSE_TIMEOUT_MS || "180000", 10),
  maxConcurrentPages: parseInt(process.env.MAX_CONCURRENT_PAGES || "2", 10),
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  translationModel: process.env.TRANSLATION_MODEL || "claude-haiku-4-5-20251001",
  sourceLanguage: process.env.SOURCE_LANGUAGE || "zh",
  targetLanguage: process.env.TARGET_LANGUAGE || "ru",
  translationBatchSize: parseInt(process.env.TRANSLATION_BATCH_SIZE || "40", 10),
  // Empty string disables the cache
  translationCachePath: process.env.TRANSLATION_CACHE_PATH ?? "data/translation-cache.db",
  labelMapPath: process.env.LABEL_MAP_PATH || "",
  vocabularyPath: process.env.VOCABULARY_PATH || "",
  includeMissingFields: process.env.INCLUDE_MISSING_FIELDS !== "false",
  imageDelayMs: parseInt(process.env.IMAGE_DELAY_MS || "500", 10),
  imageReferer: process.env.IMAGE_REFERER || "https://www.dongchedi.com/",
  outputDir: process.env.OUTPUT_DIR || "car_data",
  siteBaseUrl: "https://www.dongchedi.com",
  userAgents: [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
