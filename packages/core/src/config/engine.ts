import { z } from "zod";

const intMs = (def: number) => z.coerce.number().int().nonnegative().default(def);
const positiveInt = (def: number) => z.coerce.number().int().positive().default(def);

export const EngineConfigSchema = z
  .object({
    // Segmenter
    maxChunkDurationMs: positiveInt(30_000),
    silenceGapMs: intMs(2_000),
    frameIntervalMs: positiveInt(5_000),

    // Indexer
    embedRetries: z.coerce.number().int().min(0).max(10).default(3),
    embedRetryBaseMs: intMs(500),
    embedRetryMaxMs: intMs(8_000),

    // Retriever
    overfetchFactor: z.coerce.number().int().min(1).max(20).default(3),
    mergeGapMs: intMs(1_000),

    // Clip synthesizer
    snapMs: positiveInt(500),
    clipCacheMaxEntries: positiveInt(256),
    clipCacheMaxBytes: positiveInt(2 * 1024 * 1024 * 1024),
    clipCacheMaxAgeMs: positiveInt(24 * 60 * 60 * 1000),

    // Answer composer
    maxContextChars: positiveInt(6_000),

    // Query orchestrator
    embedTimeoutMs: positiveInt(15_000),
    searchTimeoutMs: positiveInt(5_000),
    generateTimeoutMs: positiveInt(60_000),
    extractTimeoutMs: positiveInt(60_000),
    embedCacheMaxEntries: positiveInt(1_000),
  })
  .refine((c) => c.embedRetryMaxMs >= c.embedRetryBaseMs, {
    message: "embedRetryMaxMs must be >= embedRetryBaseMs",
    path: ["embedRetryMaxMs"],
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  maxChunkDurationMs: "LENS_MAX_CHUNK_DURATION_MS",
  silenceGapMs: "LENS_SILENCE_GAP_MS",
  frameIntervalMs: "LENS_FRAME_INTERVAL_MS",
  embedRetries: "LENS_EMBED_RETRIES",
  embedRetryBaseMs: "LENS_EMBED_RETRY_BASE_MS",
  embedRetryMaxMs: "LENS_EMBED_RETRY_MAX_MS",
  overfetchFactor: "LENS_OVERFETCH_FACTOR",
  mergeGapMs: "LENS_MERGE_GAP_MS",
  snapMs: "LENS_SNAP_MS",
  clipCacheMaxEntries: "LENS_CLIP_CACHE_MAX_ENTRIES",
  clipCacheMaxBytes: "LENS_CLIP_CACHE_MAX_BYTES",
  clipCacheMaxAgeMs: "LENS_CLIP_CACHE_MAX_AGE_MS",
  maxContextChars: "LENS_MAX_CONTEXT_CHARS",
  embedTimeoutMs: "LENS_EMBED_TIMEOUT_MS",
  searchTimeoutMs: "LENS_SEARCH_TIMEOUT_MS",
  generateTimeoutMs: "LENS_GENERATE_TIMEOUT_MS",
  extractTimeoutMs: "LENS_EXTRACT_TIMEOUT_MS",
  embedCacheMaxEntries: "LENS_EMBED_CACHE_MAX_ENTRIES",
};

/**
 * Read engine tunables from the environment. Unset or blank variables fall back
 * to the schema defaults; anything unparsable throws the zod error.
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: EngineConfigInput = {}
): EngineConfig {
  const raw: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const v = env[envKey]?.trim();
    if (v) raw[field] = v;
  }
  return EngineConfigSchema.parse({ ...raw, ...overrides });
}
