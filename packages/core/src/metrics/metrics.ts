import client from "prom-client";

export type Metrics = {
  register: client.Registry;
  queriesTotal: client.Counter<"status">;
  stepDurationMs: client.Histogram<"step" | "status">;
  clipCacheTotal: client.Counter<"result">;
  clipExtractionsTotal: client.Counter<"status">;
  embedRequestsTotal: client.Counter<"status">;
};

declare global {
  var __lens_metrics__: Metrics | undefined;
}

export function initMetrics(): Metrics {
  if (globalThis.__lens_metrics__) return globalThis.__lens_metrics__;

  const register = new client.Registry();
  client.collectDefaultMetrics({ register });

  const queriesTotal = new client.Counter({
    name: "lens_queries_total",
    help: "Queries answered, by final status",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const stepDurationMs = new client.Histogram({
    name: "lens_step_duration_ms",
    help: "Duration of each query step in ms",
    labelNames: ["step", "status"] as const,
    buckets: [5, 10, 25, 50, 100, 250, 500, 1_000, 2_500, 5_000, 10_000, 30_000, 60_000],
    registers: [register],
  });

  const clipCacheTotal = new client.Counter({
    name: "lens_clip_cache_total",
    help: "Clip cache lookups by result (hit, miss, coalesced)",
    labelNames: ["result"] as const,
    registers: [register],
  });

  const clipExtractionsTotal = new client.Counter({
    name: "lens_clip_extractions_total",
    help: "Underlying media extractions",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const embedRequestsTotal = new client.Counter({
    name: "lens_embed_requests_total",
    help: "Embedding calls made by the indexer and query engine",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const m = { register, queriesTotal, stepDurationMs, clipCacheTotal, clipExtractionsTotal, embedRequestsTotal };
  globalThis.__lens_metrics__ = m;
  return m;
}
