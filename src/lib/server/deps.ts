import type { AppConfig } from "@/lib/config";
import { getPool } from "@/lib/db";
import { createOpenAIGenerator, type TextGenerator } from "@/lib/llm";
import { InMemoryMappingCache, PgMappingCache, type MappingCache } from "@/lib/mappingCache";
import { InMemoryMetricsStore, PgMetricsStore, type MetricsStore } from "@/lib/metricsStore";

export type ServerDeps = {
  config: AppConfig;
  cache: MappingCache;
  metrics: MetricsStore;
  generator: TextGenerator | null;
};

// Used when DATABASE_URL is not set, e.g. local development.
const localCache = new InMemoryMappingCache();
const localMetrics = new InMemoryMetricsStore();

export async function resolveServerDeps(config: AppConfig): Promise<ServerDeps> {
  const generator = createOpenAIGenerator(config);
  if (!config.databaseUrl) {
    return { config, cache: localCache, metrics: localMetrics, generator };
  }
  const pool = await getPool(config.databaseUrl);
  return { config, cache: new PgMappingCache(pool), metrics: new PgMetricsStore(pool), generator };
}
