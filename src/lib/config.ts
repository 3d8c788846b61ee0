import { DEFAULT_DETECT_TIMEOUT_MS, DEFAULT_SPARSE_SUMMARY_MAX_OTHER_FIELDS } from "./limits";

export type AppConfig = {
  openaiApiKey?: string;
  openaiModel: string;
  databaseUrl?: string;
  detectTimeoutMs: number;
  sparseSummaryMaxOtherFields: number;
  aiSummaryEnabled: boolean;
};

type Env = Record<string, string | undefined>;

function nonEmpty(v: string | undefined) {
  const t = v?.trim();
  return t ? t : undefined;
}

function nonNegativeInt(v: string | undefined, fallback: number) {
  const t = nonEmpty(v);
  if (!t || !/^\d+$/.test(t)) return fallback;
  return Number(t);
}

/**
 * Read runtime configuration from environment variables. Missing or
 * malformed numeric values fall back to the defaults in limits.ts.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    openaiModel: nonEmpty(env.OPENAI_MODEL) ?? "gpt-4o-mini",
    databaseUrl: nonEmpty(env.DATABASE_URL),
    detectTimeoutMs: nonNegativeInt(env.DETECT_TIMEOUT_MS, DEFAULT_DETECT_TIMEOUT_MS),
    sparseSummaryMaxOtherFields: nonNegativeInt(
      env.SPARSE_SUMMARY_MAX_OTHER_FIELDS,
      DEFAULT_SPARSE_SUMMARY_MAX_OTHER_FIELDS,
    ),
    aiSummaryEnabled: env.ENABLE_AI_SUMMARY !== "false",
  };
}
