import OpenAI from "openai";
import type { AppConfig } from "./config";
import type { Grid } from "./contracts";

export type GenerateOptions = {
  maxOutputTokens?: number;
};

/** The narrow text-generation capability the pipeline depends on. */
export interface TextGenerator {
  generate(prompt: string, opts?: GenerateOptions): Promise<string>;
}

/**
 * Build an OpenAI-backed generator, or null when no API key is configured.
 */
export function createOpenAIGenerator(config: AppConfig): TextGenerator | null {
  if (!config.openaiApiKey) return null;
  const client = new OpenAI({ apiKey: config.openaiApiKey, timeout: config.detectTimeoutMs, maxRetries: 0 });
  return {
    async generate(prompt, opts) {
      const response = await client.responses.create({
        model: config.openaiModel,
        input: prompt,
        max_output_tokens: opts?.maxOutputTokens ?? 200,
      });
      return (response.output_text ?? "").trim();
    },
  };
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, label = "request"): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  return Promise.race([
    promise.finally(() => clearTimeout(timer)),
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${label} timed out`)), ms);
    }),
  ]);
}

export function stripFences(text: string) {
  let t = text.trim();
  if (t.startsWith("```json")) t = t.slice("```json".length);
  else if (t.startsWith("```")) t = t.slice(3);
  if (t.endsWith("```")) t = t.slice(0, -3);
  return t.trim();
}

/** Parse a model reply that should be a single JSON object. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripFences(text));
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

// Column/index/data layout, compact enough to keep prompts small.
export function splitLayout(preview: Grid) {
  const width = preview.reduce((max, row) => Math.max(max, row.length), 0);
  return {
    columns: Array.from({ length: width }, (_, i) => `col${i}`),
    index: preview.map((_, i) => i),
    data: preview,
  };
}
