import type { RowRecord, SalesMetrics } from "./contracts";
import { withTimeout, type TextGenerator } from "./llm";

const NUMERIC_LITERAL = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Parse a money-ish cell: everything but digits, "." and "-" is dropped
 * (currency symbols, thousands separators, spaces), and what is left must be
 * a plain decimal. Returns NaN otherwise.
 */
export function toNumeric(text: string): number {
  const cleaned = text.trim().replace(/[^0-9.-]/g, "");
  if (!NUMERIC_LITERAL.test(cleaned)) return Number.NaN;
  return Number(cleaned);
}

// Half away from zero, so -0.125 and 0.125 round symmetrically.
export function round2(v: number) {
  return (Math.sign(v) * Math.round(Math.abs(v) * 100)) / 100;
}

export function uniqueCount(rows: RowRecord[], column: string) {
  const seen = new Set<string>();
  for (const r of rows) {
    const v = (r.fields[column] ?? "").trim();
    if (v) seen.add(v);
  }
  return seen.size;
}

export function aggregateMetrics(rows: RowRecord[], salesColumn: string, billColumn: string): SalesMetrics {
  let total = 0;
  for (const r of rows) {
    const v = toNumeric(r.fields[salesColumn] ?? "");
    if (!Number.isNaN(v)) total += v;
  }
  return {
    totalSales: round2(total),
    billRowCount: rows.length,
    uniqueBillCount: uniqueCount(rows, billColumn),
  };
}

export function simpleSummary(m: SalesMetrics) {
  return `Total sales = ${m.totalSales.toFixed(2)}, bill rows = ${m.billRowCount}, unique bill IDs = ${m.uniqueBillCount}.`;
}

function buildSummaryPrompt(m: SalesMetrics) {
  return [
    "Create a short, friendly one-sentence summary for a user.",
    "Facts:",
    `- Total sales = ${m.totalSales.toFixed(2)}`,
    `- Bill row count = ${m.billRowCount}`,
    `- Unique bill IDs = ${m.uniqueBillCount}`,
    "Keep it concise and neutral (no emojis).",
  ].join("\n");
}

/**
 * One-sentence summary from the model, or the plain sentence when the model
 * is unavailable, fails or answers with nothing.
 */
export async function summarizeMetrics(m: SalesMetrics, generator: TextGenerator | null, timeoutMs: number) {
  if (!generator) return simpleSummary(m);
  try {
    const text = await withTimeout(generator.generate(buildSummaryPrompt(m), { maxOutputTokens: 120 }), timeoutMs, "summary");
    return text.trim() || simpleSummary(m);
  } catch (err) {
    console.warn("[summary] model summary failed", err);
    return simpleSummary(m);
  }
}
