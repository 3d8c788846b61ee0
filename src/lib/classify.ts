import type { Grid, SalesClassification } from "./contracts";
import { errorMessage } from "./errors";
import { parseJsonObject, splitLayout, withTimeout, type TextGenerator } from "./llm";

export type ClassificationResult = ({ ok: true } & SalesClassification) | { ok: false; message: string };

function buildPrompt(preview: Grid) {
  return [
    "Classify if the table is sales data.",
    'Return strict JSON {"is_sales": true|false, "confidence": 0..1}.',
    "Sales data typically has a money/amount column and a bill/invoice/ref column.",
    "Preview (columns/index/data layout):",
    JSON.stringify(splitLayout(preview)),
  ].join("\n");
}

export function parseClassificationReply(text: string): ClassificationResult {
  if (!text.trim()) return { ok: false, message: "classification returned empty" };
  const obj = parseJsonObject(text);
  if (!obj || typeof obj.is_sales !== "boolean") {
    return { ok: false, message: "classification JSON parse error" };
  }
  const conf = typeof obj.confidence === "number" ? Math.min(1, Math.max(0, obj.confidence)) : 0;
  return { ok: true, isSales: obj.is_sales, confidence: conf };
}

/** Ask the model whether a preview looks like sales data. Never throws. */
export async function classifySalesPreview(
  generator: TextGenerator | null,
  preview: Grid,
  timeoutMs: number,
): Promise<ClassificationResult> {
  if (!generator) return { ok: false, message: "classification not configured" };
  try {
    const reply = await withTimeout(generator.generate(buildPrompt(preview), { maxOutputTokens: 60 }), timeoutMs, "classification");
    return parseClassificationReply(reply);
  } catch (err) {
    console.warn("[classify] model request failed", err);
    return { ok: false, message: `classification failed: ${errorMessage(err)}` };
  }
}
