import type { ColumnMapping, Grid, StrategyAttempt, StrategyName } from "./contracts";
import { BILL_KEYWORDS, SALES_KEYWORDS, buildHeaders, pickColumn } from "./columns";
import { errorMessage } from "./errors";
import { HEURISTIC_SCAN_ROWS } from "./limits";
import { parseJsonObject, splitLayout, withTimeout, type TextGenerator } from "./llm";
import type { MappingCache } from "./mappingCache";

export type DetectionContext = {
  userId: string;
  signature: string;
  preview: Grid;
};

export type StrategyResult =
  | {
      ok: true;
      strategy: StrategyName;
      mapping: ColumnMapping;
      usedExternalAssist: boolean;
      message: string;
    }
  | { ok: false; strategy: StrategyName; message: string };

export interface DetectionStrategy {
  readonly name: StrategyName;
  attempt(ctx: DetectionContext): Promise<StrategyResult>;
}

export type DetectionOutcome =
  | {
      ok: true;
      strategy: StrategyName;
      mapping: ColumnMapping;
      usedExternalAssist: boolean;
      diagnosticMessage: string;
      attempts: StrategyAttempt[];
    }
  | { ok: false; attempts: StrategyAttempt[] };

function fail(strategy: StrategyName, message: string): StrategyResult {
  return { ok: false, strategy, message };
}

export function cacheStrategy(cache: MappingCache): DetectionStrategy {
  return {
    name: "cache",
    async attempt({ userId, signature }) {
      if (!signature) return fail("cache", "no signature");
      try {
        const hit = await cache.get(userId, signature);
        if (!hit) return fail("cache", "cache miss");
        return { ok: true, strategy: "cache", mapping: hit, usedExternalAssist: false, message: "cache" };
      } catch (err) {
        console.warn("[detect] cache lookup failed", err);
        return fail("cache", `cache error: ${errorMessage(err, "lookup failed")}`);
      }
    },
  };
}

export function buildDetectionPrompt(preview: Grid) {
  return [
    "You are a data understanding assistant.",
    `Given the first ${preview.length} rows of a tabular file, identify:`,
    "1) Which row (0-based index) is most likely the header (column names).",
    '2) The exact column name that represents "Sales" or "Amount".',
    '3) The exact column name that represents "Bill" or "Invoice".',
    "Return STRICT JSON only, no commentary, no markdown fences.",
    "Use keys exactly: header_row_index, sales_column, bill_column.",
    'Example: {"header_row_index": 0, "sales_column": "Item Net Amt", "bill_column": "Bill No"}',
    "Rows (columns/index/data layout):",
    JSON.stringify(splitLayout(preview)),
  ].join("\n");
}

/**
 * Validate a detection reply. Returns the mapping, or a string describing
 * why the reply was rejected.
 */
export function parseDetectionReply(text: string, previewRows: number): ColumnMapping | string {
  if (!text.trim()) return "model returned empty";
  const obj = parseJsonObject(text);
  if (!obj) return "model JSON parse error";
  const { header_row_index: idx, sales_column: sales, bill_column: bill } = obj;
  if (typeof idx !== "number" || !Number.isInteger(idx) || typeof sales !== "string" || typeof bill !== "string") {
    return "model reply missing fields";
  }
  if (idx < 0 || idx >= previewRows) return "model header row out of range";
  if (!sales.trim() || !bill.trim()) return "model left a column blank";
  return { headerRowIndex: idx, salesColumn: sales.trim(), billColumn: bill.trim() };
}

export function modelStrategy(generator: TextGenerator | null, timeoutMs: number): DetectionStrategy {
  return {
    name: "model",
    async attempt({ preview }) {
      if (!generator) return fail("model", "model detection not configured");
      let reply: string;
      try {
        reply = await withTimeout(generator.generate(buildDetectionPrompt(preview)), timeoutMs, "model detection");
      } catch (err) {
        console.warn("[detect] model request failed", err);
        return fail("model", `model request failed: ${errorMessage(err)}`);
      }
      const parsed = parseDetectionReply(reply, preview.length);
      if (typeof parsed === "string") return fail("model", parsed);
      return { ok: true, strategy: "model", mapping: parsed, usedExternalAssist: true, message: "ok" };
    },
  };
}

const LETTER = /\p{L}/u;

export function alphaRatio(row: ReadonlyArray<string>): number | null {
  let nonEmpty = 0;
  let alpha = 0;
  for (const cell of row) {
    const t = cell.trim();
    if (!t) continue;
    nonEmpty++;
    if (LETTER.test(t)) alpha++;
  }
  return nonEmpty === 0 ? null : alpha / nonEmpty;
}

/** Index of the most text-like of the first few rows, defaulting to 0. */
export function guessHeaderRow(rows: Grid): number {
  let headerIdx = -1;
  let best = -1;
  rows.slice(0, HEURISTIC_SCAN_ROWS).forEach((row, i) => {
    const ratio = alphaRatio(row);
    if (ratio === null) return;
    if (ratio >= 0.5 && ratio > best) {
      best = ratio;
      headerIdx = i;
    }
  });
  return headerIdx === -1 ? 0 : headerIdx;
}

export function heuristicStrategy(): DetectionStrategy {
  return {
    name: "heuristic",
    async attempt({ preview }) {
      if (preview.length === 0) return fail("heuristic", "no rows to inspect");
      const headerRowIndex = guessHeaderRow(preview);
      const headers = buildHeaders(preview, headerRowIndex);
      return {
        ok: true,
        strategy: "heuristic",
        mapping: {
          headerRowIndex,
          salesColumn: pickColumn(headers, SALES_KEYWORDS),
          billColumn: pickColumn(headers, BILL_KEYWORDS),
        },
        usedExternalAssist: false,
        message: "heuristic",
      };
    },
  };
}

/**
 * Runs strategies in order and returns the first success. Every attempt is
 * kept so callers can report why earlier strategies were skipped.
 */
export class HeaderColumnDetector {
  constructor(private readonly strategies: DetectionStrategy[]) {}

  async detect(ctx: DetectionContext): Promise<DetectionOutcome> {
    const attempts: StrategyAttempt[] = [];
    for (const strategy of this.strategies) {
      const result = await strategy.attempt(ctx);
      attempts.push({ strategy: result.strategy, ok: result.ok, message: result.message });
      if (result.ok) {
        return {
          ok: true,
          strategy: result.strategy,
          mapping: result.mapping,
          usedExternalAssist: result.usedExternalAssist,
          diagnosticMessage: result.message,
          attempts,
        };
      }
    }
    return { ok: false, attempts };
  }
}

export type DetectorDeps = {
  cache?: MappingCache | null;
  generator?: TextGenerator | null;
  timeoutMs: number;
};

/** Cache, then model, then heuristic; strategies without a dependency are left out. */
export function createDetector({ cache, generator, timeoutMs }: DetectorDeps) {
  const strategies: DetectionStrategy[] = [];
  if (cache) strategies.push(cacheStrategy(cache));
  strategies.push(modelStrategy(generator ?? null, timeoutMs));
  strategies.push(heuristicStrategy());
  return new HeaderColumnDetector(strategies);
}
