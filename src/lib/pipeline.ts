import type { AnalysisResult, Grid } from "./contracts";
import { aggregateMetrics } from "./analytics";
import { classifySalesPreview } from "./classify";
import { buildRecords, runCleaningPipeline } from "./cleaning";
import { buildHeaders, findColumn } from "./columns";
import { HeaderColumnDetector, heuristicStrategy, modelStrategy } from "./detection";
import { PipelineError, isPipelineError } from "./errors";
import { KNOWLEDGE_TEXT_ROWS } from "./limits";
import type { TextGenerator } from "./llm";
import type { MappingCache } from "./mappingCache";
import { previewOf, signatureForPreview } from "./signature";

export type AnalyzeOptions = {
  userId: string;
  detector: HeaderColumnDetector;
  // When set, the confirmed mapping is written back after matching.
  cache?: MappingCache | null;
  sparseSummaryMaxOtherFields?: number;
};

/**
 * Detect the header and target columns of a grid, clean its rows and
 * aggregate the sales metrics. Throws PipelineError for detection and
 * matching failures.
 */
export async function analyzeGrid(grid: Grid, opts: AnalyzeOptions): Promise<AnalysisResult> {
  const preview = previewOf(grid);
  const signature = signatureForPreview(preview);

  const outcome = await opts.detector.detect({ userId: opts.userId, signature, preview });
  if (!outcome.ok) {
    throw new PipelineError("detection", "could not detect header row", { attempts: outcome.attempts });
  }
  const { headerRowIndex } = outcome.mapping;

  const headers = buildHeaders(grid, headerRowIndex);
  if (headers.length === 0) {
    throw new PipelineError("detection", "empty header row", { headerRowIndex, attempts: outcome.attempts });
  }

  const salesColumn = findColumn(headers, outcome.mapping.salesColumn);
  const billColumn = findColumn(headers, outcome.mapping.billColumn);
  if (!salesColumn || !billColumn) {
    throw new PipelineError("matching", "could not match detected columns", {
      headers,
      salesDetected: outcome.mapping.salesColumn,
      billDetected: outcome.mapping.billColumn,
    });
  }

  if (opts.cache) {
    try {
      await opts.cache.upsert(opts.userId, signature, { headerRowIndex, salesColumn, billColumn });
    } catch (err) {
      console.warn("[analyze] column mapping upsert failed", err);
    }
  }

  const records = buildRecords(grid, headerRowIndex, headers);
  const cleaned = runCleaningPipeline(records, {
    headers,
    salesColumn,
    billColumn,
    sparseSummaryMaxOtherFields: opts.sparseSummaryMaxOtherFields,
  });
  const metrics = aggregateMetrics(cleaned.rows, salesColumn, billColumn);

  console.info("[analyze]", {
    strategy: outcome.strategy,
    headerRowIndex,
    salesColumn,
    billColumn,
    rows: records.length,
    used: metrics.billRowCount,
  });

  return {
    signature,
    headers,
    metrics,
    diagnostics: {
      headerRowIndex,
      salesColumn,
      billColumn,
      usedExternalAssist: outcome.usedExternalAssist,
      diagnosticMessage: outcome.diagnosticMessage,
      attempts: outcome.attempts,
      droppedBlankRows: cleaned.droppedBlank.size,
      droppedTotalishRows: cleaned.droppedTotalish.size,
      droppedSummaryRows: cleaned.droppedSummary.size,
      droppedMissingBillRows: cleaned.droppedMissingBill.size,
      finalRowsUsed: metrics.billRowCount,
    },
  };
}

// Flatten the first rows of a table into text for knowledge indexing.
export function tableToText(grid: Grid, limit = KNOWLEDGE_TEXT_ROWS) {
  return grid
    .slice(0, limit)
    .map((row) => `${row.join(", ")}\n`)
    .join("");
}

export type IngestionOutcome =
  | { type: "sales_metrics"; via: "heuristic" | "model"; analysis: AnalysisResult; notes: string }
  | { type: "knowledge"; notes: string; text: string };

export type IngestOptions = {
  userId: string;
  generator: TextGenerator | null;
  timeoutMs: number;
  sparseSummaryMaxOtherFields?: number;
};

async function tryAnalyze(grid: Grid, detector: HeaderColumnDetector, opts: IngestOptions) {
  try {
    const analysis = await analyzeGrid(grid, {
      userId: opts.userId,
      detector,
      sparseSummaryMaxOtherFields: opts.sparseSummaryMaxOtherFields,
    });
    return analysis.metrics.billRowCount > 0 ? analysis : null;
  } catch (err) {
    if (!isPipelineError(err)) throw err;
    console.info("[ingest] analysis rejected:", err.message);
    return null;
  }
}

/**
 * Decide whether an upload is sales data. Heuristics first; if they do not
 * yield billed rows, the model classifies the preview and, when it says
 * sales, detects columns itself. Anything else is treated as knowledge.
 */
export async function ingestTabular(grid: Grid, opts: IngestOptions): Promise<IngestionOutcome> {
  const heuristic = await tryAnalyze(grid, new HeaderColumnDetector([heuristicStrategy()]), opts);
  if (heuristic) {
    return { type: "sales_metrics", via: "heuristic", analysis: heuristic, notes: "detected as sales via heuristics" };
  }

  const classification = await classifySalesPreview(opts.generator, previewOf(grid), opts.timeoutMs);
  if (classification.ok && classification.isSales) {
    const detector = new HeaderColumnDetector([modelStrategy(opts.generator, opts.timeoutMs)]);
    const viaModel = await tryAnalyze(grid, detector, opts);
    if (viaModel) {
      return { type: "sales_metrics", via: "model", analysis: viaModel, notes: "detected as sales via AI" };
    }
  }

  const notes = classification.ok
    ? classification.isSales
      ? "classified as sales but columns could not be resolved"
      : "classified as non-sales"
    : classification.message;
  return { type: "knowledge", notes, text: tableToText(grid) };
}
