import { NextResponse } from "next/server";
import { summarizeMetrics } from "@/lib/analytics";
import type { AnalysisResult } from "@/lib/contracts";
import { createDetector } from "@/lib/detection";
import { analyzeGrid } from "@/lib/pipeline";
import type { ServerDeps } from "./deps";
import { errorResponse, readUpload, userIdFrom } from "./upload";

export function analysisBody(fileName: string, summary: string, a: AnalysisResult) {
  const d = a.diagnostics;
  return {
    summary,
    metrics: {
      total_sales: a.metrics.totalSales,
      bill_row_count: a.metrics.billRowCount,
      unique_bill_count: a.metrics.uniqueBillCount,
    },
    meta: {
      file_name: fileName,
      header_row: d.headerRowIndex,
      sales_column: d.salesColumn,
      bill_column: d.billColumn,
      ai_used: d.usedExternalAssist,
      ai_message: d.diagnosticMessage,
      attempts: d.attempts,
    },
    cleaning: {
      dropped_blank_rows: d.droppedBlankRows,
      dropped_totalish_second_col: d.droppedTotalishRows,
      dropped_summary_rows: d.droppedSummaryRows,
      dropped_missing_bill_rows: d.droppedMissingBillRows,
      final_rows_used: d.finalRowsUsed,
    },
  };
}

/**
 * POST handler for a sales upload: cache → model → heuristic detection,
 * cleaning, metrics, summary and persistence of the result.
 */
export function createUploadAnalyzeHandler(resolveDeps: () => Promise<ServerDeps>) {
  return async function handle(request: Request) {
    try {
      const upload = await readUpload(request);
      if (upload instanceof NextResponse) return upload;

      const { config, cache, metrics, generator } = await resolveDeps();
      const userId = userIdFrom(request);
      const detector = createDetector({ cache, generator, timeoutMs: config.detectTimeoutMs });
      const analysis = await analyzeGrid(upload.grid, {
        userId,
        detector,
        cache,
        sparseSummaryMaxOtherFields: config.sparseSummaryMaxOtherFields,
      });

      const summary = await summarizeMetrics(
        analysis.metrics,
        config.aiSummaryEnabled ? generator : null,
        config.detectTimeoutMs,
      );

      try {
        await metrics.record(userId, {
          sourceType: "file",
          fileName: upload.fileName,
          headers: analysis.headers,
          metrics: analysis.metrics,
        });
      } catch (err) {
        console.error("Sales metrics insert failed", err);
      }

      return NextResponse.json(analysisBody(upload.fileName, summary, analysis));
    } catch (err: unknown) {
      return errorResponse(err, "Upload analyze error");
    }
  };
}
