import { NextResponse } from "next/server";
import { ingestTabular } from "@/lib/pipeline";
import type { ServerDeps } from "./deps";
import { errorResponse, readUpload, userIdFrom } from "./upload";

export function createIngestHandler(resolveDeps: () => Promise<ServerDeps>) {
  return async function handle(request: Request) {
    try {
      const upload = await readUpload(request);
      if (upload instanceof NextResponse) return upload;

      const { config, metrics, generator } = await resolveDeps();
      const userId = userIdFrom(request);
      const outcome = await ingestTabular(upload.grid, {
        userId,
        generator,
        timeoutMs: config.detectTimeoutMs,
        sparseSummaryMaxOtherFields: config.sparseSummaryMaxOtherFields,
      });

      if (outcome.type === "knowledge") {
        return NextResponse.json({
          type: outcome.type,
          file_name: upload.fileName,
          notes: outcome.notes,
          text: outcome.text,
        });
      }

      const m = outcome.analysis.metrics;
      try {
        await metrics.record(userId, {
          sourceType: "file",
          fileName: upload.fileName,
          headers: outcome.analysis.headers,
          metrics: m,
        });
      } catch (err) {
        console.error("Sales metrics insert failed", err);
      }

      return NextResponse.json({
        type: outcome.type,
        file_name: upload.fileName,
        notes: outcome.notes,
        metrics: {
          total_sales: m.totalSales,
          bill_row_count: m.billRowCount,
          unique_bill_count: m.uniqueBillCount,
        },
      });
    } catch (err: unknown) {
      return errorResponse(err, "Ingest error");
    }
  };
}
