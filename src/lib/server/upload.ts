import { NextResponse } from "next/server";
import type { Grid } from "@/lib/contracts";
import { PipelineError, errorMessage, isPipelineError } from "@/lib/errors";
import { extensionOf, readGrid } from "@/lib/ingest";
import { MAX_UPLOAD_BYTES, SUPPORTED_MIME_TYPES } from "@/lib/limits";

export type ParsedUpload = {
  fileName: string;
  grid: Grid;
};

export function userIdFrom(request: Request) {
  return request.headers.get("x-user-id")?.trim() || "anonymous";
}

/**
 * Pull the "file" field out of a multipart request and read it into a grid.
 * Returns a ready-made error response when the upload is unusable.
 */
export async function readUpload(request: Request): Promise<ParsedUpload | NextResponse> {
  let formData: FormData;
  try {
    formData = await request.formData();
  } catch {
    return NextResponse.json({ error: "expected multipart/form-data with a file field" }, { status: 400 });
  }
  const file = formData.get("file");
  if (file === null || typeof file === "string") {
    return NextResponse.json({ error: "file is required" }, { status: 400 });
  }
  if (file.size > MAX_UPLOAD_BYTES) {
    return NextResponse.json({ error: "file too large" }, { status: 413 });
  }
  if (file.type && !SUPPORTED_MIME_TYPES.includes(file.type)) {
    console.warn("Unrecognized MIME type:", file.type);
  }
  const bytes = new Uint8Array(await file.arrayBuffer());
  const grid = readGrid(bytes, extensionOf(file.name));
  return { fileName: file.name, grid };
}

export function pipelineErrorBody(err: PipelineError) {
  const d = err.details;
  if (err.kind === "matching") {
    return {
      error: err.message,
      headers: d.headers ?? [],
      sales_detected: d.salesDetected ?? "",
      bill_detected: d.billDetected ?? "",
    };
  }
  if (err.kind === "detection") {
    return { error: err.message, header_row: d.headerRowIndex ?? null, attempts: d.attempts ?? [] };
  }
  return { error: err.message };
}

export function errorResponse(err: unknown, tag: string) {
  if (isPipelineError(err)) {
    return NextResponse.json(pipelineErrorBody(err), { status: 400 });
  }
  console.error(tag, err);
  return NextResponse.json({ error: errorMessage(err) }, { status: 500 });
}
