import Papa from "papaparse";
import * as XLSX from "xlsx";
import type { Grid } from "./contracts";
import { PipelineError } from "./errors";
import { SUPPORTED_EXTENSIONS, type SupportedExtension } from "./limits";

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];
const OLE_MAGIC = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

export function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot >= 0 ? fileName.slice(dot).toLowerCase() : "";
}

export function isSupportedExtension(ext: string): ext is SupportedExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(ext);
}

function startsWith(bytes: Uint8Array, magic: number[]) {
  return bytes.length >= magic.length && magic.every((b, i) => bytes[i] === b);
}

export function rowsFromCsvText(text: string): string[][] {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
    skipEmptyLines: true,
  });
  const quoteError = result.errors.find((e) => e.type === "Quotes");
  if (quoteError) {
    throw new PipelineError("format", `malformed CSV at row ${quoteError.row ?? "?"}: ${quoteError.message}`);
  }
  return result.data;
}

export function rowsFromWorkbook(bytes: Uint8Array): string[][] {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(bytes, { type: "array" });
  } catch (err) {
    throw new PipelineError("format", `unreadable spreadsheet: ${err instanceof Error ? err.message : "parse error"}`);
  }
  const sheetName = wb.SheetNames[0];
  if (!sheetName) return [];
  const sheet = wb.Sheets[sheetName];
  if (!sheet) return [];
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    // Numbers keep their full value; General format would print long ids as 2.02403E+11.
    rawNumbers: true,
    defval: "",
    blankrows: true,
  });
  return raw.map((r) => r.map((c) => String(c ?? "")));
}

/**
 * Convert uploaded bytes into a grid of text cells. Only the first sheet of
 * a workbook is read; rows keep their original (possibly ragged) length.
 */
export function readGrid(bytes: Uint8Array, extension: string): Grid {
  const ext = extension.toLowerCase();
  if (!isSupportedExtension(ext)) {
    throw new PipelineError("format", "unsupported file type; use .csv or .xlsx/.xls");
  }
  if (ext === ".csv") {
    return rowsFromCsvText(new TextDecoder("utf-8").decode(bytes));
  }
  if (!startsWith(bytes, ZIP_MAGIC) && !startsWith(bytes, OLE_MAGIC)) {
    throw new PipelineError("format", "file is not a valid spreadsheet");
  }
  return rowsFromWorkbook(bytes);
}
