import type { Grid, RowRecord } from "./contracts";
import { toNumeric } from "./analytics";
import { DEFAULT_SPARSE_SUMMARY_MAX_OTHER_FIELDS } from "./limits";

export type StageResult = {
  kept: RowRecord[];
  removed: Set<number>;
};

export type CleaningOptions = {
  headers: string[];
  salesColumn: string;
  billColumn: string;
  // Fields besides sales that a bill-less numeric row may carry and still count as a summary line.
  sparseSummaryMaxOtherFields?: number;
};

export type CleaningReport = {
  rows: RowRecord[];
  droppedBlank: Set<number>;
  droppedTotalish: Set<number>;
  droppedSummary: Set<number>;
  droppedMissingBill: Set<number>;
};

const EMPTY_BILL_TOKENS = new Set(["", "-", "na", "n/a", "none", "null", "nil", "nan", "0"]);

const TOTAL_WORD = /\b(grand\s*)?(sub\s*)?totals?\b/;

export function isEffectivelyEmptyBill(value: string | undefined) {
  return EMPTY_BILL_TOKENS.has((value ?? "").trim().toLowerCase());
}

/** Levenshtein distance over UTF-16 code units. */
export function editDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

export function looksLikeTotal(value: string | undefined): boolean {
  const t = (value ?? "").trim().toLowerCase();
  if (!t) return false;
  if (TOTAL_WORD.test(t)) return true;
  return editDistance(t, "total") <= 1;
}

/** One record per row after the header; short rows are padded with "". */
export function buildRecords(grid: Grid, headerRowIndex: number, headers: string[]): RowRecord[] {
  const out: RowRecord[] = [];
  for (let i = headerRowIndex + 1; i < grid.length; i++) {
    const row = grid[i];
    const cells = headers.map((_, j) => (row[j] ?? "").trim());
    // fromEntries defines own keys, so "__proto__" is kept as a column; reversed so the first duplicate wins.
    const fields = Object.fromEntries(headers.map((h, j): [string, string] => [h, cells[j]]).reverse());
    out.push({ rowIndex: i, cells, fields });
  }
  return out;
}

function partition(rows: RowRecord[], drop: (r: RowRecord) => boolean): StageResult {
  const kept: RowRecord[] = [];
  const removed = new Set<number>();
  for (const r of rows) {
    if (drop(r)) removed.add(r.rowIndex);
    else kept.push(r);
  }
  return { kept, removed };
}

export function dropBlankRows(rows: RowRecord[]): StageResult {
  return partition(rows, (r) => r.cells.every((v) => v.trim() === ""));
}

export function dropTotalishSecondColumn(rows: RowRecord[], headers: string[]): StageResult {
  if (headers.length < 2) return { kept: rows, removed: new Set() };
  return partition(rows, (r) => looksLikeTotal(r.cells[1]));
}

export function isSparseSummaryRow(r: RowRecord, billColumn: string, salesColumn: string, maxOtherFields: number) {
  if (!isEffectivelyEmptyBill(r.fields[billColumn])) return false;
  if (Number.isNaN(toNumeric(r.fields[salesColumn] ?? ""))) return false;
  let filled = 0;
  for (const v of r.cells) {
    const t = v.trim();
    if (t !== "" && t.toLowerCase() !== "nan") filled++;
  }
  // The sales cell is numeric here, so it is one of the filled cells.
  return filled - 1 <= maxOtherFields;
}

export function filterSummaryRows(
  rows: RowRecord[],
  billColumn: string,
  salesColumn: string,
  maxOtherFields = DEFAULT_SPARSE_SUMMARY_MAX_OTHER_FIELDS,
): StageResult {
  return partition(
    rows,
    (r) =>
      r.cells.some(looksLikeTotal) ||
      isSparseSummaryRow(r, billColumn, salesColumn, maxOtherFields),
  );
}

export function keepRowsWithBill(rows: RowRecord[], billColumn: string): StageResult {
  return partition(rows, (r) => isEffectivelyEmptyBill(r.fields[billColumn]));
}

/**
 * Apply the cleaning stages in their fixed order. A row dropped by one
 * stage is never seen by the next.
 */
export function runCleaningPipeline(records: RowRecord[], opts: CleaningOptions): CleaningReport {
  const blank = dropBlankRows(records);
  const totalish = dropTotalishSecondColumn(blank.kept, opts.headers);
  const summary = filterSummaryRows(
    totalish.kept,
    opts.billColumn,
    opts.salesColumn,
    opts.sparseSummaryMaxOtherFields ?? DEFAULT_SPARSE_SUMMARY_MAX_OTHER_FIELDS,
  );
  const withBill = keepRowsWithBill(summary.kept, opts.billColumn);
  return {
    rows: withBill.kept,
    droppedBlank: blank.removed,
    droppedTotalish: totalish.removed,
    droppedSummary: summary.removed,
    droppedMissingBill: withBill.removed,
  };
}
