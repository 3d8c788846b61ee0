import type { Grid } from "./contracts";

export const SALES_KEYWORDS = [
  "sales",
  "amount",
  "amt",
  "net amt",
  "net amount",
  "total",
  "grand total",
  "invoice amount",
  "subtotal",
  "item net amt",
];

export const BILL_KEYWORDS = [
  "bill",
  "bill no",
  "bill number",
  "invoice",
  "invoice no",
  "invoice number",
  "inv",
  "ref no",
  "reference",
  "voucher",
  "receipt",
];

/**
 * Header names for the given row. Blank cells become `Col<i>` so every
 * position has a usable name.
 */
export function buildHeaders(grid: Grid, headerRowIndex: number): string[] {
  const raw = grid[headerRowIndex];
  if (headerRowIndex < 0 || !raw) return [];
  return raw.map((cell, i) => cell.trim() || `Col${i}`);
}

/** Pick the first keyword (by priority) that names a header, exact before substring. */
export function pickColumn(headers: string[], keywords: string[]): string {
  for (const k of keywords) {
    const hit = headers.find((h) => h.toLowerCase() === k.toLowerCase());
    if (hit) return hit;
  }
  for (const k of keywords) {
    const lk = k.toLowerCase();
    const hit = headers.find((h) => h.toLowerCase().includes(lk));
    if (hit) return hit;
  }
  return "";
}

/**
 * Resolve a proposed (possibly approximate) column name to an actual
 * header. Returns "" when nothing matches.
 */
export function findColumn(headers: string[], proposed: string): string {
  const target = proposed.trim().toLowerCase();
  if (!target) return "";
  const exact = headers.find((h) => h.trim().toLowerCase() === target);
  if (exact !== undefined) return exact;
  return headers.find((h) => h.toLowerCase().includes(target)) ?? "";
}
