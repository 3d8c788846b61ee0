import type { SalesMetrics } from "./contracts";

export type SalesTextRequest = {
  totalSales?: number;
  billRowCount?: number;
  uniqueBillCount?: number;
  text: string;
};

const FIRST_AMOUNT = /[0-9]+(?:\.[0-9]+)?/;
// Whole numbers that are not part of a decimal amount.
const COUNT = /(?<!\d|\d\.)\d{1,9}(?!\d|\.\d)/g;
const THOUSANDS_SEPARATOR = /(?<=\d),(?=\d{3}(?!\d))/g;

function optionalNumber(v: unknown): number | undefined | null {
  if (v === undefined || v === null) return undefined;
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function optionalCount(v: unknown): number | undefined | null {
  const n = optionalNumber(v);
  if (n === undefined || n === null) return n;
  return Number.isInteger(n) && n >= 0 ? n : null;
}

/** Validate a JSON body for the sales-text endpoint. Returns null when it is malformed. */
export function parseSalesTextBody(body: unknown): SalesTextRequest | null {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return null;
  const b: Record<string, unknown> = { ...body };
  const totalSales = optionalNumber(b.total_sales);
  const billRowCount = optionalCount(b.bill_row_count);
  const uniqueBillCount = optionalCount(b.unique_bill_count);
  if (totalSales === null || billRowCount === null || uniqueBillCount === null) return null;
  if (b.text !== undefined && b.text !== null && typeof b.text !== "string") return null;
  return { totalSales, billRowCount, uniqueBillCount, text: typeof b.text === "string" ? b.text : "" };
}

/**
 * Metrics for a text submission. Explicit figures win when all three are
 * given; otherwise the first amount in the text is the total and the next two
 * whole numbers are the bill row and unique bill counts.
 */
export function metricsFromSalesText(req: SalesTextRequest): SalesMetrics {
  if (req.totalSales !== undefined && req.billRowCount !== undefined && req.uniqueBillCount !== undefined) {
    return { totalSales: req.totalSales, billRowCount: req.billRowCount, uniqueBillCount: req.uniqueBillCount };
  }
  const text = req.text.toLowerCase().replace(THOUSANDS_SEPARATOR, "");
  const amount = FIRST_AMOUNT.exec(text);
  const counts = [...text.matchAll(COUNT)].filter((m) => m.index !== amount?.index).map((m) => Number(m[0]));
  return {
    totalSales: amount ? Number(amount[0]) : 0,
    billRowCount: counts[0] ?? 0,
    uniqueBillCount: counts[1] ?? 0,
  };
}
