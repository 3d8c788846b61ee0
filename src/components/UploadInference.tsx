"use client";

import { useCallback, useEffect, useMemo, useState } from "react";

const HISTORY_KEY = "upload-history-v2";
const MAX_HISTORY = 8;

export type AnalyzeResponse = {
  summary: string;
  metrics: { total_sales: number; bill_row_count: number; unique_bill_count: number };
  meta: {
    file_name: string;
    header_row: number;
    sales_column: string;
    bill_column: string;
    ai_used: boolean;
    ai_message: string;
  };
  cleaning: {
    dropped_blank_rows: number;
    dropped_totalish_second_col: number;
    dropped_summary_rows: number;
    dropped_missing_bill_rows: number;
    final_rows_used: number;
  };
};

type MatchFailure = {
  headers: string[];
  salesDetected: string;
  billDetected: string;
};

type HistoryEntry = {
  fileName: string;
  totalSales: number;
  billRows: number;
  analyzedAt: string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isAnalyzeResponse(v: unknown): v is AnalyzeResponse {
  return isRecord(v) && isRecord(v.metrics) && isRecord(v.meta) && isRecord(v.cleaning) && typeof v.summary === "string";
}

function toMatchFailure(v: Record<string, unknown>): MatchFailure | null {
  if (!Array.isArray(v.headers)) return null;
  return {
    headers: v.headers.map(String),
    salesDetected: typeof v.sales_detected === "string" ? v.sales_detected : "",
    billDetected: typeof v.bill_detected === "string" ? v.bill_detected : "",
  };
}

export function UploadInference() {
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [matchFailure, setMatchFailure] = useState<MatchFailure | null>(null);
  const [result, setResult] = useState<AnalyzeResponse | null>(null);
  const [history, setHistory] = useState<HistoryEntry[]>([]);

  useEffect(() => {
    setHistory(loadHistoryEntries());
  }, []);

  const recordHistory = useCallback((res: AnalyzeResponse) => {
    setHistory((current) => {
      const entry: HistoryEntry = {
        fileName: res.meta.file_name,
        totalSales: res.metrics.total_sales,
        billRows: res.metrics.bill_row_count,
        analyzedAt: new Date().toISOString(),
      };
      const next = [entry, ...current.filter((h) => h.fileName !== entry.fileName)].slice(0, MAX_HISTORY);
      saveHistoryEntries(next);
      return next;
    });
  }, []);

  const clearHistory = useCallback(() => {
    if (typeof window === "undefined") return;
    localStorage.removeItem(HISTORY_KEY);
    setHistory([]);
  }, []);

  const handleFile = async (file: File | null) => {
    if (!file) return;
    setError(null);
    setMatchFailure(null);
    setResult(null);
    setLoading(true);
    try {
      const body = new FormData();
      body.append("file", file);
      const res = await fetch("/api/upload-analyze", { method: "POST", body });
      const data: unknown = await res.json();
      if (!res.ok) {
        const payload = isRecord(data) ? data : {};
        setError(typeof payload.error === "string" ? payload.error : "upload failed");
        setMatchFailure(toMatchFailure(payload));
        return;
      }
      if (!isAnalyzeResponse(data)) throw new Error("unexpected response");
      console.info("[upload-analyze]", data.meta);
      setResult(data);
      recordHistory(data);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : "Upload failed";
      setError(msg);
    } finally {
      setLoading(false);
    }
  };

  const droppedTotal = useMemo(() => {
    if (!result) return 0;
    const c = result.cleaning;
    return c.dropped_blank_rows + c.dropped_totalish_second_col + c.dropped_summary_rows + c.dropped_missing_bill_rows;
  }, [result]);

  return (
    <div className="grid gap-6 md:grid-cols-[220px_1fr]">
      <aside className="rounded-xl border border-slate-200 bg-white p-4 shadow-sm">
        <div className="flex items-center justify-between">
          <h3 className="text-sm font-semibold text-slate-900">Recent uploads</h3>
          {history.length > 0 && (
            <button type="button" onClick={clearHistory} className="text-[11px] font-semibold text-rose-600 hover:text-rose-800">
              Clear
            </button>
          )}
        </div>
        <div className="mt-3 space-y-2">
          {history.length === 0 ? (
            <p className="text-xs text-slate-500">No uploads yet.</p>
          ) : (
            history.map((entry) => (
              <div key={entry.fileName} className="rounded-lg border border-slate-200 px-3 py-2">
                <p className="truncate text-sm font-semibold text-slate-900">{entry.fileName}</p>
                <p className="text-[11px] text-slate-500">
                  {formatAmount(entry.totalSales)} · {entry.billRows} bills
                </p>
              </div>
            ))
          )}
        </div>
      </aside>

      <div className="space-y-5">
        <div className="rounded-xl border-2 border-dashed border-slate-200 bg-white p-6 text-center shadow-sm">
          <div className="flex flex-col items-center gap-3">
            <input
              id="file-input"
              type="file"
              accept=".csv,.xlsx,.xls"
              onChange={(e) => handleFile(e.target.files?.[0] ?? null)}
              className="hidden"
            />
            <label
              htmlFor="file-input"
              className="inline-flex cursor-pointer items-center gap-2 rounded-lg bg-indigo-600 px-4 py-2 text-sm font-medium text-white shadow hover:bg-indigo-700"
            >
              Choose file
            </label>
            <p className="text-sm text-gray-500">CSV or Excel export; the header row and columns are detected for you.</p>
          </div>
        </div>

        {loading && <p className="text-sm text-emerald-600">Analyzing upload...</p>}
        {error && <p className="text-sm text-rose-600">Error: {error}</p>}

        {matchFailure && (
          <div className="rounded-xl border border-amber-200 bg-amber-50 p-4 text-sm text-amber-900">
            <p>
              Detected sales column &quot;{matchFailure.salesDetected || "none"}&quot; and bill column &quot;
              {matchFailure.billDetected || "none"}&quot;, but neither could be matched reliably.
            </p>
            <p className="mt-2 font-semibold">Headers found:</p>
            <ul className="mt-1 list-inside list-disc">
              {matchFailure.headers.map((h, i) => (
                <li key={`${h}-${i}`}>{h}</li>
              ))}
            </ul>
          </div>
        )}

        {result && (
          <div className="space-y-3">
            <div className="rounded-xl border border-slate-200 bg-white p-4 shadow-sm">
              <h3 className="font-semibold text-slate-900">Summary</h3>
              <p className="text-sm text-slate-700">{result.summary}</p>
            </div>

            <div className="grid gap-3 md:grid-cols-3">
              <Metric label="Total sales" value={formatAmount(result.metrics.total_sales)} />
              <Metric label="Bill rows" value={String(result.metrics.bill_row_count)} />
              <Metric label="Unique bills" value={String(result.metrics.unique_bill_count)} />
            </div>

            <div className="rounded-xl border border-slate-200 bg-white p-4 text-sm shadow-sm">
              <h3 className="mb-2 font-semibold text-slate-900">Column Mapping</h3>
              <p>Header row: {result.meta.header_row}</p>
              <p>Sales column: {result.meta.sales_column}</p>
              <p>Bill column: {result.meta.bill_column}</p>
              <p className="text-xs text-gray-500">
                Source: {result.meta.ai_used ? "AI" : result.meta.ai_message}
              </p>
            </div>

            <div className="rounded-xl border border-slate-200 bg-white p-4 text-sm shadow-sm">
              <h3 className="mb-2 font-semibold text-slate-900">Cleaning</h3>
              <p>Blank rows: {result.cleaning.dropped_blank_rows}</p>
              <p>Total labels (second column): {result.cleaning.dropped_totalish_second_col}</p>
              <p>Summary rows: {result.cleaning.dropped_summary_rows}</p>
              <p>Rows without a bill: {result.cleaning.dropped_missing_bill_rows}</p>
              <p className="text-xs text-gray-500">
                {droppedTotal} dropped, {result.cleaning.final_rows_used} used
              </p>
            </div>
          </div>
        )}
      </div>
    </div>
  );
}

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <div className="rounded-xl border border-slate-200 bg-white p-4 shadow-sm">
      <p className="text-xs uppercase tracking-wide text-slate-500">{label}</p>
      <p className="text-2xl font-semibold text-slate-900">{value}</p>
    </div>
  );
}

export function formatAmount(v: number | null | undefined) {
  if (v === null || v === undefined) return "n/a";
  return v.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

function isHistoryEntry(v: unknown): v is HistoryEntry {
  return (
    isRecord(v) &&
    typeof v.fileName === "string" &&
    typeof v.totalSales === "number" &&
    typeof v.billRows === "number" &&
    typeof v.analyzedAt === "string"
  );
}

function loadHistoryEntries(): HistoryEntry[] {
  if (typeof window === "undefined") return [];
  try {
    const raw = localStorage.getItem(HISTORY_KEY);
    if (!raw) return [];
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter(isHistoryEntry) : [];
  } catch (err) {
    console.warn("Failed to load history", err);
    return [];
  }
}

function saveHistoryEntries(entries: HistoryEntry[]) {
  if (typeof window === "undefined") return;
  try {
    localStorage.setItem(HISTORY_KEY, JSON.stringify(entries));
  } catch (err) {
    console.warn("Failed to save history", err);
  }
}
