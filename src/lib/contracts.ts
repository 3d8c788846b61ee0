// Shared shapes for uploaded sales grids and the analysis they produce.
export type Grid = ReadonlyArray<ReadonlyArray<string>>;

export type ColumnMapping = {
  headerRowIndex: number;
  salesColumn: string;
  billColumn: string;
};

export type RowRecord = {
  // Index of the row in the source grid, not in the record list.
  rowIndex: number;
  // One trimmed value per header position.
  cells: string[];
  // By header name; when names repeat, the first column wins.
  fields: Record<string, string>;
};

export type SalesMetrics = {
  totalSales: number;
  billRowCount: number;
  uniqueBillCount: number;
};

export type StrategyName = "cache" | "model" | "heuristic";

export type StrategyAttempt = {
  strategy: StrategyName;
  ok: boolean;
  message: string;
};

export type AnalysisDiagnostics = {
  headerRowIndex: number;
  salesColumn: string;
  billColumn: string;
  usedExternalAssist: boolean;
  diagnosticMessage: string;
  attempts: StrategyAttempt[];
  droppedBlankRows: number;
  droppedTotalishRows: number;
  droppedSummaryRows: number;
  droppedMissingBillRows: number;
  finalRowsUsed: number;
};

export type AnalysisResult = {
  signature: string;
  headers: string[];
  metrics: SalesMetrics;
  diagnostics: AnalysisDiagnostics;
};

export type SalesClassification = {
  isSales: boolean;
  confidence: number; // 0–1
};

export type MetricSource = "file" | "text";

// A persisted metrics row as read back from the store.
export type StoredMetric = {
  id: number;
  sourceType: MetricSource;
  payload: Record<string, unknown>;
  totalSales: number | null;
  billRowCount: number | null;
  uniqueBillCount: number | null;
  createdAt: string;
};
