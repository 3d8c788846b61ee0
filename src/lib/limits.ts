// Centralized limits and guardrails for ingestion and runtime behavior.
export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024; // 50 MB hard cap
export const PREVIEW_ROWS = 5; // rows hashed for the signature and shown to the model
export const HEURISTIC_SCAN_ROWS = 5;
export const DEFAULT_DETECT_TIMEOUT_MS = 15_000;
export const DEFAULT_SPARSE_SUMMARY_MAX_OTHER_FIELDS = 1;
export const KNOWLEDGE_TEXT_ROWS = 200; // rows flattened when an upload is not sales data
export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export const SUPPORTED_EXTENSIONS = [".csv", ".xlsx", ".xls"] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const SUPPORTED_MIME_TYPES = [
  "text/csv",
  "application/csv",
  "application/vnd.ms-excel",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
];
