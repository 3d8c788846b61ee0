import type { MetricSource, SalesMetrics, StoredMetric } from "./contracts";
import type { Queryable } from "./db";

export type MetricsEntry =
  | { sourceType: "file"; fileName: string; headers: string[]; metrics: SalesMetrics }
  | { sourceType: "text"; rawText: string; metrics: SalesMetrics };

export type Page = {
  limit: number;
  offset: number;
};

/**
 * Per-user history of computed metrics. Reads never cross users: an id
 * owned by someone else is reported as missing.
 */
export interface MetricsStore {
  record(userId: string, entry: MetricsEntry): Promise<void>;
  // Newest first.
  list(userId: string, page: Page): Promise<StoredMetric[]>;
  latest(userId: string): Promise<StoredMetric | null>;
  get(userId: string, id: number): Promise<StoredMetric | null>;
}

export function payloadOf(entry: MetricsEntry): Record<string, unknown> {
  if (entry.sourceType === "text") return { source: "text", raw_text: entry.rawText };
  return { file_name: entry.fileName, headers: entry.headers };
}

export class InMemoryMetricsStore implements MetricsStore {
  private readonly rows: { userId: string; metric: StoredMetric }[] = [];
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async record(userId: string, entry: MetricsEntry) {
    this.rows.push({
      userId,
      metric: {
        id: this.nextId++,
        sourceType: entry.sourceType,
        payload: payloadOf(entry),
        totalSales: entry.metrics.totalSales,
        billRowCount: entry.metrics.billRowCount,
        uniqueBillCount: entry.metrics.uniqueBillCount,
        createdAt: this.now().toISOString(),
      },
    });
  }

  private owned(userId: string) {
    return this.rows
      .filter((r) => r.userId === userId)
      .map((r) => ({ ...r.metric }))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id);
  }

  async list(userId: string, { limit, offset }: Page) {
    return this.owned(userId).slice(offset, offset + limit);
  }

  async latest(userId: string) {
    return this.owned(userId)[0] ?? null;
  }

  async get(userId: string, id: number) {
    return this.owned(userId).find((m) => m.id === id) ?? null;
  }
}

const SELECT_METRIC = `SELECT id, source_type, payload, total_sales::float8 AS total_sales,
  bill_row_count, unique_bill_count, created_at
  FROM sales_metrics`;

type MetricRow = {
  id: string | number;
  source_type: MetricSource;
  payload: Record<string, unknown>;
  total_sales: number | null;
  bill_row_count: number | null;
  unique_bill_count: number | null;
  created_at: Date | string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

const numberOrNull = (v: unknown) => v === null || typeof v === "number";

function isMetricRow(v: unknown): v is MetricRow {
  if (!isRecord(v)) return false;
  return (
    (typeof v.id === "string" || typeof v.id === "number") &&
    (v.source_type === "file" || v.source_type === "text") &&
    isRecord(v.payload) &&
    numberOrNull(v.total_sales) &&
    numberOrNull(v.bill_row_count) &&
    numberOrNull(v.unique_bill_count) &&
    (v.created_at instanceof Date || typeof v.created_at === "string")
  );
}

function toStoredMetric(row: MetricRow): StoredMetric {
  return {
    // BIGSERIAL comes back as text from pg.
    id: Number(row.id),
    sourceType: row.source_type,
    payload: row.payload,
    totalSales: row.total_sales,
    billRowCount: row.bill_row_count,
    uniqueBillCount: row.unique_bill_count,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
  };
}

export class PgMetricsStore implements MetricsStore {
  constructor(private readonly pool: Queryable) {}

  async record(userId: string, entry: MetricsEntry) {
    await this.pool.query(
      `INSERT INTO sales_metrics (user_id, source_type, payload, total_sales, bill_row_count, unique_bill_count)
       VALUES ($1, $2, $3::jsonb, $4, $5, $6)`,
      [
        userId,
        entry.sourceType,
        JSON.stringify(payloadOf(entry)),
        entry.metrics.totalSales,
        entry.metrics.billRowCount,
        entry.metrics.uniqueBillCount,
      ],
    );
  }

  private async select(sql: string, values: unknown[]) {
    const res = await this.pool.query(sql, values);
    return res.rows.filter(isMetricRow).map(toStoredMetric);
  }

  async list(userId: string, { limit, offset }: Page) {
    return this.select(`${SELECT_METRIC} WHERE user_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2 OFFSET $3`, [
      userId,
      limit,
      offset,
    ]);
  }

  async latest(userId: string) {
    const [row] = await this.select(`${SELECT_METRIC} WHERE user_id = $1 ORDER BY created_at DESC, id DESC LIMIT 1`, [
      userId,
    ]);
    return row ?? null;
  }

  async get(userId: string, id: number) {
    const [row] = await this.select(`${SELECT_METRIC} WHERE id = $1 AND user_id = $2`, [id, userId]);
    return row ?? null;
  }
}
