import { Pool } from "pg";

// The slice of a pg Pool the stores use.
export type Queryable = {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
};

let poolSingleton: Promise<Pool> | null = null;

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS column_mappings (
    id BIGSERIAL PRIMARY KEY,
    user_id TEXT NOT NULL,
    signature TEXT NOT NULL,
    header_row INT NOT NULL,
    sales_column TEXT NOT NULL,
    bill_column TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    UNIQUE (user_id, signature)
  )`,
  `CREATE TABLE IF NOT EXISTS sales_metrics (
    id BIGSERIAL PRIMARY KEY,
    user_id TEXT NOT NULL,
    source_type TEXT NOT NULL,
    payload JSONB NOT NULL,
    total_sales NUMERIC,
    bill_row_count INT,
    unique_bill_count INT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS sales_metrics_user_id_idx ON sales_metrics (user_id, created_at DESC)`,
];

async function connect(databaseUrl: string) {
  const pool = new Pool({ connectionString: databaseUrl, connectionTimeoutMillis: 5_000 });
  for (const stmt of SCHEMA) {
    await pool.query(stmt);
  }
  return pool;
}

/**
 * Lazily create the shared Postgres pool and make sure the tables exist.
 */
export function getPool(databaseUrl: string): Promise<Pool> {
  if (!poolSingleton) {
    poolSingleton = connect(databaseUrl).catch((err: unknown) => {
      poolSingleton = null;
      throw err;
    });
  }
  return poolSingleton;
}
