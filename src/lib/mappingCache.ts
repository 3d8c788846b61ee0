import type { ColumnMapping } from "./contracts";
import type { Queryable } from "./db";

/**
 * Per-user store of confirmed column mappings, keyed by preview signature.
 * Upserts are last-writer-wins.
 */
export interface MappingCache {
  get(userId: string, signature: string): Promise<ColumnMapping | null>;
  upsert(userId: string, signature: string, mapping: ColumnMapping): Promise<void>;
}

export class InMemoryMappingCache implements MappingCache {
  private readonly entries = new Map<string, ColumnMapping>();

  private key(userId: string, signature: string) {
    return `${userId}\u0000${signature}`;
  }

  async get(userId: string, signature: string) {
    const hit = this.entries.get(this.key(userId, signature));
    return hit ? { ...hit } : null;
  }

  async upsert(userId: string, signature: string, mapping: ColumnMapping) {
    this.entries.set(this.key(userId, signature), { ...mapping });
  }

  get size() {
    return this.entries.size;
  }
}

type MappingRow = { header_row: number; sales_column: string; bill_column: string };

function isMappingRow(v: unknown): v is MappingRow {
  if (typeof v !== "object" || v === null) return false;
  const r: Record<string, unknown> = { ...v };
  return typeof r.header_row === "number" && typeof r.sales_column === "string" && typeof r.bill_column === "string";
}

export class PgMappingCache implements MappingCache {
  constructor(private readonly pool: Queryable) {}

  async get(userId: string, signature: string) {
    const res = await this.pool.query(
      `SELECT header_row, sales_column, bill_column FROM column_mappings WHERE user_id = $1 AND signature = $2`,
      [userId, signature],
    );
    const row = res.rows[0];
    if (!isMappingRow(row)) return null;
    return { headerRowIndex: row.header_row, salesColumn: row.sales_column, billColumn: row.bill_column };
  }

  async upsert(userId: string, signature: string, mapping: ColumnMapping) {
    await this.pool.query(
      `INSERT INTO column_mappings (user_id, signature, header_row, sales_column, bill_column)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (user_id, signature) DO UPDATE
         SET header_row = EXCLUDED.header_row,
             sales_column = EXCLUDED.sales_column,
             bill_column = EXCLUDED.bill_column,
             updated_at = now()`,
      [userId, signature, mapping.headerRowIndex, mapping.salesColumn, mapping.billColumn],
    );
  }
}
