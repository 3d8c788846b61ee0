import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@/lib/config";
import type { TextGenerator } from "@/lib/llm";
import { InMemoryMappingCache } from "@/lib/mappingCache";
import { InMemoryMetricsStore } from "@/lib/metricsStore";
import type { ServerDeps } from "./deps";
import { createIngestHandler } from "./ingest";

function ingestRequest(text: string, name: string) {
  const body = new FormData();
  body.append("file", new File([text], name, { type: "text/csv" }));
  return new Request("http://localhost/api/ingest", { method: "POST", body, headers: { "x-user-id": "user-3" } });
}

function setup(generator: TextGenerator | null) {
  const metrics = new InMemoryMetricsStore();
  const deps: ServerDeps = { config: loadConfig({}), cache: new InMemoryMappingCache(), metrics, generator };
  return { metrics, handle: createIngestHandler(async () => deps) };
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("POST /api/ingest", () => {
  it("records sales uploads found by the heuristics", async () => {
    const { handle, metrics } = setup(null);
    const res = await handle(ingestRequest("Invoice No,Net Amount\nINV-1,\"1,000\"\nINV-2,250.75\n", "q1.csv"));

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      type: "sales_metrics",
      file_name: "q1.csv",
      notes: "detected as sales via heuristics",
      metrics: { total_sales: 1250.75, bill_row_count: 2, unique_bill_count: 2 },
    });
    await expect(metrics.latest("user-3")).resolves.toMatchObject({
      sourceType: "file",
      payload: { file_name: "q1.csv", headers: ["Invoice No", "Net Amount"] },
      totalSales: 1250.75,
    });
  });

  it("returns flattened text for non-sales uploads", async () => {
    const generator: TextGenerator = { generate: async () => '{"is_sales": false, "confidence": 0.95}' };
    const { handle, metrics } = setup(generator);
    const res = await handle(ingestRequest("Name,Team\nAda,Platform\n", "people.csv"));

    await expect(res.json()).resolves.toEqual({
      type: "knowledge",
      file_name: "people.csv",
      notes: "classified as non-sales",
      text: "Name, Team\nAda, Platform\n",
    });
    await expect(metrics.latest("user-3")).resolves.toBeNull();
  });

  it("rejects malformed CSV", async () => {
    const { handle } = setup(null);
    const res = await handle(ingestRequest('a,b\n1,"open\n', "broken.csv"));
    expect(res.status).toBe(400);
  });
});
