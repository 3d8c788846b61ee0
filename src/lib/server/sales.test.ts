import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@/lib/config";
import { InMemoryMappingCache } from "@/lib/mappingCache";
import { InMemoryMetricsStore, type MetricsEntry } from "@/lib/metricsStore";
import type { ServerDeps } from "./deps";
import {
  createGetSalesHandler,
  createLatestSalesHandler,
  createListSalesHandler,
  createSalesTextHandler,
  pageFrom,
} from "./sales";

const entry = (fileName: string, totalSales: number): MetricsEntry => ({
  sourceType: "file",
  fileName,
  headers: ["Bill No", "Amount"],
  metrics: { totalSales, billRowCount: 2, uniqueBillCount: 2 },
});

function setup() {
  let t = Date.UTC(2026, 2, 1);
  const metrics = new InMemoryMetricsStore(() => new Date((t += 1000)));
  const deps: ServerDeps = { config: loadConfig({}), cache: new InMemoryMappingCache(), metrics, generator: null };
  const resolve = async () => deps;
  return {
    metrics,
    list: createListSalesHandler(resolve),
    latest: createLatestSalesHandler(resolve),
    get: createGetSalesHandler(resolve),
    text: createSalesTextHandler(resolve),
  };
}

function getRequest(path: string, userId = "user-1") {
  return new Request(`http://localhost${path}`, { headers: { "x-user-id": userId } });
}

function postRequest(body: string, userId = "user-1") {
  return new Request("http://localhost/api/sales-text", {
    method: "POST",
    body,
    headers: { "content-type": "application/json", "x-user-id": userId },
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("pageFrom", () => {
  it.each([
    ["", { limit: 20, offset: 0 }],
    ["limit=0", { limit: 20, offset: 0 }],
    ["limit=101", { limit: 20, offset: 0 }],
    ["limit=-3", { limit: 20, offset: 0 }],
    ["limit=abc&offset=xyz", { limit: 20, offset: 0 }],
    ["limit=100&offset=40", { limit: 100, offset: 40 }],
    ["limit=5&offset=-5", { limit: 5, offset: 0 }],
  ])("reads %j", (query, page) => {
    expect(pageFrom(new URLSearchParams(query))).toEqual(page);
  });
});

describe("GET /api/sales", () => {
  it("lists only the caller's metrics, newest first", async () => {
    const { metrics, list } = setup();
    await metrics.record("user-1", entry("jan.csv", 100));
    await metrics.record("user-2", entry("other.csv", 999));
    await metrics.record("user-1", entry("feb.csv", 200));

    const res = await list(getRequest("/api/sales"));
    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      items: [
        {
          id: 3,
          source_type: "file",
          payload: { file_name: "feb.csv", headers: ["Bill No", "Amount"] },
          total_sales: 200,
          bill_row_count: 2,
          unique_bill_count: 2,
          created_at: "2026-03-01T00:00:03.000Z",
        },
        {
          id: 1,
          source_type: "file",
          payload: { file_name: "jan.csv", headers: ["Bill No", "Amount"] },
          total_sales: 100,
          bill_row_count: 2,
          unique_bill_count: 2,
          created_at: "2026-03-01T00:00:01.000Z",
        },
      ],
      limit: 20,
      offset: 0,
    });
  });

  it("applies paging and echoes the effective values", async () => {
    const { metrics, list } = setup();
    for (let i = 1; i <= 3; i++) await metrics.record("user-1", entry(`m${i}.csv`, i));

    const body = await (await list(getRequest("/api/sales?limit=1&offset=1"))).json();
    expect(body.limit).toBe(1);
    expect(body.offset).toBe(1);
    expect(body.items.map((m: { id: number }) => m.id)).toEqual([2]);

    const fallback = await (await list(getRequest("/api/sales?limit=500&offset=-2"))).json();
    expect([fallback.limit, fallback.offset]).toEqual([20, 0]);
    expect(fallback.items).toHaveLength(3);
  });

  it("uses the anonymous user without a header", async () => {
    const { metrics, list } = setup();
    await metrics.record("anonymous", entry("anon.csv", 5));
    const body = await (await list(new Request("http://localhost/api/sales"))).json();
    expect(body.items).toHaveLength(1);
  });

  it("maps store failures to a 500", async () => {
    const { metrics, list } = setup();
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(metrics, "list").mockRejectedValue(new Error("db down"));
    const res = await list(getRequest("/api/sales"));
    expect(res.status).toBe(500);
    await expect(res.json()).resolves.toEqual({ error: "db down" });
  });
});

describe("GET /api/sales/latest", () => {
  it("returns 404 when the caller has nothing stored", async () => {
    const { metrics, latest } = setup();
    await metrics.record("user-2", entry("other.csv", 1));
    const res = await latest(getRequest("/api/sales/latest"));
    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ error: "no sales metrics" });
  });

  it("returns the newest metric", async () => {
    const { metrics, latest } = setup();
    await metrics.record("user-1", entry("jan.csv", 100));
    await metrics.record("user-1", entry("feb.csv", 200));
    const res = await latest(getRequest("/api/sales/latest"));
    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({ id: 2, total_sales: 200, payload: { file_name: "feb.csv" } });
  });
});

describe("GET /api/sales/[id]", () => {
  it("returns the caller's metric", async () => {
    const { metrics, get } = setup();
    await metrics.record("user-1", entry("jan.csv", 100));
    const res = await get(getRequest("/api/sales/1"), "1");
    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      id: 1,
      source_type: "file",
      payload: { file_name: "jan.csv", headers: ["Bill No", "Amount"] },
      total_sales: 100,
      bill_row_count: 2,
      unique_bill_count: 2,
      created_at: "2026-03-01T00:00:01.000Z",
    });
  });

  it.each([
    ["an unknown id", "9"],
    ["another user's id", "2"],
    ["a non-numeric id", "abc"],
    ["a zero id", "0"],
  ])("returns 404 for %s", async (_label, id) => {
    const { metrics, get } = setup();
    await metrics.record("user-1", entry("jan.csv", 100));
    await metrics.record("user-2", entry("theirs.csv", 300));
    const res = await get(getRequest(`/api/sales/${id}`), id);
    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ error: "not found" });
  });
});

describe("POST /api/sales-text", () => {
  it("rejects a body that is not JSON", async () => {
    const { text } = setup();
    const res = await text(postRequest("total: 5"));
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: "invalid body" });
  });

  it("rejects figures of the wrong type", async () => {
    const { text } = setup();
    const res = await text(postRequest(JSON.stringify({ total_sales: "lots", text: "x" })));
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: "invalid body" });
  });

  it("stores metrics read from the text for the caller", async () => {
    const { metrics, text } = setup();
    const res = await text(postRequest(JSON.stringify({ text: "Total 1,500.50 from 42 bills, 40 unique" }), "user-7"));

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      status: "ok",
      metrics: { total_sales: 1500.5, bill_row_count: 42, unique_bill_count: 40 },
    });
    await expect(metrics.list("user-7", { limit: 20, offset: 0 })).resolves.toEqual([
      {
        id: 1,
        sourceType: "text",
        payload: { source: "text", raw_text: "Total 1,500.50 from 42 bills, 40 unique" },
        totalSales: 1500.5,
        billRowCount: 42,
        uniqueBillCount: 40,
        createdAt: "2026-03-01T00:00:01.000Z",
      },
    ]);
  });

  it("stores explicit figures as given", async () => {
    const { text } = setup();
    const res = await text(postRequest(JSON.stringify({ total_sales: 80, bill_row_count: 4, unique_bill_count: 3 })));
    await expect(res.json()).resolves.toEqual({
      status: "ok",
      metrics: { total_sales: 80, bill_row_count: 4, unique_bill_count: 3 },
    });
  });
});
