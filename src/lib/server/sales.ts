import { NextResponse } from "next/server";
import type { StoredMetric } from "@/lib/contracts";
import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from "@/lib/limits";
import type { Page } from "@/lib/metricsStore";
import { metricsFromSalesText, parseSalesTextBody } from "@/lib/salesText";
import type { ServerDeps } from "./deps";
import { errorResponse, userIdFrom } from "./upload";

type ResolveDeps = () => Promise<ServerDeps>;

function intParam(v: string | null) {
  return v !== null && /^-?\d+$/.test(v.trim()) ? Number(v) : null;
}

// Out-of-range limits fall back to the default rather than being clamped to the bound.
export function pageFrom(params: URLSearchParams): Page {
  const limit = intParam(params.get("limit"));
  const offset = intParam(params.get("offset"));
  return {
    limit: limit === null || limit <= 0 || limit > MAX_PAGE_LIMIT ? DEFAULT_PAGE_LIMIT : limit,
    offset: offset === null || offset < 0 ? 0 : offset,
  };
}

export function metricBody(m: StoredMetric) {
  return {
    id: m.id,
    source_type: m.sourceType,
    payload: m.payload,
    total_sales: m.totalSales,
    bill_row_count: m.billRowCount,
    unique_bill_count: m.uniqueBillCount,
    created_at: m.createdAt,
  };
}

export function createListSalesHandler(resolveDeps: ResolveDeps) {
  return async function handle(request: Request) {
    try {
      const page = pageFrom(new URL(request.url).searchParams);
      const { metrics } = await resolveDeps();
      const items = await metrics.list(userIdFrom(request), page);
      return NextResponse.json({ items: items.map(metricBody), limit: page.limit, offset: page.offset });
    } catch (err: unknown) {
      return errorResponse(err, "List sales metrics error");
    }
  };
}

export function createLatestSalesHandler(resolveDeps: ResolveDeps) {
  return async function handle(request: Request) {
    try {
      const { metrics } = await resolveDeps();
      const latest = await metrics.latest(userIdFrom(request));
      if (!latest) return NextResponse.json({ error: "no sales metrics" }, { status: 404 });
      return NextResponse.json(metricBody(latest));
    } catch (err: unknown) {
      return errorResponse(err, "Latest sales metric error");
    }
  };
}

export function createGetSalesHandler(resolveDeps: ResolveDeps) {
  return async function handle(request: Request, id: string) {
    try {
      const metricId = intParam(id);
      if (metricId === null || metricId <= 0) return NextResponse.json({ error: "not found" }, { status: 404 });
      const { metrics } = await resolveDeps();
      const found = await metrics.get(userIdFrom(request), metricId);
      if (!found) return NextResponse.json({ error: "not found" }, { status: 404 });
      return NextResponse.json(metricBody(found));
    } catch (err: unknown) {
      return errorResponse(err, "Get sales metric error");
    }
  };
}

/**
 * POST handler for sales figures sent as JSON: explicit totals, or free text
 * the figures are read from.
 */
export function createSalesTextHandler(resolveDeps: ResolveDeps) {
  return async function handle(request: Request) {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return NextResponse.json({ error: "invalid body" }, { status: 400 });
    }
    const parsed = parseSalesTextBody(body);
    if (!parsed) return NextResponse.json({ error: "invalid body" }, { status: 400 });

    try {
      const { metrics } = await resolveDeps();
      const m = metricsFromSalesText(parsed);
      await metrics.record(userIdFrom(request), { sourceType: "text", rawText: parsed.text, metrics: m });
      return NextResponse.json({
        status: "ok",
        metrics: { total_sales: m.totalSales, bill_row_count: m.billRowCount, unique_bill_count: m.uniqueBillCount },
      });
    } catch (err: unknown) {
      return errorResponse(err, "Sales text insert error");
    }
  };
}
