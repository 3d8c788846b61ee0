import { afterEach, describe, expect, it, vi } from "vitest";
import { aggregateMetrics, round2, simpleSummary, summarizeMetrics, toNumeric, uniqueCount } from "./analytics";
import type { RowRecord } from "./contracts";
import type { TextGenerator } from "./llm";

function rows(...pairs: [string, string][]): RowRecord[] {
  return pairs.map(([bill, amount], i) => ({ rowIndex: i + 1, cells: [bill, amount], fields: { Bill: bill, Amount: amount } }));
}

describe("toNumeric", () => {
  it("drops currency symbols, separators and spaces", () => {
    expect(toNumeric("₹1,234.50")).toBe(1234.5);
    expect(toNumeric(" $ 2 000 ")).toBe(2000);
    expect(toNumeric("-12.5")).toBe(-12.5);
    expect(toNumeric(".75")).toBe(0.75);
  });

  it.each(["—", "", "abc", "1.2.3", "12-3", "-"])("returns NaN for %j", (text) => {
    expect(toNumeric(text)).toBeNaN();
  });
});

describe("round2", () => {
  it("rounds half away from zero", () => {
    expect(round2(0.125)).toBe(0.13);
    expect(round2(-0.125)).toBe(-0.13);
    expect(round2(0.1 + 0.2)).toBe(0.3);
  });
});

describe("aggregateMetrics", () => {
  it("sums parsable amounts and counts distinct bills", () => {
    const m = aggregateMetrics(rows(["B1", "100"], ["B1", "₹50.25"], ["B2", "—"], ["b2", "10"]), "Amount", "Bill");
    expect(m).toEqual({ totalSales: 160.25, billRowCount: 4, uniqueBillCount: 3 });
  });

  it("never counts more unique bills than rows", () => {
    const m = aggregateMetrics(rows(["B1", "1"], ["B1", "2"], [" B1 ", "3"]), "Amount", "Bill");
    expect(m.uniqueBillCount).toBe(1);
    expect(m.uniqueBillCount).toBeLessThanOrEqual(m.billRowCount);
  });

  it("reports zero for an empty row set", () => {
    expect(aggregateMetrics([], "Amount", "Bill")).toEqual({ totalSales: 0, billRowCount: 0, uniqueBillCount: 0 });
  });
});

describe("uniqueCount", () => {
  it("ignores blank values", () => {
    expect(uniqueCount(rows(["", "1"], ["  ", "2"], ["B1", "3"]), "Bill")).toBe(1);
  });
});

describe("summaries", () => {
  const metrics = { totalSales: 300, billRowCount: 2, uniqueBillCount: 2 };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats the plain sentence", () => {
    expect(simpleSummary(metrics)).toBe("Total sales = 300.00, bill rows = 2, unique bill IDs = 2.");
  });

  it("uses the plain sentence without a generator", async () => {
    await expect(summarizeMetrics(metrics, null, 1000)).resolves.toBe(simpleSummary(metrics));
  });

  it("uses the model sentence when one comes back", async () => {
    const generate = vi.fn(async () => "  You sold 300.00 across 2 bills.  ");
    const generator: TextGenerator = { generate };
    await expect(summarizeMetrics(metrics, generator, 1000)).resolves.toBe("You sold 300.00 across 2 bills.");
    expect(generate).toHaveBeenCalledWith(expect.stringContaining("Total sales = 300.00"), { maxOutputTokens: 120 });
  });

  it("falls back when the model fails or answers with nothing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const failing: TextGenerator = { generate: async () => Promise.reject(new Error("boom")) };
    const empty: TextGenerator = { generate: async () => "   " };
    await expect(summarizeMetrics(metrics, failing, 1000)).resolves.toBe(simpleSummary(metrics));
    await expect(summarizeMetrics(metrics, empty, 1000)).resolves.toBe(simpleSummary(metrics));
  });
});
