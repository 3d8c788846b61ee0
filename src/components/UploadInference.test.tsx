// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { UploadInference, formatAmount } from "./UploadInference";

const okBody = {
  summary: "Total sales = 300.00, bill rows = 2, unique bill IDs = 2.",
  metrics: { total_sales: 300, bill_row_count: 2, unique_bill_count: 2 },
  meta: {
    file_name: "march.csv",
    header_row: 0,
    sales_column: "Amount",
    bill_column: "Bill No",
    ai_used: false,
    ai_message: "heuristic",
    attempts: [],
  },
  cleaning: {
    dropped_blank_rows: 1,
    dropped_totalish_second_col: 1,
    dropped_summary_rows: 0,
    dropped_missing_bill_rows: 2,
    final_rows_used: 2,
  },
};

function stubFetch(ok: boolean, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => ({ ok, json: async () => body }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function chooseFile() {
  const input = screen.getByLabelText("Choose file");
  const file = new File(["Date,Bill No,Amount\n"], "march.csv", { type: "text/csv" });
  fireEvent.change(input, { target: { files: [file] } });
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
});

afterEach(() => {
  cleanup();
  localStorage.clear();
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("UploadInference", () => {
  it("posts the file and shows metrics, mapping and cleaning counts", async () => {
    const fetchMock = stubFetch(true, okBody);
    render(<UploadInference />);
    chooseFile();

    expect(await screen.findByText(okBody.summary)).toBeTruthy();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe("/api/upload-analyze");
    expect(screen.getByText("Sales column: Amount")).toBeTruthy();
    expect(screen.getByText("Bill column: Bill No")).toBeTruthy();
    expect(screen.getByText("Source: heuristic")).toBeTruthy();
    expect(screen.getByText("4 dropped, 2 used")).toBeTruthy();
    expect(screen.getByText("300.00")).toBeTruthy();
  });

  it("adds the upload to the saved history", async () => {
    stubFetch(true, okBody);
    render(<UploadInference />);
    chooseFile();

    expect(await screen.findByText("march.csv")).toBeTruthy();
    const saved: unknown = JSON.parse(localStorage.getItem("upload-history-v2") ?? "[]");
    expect(saved).toEqual([
      expect.objectContaining({ fileName: "march.csv", totalSales: 300, billRows: 2 }),
    ]);
  });

  it("shows the headers it found when columns cannot be matched", async () => {
    stubFetch(false, {
      error: "could not match detected columns",
      headers: ["Date", "Qty"],
      sales_detected: "Revenue",
      bill_detected: "",
    });
    render(<UploadInference />);
    chooseFile();

    expect(await screen.findByText("Error: could not match detected columns")).toBeTruthy();
    expect(screen.getByText("Qty")).toBeTruthy();
    expect(localStorage.getItem("upload-history-v2")).toBeNull();
  });

  it("restores history saved by an earlier session", () => {
    localStorage.setItem(
      "upload-history-v2",
      JSON.stringify([{ fileName: "feb.xlsx", totalSales: 1234.5, billRows: 9, analyzedAt: "2024-02-01T00:00:00.000Z" }]),
    );
    render(<UploadInference />);
    expect(screen.getByText("feb.xlsx")).toBeTruthy();
    expect(screen.getByText("1,234.50 · 9 bills")).toBeTruthy();
  });
});

describe("formatAmount", () => {
  it("prints two decimals with grouping", () => {
    expect(formatAmount(1234.5)).toBe("1,234.50");
    expect(formatAmount(null)).toBe("n/a");
  });
});
