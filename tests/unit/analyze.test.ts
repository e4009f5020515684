import { describe, it, expect } from "vitest";
import {
  detectDate,
  detectReference,
  patternName,
} from "../../src/core/analyze.js";

describe("detectReference", () => {
  it("finds a labelled invoice number", () => {
    expect(detectReference("Invoice #A1234 dated 2023-01-02")).toBe(
      "Invoice-A1234",
    );
    expect(detectReference("INV: 98765")).toBe("Invoice-98765");
    expect(detectReference("INV-2023-001 attached")).toBe("Invoice-2023-001");
  });

  it("skips short identifiers and bare years, then tries the next label", () => {
    expect(detectReference("Invoice 2023 for Order #77881")).toBe("Order-77881");
    expect(detectReference("Invoice due soon")).toBeNull();
  });

  it("falls back to a reference label", () => {
    expect(detectReference("Ref: XY-001")).toBe("Ref-XY-001");
  });

  it("ignores labels embedded in other words", () => {
    expect(detectReference("Portfolio Reference Report")).toBeNull();
  });
});

describe("detectDate", () => {
  it("keeps ISO dates", () => {
    expect(detectDate("Invoice due 2023-11-05")).toBe("2023-11-05");
    expect(detectDate("Logged 2023/1/9")).toBe("2023-01-09");
  });

  it("normalizes month-name dates", () => {
    expect(detectDate("Signed on March 3, 2024")).toBe("2024-03-03");
    expect(detectDate("Sep 9, 2021")).toBe("2021-09-09");
  });

  it("reads numeric dates month-first", () => {
    expect(detectDate("Paid 11/05/2023")).toBe("2023-11-05");
  });

  it("reads numeric dates day-first when the first field cannot be a month", () => {
    expect(detectDate("Paid 25/12/2023")).toBe("2023-12-25");
  });

  it("passes through what it cannot normalize with dashes as separators", () => {
    expect(detectDate("Paid 11/05/23")).toBe("11-05-23");
    expect(detectDate("Logged 2023.13.45")).toBe("2023-13-45");
  });

  it("prefers the ISO form over other formats anywhere in the text", () => {
    expect(detectDate("Due 11/05/2023, issued 2023-10-01")).toBe("2023-10-01");
  });

  it("returns null without a date", () => {
    expect(detectDate("nothing to see")).toBeNull();
  });
});

describe("patternName", () => {
  it("joins the identifier and the date", () => {
    expect(patternName("Invoice #A1234 dated 2023-01-02")).toBe(
      "Invoice-A1234_2023-01-02",
    );
  });

  it("uses the date alone when there is no identifier", () => {
    expect(patternName("Signed on March 3, 2024")).toBe("2024-03-03");
  });

  it("falls back to the first 50 characters of the first line", () => {
    expect(patternName("\n  Quarterly Report Summary\nbody text")).toBe(
      "Quarterly_Report_Summary",
    );
    const long = "A".repeat(60);
    expect(patternName(long)).toBe("A".repeat(50));
  });

  it("counts fallback characters by code point, never splitting a surrogate pair", () => {
    expect(patternName("a" + "😀".repeat(60))).toBe("a" + "😀".repeat(49));
  });

  it("sanitizes the fallback title", () => {
    expect(patternName("Minutes: Board / Staff")).toBe("Minutes_Board_Staff");
  });

  it("finds nothing in empty text", () => {
    expect(patternName("")).toBeNull();
    expect(patternName("  \n \n")).toBeNull();
  });
});
