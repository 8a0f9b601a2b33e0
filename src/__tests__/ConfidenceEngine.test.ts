/**
 * ConfidenceEngine – unit tests
 */
import { ConfidenceEngine } from "../core/confidence";
import { PaymentMode } from "../types";
import type { ReceiptAnalysisResult } from "../types";

// ─── helpers ──────────────────────────────────────────────────────────────────

function makeResult(
  overrides: Partial<ReceiptAnalysisResult> = {},
): ReceiptAnalysisResult {
  return {
    date: null,
    amount: null,
    description: "",
    categories: [],
    paymentMode: PaymentMode.CASH,
    itemType: "",
    item: "",
    brand: "",
    spec: "",
    quantity: "",
    unitOfMeasure: "",
    unitPrice: "",
    ...overrides,
  };
}

const complete = makeResult({
  date: "2024-03-12",
  amount: 20000,
  description: "Cement for slab",
  item: "Cement",
  quantity: "50",
  unitPrice: "400",
});

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("ConfidenceEngine", () => {
  const engine = new ConfidenceEngine();

  it("scores an empty record as zero", () => {
    expect(engine.score(makeResult(), [])).toEqual({
      overall: 0,
      ocr: 0,
      fields: 0,
      numeric: 0,
    });
  });

  it("combines OCR, population and consistency scores", () => {
    const breakdown = engine.score(complete, [0.9, 0.8]);
    expect(breakdown.ocr).toBeCloseTo(0.85, 4);
    expect(breakdown.fields).toBe(1);
    expect(breakdown.numeric).toBe(1);
    expect(breakdown.overall).toBeCloseTo(0.955, 4);
  });

  it("counts populated core fields", () => {
    const breakdown = engine.score(makeResult({ amount: 10, item: "Sand" }), []);
    expect(breakdown.fields).toBe(0.3333);
  });

  it("penalises quantity × unit price far from the amount", () => {
    const breakdown = engine.score({ ...complete, unitPrice: "300" }, [1]);
    expect(breakdown.numeric).toBe(0.3);
  });

  it("accepts quantity × unit price within one percent", () => {
    const breakdown = engine.score(
      makeResult({ amount: 100, quantity: "3", unitPrice: "33.5" }),
      [1],
    );
    expect(breakdown.numeric).toBe(1);
  });

  it("gives partial credit when quantity or unit price is missing", () => {
    expect(engine.score({ ...complete, unitPrice: "" }, [1]).numeric).toBe(0.7);
  });

  it("rounds to four decimals", () => {
    const breakdown = engine.score(complete, [0.33333, 0.33333, 0.33334]);
    expect(breakdown.ocr).toBe(0.3333);
  });
});
