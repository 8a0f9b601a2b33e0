/**
 * ReceiptLens – Confidence Scoring
 *
 * Composite score (0–1) for one analysis, from:
 *  1. OCR confidence of the fragments the fields were read from
 *  2. Field population ratio of the form's core fields
 *  3. Numeric consistency – does quantity × unit price match the amount?
 */

import type { ReceiptAnalysisResult } from "../types";

// ─── Weights ─────────────────────────────────────────────────────────────────

const WEIGHT_OCR = 0.3;
const WEIGHT_FIELDS = 0.5;
const WEIGHT_NUMERIC = 0.2;

/** Relative tolerance for quantity × unitPrice ≈ amount */
const AMOUNT_TOLERANCE = 0.01;

const CORE_FIELDS = [
  "date",
  "amount",
  "description",
  "item",
  "quantity",
  "unitPrice",
] as const satisfies ReadonlyArray<keyof ReceiptAnalysisResult>;

export interface ConfidenceBreakdown {
  overall: number;
  ocr: number;
  fields: number;
  numeric: number;
}

function round(n: number): number {
  return parseFloat(n.toFixed(4));
}

export class ConfidenceEngine {
  /**
   * @param result           – assembled record
   * @param sourceConfidence – OCR confidence of every fragment a field consumed
   */
  score(
    result: ReceiptAnalysisResult,
    sourceConfidence: readonly number[],
  ): ConfidenceBreakdown {
    const ocr = this.scoreOCR(sourceConfidence);
    const fields = this.scoreFieldPopulation(result);
    const numeric = this.scoreNumericConsistency(result);

    return {
      overall: round(
        ocr * WEIGHT_OCR + fields * WEIGHT_FIELDS + numeric * WEIGHT_NUMERIC,
      ),
      ocr: round(ocr),
      fields: round(fields),
      numeric: round(numeric),
    };
  }

  // ─── Component scorers ────────────────────────────────────────────────────

  private scoreOCR(confidences: readonly number[]): number {
    if (confidences.length === 0) return 0;
    return confidences.reduce((sum, c) => sum + c, 0) / confidences.length;
  }

  private scoreFieldPopulation(result: ReceiptAnalysisResult): number {
    const filled = CORE_FIELDS.filter((key) => {
      const value = result[key];
      return value !== null && value !== "";
    }).length;
    return filled / CORE_FIELDS.length;
  }

  private scoreNumericConsistency(result: ReceiptAnalysisResult): number {
    if (result.amount === null) return 0;

    const quantity = Number(result.quantity);
    const unitPrice = Number(result.unitPrice);
    if (!result.quantity || !result.unitPrice) return 0.7;
    if (!Number.isFinite(quantity) || !Number.isFinite(unitPrice)) return 0.7;

    const expected = quantity * unitPrice;
    const scale = Math.max(Math.abs(result.amount), 1);
    return Math.abs(expected - result.amount) / scale <= AMOUNT_TOLERANCE
      ? 1
      : 0.3;
  }
}
