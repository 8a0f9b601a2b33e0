/**
 * ReceiptLens - TypeScript type definitions
 */

/**
 * Axis-aligned box in the unit square (0–1 on both axes).
 */
export interface BoundingBox {
  minX: number;
  minY: number;
  width: number;
  height: number;
}

/**
 * One text span produced by an OCR provider.
 */
export interface DetectedFragment {
  text: string;
  boundingBox: BoundingBox;
  /** Recognition confidence (0–1) */
  confidence: number;
}

/**
 * Where `minY = 0` sits on the image.
 * ML Kit / Tesseract / Cloud Vision use "top-left"; Apple Vision uses "bottom-left".
 */
export type CoordinateOrigin = "top-left" | "bottom-left";

/**
 * Payment modes an expense form accepts
 */
export enum PaymentMode {
  CASH = "cash",
  UPI = "upi",
  CHEQUE = "cheque",
  CARD = "card",
}

/**
 * Value kinds drive which inline pattern a label is searched with
 */
export type FieldKind = "text" | "numeric" | "date";

export interface FieldDefinition {
  readonly key: string;
  readonly kind: FieldKind;
  /** Lower-case label variants, e.g. "qty", "unit price" */
  readonly aliases: readonly string[];
}

export interface FieldDefinitionTable {
  readonly version: string;
  readonly fields: readonly FieldDefinition[];
}

/**
 * Structured expense record used to pre-fill an expense-entry form.
 * Every text field is editable by the user, so absence is "" rather than null.
 */
export interface ReceiptAnalysisResult {
  /** ISO-8601 calendar date (YYYY-MM-DD) */
  readonly date: string | null;
  readonly amount: number | null;
  readonly description: string;
  readonly categories: readonly string[];
  readonly paymentMode: PaymentMode;
  readonly itemType: string;
  readonly item: string;
  readonly brand: string;
  readonly spec: string;
  /** Cleaned numeric string, e.g. "500" */
  readonly quantity: string;
  readonly unitOfMeasure: string;
  /** Cleaned numeric string, e.g. "20000" */
  readonly unitPrice: string;
}

export interface AnalysisMetadata {
  /** Fragments handed to the analyzer */
  fragmentCount: number;
  /** Fragments left after confidence filtering and trimming */
  usableFragmentCount: number;
  resolvedFieldCount: number;
  confidenceScore: number;
  processingTimeMs: number;
  fieldDefinitionsVersion: string;
  ocrProvider?: string;
  warnings?: string[];
}

/**
 * Full outcome of one analysis: the typed record plus the raw field map and
 * which input fragments each field was read from.
 */
export interface ReceiptAnalysisReport {
  result: ReceiptAnalysisResult;
  /** Raw resolved strings for every field key, including keys outside `result` */
  fields: Record<string, string>;
  /** Field key → indices into the caller's fragment array */
  sources: Record<string, number[]>;
  metadata: AnalysisMetadata;
}
