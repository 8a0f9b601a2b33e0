/**
 * ReceiptLens - Receipt & expense-voucher field extraction for Node.js
 *
 * Turns positioned OCR text fragments into a structured expense record,
 * with optional Tesseract.js and Google Cloud Vision OCR front ends.
 *
 * @packageDocumentation
 */

// ─── Pipeline ────────────────────────────────────────────────────────────────
export { ReceiptAnalyzer, ReceiptScanner } from "./core";
export type { ReceiptAnalyzerOptions, ReceiptScannerOptions } from "./core";

// Types
export { PaymentMode } from "./types";
export type {
  BoundingBox,
  DetectedFragment,
  CoordinateOrigin,
  FieldKind,
  FieldDefinition,
  FieldDefinitionTable,
  ReceiptAnalysisResult,
  ReceiptAnalysisReport,
  AnalysisMetadata,
} from "./types";
export type { ImageInput, ReceiptScanOptions } from "./schema/ScanOptions";

// Configuration
export {
  loadFieldDefinitions,
  DEFAULT_FIELD_DEFINITIONS,
} from "./config/fieldDefinitions";
export {
  resolveAnalyzerSettings,
  DEFAULT_ANALYZER_SETTINGS,
} from "./config/options";
export type { AnalyzerSettings, AnalyzerTuning } from "./config/options";

// OCR layer
export { OCREngine, TesseractOCR, CloudVisionOCR, OCRError } from "./ocr";
export type {
  OCRProvider,
  OCROptions,
  OCRResult,
  OCRFailureKind,
  CloudVisionOCRConfig,
} from "./ocr";

// Parser layer
export {
  parseDate,
  cleanNumeric,
  parseDecimal,
  classifyPaymentMode,
  splitCategories,
} from "./parser";

// Confidence scoring
export { ConfidenceEngine } from "./core";
export type { ConfidenceBreakdown } from "./core";

// Validation & errors
export {
  validateImageInput,
  validateScanOptions,
  ReceiptAnalysisError,
} from "./core";
export type { ValidationResult, ReceiptAnalysisErrorCode } from "./core";

// Logger
export { createLogger, silentLogger } from "./utils/logger";
export type { ReceiptLensLogger, LogLevel } from "./utils/logger";
