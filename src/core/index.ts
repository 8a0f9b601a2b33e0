export { ReceiptAnalyzer } from "./ReceiptAnalyzer";
export type { ReceiptAnalyzerOptions } from "./ReceiptAnalyzer";
export { ReceiptScanner } from "./ReceiptScanner";
export type { ReceiptScannerOptions } from "./ReceiptScanner";
export { ConfidenceEngine } from "./confidence";
export type { ConfidenceBreakdown } from "./confidence";
export {
  validateImageInput,
  validateScanOptions,
  ReceiptAnalysisError,
} from "./validator";
export type { ValidationResult, ReceiptAnalysisErrorCode } from "./validator";
