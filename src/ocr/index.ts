export { OCREngine } from "./OCREngine";
export { TesseractOCR } from "./TesseractOCR";
export { CloudVisionOCR } from "./CloudVisionOCR";
export type { CloudVisionOCRConfig } from "./CloudVisionOCR";
export type {
  OCRProvider,
  OCROptions,
  OCRResult,
  OCRFailureKind,
} from "./OCRProvider";
export { OCRError, toUnitBox } from "./OCRProvider";
