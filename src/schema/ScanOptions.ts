/**
 * ReceiptLens – Scanner input types
 */

interface ImageDimensions {
  /** Pixel width, used to normalise provider coordinates when known */
  width?: number;
  /** Pixel height */
  height?: number;
}

export type ImageInput =
  | ({ type: "base64"; data: string; mimeType?: string } & ImageDimensions)
  | ({ type: "uri"; path: string } & ImageDimensions)
  | ({ type: "buffer"; data: Uint8Array; mimeType?: string } & ImageDimensions);

export interface ReceiptScanOptions {
  image: ImageInput;

  /** OCR language hint (ISO 639-1, default: "en") */
  language?: string;

  /** Name of the OCR provider to try first */
  ocrProvider?: string;

  /**
   * Checked before the OCR call and again once it settles.
   * Extraction itself is never interrupted.
   */
  signal?: AbortSignal;
}
