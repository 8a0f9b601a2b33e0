/**
 * ReceiptLens – OCR Provider abstraction
 *
 * Every text-recognition backend implements this interface, so Tesseract,
 * Cloud Vision or an on-device engine can be swapped at runtime.
 */

import type { DetectedFragment } from "../types";
import type { ImageInput } from "../schema/ScanOptions";

export interface OCRResult {
  /** Positioned text spans in unit-square coordinates (top-left origin) */
  fragments: DetectedFragment[];
  /** Name of the provider that produced this result */
  provider: string;
}

export interface OCROptions {
  image: ImageInput;
  /** BCP-47 language hint (e.g. "en", "hi") */
  language?: string;
  signal?: AbortSignal;
}

/**
 * Every OCR provider must implement this contract.
 */
export interface OCRProvider {
  /** Unique provider identifier – used to look up by key */
  readonly name: string;

  /**
   * Recognise positioned text in the supplied image.
   *
   * Implementations must:
   * - Reject only with OCRError
   * - Report `confidence: 0` on fragments when the backend gives none
   */
  recognizeText(options: OCROptions): Promise<OCRResult>;

  /** Return `true` if the provider can run in this process */
  isAvailable(): Promise<boolean>;
}

/**
 * "image": the image could not be decoded or read, so recognition was never
 * attempted. "recognition": the backend ran and failed.
 */
export type OCRFailureKind = "image" | "recognition";

/**
 * Typed error thrown by OCR providers.
 */
export class OCRError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly cause?: unknown,
    public readonly kind: OCRFailureKind = "recognition",
  ) {
    super(`[${provider}] ${message}`);
    this.name = "OCRError";
  }
}

/**
 * Convert a pixel rectangle to a unit-square bounding box, clamped to the
 * image.
 */
export function toUnitBox(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  width: number,
  height: number,
): DetectedFragment["boundingBox"] {
  const clamp = (v: number): number => Math.min(Math.max(v, 0), 1);
  const minX = clamp(Math.min(x0, x1) / width);
  const minY = clamp(Math.min(y0, y1) / height);
  return {
    minX,
    minY,
    width: clamp(Math.max(x0, x1) / width) - minX,
    height: clamp(Math.max(y0, y1) / height) - minY,
  };
}
