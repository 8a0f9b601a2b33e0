/**
 * ReceiptLens – Input validation & typed errors
 *
 * Validates scan options before any OCR work starts and defines the
 * error type surfaced to callers.
 */

import type { ImageInput, ReceiptScanOptions } from "../schema/ScanOptions";

// ─── Input validation ─────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

const BASE64_RX = /^[A-Za-z0-9+/\r\n]+={0,2}$/;
const DATA_URL_RX = /^data:image\/[a-z0-9.+-]+;base64,/i;

/**
 * Check that an image source can be handed to an OCR provider at all.
 * Anything rejected here maps to IMAGE_PROCESSING_FAILED.
 */
export function validateImageInput(
  image: ImageInput | undefined,
): ValidationResult {
  const errors: string[] = [];

  if (!image) {
    errors.push("`image` is required.");
    return { valid: false, errors };
  }

  switch (image.type) {
    case "base64": {
      const payload = image.data.replace(DATA_URL_RX, "");
      if (payload.trim().length === 0) {
        errors.push("`image.data` is empty.");
      } else if (!BASE64_RX.test(payload)) {
        errors.push("`image.data` is not valid base64.");
      }
      break;
    }
    case "uri":
      if (image.path.trim().length === 0) {
        errors.push("`image.path` is required for type 'uri'.");
      }
      break;
    case "buffer":
      if (image.data.byteLength === 0) {
        errors.push("`image.data` buffer is empty.");
      }
      break;
  }

  if (image.width !== undefined && !(image.width > 0)) {
    errors.push("`image.width` must be a positive number of pixels.");
  }
  if (image.height !== undefined && !(image.height > 0)) {
    errors.push("`image.height` must be a positive number of pixels.");
  }

  return { valid: errors.length === 0, errors };
}

export function validateScanOptions(
  options: ReceiptScanOptions,
): ValidationResult {
  const result = validateImageInput(options.image);
  if (
    options.language !== undefined &&
    !/^[a-z]{2,3}(?:[-_][A-Za-z]{2,4})?$/.test(options.language)
  ) {
    result.errors.push("`language` must be an ISO 639 code such as \"en\".");
    result.valid = false;
  }
  return result;
}

// ─── Typed error ──────────────────────────────────────────────────────────────

export type ReceiptAnalysisErrorCode =
  | "IMAGE_PROCESSING_FAILED"
  | "RECOGNITION_FAILED"
  | "PARSING_FAILED"
  | "INVALID_OPTIONS";

export class ReceiptAnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: ReceiptAnalysisErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ReceiptAnalysisError";
  }
}
