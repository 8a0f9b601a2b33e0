/**
 * ReceiptLens – Image → expense record pipeline
 *
 * Usage:
 *   const scanner = new ReceiptScanner({
 *     ocrProviders: [new CloudVisionOCR({ apiKey }), new TesseractOCR()],
 *   });
 *   const report = await scanner.scan({ image: { type: "uri", path } });
 *
 * Failure kinds surfaced to the caller (no internal retry):
 *   IMAGE_PROCESSING_FAILED – image missing or undecodable
 *   RECOGNITION_FAILED      – every OCR provider failed or none is available
 *   PARSING_FAILED          – OCR produced no usable text
 * A caller-supplied AbortSignal rejects with its own reason.
 */

import type { ReceiptAnalysisReport } from "../types";
import type { ReceiptScanOptions } from "../schema/ScanOptions";
import { OCREngine } from "../ocr/OCREngine";
import { OCRError } from "../ocr/OCRProvider";
import type { OCRProvider, OCRResult } from "../ocr/OCRProvider";
import { TesseractOCR } from "../ocr/TesseractOCR";
import { createLogger } from "../utils/logger";
import type { ReceiptLensLogger } from "../utils/logger";
import { ReceiptAnalyzer } from "./ReceiptAnalyzer";
import type { ReceiptAnalyzerOptions } from "./ReceiptAnalyzer";
import { ReceiptAnalysisError, validateScanOptions } from "./validator";

export interface ReceiptScannerOptions extends ReceiptAnalyzerOptions {
  /** Fallback chain, first entry tried first (default: Tesseract only) */
  ocrProviders?: OCRProvider[];
  /** Share an analyzer between scanners instead of building one */
  analyzer?: ReceiptAnalyzer;
  /** OCR language when a scan names none (default: "en") */
  defaultLanguage?: string;
}

export class ReceiptScanner {
  readonly analyzer: ReceiptAnalyzer;
  private readonly ocr: OCREngine;
  private readonly logger: ReceiptLensLogger;
  private readonly defaultLanguage: string;

  constructor(options: ReceiptScannerOptions = {}) {
    this.logger =
      options.logger ?? createLogger(options.debug ?? false, "scanner");
    this.analyzer =
      options.analyzer ?? new ReceiptAnalyzer({ ...options, logger: this.logger });
    this.ocr = new OCREngine(
      options.ocrProviders ?? [new TesseractOCR()],
      this.logger,
    );
    this.defaultLanguage = options.defaultLanguage ?? "en";
  }

  /** Add or replace an OCR provider at runtime */
  registerOCRProvider(provider: OCRProvider): void {
    this.ocr.registerProvider(provider);
  }

  /**
   * Run OCR only, with the scanner's error mapping.
   */
  async recognizeText(options: ReceiptScanOptions): Promise<OCRResult> {
    const validation = validateScanOptions(options);
    if (!validation.valid) {
      throw new ReceiptAnalysisError(
        `Invalid image: ${validation.errors.join("; ")}`,
        "IMAGE_PROCESSING_FAILED",
      );
    }

    options.signal?.throwIfAborted();
    try {
      return await this.ocr.run(
        {
          image: options.image,
          language: options.language ?? this.defaultLanguage,
          signal: options.signal,
        },
        options.ocrProvider,
      );
    } catch (err) {
      if (options.signal?.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof OCRError && err.kind === "image") {
        throw new ReceiptAnalysisError(
          `Image could not be processed: ${message}`,
          "IMAGE_PROCESSING_FAILED",
          err,
        );
      }
      throw new ReceiptAnalysisError(
        `OCR extraction failed: ${message}`,
        "RECOGNITION_FAILED",
        err,
      );
    }
  }

  /**
   * Recognise and analyse one receipt image.
   */
  async scan(options: ReceiptScanOptions): Promise<ReceiptAnalysisReport> {
    const startTime = Date.now();
    this.logger.info("scan() started");

    // ── 1. OCR ────────────────────────────────────────────────────────────────
    const ocrResult = await this.recognizeText(options);
    options.signal?.throwIfAborted();
    this.logger.info(
      `OCR complete – ${ocrResult.fragments.length} fragments from ${ocrResult.provider}`,
    );

    // ── 2. Field extraction (runs to completion) ─────────────────────────────
    const report = this.analyzer.analyzeDetailed(ocrResult.fragments);
    report.metadata.ocrProvider = ocrResult.provider;

    const warnings: string[] = [];
    if (report.result.amount === null) warnings.push("No amount found");
    if (report.result.date === null) warnings.push("No date found");
    if (warnings.length > 0) report.metadata.warnings = warnings;

    // ── 3. Timing ───────────────────────────────────────────────────────────
    report.metadata.processingTimeMs = Date.now() - startTime;
    this.logger.info(
      `scan() finished in ${report.metadata.processingTimeMs}ms – confidence ${(report.metadata.confidenceScore * 100).toFixed(1)}%`,
    );

    return report;
  }
}
