/**
 * ReceiptLens – Tesseract.js OCR Provider
 *
 * Fully offline OCR in Node.js. Emits one fragment per recognised line.
 *
 * Usage note: tesseract.js is an optional PEER dependency.
 * Add it to your project: `npm install tesseract.js`
 */

import type { DetectedFragment } from "../types";
import type { ImageInput } from "../schema/ScanOptions";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError, toUnitBox } from "./OCRProvider";

// ─── Tesseract.js lazy type shim (avoids hard compile-time dependency) ───────

interface TesseractBBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

interface TesseractLine {
  text: string;
  /** 0–100 */
  confidence: number;
  bbox: TesseractBBox;
}

interface TesseractWorker {
  recognize(image: string | Buffer): Promise<{
    data: { text: string; confidence: number; lines?: TesseractLine[] };
  }>;
  terminate(): Promise<unknown>;
}

interface TesseractModule {
  createWorker(
    langs?: string,
    oem?: number,
    options?: Record<string, unknown>,
  ): Promise<TesseractWorker>;
}

function getTesseract(): TesseractModule | null {
  try {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    return require("tesseract.js") as TesseractModule;
  } catch {
    return null;
  }
}

const UNREADABLE_IMAGE_RX = /read image|decode|unsupported image|invalid image/i;

// ─── Implementation ──────────────────────────────────────────────────────────

export class TesseractOCR implements OCRProvider {
  readonly name = "tesseract";

  async isAvailable(): Promise<boolean> {
    return getTesseract() !== null;
  }

  async recognizeText(options: OCROptions): Promise<OCRResult> {
    const Tesseract = getTesseract();
    if (!Tesseract) {
      throw new OCRError(
        "tesseract.js is not installed. Run: npm install tesseract.js",
        this.name,
      );
    }

    const source = this.toTesseractImage(options.image);
    const lang = this.normaliseLang(options.language ?? "en");
    let worker: TesseractWorker | null = null;

    try {
      worker = await Tesseract.createWorker(lang, 1, { logger: () => undefined });
      const { data } = await worker.recognize(source);

      return {
        fragments: this.toFragments(data.lines ?? [], options.image),
        provider: this.name,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new OCRError(
        `Tesseract recognition failed: ${message}`,
        this.name,
        err,
        UNREADABLE_IMAGE_RX.test(message) ? "image" : "recognition",
      );
    } finally {
      if (worker) {
        await worker.terminate().catch(() => undefined);
      }
    }
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  private toTesseractImage(image: ImageInput): string | Buffer {
    switch (image.type) {
      case "uri":
        return image.path;
      case "buffer":
        return Buffer.from(image.data);
      case "base64": {
        const payload = image.data.replace(/^data:[^;]+;base64,/, "");
        const bytes = Buffer.from(payload, "base64");
        if (bytes.length === 0) {
          throw new OCRError("Image payload decodes to zero bytes", this.name, undefined, "image");
        }
        return bytes;
      }
    }
  }

  /**
   * Tesseract reports pixel boxes. Without known image dimensions the
   * furthest line edge stands in for the page size.
   */
  private toFragments(
    lines: readonly TesseractLine[],
    image: ImageInput,
  ): DetectedFragment[] {
    const width =
      image.width ?? Math.max(1, ...lines.map((l) => l.bbox.x1));
    const height =
      image.height ?? Math.max(1, ...lines.map((l) => l.bbox.y1));

    return lines
      .filter((line) => line.text.trim().length > 0)
      .map((line) => ({
        text: line.text.trim(),
        boundingBox: toUnitBox(
          line.bbox.x0,
          line.bbox.y0,
          line.bbox.x1,
          line.bbox.y1,
          width,
          height,
        ),
        confidence: Math.min(Math.max(line.confidence / 100, 0), 1),
      }));
  }

  /** Convert BCP-47 "en" → Tesseract "eng" */
  private normaliseLang(lang: string): string {
    const map: Record<string, string> = {
      en: "eng",
      hi: "hin",
      ta: "tam",
      te: "tel",
      kn: "kan",
      mr: "mar",
      bn: "ben",
      gu: "guj",
      fr: "fra",
      de: "deu",
      es: "spa",
    };
    return map[lang.toLowerCase()] ?? lang;
  }
}
