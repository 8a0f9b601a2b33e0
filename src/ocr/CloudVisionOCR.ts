/**
 * ReceiptLens – Google Cloud Vision OCR Provider
 *
 * Calls the `images:annotate` REST endpoint with DOCUMENT_TEXT_DETECTION
 * and rebuilds printed lines from the word-level annotation.
 *
 * Configuration:
 *   new CloudVisionOCR({ apiKey: process.env.GOOGLE_CLOUD_VISION_API_KEY ?? "" })
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";

import type { DetectedFragment } from "../types";
import type { ImageInput } from "../schema/ScanOptions";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError, toUnitBox } from "./OCRProvider";

// ─── Config ──────────────────────────────────────────────────────────────────

export interface CloudVisionOCRConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

// ─── Response schema ─────────────────────────────────────────────────────────

const vertexSchema = z.object({
  x: z.number().optional(),
  y: z.number().optional(),
});

const wordSchema = z.object({
  boundingBox: z.object({ vertices: z.array(vertexSchema).default([]) }).optional(),
  confidence: z.number().optional(),
  symbols: z
    .array(
      z.object({
        text: z.string().default(""),
        property: z
          .object({
            detectedBreak: z.object({ type: z.string() }).optional(),
          })
          .optional(),
      }),
    )
    .default([]),
});

const pageSchema = z.object({
  width: z.number().optional(),
  height: z.number().optional(),
  blocks: z
    .array(
      z.object({
        paragraphs: z
          .array(z.object({ words: z.array(wordSchema).default([]) }))
          .default([]),
      }),
    )
    .default([]),
});

const annotateResponseSchema = z.object({
  responses: z
    .array(
      z.object({
        fullTextAnnotation: z
          .object({ pages: z.array(pageSchema).default([]) })
          .optional(),
        error: z
          .object({ code: z.number().optional(), message: z.string().optional() })
          .optional(),
      }),
    )
    .default([]),
});

type VisionWord = z.infer<typeof wordSchema>;
type VisionPage = z.infer<typeof pageSchema>;

/** Breaks after which Vision starts a new printed line */
const LINE_BREAKS = new Set(["EOL_SURE_SPACE", "LINE_BREAK", "HYPHEN"]);
const SPACE_BREAKS = new Set(["SPACE", "SURE_SPACE"]);

/** google.rpc.Code INVALID_ARGUMENT – reported for undecodable image bytes */
const RPC_INVALID_ARGUMENT = 3;

// ─── Implementation ──────────────────────────────────────────────────────────

export class CloudVisionOCR implements OCRProvider {
  readonly name = "cloud-vision";
  private readonly config: Required<CloudVisionOCRConfig>;

  constructor(config: CloudVisionOCRConfig) {
    this.config = {
      baseUrl: "https://vision.googleapis.com/v1",
      timeoutMs: 30_000,
      ...config,
    };
  }

  async isAvailable(): Promise<boolean> {
    return this.config.apiKey.trim().length > 0;
  }

  async recognizeText(options: OCROptions): Promise<OCRResult> {
    const image = await this.toVisionImage(options.image);

    let body: unknown;
    try {
      body = await this.callAPI({
        requests: [
          {
            image,
            features: [{ type: "DOCUMENT_TEXT_DETECTION" }],
            ...(options.language
              ? { imageContext: { languageHints: [options.language] } }
              : {}),
          },
        ],
      }, options.signal);
    } catch (err) {
      throw new OCRError(
        `API call failed: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
        err,
      );
    }

    const parsed = annotateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OCRError("Unexpected annotate response shape", this.name, parsed.error);
    }

    const response = parsed.data.responses[0];
    if (response?.error) {
      throw new OCRError(
        `Vision API error: ${response.error.message ?? "unknown error"}`,
        this.name,
        response.error,
        response.error.code === RPC_INVALID_ARGUMENT ? "image" : "recognition",
      );
    }

    const page = response?.fullTextAnnotation?.pages[0];
    return {
      fragments: page ? this.toFragments(page, options.image) : [],
      provider: this.name,
    };
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  private async toVisionImage(
    image: ImageInput,
  ): Promise<{ content: string } | { source: { imageUri: string } }> {
    switch (image.type) {
      case "base64":
        return { content: image.data.replace(/^data:[^;]+;base64,/, "") };
      case "buffer":
        return { content: Buffer.from(image.data).toString("base64") };
      case "uri": {
        if (/^(?:https?|gs):\/\//i.test(image.path)) {
          return { source: { imageUri: image.path } };
        }
        try {
          const bytes = await readFile(image.path);
          return { content: bytes.toString("base64") };
        } catch (err) {
          throw new OCRError(
            `Cannot read image file '${image.path}'`,
            this.name,
            err,
            "image",
          );
        }
      }
    }
  }

  private async callAPI(payload: unknown, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(
        `${this.config.baseUrl}/images:annotate?key=${encodeURIComponent(this.config.apiKey)}`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
          signal: controller.signal,
        },
      );

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new Error(`HTTP ${response.status}: ${text.slice(0, 200)}`);
      }

      return await response.json();
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  /** Words → printed lines, each with the union box of its words */
  private toFragments(page: VisionPage, image: ImageInput): DetectedFragment[] {
    const width = image.width ?? page.width ?? 0;
    const height = image.height ?? page.height ?? 0;
    if (!(width > 0) || !(height > 0)) return [];

    const fragments: DetectedFragment[] = [];

    for (const block of page.blocks) {
      for (const paragraph of block.paragraphs) {
        let line: VisionWord[] = [];
        let text = "";

        const flush = (): void => {
          const fragment = this.lineFragment(line, text, width, height);
          if (fragment) fragments.push(fragment);
          line = [];
          text = "";
        };

        for (const word of paragraph.words) {
          line.push(word);
          text += word.symbols.map((s) => s.text).join("");
          const last = word.symbols[word.symbols.length - 1];
          const breakType = last?.property?.detectedBreak?.type;
          if (breakType && LINE_BREAKS.has(breakType)) flush();
          else if (breakType && SPACE_BREAKS.has(breakType)) text += " ";
        }
        if (line.length > 0) flush();
      }
    }

    return fragments;
  }

  private lineFragment(
    words: readonly VisionWord[],
    text: string,
    width: number,
    height: number,
  ): DetectedFragment | undefined {
    const trimmed = text.trim();
    const vertices = words.flatMap((w) => w.boundingBox?.vertices ?? []);
    if (!trimmed || vertices.length === 0) return undefined;

    const xs = vertices.map((v) => v.x ?? 0);
    const ys = vertices.map((v) => v.y ?? 0);
    const scored = words.filter((w) => w.confidence !== undefined);
    const confidence =
      scored.length === 0
        ? 0
        : scored.reduce((sum, w) => sum + (w.confidence ?? 0), 0) / scored.length;

    return {
      text: trimmed,
      boundingBox: toUnitBox(
        Math.min(...xs),
        Math.min(...ys),
        Math.max(...xs),
        Math.max(...ys),
        width,
        height,
      ),
      confidence,
    };
  }
}
