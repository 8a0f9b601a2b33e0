/**
 * ReceiptLens – Analyzer tuning constants
 *
 * All geometry is expressed in unit-square coordinates, so the defaults
 * hold for any image size.
 */

import { z } from "zod";

import { ReceiptAnalysisError } from "../core/validator";

export const analyzerSettingsSchema = z.object({
  /** Fragments below this OCR confidence never take part in matching */
  confidenceFloor: z.number().min(0).max(1).default(0.3),
  /** Number of horizontal bands the image height is cut into (~1% each) */
  rowResolution: z.number().int().min(1).max(10_000).default(100),
  /** Neighbour search reaches this many bands above and below a label */
  rowBand: z.number().int().min(0).default(2),
  /** Widest label→value gap considered (fraction of image width) */
  maxHorizontalGap: z.number().gt(0).max(1).default(0.6),
  /** A value may start this far left of the label's right edge */
  rightEdgeTolerance: z.number().min(0).max(1).default(0.01),
  coordinateOrigin: z.enum(["top-left", "bottom-left"]).default("top-left"),
});

export type AnalyzerSettings = Readonly<z.output<typeof analyzerSettingsSchema>>;
export type AnalyzerTuning = z.input<typeof analyzerSettingsSchema>;

export const DEFAULT_ANALYZER_SETTINGS: AnalyzerSettings = Object.freeze(
  analyzerSettingsSchema.parse({}),
);

/**
 * Merge caller tuning over the defaults.
 *
 * @throws ReceiptAnalysisError INVALID_OPTIONS on out-of-range values
 */
export function resolveAnalyzerSettings(
  tuning: AnalyzerTuning = {},
): AnalyzerSettings {
  const parsed = analyzerSettingsSchema.safeParse({
    confidenceFloor: tuning.confidenceFloor,
    rowResolution: tuning.rowResolution,
    rowBand: tuning.rowBand,
    maxHorizontalGap: tuning.maxHorizontalGap,
    rightEdgeTolerance: tuning.rightEdgeTolerance,
    coordinateOrigin: tuning.coordinateOrigin,
  });
  if (!parsed.success) {
    throw new ReceiptAnalysisError(
      `Invalid analyzer options: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      "INVALID_OPTIONS",
      parsed.error,
    );
  }
  return Object.freeze(parsed.data);
}
