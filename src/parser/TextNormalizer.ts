/**
 * ReceiptLens – Fragment normalisation
 *
 * Turns the provider's unordered fragment list into the reading-ordered
 * arena every later stage indexes into.
 */

import type { CoordinateOrigin, DetectedFragment } from "../types";
import { normaliseFragmentText } from "./primitives";

export interface NormalisedFragment {
  /** Position in the caller's fragment array */
  readonly sourceIndex: number;
  readonly text: string;
  readonly lower: string;
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly midY: number;
  readonly confidence: number;
}

export interface TextNormalizerOptions {
  confidenceFloor: number;
  coordinateOrigin: CoordinateOrigin;
}

function isFiniteBox(f: DetectedFragment): boolean {
  const b = f.boundingBox;
  return (
    b != null &&
    [b.minX, b.minY, b.width, b.height].every(Number.isFinite) &&
    b.width >= 0 &&
    b.height >= 0
  );
}

/**
 * Filter, clean and sort fragments top-to-bottom.
 *
 * A fragment is dropped when its confidence is below the floor, its text
 * is empty after cleaning, or its geometry is not a finite box.
 */
export function normaliseFragments(
  fragments: readonly DetectedFragment[],
  options: TextNormalizerOptions,
): NormalisedFragment[] {
  const out: NormalisedFragment[] = [];

  fragments.forEach((fragment, sourceIndex) => {
    if (typeof fragment?.text !== "string") return;
    if (!Number.isFinite(fragment.confidence)) return;
    if (fragment.confidence < options.confidenceFloor) return;
    if (!isFiniteBox(fragment)) return;

    const text = normaliseFragmentText(fragment.text);
    if (text.length === 0) return;

    const { minX, width, height } = fragment.boundingBox;
    const minY =
      options.coordinateOrigin === "bottom-left"
        ? 1 - fragment.boundingBox.minY - height
        : fragment.boundingBox.minY;

    out.push({
      sourceIndex,
      text,
      lower: text.toLowerCase(),
      minX,
      maxX: minX + width,
      minY,
      midY: minY + height / 2,
      confidence: fragment.confidence,
    });
  });

  return out.sort(
    (a, b) =>
      a.midY - b.midY || a.minX - b.minX || a.sourceIndex - b.sourceIndex,
  );
}
