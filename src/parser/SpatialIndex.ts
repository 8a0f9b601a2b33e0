/**
 * ReceiptLens – Row-bucket spatial index
 *
 * Text printed on one line rarely shares an exact vertical centre after
 * OCR, so fragments are binned into horizontal bands and a neighbour
 * query reads a few bands either side.
 */

import type { NormalisedFragment } from "./TextNormalizer";

/**
 * Band index of a vertical centre. Pure and deterministic.
 */
export function rowBucket(midY: number, resolution: number): number {
  const bucket = Math.floor(midY * resolution);
  return Math.min(Math.max(bucket, 0), resolution - 1);
}

export class SpatialIndex {
  private readonly buckets = new Map<number, number[]>();
  private readonly bucketOfFragment: number[];

  constructor(
    fragments: readonly NormalisedFragment[],
    private readonly resolution: number,
  ) {
    this.bucketOfFragment = fragments.map((f) =>
      rowBucket(f.midY, resolution),
    );
    this.bucketOfFragment.forEach((bucket, index) => {
      const row = this.buckets.get(bucket);
      if (row) row.push(index);
      else this.buckets.set(bucket, [index]);
    });
  }

  get size(): number {
    return this.bucketOfFragment.length;
  }

  bucketOf(index: number): number {
    const bucket = this.bucketOfFragment[index];
    if (bucket === undefined) {
      throw new RangeError(`Fragment index ${index} is not indexed`);
    }
    return bucket;
  }

  /** Fragment indices stored in one band, in reading order */
  row(bucket: number): readonly number[] {
    return this.buckets.get(bucket) ?? [];
  }

  /**
   * Indices whose band lies within ±`band` of fragment `index`,
   * excluding `index` itself, in reading order.
   */
  neighbours(index: number, band: number): number[] {
    const centre = this.bucketOf(index);
    const from = Math.max(centre - band, 0);
    const to = Math.min(centre + band, this.resolution - 1);
    const out: number[] = [];
    for (let b = from; b <= to; b++) {
      for (const i of this.row(b)) {
        if (i !== index) out.push(i);
      }
    }
    return out.sort((a, b) => a - b);
  }
}
