/**
 * ReceiptLens – Label → value resolution
 *
 * For each label, in order:
 *   1. inline: the value sits in the label's own fragment ("Qty - 5")
 *   2. spatial: the nearest unconsumed fragment to the right on the same row
 * When both fail the field stays unresolved.
 *
 * The amount sniffer runs once after the pass for totals printed without
 * a recognisable label.
 */

import type { FieldKind } from "../types";
import type { ExtractionState, ResolvedField } from "./ExtractionState";
import type { FieldMatcher, LabelMatch } from "./FieldMatcher";
import type { SpatialIndex } from "./SpatialIndex";
import type { NormalisedFragment } from "./TextNormalizer";
import {
  CURRENCY_PREFIX_SOURCE,
  NUMBER_SOURCE,
  isBareNumeric,
  looksMonetary,
} from "./primitives";

export interface ValueResolverOptions {
  rowBand: number;
  maxHorizontalGap: number;
  rightEdgeTolerance: number;
}

export const AMOUNT_FIELD_KEY = "amount";

const MONEY_SOURCE = String.raw`${CURRENCY_PREFIX_SOURCE}?\s*${NUMBER_SOURCE}`;

/** "50 Bags", "12.5 kg." – keeps the unit for the unit-of-measure fallback */
const TRAILING_UNIT_SOURCE = String.raw`(?:\s*[a-z][a-z.]{0,15})?`;

const DATE_LIKE_SOURCE = [
  String.raw`\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}`,
  String.raw`\d{4}[-/]\d{1,2}[-/]\d{1,2}`,
  String.raw`\d{1,2}(?:st|nd|rd|th)?[\s-]+[a-z]{3,9}\.?[\s,-]+\d{4}`,
  String.raw`[a-z]{3,9}\.?\s+\d{1,2},?\s+\d{4}`,
].join("|");

/** Built once per resolver; patterns carry no global state (no /g). */
function compileInlinePatterns(): Record<FieldKind, readonly RegExp[]> {
  return {
    numeric: [
      new RegExp(String.raw`[-:]\s*(${MONEY_SOURCE}${TRAILING_UNIT_SOURCE})`, "i"),
      new RegExp(String.raw`(${CURRENCY_PREFIX_SOURCE}\s*${NUMBER_SOURCE})`, "i"),
    ],
    date: [new RegExp(String.raw`(?:[-:]\s*)?(${DATE_LIKE_SOURCE})`, "i")],
    text: [/[-:]\s*(\S.*)$/],
  };
}

interface SpatialHit {
  index: number;
  gap: number;
}

export class ValueResolver {
  private readonly inlinePatterns = compileInlinePatterns();

  constructor(
    private readonly matcher: FieldMatcher,
    private readonly options: ValueResolverOptions,
  ) {}

  /**
   * Resolve one label candidate. Does not mutate `state`; the caller
   * commits the returned field.
   */
  resolve(
    labelIndex: number,
    match: LabelMatch,
    fragments: readonly NormalisedFragment[],
    index: SpatialIndex,
    state: ExtractionState,
  ): ResolvedField | undefined {
    const label = fragments[labelIndex];
    if (!label) return undefined;

    const inline = this.extractInline(label, match);
    if (inline !== undefined) {
      return { value: inline, fragments: [labelIndex], via: "inline" };
    }

    const hit = this.nearestToTheRight(labelIndex, fragments, index, state);
    const value = hit === undefined ? undefined : fragments[hit.index];
    if (!hit || !value) return undefined;

    return {
      value: value.text,
      fragments: [labelIndex, hit.index],
      via: "spatial",
    };
  }

  /** Value written inside the label fragment after the alias */
  extractInline(
    label: NormalisedFragment,
    match: LabelMatch,
  ): string | undefined {
    // toLowerCase can change the length of some characters; fall back to
    // the lower-cased text so the alias offset stays valid
    const source =
      label.text.length === label.lower.length ? label.text : label.lower;
    const rest = source.slice(match.aliasEnd);

    for (const pattern of this.inlinePatterns[match.field.kind]) {
      const found = pattern.exec(rest)?.[1]?.trim();
      if (found) return found;
    }
    return undefined;
  }

  /**
   * Nearest unconsumed fragment starting right of the label on the same or
   * an adjacent row band. Smallest horizontal gap wins; ties go to the
   * earlier fragment in reading order. Fragments that open with an alias
   * ("Grade 60", "Unit") are taken only when no other candidate exists.
   */
  nearestToTheRight(
    labelIndex: number,
    fragments: readonly NormalisedFragment[],
    index: SpatialIndex,
    state: ExtractionState,
  ): SpatialHit | undefined {
    const label = fragments[labelIndex];
    if (!label) return undefined;
    const { rowBand, maxHorizontalGap, rightEdgeTolerance } = this.options;

    let best: SpatialHit | undefined;
    let bestLabelLike: SpatialHit | undefined;
    for (const i of index.neighbours(labelIndex, rowBand)) {
      if (state.isConsumed(i)) continue;
      const candidate = fragments[i];
      if (!candidate) continue;
      if (candidate.minX <= label.maxX - rightEdgeTolerance) continue;

      const gap = candidate.minX - label.maxX;
      if (gap >= maxHorizontalGap) continue;
      if (this.matcher.looksLikeLabel(candidate.lower)) {
        if (!bestLabelLike || gap < bestLabelLike.gap) {
          bestLabelLike = { index: i, gap };
        }
        continue;
      }

      if (!best || gap < best.gap) best = { index: i, gap };
    }
    return best ?? bestLabelLike;
  }

  /**
   * First unconsumed fragment, in reading order, that is nothing but a
   * monetary-looking number.
   */
  sniffAmount(
    fragments: readonly NormalisedFragment[],
    state: ExtractionState,
  ): ResolvedField | undefined {
    for (let i = 0; i < fragments.length; i++) {
      const fragment = fragments[i];
      if (!fragment || state.isConsumed(i)) continue;
      if (isBareNumeric(fragment.text) && looksMonetary(fragment.text)) {
        return { value: fragment.text, fragments: [i], via: "sniffer" };
      }
    }
    return undefined;
  }
}
