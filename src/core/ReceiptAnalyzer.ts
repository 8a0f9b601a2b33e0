/**
 * ReceiptLens – Field extraction engine
 *
 * fragments → normalise → spatial index → label/value pass → amount sniffer
 *           → raw field map → ReceiptAnalysisResult
 *
 * Construct once and share: the field table and regex patterns are built in
 * the constructor and never mutated. Each analyze() call keeps its state on
 * the stack, so concurrent calls need no coordination.
 *
 * Usage:
 *   const analyzer = new ReceiptAnalyzer({ confidenceFloor: 0.4 });
 *   const result = analyzer.analyze(fragments);
 */

import type {
  DetectedFragment,
  FieldDefinitionTable,
  ReceiptAnalysisReport,
  ReceiptAnalysisResult,
} from "../types";
import {
  DEFAULT_FIELD_DEFINITIONS,
  loadFieldDefinitions,
} from "../config/fieldDefinitions";
import { resolveAnalyzerSettings } from "../config/options";
import type { AnalyzerSettings, AnalyzerTuning } from "../config/options";
import { ExtractionState } from "../parser/ExtractionState";
import { FieldMatcher } from "../parser/FieldMatcher";
import { assembleResult } from "../parser/ResultAssembler";
import { SpatialIndex } from "../parser/SpatialIndex";
import { normaliseFragments } from "../parser/TextNormalizer";
import type { NormalisedFragment } from "../parser/TextNormalizer";
import { AMOUNT_FIELD_KEY, ValueResolver } from "../parser/ValueResolver";
import { createLogger } from "../utils/logger";
import type { ReceiptLensLogger } from "../utils/logger";
import { ConfidenceEngine } from "./confidence";
import { ReceiptAnalysisError } from "./validator";

export interface ReceiptAnalyzerOptions extends AnalyzerTuning {
  /** Alias table to use instead of the bundled one */
  fieldDefinitions?: FieldDefinitionTable;
  debug?: boolean;
  logger?: ReceiptLensLogger;
}

export class ReceiptAnalyzer {
  readonly settings: AnalyzerSettings;
  readonly fieldDefinitions: FieldDefinitionTable;

  private readonly matcher: FieldMatcher;
  private readonly resolver: ValueResolver;
  private readonly confidence = new ConfidenceEngine();
  private readonly logger: ReceiptLensLogger;

  /**
   * @throws ReceiptAnalysisError INVALID_OPTIONS on bad tuning or alias table
   */
  constructor(options: ReceiptAnalyzerOptions = {}) {
    this.settings = resolveAnalyzerSettings(options);
    this.fieldDefinitions = options.fieldDefinitions
      ? loadFieldDefinitions(options.fieldDefinitions)
      : DEFAULT_FIELD_DEFINITIONS;
    this.logger =
      options.logger ?? createLogger(options.debug ?? false, "analyzer");
    this.matcher = new FieldMatcher(this.fieldDefinitions);
    this.resolver = new ValueResolver(this.matcher, this.settings);
  }

  /**
   * Extract an expense record from OCR fragments.
   *
   * @throws ReceiptAnalysisError PARSING_FAILED when no fragment survives
   *         normalisation. Missing fields never throw.
   */
  analyze(fragments: readonly DetectedFragment[]): ReceiptAnalysisResult {
    return this.analyzeDetailed(fragments).result;
  }

  /**
   * Same as analyze(), also returning the raw field map, the fragments each
   * field was read from, and scoring metadata.
   */
  analyzeDetailed(
    fragments: readonly DetectedFragment[],
  ): ReceiptAnalysisReport {
    const startTime = Date.now();
    const input = Array.isArray(fragments) ? fragments : [];

    // ── 1. Normalise ────────────────────────────────────────────────────────
    const usable = normaliseFragments(input, this.settings);
    if (usable.length === 0) {
      throw new ReceiptAnalysisError(
        `No usable text fragments (${input.length} received, confidence floor ${this.settings.confidenceFloor})`,
        "PARSING_FAILED",
      );
    }
    this.logger.debug(
      `${usable.length}/${input.length} fragments usable after normalisation`,
    );

    // ── 2. Index & match ────────────────────────────────────────────────────
    const index = new SpatialIndex(usable, this.settings.rowResolution);
    const state = new ExtractionState(usable.length);
    this.matchLabels(usable, index, state);

    // ── 3. Amount sniffer ───────────────────────────────────────────────────
    if (!state.isResolved(AMOUNT_FIELD_KEY)) {
      const sniffed = this.resolver.sniffAmount(usable, state);
      if (sniffed) {
        state.resolve(AMOUNT_FIELD_KEY, sniffed);
        this.logger.debug(`Amount sniffed from unlabelled "${sniffed.value}"`);
      }
    }

    // ── 4. Assemble ─────────────────────────────────────────────────────────
    const fieldMap = new Map<string, string>();
    const fields: Record<string, string> = {};
    const sources: Record<string, number[]> = {};
    const sourceConfidence: number[] = [];

    for (const [key, resolved] of state.resolved) {
      fieldMap.set(key, resolved.value);
      fields[key] = resolved.value;
      sources[key] = resolved.fragments.map((i) => this.at(usable, i).sourceIndex);
      for (const i of resolved.fragments) {
        sourceConfidence.push(this.at(usable, i).confidence);
      }
    }

    const result = assembleResult({
      fields: fieldMap,
      texts: usable.map((f) => f.text),
    });
    const breakdown = this.confidence.score(result, sourceConfidence);

    return {
      result,
      fields,
      sources,
      metadata: {
        fragmentCount: input.length,
        usableFragmentCount: usable.length,
        resolvedFieldCount: state.resolved.size,
        confidenceScore: breakdown.overall,
        processingTimeMs: Date.now() - startTime,
        fieldDefinitionsVersion: this.fieldDefinitions.version,
      },
    };
  }

  // ─── Private helpers ────────────────────────────────────────────────────────

  /** Single top-to-bottom pass; each fragment is visited once. */
  private matchLabels(
    fragments: readonly NormalisedFragment[],
    index: SpatialIndex,
    state: ExtractionState,
  ): void {
    const isResolved = (key: string): boolean => state.isResolved(key);

    for (let i = 0; i < fragments.length; i++) {
      if (state.isConsumed(i)) continue;
      const fragment = this.at(fragments, i);

      const match = this.matcher.match(fragment.lower, isResolved);
      if (!match) continue;

      const resolved = this.resolver.resolve(i, match, fragments, index, state);
      if (!resolved) {
        this.logger.debug(
          `Label "${fragment.text}" (${match.field.key}) has no value`,
        );
        continue;
      }

      state.resolve(match.field.key, resolved);
      this.logger.debug(
        `Resolved ${match.field.key} = "${resolved.value}" (${resolved.via})`,
      );
    }
  }

  private at(
    fragments: readonly NormalisedFragment[],
    i: number,
  ): NormalisedFragment {
    const fragment = fragments[i];
    if (!fragment) throw new RangeError(`No fragment at arena index ${i}`);
    return fragment;
  }
}
