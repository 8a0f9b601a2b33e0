export { normaliseFragments } from "./TextNormalizer";
export type { NormalisedFragment, TextNormalizerOptions } from "./TextNormalizer";
export { SpatialIndex, rowBucket } from "./SpatialIndex";
export { ExtractionState } from "./ExtractionState";
export type { ResolvedField } from "./ExtractionState";
export { FieldMatcher } from "./FieldMatcher";
export type { LabelMatch } from "./FieldMatcher";
export { ValueResolver, AMOUNT_FIELD_KEY } from "./ValueResolver";
export {
  assembleResult,
  classifyPaymentMode,
  resolvePaymentMode,
  canonicaliseCategory,
  splitCategories,
} from "./ResultAssembler";
export {
  normaliseFragmentText,
  cleanNumeric,
  parseDecimal,
  extractNumericToken,
  parseDate,
  DATE_FORMAT_NAMES,
} from "./primitives";
