/**
 * Label indexing and matching engine
 *
 * @example
 * ```typescript
 * import { DestinationLabelManager } from "@/labels";
 *
 * const manager = new DestinationLabelManager();
 * manager.searchTagsByPrefix("bea", "en");      // [beach tag]
 * manager.searchDestinationsByTags(["historical", "luxury"], "en", 0.3, 5);
 * // [{ destination, score }, ...] best first
 * ```
 */

export { CategoryIndex } from "./category-index";
export { DEFAULT_TAGS } from "./default-tags";
export { DestinationStore } from "./destination-store";
export {
  LabelDecodeError,
  LabelIOError,
  type LabelIOOperation,
  parseLanguageCode,
  parseTagCategory,
  toLabelIOError,
} from "./errors";
export { createLabelManager, getTagsFilePath } from "./factory";
export {
  DestinationLabelManager,
  type LabelManagerOptions,
  type LabelStats,
  type TagExportResult,
  type TagImportOptions,
  type TagImportResult,
} from "./label-manager";
export {
  COVERAGE_WEIGHT,
  calculateTagMatchScore,
  EXACT_MATCH_MULTIPLIER,
  explainTagMatch,
  formatMatchSummary,
  type MatchBreakdown,
  PARTIAL_MATCH_MULTIPLIER,
  QUALITY_WEIGHT,
  type QueryMatch,
  type RankOptions,
  rankDestinations,
  type TagLookup,
} from "./matching";
export { getDestinationName, getTagName, getTagSynonyms } from "./names";
export { PrefixIndex } from "./prefix-index";
export { TagRegistry } from "./registry";
export { SAMPLE_DESTINATIONS } from "./sample-destinations";
export {
  type DecodedTags,
  type DecodeOptions,
  decodeTagDocument,
  encodeTagDocument,
  type ImportStrategy,
  ImportStrategySchema,
  parseTagDocument,
  type SerializedTag,
  SerializedTagSchema,
  serializeTagDocument,
  TAG_DOCUMENT_VERSION,
  type TagDocument,
  TagDocumentSchema,
} from "./serialization";
