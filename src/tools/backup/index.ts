/**
 * Backup tools - tag export and import
 */

export {
  type ExportTagsInput,
  ExportTagsInputSchema,
  type ExportTagsResult,
  exportTags,
} from "./export";

export {
  type ImportTagsInput,
  ImportTagsInputSchema,
  type ImportTagsResult,
  importTags,
} from "./import";
