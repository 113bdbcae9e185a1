/**
 * Import tool for restoring tags from an export file
 *
 * Records are added on top of the current registry; a tag with an existing
 * ID replaces the old one. With the default lenient strategy, bad records are
 * skipped and listed in `errors`; strict aborts before anything is added.
 */

import { z } from "zod";
import {
  type DestinationLabelManager,
  ImportStrategySchema,
  LabelDecodeError,
  LabelIOError,
} from "@/labels";

export const ImportTagsInputSchema = z.object({
  inputPath: z.string().min(1).describe("Path to the export file to import"),
  strategy: ImportStrategySchema.default("lenient").describe(
    "strict: abort on the first invalid record; lenient: skip and report",
  ),
});

export type ImportTagsInput = z.input<typeof ImportTagsInputSchema>;

export interface ImportTagsResult {
  success: boolean;
  inputPath: string;
  imported: number;
  skipped: number;
  errors: string[];
}

export function importTags(
  input: ImportTagsInput,
  manager: DestinationLabelManager,
): ImportTagsResult {
  const strategy = input.strategy ?? "lenient";
  const result: ImportTagsResult = {
    success: false,
    inputPath: input.inputPath,
    imported: 0,
    skipped: 0,
    errors: [],
  };

  try {
    const imported = manager.importTags(input.inputPath, { strategy });
    result.imported = imported.imported;
    result.skipped = imported.skipped;
    result.errors = imported.errors.map((error) => error.message);
  } catch (error) {
    if (error instanceof LabelIOError || error instanceof LabelDecodeError) {
      result.errors.push(error.message);
      console.error(`[destinations] Import failed: ${error.message}`);
      return result;
    }
    throw error;
  }

  result.success = result.errors.length === 0;

  console.error(
    `[destinations] Import complete: ${result.imported} tags, ${result.skipped} skipped`,
  );

  return result;
}
