/**
 * Export tool for backing up the tag registry
 *
 * Writes every tag to a portable JSON document that importTags can read back.
 */

import { z } from "zod";
import type { DestinationLabelManager } from "@/labels";

export const ExportTagsInputSchema = z.object({
  outputPath: z.string().min(1).describe("Path to write the export file"),
});

export type ExportTagsInput = z.infer<typeof ExportTagsInputSchema>;

export interface ExportTagsResult {
  success: boolean;
  outputPath: string;
  stats: {
    tags: number;
  };
  error?: string;
}

/**
 * Export all tags. Failures are reported in the result, not thrown.
 */
export function exportTags(
  input: ExportTagsInput,
  manager: DestinationLabelManager,
): ExportTagsResult {
  try {
    const result = manager.exportTags(input.outputPath);

    console.error(
      `[destinations] Exported ${result.tags} tags to ${input.outputPath}`,
    );

    return {
      success: true,
      outputPath: input.outputPath,
      stats: { tags: result.tags },
    };
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : "Unknown error";
    console.error(`[destinations] Export failed: ${errorMessage}`);
    return {
      success: false,
      outputPath: input.outputPath,
      stats: { tags: 0 },
      error: errorMessage,
    };
  }
}
