import { z } from "zod";
import type { DestinationLabelManager } from "@/labels";
import {
  LanguageCodeSchema,
  SynonymListSchema,
  TagCategorySchema,
  TagSchema,
} from "@/types";

export const AddTagInputSchema = z.object({
  id: z.string().min(1).describe("Unique tag ID, e.g. hot_spring"),
  category: TagCategorySchema.describe("Tag category"),
  synonyms: z
    .record(LanguageCodeSchema, SynonymListSchema)
    .describe("Synonyms per language code; the first is the display name"),
  description: z
    .record(LanguageCodeSchema, z.string())
    .optional()
    .describe("Description per language code"),
  weight: z
    .number()
    .nonnegative()
    .optional()
    .describe("Ranking weight for prefix search (default: 1)"),
  parentId: z.string().min(1).optional().describe("Parent tag ID"),
});

export type AddTagInput = z.infer<typeof AddTagInputSchema>;

export interface AddTagResult {
  success: boolean;
  /** True when an existing tag with the same ID was replaced */
  replaced: boolean;
  tagId: string;
  message: string;
}

export function addTag(
  input: AddTagInput,
  manager: DestinationLabelManager,
): AddTagResult {
  const replaced = manager.getTag(input.id) !== undefined;
  manager.addTag(TagSchema.parse(input));

  return {
    success: true,
    replaced,
    tagId: input.id,
    message: replaced
      ? `Tag '${input.id}' replaced`
      : `Tag '${input.id}' added`,
  };
}
