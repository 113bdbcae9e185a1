import { z } from "zod";
import {
  type DestinationLabelManager,
  LabelDecodeError,
  parseTagCategory,
} from "@/labels";
import { type Config, type TagCategory, TagCategorySchema } from "@/types";
import { resolveLanguage } from "../language";
import { type TagView, toTagView } from "./view";

export const TagsByCategoryInputSchema = z.object({
  category: z
    .string()
    .describe(`Tag category: ${TagCategorySchema.options.join(", ")}`),
  language: z.string().optional().describe("Language code for names"),
});

export type TagsByCategoryInput = z.infer<typeof TagsByCategoryInputSchema>;

/**
 * List a category's tags. An unknown category is an empty list, not an error.
 */
export function getTagsByCategory(
  input: TagsByCategoryInput,
  manager: DestinationLabelManager,
  config: Config,
): TagView[] {
  let category: TagCategory;
  try {
    category = parseTagCategory(input.category);
  } catch (error) {
    if (error instanceof LabelDecodeError) {
      return [];
    }
    throw error;
  }

  const language = resolveLanguage(input.language, config.defaultLanguage);
  return manager
    .getTagsByCategory(category)
    .map((tag) => toTagView(tag, language));
}
