import { z } from "zod";
import type { DestinationLabelManager } from "@/labels";
import type { Config } from "@/types";
import { resolveLanguage } from "../language";
import { type TagView, toTagView } from "./view";

export const SearchTagsInputSchema = z.object({
  prefix: z.string().describe("Tag name prefix (case-insensitive)"),
  language: z
    .string()
    .optional()
    .describe("Language code: zh, en, ja, ko, fr, es, de"),
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .describe("Maximum results (default: 10)"),
});

export type SearchTagsInput = z.infer<typeof SearchTagsInputSchema>;

export function searchTags(
  input: SearchTagsInput,
  manager: DestinationLabelManager,
  config: Config,
): TagView[] {
  const language = resolveLanguage(input.language, config.defaultLanguage);
  const tags = manager.searchTagsByPrefix(
    input.prefix,
    language,
    input.limit ?? config.search.prefixLimit,
  );
  return tags.map((tag) => toTagView(tag, language));
}
