import { getTagName, getTagSynonyms } from "@/labels";
import type { LanguageCode, Tag, TagCategory } from "@/types";

/**
 * Tag as returned by the MCP tools: localized to one language
 */
export interface TagView {
  id: string;
  name: string;
  category: TagCategory;
  description: string | null;
  synonyms: string[];
  weight: number;
  parentId: string | null;
}

export function toTagView(tag: Tag, language: LanguageCode): TagView {
  return {
    id: tag.id,
    name: getTagName(tag, language),
    category: tag.category,
    description: tag.description[language] ?? null,
    synonyms: getTagSynonyms(tag, language),
    weight: tag.weight,
    parentId: tag.parentId ?? null,
  };
}
