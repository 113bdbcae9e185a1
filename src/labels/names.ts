import type { Destination, LanguageCode, Tag } from "@/types";

/**
 * Display name of a tag: first synonym in `language`, then in `fallback`,
 * then the id.
 */
export function getTagName(
  tag: Tag,
  language: LanguageCode,
  fallback: LanguageCode = "en",
): string {
  return tag.synonyms[language]?.[0] ?? tag.synonyms[fallback]?.[0] ?? tag.id;
}

export function getTagSynonyms(tag: Tag, language: LanguageCode): string[] {
  return tag.synonyms[language] ?? [];
}

export function getDestinationName(
  destination: Destination,
  language: LanguageCode,
  fallback: LanguageCode = "en",
): string {
  return (
    destination.names[language] || destination.names[fallback] || destination.id
  );
}
