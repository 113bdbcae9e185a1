import { z } from "zod";

// Language codes (ISO 639-1)
export const LanguageCodeSchema = z.enum(["zh", "en", "ja", "ko", "fr", "es", "de"]);
export type LanguageCode = z.infer<typeof LanguageCodeSchema>;
export const LANGUAGE_CODES = LanguageCodeSchema.options;

// Tag categories
export const TagCategorySchema = z.enum([
  "scenery",
  "activity",
  "culture",
  "climate",
  "crowd",
  "budget",
  "transport",
  "facility",
]);
export type TagCategory = z.infer<typeof TagCategorySchema>;
export const TAG_CATEGORIES = TagCategorySchema.options;

// Tag types
export const SynonymListSchema = z.array(z.string().min(1)).min(1);

export const TagSchema = z.object({
  id: z.string().min(1),
  category: TagCategorySchema,
  /** Per-language synonyms; the first entry is the display name */
  synonyms: z.record(LanguageCodeSchema, SynonymListSchema).default({}),
  description: z.record(LanguageCodeSchema, z.string()).default({}),
  /** Tie-break for prefix results, higher first */
  weight: z.number().nonnegative().default(1),
  /** Hierarchy pointer, not checked for cycles */
  parentId: z.string().min(1).optional(),
});
export type Tag = z.infer<typeof TagSchema>;
export type TagInput = z.input<typeof TagSchema>;

// Destination types
export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});
export type Coordinates = z.infer<typeof CoordinatesSchema>;

export const DestinationSchema = z.object({
  id: z.string().min(1),
  names: z.record(LanguageCodeSchema, z.string()).default({}),
  coordinates: CoordinatesSchema.optional(),
  /** ISO 3166-1 alpha-2 */
  countryCode: z.string().optional(),
  administrativeLevel: z.string().optional(),
  /** tag id -> relevance, nominally 0-1 */
  tags: z.record(z.string(), z.number()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
});
export type Destination = z.infer<typeof DestinationSchema>;
export type DestinationInput = z.input<typeof DestinationSchema>;

export interface ScoredDestination {
  destination: Destination;
  score: number;
}

// Config types
export const SearchConfigSchema = z.object({
  prefixLimit: z.number().int().min(1).default(10),
  destinationLimit: z.number().int().min(1).default(20),
  /** Open-ended threshold: match scores can exceed 1.0 */
  minMatchScore: z.number().min(0).default(0.3),
});
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const ConfigSchema = z.object({
  defaultLanguage: LanguageCodeSchema.default("en"),
  seedDefaultTags: z.boolean().default(true),
  seedSampleDestinations: z.boolean().default(true),
  /** Tag file imported at startup, relative to the project path */
  tagsFile: z.string().optional(),
  search: SearchConfigSchema.default({}),
});
export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = {
  defaultLanguage: "en",
  seedDefaultTags: true,
  seedSampleDestinations: true,
  search: {
    prefixLimit: 10,
    destinationLimit: 20,
    minMatchScore: 0.3,
  },
};
