import { z } from "zod";
import type { DestinationLabelManager } from "@/labels";
import type { Config } from "@/types";
import { resolveLanguage } from "../language";
import { type DestinationView, toDestinationView } from "./view";

export const SearchDestinationsInputSchema = z.object({
  tags: z
    .array(z.string())
    .describe("Free-text tag queries, matched against tag synonyms"),
  language: z.string().optional().describe("Language of the queries"),
  minMatchScore: z
    .number()
    .min(0)
    .optional()
    .describe(
      "Minimum match score (default: 0.3). Exact matches push scores above 1.0",
    ),
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .describe("Maximum results (default: 20)"),
});

export type SearchDestinationsInput = z.infer<
  typeof SearchDestinationsInputSchema
>;

export function searchDestinations(
  input: SearchDestinationsInput,
  manager: DestinationLabelManager,
  config: Config,
): DestinationView[] {
  const language = resolveLanguage(input.language, config.defaultLanguage);
  const results = manager.searchDestinationsByTags(
    input.tags,
    language,
    input.minMatchScore ?? config.search.minMatchScore,
    input.limit ?? config.search.destinationLimit,
  );

  return results.map(({ destination, score }) =>
    toDestinationView(destination, language, score),
  );
}
