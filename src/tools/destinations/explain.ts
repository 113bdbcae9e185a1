import { z } from "zod";
import {
  type DestinationLabelManager,
  formatMatchSummary,
  type MatchBreakdown,
} from "@/labels";
import type { Config } from "@/types";
import { resolveLanguage } from "../language";

export const ExplainMatchInputSchema = z.object({
  destinationId: z.string().describe("Destination ID"),
  tags: z.array(z.string()).describe("Free-text tag queries"),
  language: z.string().optional().describe("Language of the queries"),
});

export type ExplainMatchInput = z.infer<typeof ExplainMatchInputSchema>;

export interface ExplainMatchResult extends MatchBreakdown {
  destinationId: string;
  summary: string;
}

/**
 * Score breakdown for one destination, or null if it does not exist
 */
export function explainMatch(
  input: ExplainMatchInput,
  manager: DestinationLabelManager,
  config: Config,
): ExplainMatchResult | null {
  const destination = manager.getDestination(input.destinationId);
  if (!destination) {
    return null;
  }

  const language = resolveLanguage(input.language, config.defaultLanguage);
  const breakdown = manager.explainTagMatch(destination, input.tags, language);

  return {
    destinationId: destination.id,
    summary: formatMatchSummary(breakdown),
    ...breakdown,
  };
}
