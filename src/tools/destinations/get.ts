import { z } from "zod";
import type { DestinationLabelManager } from "@/labels";
import type { Config } from "@/types";
import { resolveLanguage } from "../language";
import { type DestinationView, toDestinationView } from "./view";

export const GetDestinationInputSchema = z.object({
  destinationId: z.string().describe("Destination ID to retrieve"),
  language: z.string().optional().describe("Language for the display name"),
});

export type GetDestinationInput = z.infer<typeof GetDestinationInputSchema>;

export function getDestination(
  input: GetDestinationInput,
  manager: DestinationLabelManager,
  config: Config,
): DestinationView | null {
  const destination = manager.getDestination(input.destinationId);
  if (!destination) {
    return null;
  }
  const language = resolveLanguage(input.language, config.defaultLanguage);
  return toDestinationView(destination, language);
}
