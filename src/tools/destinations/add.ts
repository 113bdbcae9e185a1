import { z } from "zod";
import {
  type DestinationLabelManager,
  LabelDecodeError,
  parseLanguageCode,
} from "@/labels";
import { CoordinatesSchema, type Destination } from "@/types";

export const AddDestinationInputSchema = z.object({
  destinationId: z
    .string()
    .min(1)
    .describe("Destination ID, e.g. geoname:1808926"),
  names: z
    .record(z.string(), z.string())
    .describe("Names keyed by language code; unknown codes are dropped"),
  tags: z
    .record(z.string(), z.number())
    .describe("Tag ID → relevance (0-1)"),
  coordinates: CoordinatesSchema.optional().describe("{ lat, lng }"),
  countryCode: z.string().optional().describe("ISO 3166-1 country code"),
  administrativeLevel: z
    .string()
    .optional()
    .describe("city, province, municipality, ..."),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type AddDestinationInput = z.infer<typeof AddDestinationInputSchema>;

export interface AddDestinationResult {
  success: boolean;
  destinationId: string;
  message: string;
  /** Name keys that were not a supported language code */
  droppedLanguages: string[];
}

/**
 * Add or fully replace a destination
 */
export function addDestination(
  input: AddDestinationInput,
  manager: DestinationLabelManager,
): AddDestinationResult {
  const names: Destination["names"] = {};
  const droppedLanguages: string[] = [];

  for (const [code, name] of Object.entries(input.names)) {
    try {
      names[parseLanguageCode(code)] = name;
    } catch (error) {
      if (!(error instanceof LabelDecodeError)) throw error;
      droppedLanguages.push(code);
    }
  }

  if (droppedLanguages.length > 0) {
    console.warn(
      `[destinations] Dropped names with unknown language codes: ${droppedLanguages.join(", ")}`,
    );
  }

  manager.addDestination({
    id: input.destinationId,
    names,
    coordinates: input.coordinates,
    countryCode: input.countryCode,
    administrativeLevel: input.administrativeLevel,
    tags: input.tags,
    metadata: input.metadata ?? {},
  });

  return {
    success: true,
    destinationId: input.destinationId,
    message: `Destination '${input.destinationId}' added`,
    droppedLanguages,
  };
}
