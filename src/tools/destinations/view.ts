import { getDestinationName } from "@/labels";
import type { Coordinates, Destination, LanguageCode } from "@/types";

export interface DestinationView {
  id: string;
  name: string;
  names: Destination["names"];
  coordinates: Coordinates | null;
  countryCode: string | null;
  administrativeLevel: string | null;
  tags: Record<string, number>;
  metadata: Record<string, unknown>;
  /** Rounded to 3 decimals; only set on search results */
  matchScore?: number;
}

export function toDestinationView(
  destination: Destination,
  language: LanguageCode,
  matchScore?: number,
): DestinationView {
  const view: DestinationView = {
    id: destination.id,
    name: getDestinationName(destination, language),
    names: destination.names,
    coordinates: destination.coordinates ?? null,
    countryCode: destination.countryCode ?? null,
    administrativeLevel: destination.administrativeLevel ?? null,
    tags: destination.tags,
    metadata: destination.metadata,
  };
  if (matchScore !== undefined) {
    view.matchScore = Math.round(matchScore * 1000) / 1000;
  }
  return view;
}
