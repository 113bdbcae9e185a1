import type { DestinationInput } from "@/types";

/**
 * Demo destinations loaded when `seedSampleDestinations` is on
 */
export const SAMPLE_DESTINATIONS: DestinationInput[] = [
  {
    id: "geoname:1816670",
    names: { en: "Beijing", zh: "北京", ja: "北京" },
    coordinates: { lat: 39.9, lng: 116.41 },
    countryCode: "CN",
    administrativeLevel: "municipality",
    tags: {
      historical: 0.95,
      culture: 0.9,
      family_friendly: 0.7,
      luxury: 0.6,
    },
    metadata: {
      population: 21540000,
      timezone: "Asia/Shanghai",
      famousFor: ["Great Wall", "Forbidden City"],
    },
  },
  {
    id: "geoname:1850147",
    names: { en: "Tokyo", zh: "东京", ja: "東京" },
    coordinates: { lat: 35.68, lng: 139.76 },
    countryCode: "JP",
    administrativeLevel: "metropolis",
    tags: {
      culture: 0.85,
      luxury: 0.8,
      family_friendly: 0.75,
      historical: 0.6,
    },
    metadata: {
      population: 13960000,
      timezone: "Asia/Tokyo",
      famousFor: ["Shibuya Crossing", "Senso-ji Temple"],
    },
  },
  {
    id: "geoname:5128581",
    names: { en: "New York City", zh: "纽约", ja: "ニューヨーク" },
    coordinates: { lat: 40.71, lng: -74.01 },
    countryCode: "US",
    administrativeLevel: "city",
    tags: {
      luxury: 0.9,
      culture: 0.85,
      family_friendly: 0.65,
    },
    metadata: {
      population: 8419000,
      timezone: "America/New_York",
      famousFor: ["Statue of Liberty", "Times Square"],
    },
  },
  {
    id: "geoname:2643743",
    names: { en: "London", zh: "伦敦", ja: "ロンドン" },
    coordinates: { lat: 51.51, lng: -0.13 },
    countryCode: "GB",
    administrativeLevel: "city",
    tags: {
      historical: 0.9,
      culture: 0.85,
      luxury: 0.7,
      family_friendly: 0.7,
    },
    metadata: {
      population: 8900000,
      timezone: "Europe/London",
      famousFor: ["Big Ben", "British Museum"],
    },
  },
];
