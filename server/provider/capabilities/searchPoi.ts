import { z } from "zod";
import { OUTPUT_LIMITS, RESPONSE_CONSTANTS } from "../../config/constants";
import { UnknownPoiCategoryError } from "../../utils/errorHandler";
import { resolveCoordinates } from "../geocoding";
import { availablePoiTypes, overpassRequest } from "../overpass";
import { defineCapability, type ProviderContext } from "../types";

const overpassSchema = z.object({
  elements: z.array(
    z.object({
      type: z.string().optional(),
      tags: z.record(z.string()).optional(),
    }).passthrough(),
  ),
}).passthrough();

export type PoiElement = z.infer<typeof overpassSchema>["elements"][number];

export type PoiSearch = {
  location: string;
  poiType: string;
  limit: number;
  radius: number;
};

function describeElement(tags: Record<string, string>): string {
  let entry = `📍 ${tags.name ?? tags.tourism ?? "Unnamed POI"}\n`;

  if (tags.website) entry += `   🌐 Website: ${tags.website}\n`;
  if (tags.phone) entry += `   📞 Phone: ${tags.phone}\n`;
  if (tags.opening_hours) entry += `   🕐 Hours: ${tags.opening_hours}\n`;
  if (tags.cuisine) entry += `   🍽️  Cuisine: ${tags.cuisine}\n`;
  if (tags["addr:street"]) entry += `   🏠 Address: ${tags["addr:housenumber"] ?? ""} ${tags["addr:street"]}\n`;
  if (tags.brand) entry += `   🏢 Brand: ${tags.brand}\n`;
  if (tags.stars) entry += `   ⭐ Rating: ${tags.stars} stars\n`;

  return entry + "\n";
}

export function formatPois(search: PoiSearch, elements: PoiElement[]): string {
  if (elements.length === 0) {
    return `No ${search.poiType} POIs found in ${search.location}.`;
  }

  let result = `${RESPONSE_CONSTANTS.SUMMARY_PREFIX} Points of Interest (${search.poiType}) in ${search.location}:\n\n`;

  let shown = 0;
  for (const element of elements) {
    if (shown >= search.limit) break;
    if (element.type !== "node" || !element.tags) continue;

    result += describeElement(element.tags);
    shown++;
  }

  if (elements.length > search.limit) {
    result += `... and ${elements.length - search.limit} more POIs`;
  }

  return result;
}

export async function findPois(ctx: ProviderContext, search: PoiSearch): Promise<string> {
  const coordinates = await resolveCoordinates(ctx, search.location);
  if (!coordinates) {
    return `Unable to find coordinates for location: ${search.location}`;
  }

  const limit = Math.min(search.limit, OUTPUT_LIMITS.MAX_POI_RESULTS);
  const radius = Math.min(search.radius, OUTPUT_LIMITS.MAX_POI_RADIUS_M);

  let request: ReturnType<typeof overpassRequest>;
  try {
    request = overpassRequest(search.poiType, coordinates.latitude, coordinates.longitude, radius, limit);
  } catch (error) {
    if (error instanceof UnknownPoiCategoryError) {
      return `Invalid POI type: ${search.poiType}. Available types: ${availablePoiTypes().join(", ")}`;
    }
    throw error;
  }

  const data = await ctx.http.getParsed(overpassSchema, request.url, request.params);
  if (!data) {
    return `Unable to fetch POI data for ${search.location}.`;
  }

  return formatPois({ ...search, limit, radius }, data.elements);
}

export const searchPoi = defineCapability({
  name: "search_poi",
  description:
    "Search for Points of Interest (POI) near a location using OpenStreetMap: attractions, " +
    "restaurants, hotels, museums and more, with contact details, opening hours and addresses.",
  inputShape: {
    location: z.string().min(1).describe("Location to search in (city, country, etc.) - e.g., 'Paris', 'Tokyo'"),
    poi_type: z.string().default("attractions").describe(
      `Type of POI to search for. One of: ${availablePoiTypes().join(", ")}`,
    ),
    limit: z.number().int().min(1).default(10).describe("Maximum number of results (default 10, max 50)"),
    radius: z.number().int().min(1).default(10000).describe("Search radius in meters (default 10000, max 50000)"),
  },
  handler: (ctx, { location, poi_type, limit, radius }) =>
    findPois(ctx, { location, poiType: poi_type, limit, radius }),
});
