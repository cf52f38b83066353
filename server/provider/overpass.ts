/**
 * Overpass QL builder for points-of-interest searches.
 *
 * buildOverpassQuery is pure: category + circle + limit in, query text out.
 * An unknown category throws UnknownPoiCategoryError.
 */

import { API_ENDPOINTS } from "../config/constants";
import { UnknownPoiCategoryError } from "../utils/errorHandler";
import type { QueryParams } from "./resilientFetch";

// Node tag filters per category; a category with several filters unions them
const POI_FILTERS = {
  // Food & drink
  restaurants: ['["amenity"="restaurant"]'],
  fast_food: ['["amenity"="fast_food"]'],
  cafes: ['["amenity"="cafe"]'],
  bars: ['["amenity"~"^(bar|pub)$"]'],
  nightlife: ['["amenity"~"^(bar|pub|nightclub|biergarten)$"]'],

  // Attractions
  attractions: ['["tourism"~"^(attraction|museum|monument|artwork|viewpoint)$"]'],
  museums: ['["tourism"="museum"]'],
  monuments: ['["historic"~"^(monument|memorial)$"]'],
  parks: ['["leisure"~"^(park|garden)$"]'],
  viewpoints: ['["tourism"="viewpoint"]'],
  religious: ['["amenity"="place_of_worship"]'],
  historic: ['["historic"]'],

  // Accommodation
  hotels: ['["tourism"="hotel"]'],
  hostels: ['["tourism"="hostel"]'],
  accommodation: ['["tourism"~"^(hotel|hostel|guest_house|apartment)$"]'],

  // Shopping
  shopping: ['["shop"]'],
  malls: ['["shop"="mall"]'],
  markets: ['["amenity"="marketplace"]'],
  supermarkets: ['["shop"="supermarket"]'],

  // Transport
  transport: ['["public_transport"~"^(station|stop_position)$"]'],
  stations: ['["railway"="station"]'],
  airports: ['["aeroway"="aerodrome"]'],

  // Services
  healthcare: ['["amenity"~"^(hospital|clinic|pharmacy)$"]'],
  banks: ['["amenity"~"^(bank|atm)$"]'],
  gas_stations: ['["amenity"="fuel"]'],

  all_pois: [
    '["amenity"~"^(restaurant|cafe|bar|hotel)$"]',
    '["tourism"~"^(attraction|museum|monument)$"]',
    '["shop"~"^(mall|supermarket)$"]',
    '["leisure"~"^(park|garden)$"]',
  ],
} as const satisfies Record<string, readonly string[]>;

export type PoiCategory = keyof typeof POI_FILTERS;

export function isPoiCategory(value: string): value is PoiCategory {
  return Object.prototype.hasOwnProperty.call(POI_FILTERS, value);
}

export function availablePoiTypes(): PoiCategory[] {
  return Object.keys(POI_FILTERS).filter(isPoiCategory);
}

export function buildOverpassQuery(
  category: string,
  latitude: number,
  longitude: number,
  radius: number,
  limit: number,
): string {
  if (!isPoiCategory(category)) {
    throw new UnknownPoiCategoryError(category, availablePoiTypes());
  }

  const around = `(around:${radius},${latitude},${longitude})`;
  const nodes = POI_FILTERS[category].map(filter => `node${filter}${around};`).join("");
  return `[out:json];(${nodes});out ${limit};`;
}

export function overpassRequest(
  category: string,
  latitude: number,
  longitude: number,
  radius: number,
  limit: number,
): { url: string; params: QueryParams } {
  return {
    url: API_ENDPOINTS.OVERPASS,
    params: { data: buildOverpassQuery(category, latitude, longitude, radius, limit) },
  };
}
