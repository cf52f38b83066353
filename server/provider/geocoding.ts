import { z } from "zod";
import { API_ENDPOINTS } from "../config/constants";
import { logDebug, logError } from "../utils/logger";
import type { ResilientFetch } from "./resilientFetch";

export type Coordinates = {
  latitude: number;
  longitude: number;
};

/**
 * Process-wide memo of successful geocoding lookups, keyed by the
 * lower-cased location string. Append-only: no TTL, no eviction.
 */
export class CoordinateCache {
  private entries = new Map<string, Coordinates>();

  static keyFor(location: string): string {
    return location.toLowerCase();
  }

  get(location: string): Coordinates | undefined {
    return this.entries.get(CoordinateCache.keyFor(location));
  }

  set(location: string, coordinates: Coordinates): void {
    this.entries.set(CoordinateCache.keyFor(location), coordinates);
  }

  get size(): number {
    return this.entries.size;
  }
}

const coordinateValue = z.union([z.string(), z.number()]);

const geocodeResponseSchema = z.array(
  z.object({
    lat: coordinateValue.optional(),
    lon: coordinateValue.optional(),
  }).passthrough(),
);

type GeocodeDeps = {
  http: ResilientFetch;
  coordinates: CoordinateCache;
};

export async function resolveCoordinates(deps: GeocodeDeps, location: string): Promise<Coordinates | null> {
  const cached = deps.coordinates.get(location);
  if (cached) {
    logDebug(`[Geocoding] Cache hit for ${location}`);
    return cached;
  }

  const results = await deps.http.getParsed(geocodeResponseSchema, API_ENDPOINTS.GEOCODING, {
    q: location,
    format: "json",
    limit: 1,
  });

  const first = results?.[0];
  if (!first || first.lat === undefined || first.lon === undefined || first.lat === "" || first.lon === "") {
    return null;
  }

  const latitude = Number(first.lat);
  const longitude = Number(first.lon);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    logError(`[Geocoding] Invalid coordinates for ${location}: lat=${first.lat}, lon=${first.lon}`);
    return null;
  }

  const coordinates = { latitude, longitude };
  deps.coordinates.set(location, coordinates);
  return coordinates;
}
