import { z } from "zod";
import { API_ENDPOINTS, OUTPUT_LIMITS, RESPONSE_CONSTANTS } from "../../config/constants";
import { resolveCoordinates, type Coordinates } from "../geocoding";
import { defineCapability, type ProviderContext } from "../types";

const reading = z.union([z.number(), z.string()]).nullable().optional();

const forecastSchema = z.object({
  current_weather: z.object({
    time: z.string().optional(),
    temperature: reading,
    windspeed: reading,
    weathercode: reading,
  }).passthrough().optional(),
  daily: z.object({
    time: z.array(z.string()).optional(),
    temperature_2m_max: z.array(reading).optional(),
    temperature_2m_min: z.array(reading).optional(),
    precipitation_probability_max: z.array(reading).optional(),
  }).passthrough().optional(),
}).passthrough();

export type Forecast = z.infer<typeof forecastSchema>;

function show(value: number | string | null | undefined): string {
  return value === null || value === undefined ? "Unknown" : String(value);
}

export function formatForecast(forecast: Forecast): string {
  let result = `${RESPONSE_CONSTANTS.SUMMARY_PREFIX} Weather Forecast:\n\n`;

  const current = forecast.current_weather;
  if (current) {
    result += `Current Weather (${show(current.time)}):\n`;
    result += `   Temperature: ${show(current.temperature)}°C\n`;
    result += `   Wind Speed: ${show(current.windspeed)} km/h\n`;
    result += `   Weather Code: ${show(current.weathercode)}\n\n`;
  }

  const daily = forecast.daily;
  if (daily?.time) {
    result += "📅 Daily Forecast:\n";
    const rows = Math.min(daily.time.length, OUTPUT_LIMITS.MAX_DAILY_ROWS);
    for (let i = 0; i < rows; i++) {
      const max = show(daily.temperature_2m_max?.[i]);
      const min = show(daily.temperature_2m_min?.[i]);
      const rain = show(daily.precipitation_probability_max?.[i]);
      result += `   ${daily.time[i]}: ${min}°C - ${max}°C, ${rain}% rain chance\n`;
    }
  }

  return result;
}

export async function fetchForecast(ctx: ProviderContext, coordinates: Coordinates, days: number): Promise<string> {
  const forecast = await ctx.http.getParsed(forecastSchema, `${API_ENDPOINTS.WEATHER}/forecast`, {
    latitude: coordinates.latitude,
    longitude: coordinates.longitude,
    current_weather: "true",
    daily: "temperature_2m_max,temperature_2m_min,precipitation_probability_max,windspeed_10m_max",
    timezone: "auto",
    forecast_days: Math.min(days, OUTPUT_LIMITS.MAX_FORECAST_DAYS),
  });

  if (!forecast) {
    return `Unable to fetch weather data for coordinates (${coordinates.latitude}, ${coordinates.longitude}).`;
  }
  return formatForecast(forecast);
}

export async function weatherForLocation(ctx: ProviderContext, location: string, days: number): Promise<string> {
  const coordinates = await resolveCoordinates(ctx, location);
  if (!coordinates) {
    return `Unable to find coordinates for location: ${location}`;
  }
  return fetchForecast(ctx, coordinates, days);
}

export const getWeatherByLocation = defineCapability({
  name: "get_weather_by_location",
  description:
    "Get a weather forecast for a location by name: current conditions, daily temperature " +
    "ranges and precipitation probability.",
  inputShape: {
    location: z.string().min(1).describe("Location name (country, city, etc.) - e.g., 'Paris', 'Tokyo', 'New York'"),
    days: z.number().int().min(1).default(7).describe("Number of days to forecast (1-16, default 7)"),
  },
  handler: (ctx, { location, days }) => weatherForLocation(ctx, location, days),
});
