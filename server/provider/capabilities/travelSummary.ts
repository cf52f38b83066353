import { z } from "zod";
import { OUTPUT_LIMITS, RESPONSE_CONSTANTS } from "../../config/constants";
import { defineCapability, type ProviderContext } from "../types";
import { formatCountry, lookupCountry } from "./countryInfo";
import { fetchPublicHolidays } from "./publicHolidays";
import { findPois } from "./searchPoi";
import { weatherForLocation } from "./weather";

export type SummaryTarget = {
  // heading and the place weather and attractions are looked up for
  place: string;
  countryName: string;
};

/**
 * Composes country facts, a short forecast, a handful of attractions and
 * this year's holidays. The country record is fetched once and also
 * supplies the two-letter code for the holidays lookup; without a code
 * the holidays section is left out.
 */
export async function buildTravelSummary(ctx: ProviderContext, target: SummaryTarget): Promise<string> {
  let result = `${RESPONSE_CONSTANTS.SUMMARY_PREFIX} Travel Summary for ${target.place}:\n${"=".repeat(50)}\n\n`;

  const country = await lookupCountry(ctx, target.countryName);
  result += formatCountry(target.countryName, country) + "\n\n";

  result += (await weatherForLocation(ctx, target.place, OUTPUT_LIMITS.SUMMARY_FORECAST_DAYS)) + "\n\n";

  result += (await findPois(ctx, {
    location: target.place,
    poiType: "attractions",
    limit: OUTPUT_LIMITS.SUMMARY_POI_LIMIT,
    radius: 10000,
  })) + "\n\n";

  const countryCode = country?.cca2;
  if (countryCode) {
    result += (await fetchPublicHolidays(ctx, ctx.now().getFullYear(), countryCode)) + "\n\n";
  }

  return result;
}

export const getTravelSummaryForCountry = defineCapability({
  name: "get_travel_summary_for_country",
  description:
    "Get a complete travel overview for a country: country information, a weather forecast, " +
    "popular attractions and this year's public holidays.",
  inputShape: {
    country_name: z.string().min(1).describe("Country name (e.g., 'France', 'Japan', 'Australia')"),
  },
  handler: (ctx, { country_name }) =>
    buildTravelSummary(ctx, { place: country_name, countryName: country_name }),
});

export const getTravelSummaryForCity = defineCapability({
  name: "get_travel_summary_for_city",
  description:
    "Get a complete travel overview for a city: information about its country, a weather forecast " +
    "and popular attractions for the city, and the country's public holidays this year.",
  inputShape: {
    city_name: z.string().min(1).describe("City name (e.g., 'Paris', 'Tokyo', 'New York')"),
    country_name: z.string().min(1).describe("Country name (e.g., 'France', 'Japan', 'Australia')"),
  },
  handler: (ctx, { city_name, country_name }) =>
    buildTravelSummary(ctx, { place: city_name, countryName: country_name }),
});
