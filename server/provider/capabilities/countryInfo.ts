import { z } from "zod";
import { API_ENDPOINTS, RESPONSE_CONSTANTS } from "../../config/constants";
import { defineCapability, type ProviderContext } from "../types";

const countrySchema = z.object({
  name: z.object({
    common: z.string().optional(),
    official: z.string().optional(),
  }).passthrough().optional(),
  cca2: z.string().optional(),
  capital: z.array(z.string()).optional(),
  region: z.string().optional(),
  subregion: z.string().optional(),
  population: z.number().optional(),
  languages: z.record(z.string()).optional(),
  currencies: z.record(
    z.object({
      name: z.string().optional(),
      symbol: z.string().optional(),
    }).passthrough(),
  ).optional(),
  latlng: z.array(z.number()).optional(),
  timezones: z.array(z.string()).optional(),
  flag: z.string().optional(),
}).passthrough();

export type Country = z.infer<typeof countrySchema>;

export async function lookupCountry(ctx: ProviderContext, countryName: string): Promise<Country | null> {
  const matches = await ctx.http.getParsed(
    z.array(countrySchema),
    `${API_ENDPOINTS.COUNTRIES}/name/${encodeURIComponent(countryName)}`,
  );
  return matches?.[0] ?? null;
}

export function formatCountry(countryName: string, country: Country | null): string {
  if (!country) {
    return `Unable to fetch information for country: ${countryName}`;
  }

  let result = `${RESPONSE_CONSTANTS.SUMMARY_PREFIX} Country Information: ${country.name?.common ?? countryName}\n\n`;

  const subregion = country.subregion;
  result += `📋 Official Name: ${country.name?.official ?? "Unknown"}\n`;
  result += `🏛️  Capital: ${country.capital?.[0] ?? "Unknown"}\n`;
  result += `🌐 Region: ${country.region ?? "Unknown"}`;
  if (subregion) {
    result += ` (${subregion})`;
  }
  result += `\n👥 Population: ${country.population !== undefined ? country.population.toLocaleString("en-US") : "Unknown"}\n`;

  const languages = Object.values(country.languages ?? {});
  if (languages.length > 0) {
    result += `🗣️  Languages: ${languages.join(", ")}\n`;
  }

  const currencies = Object.entries(country.currencies ?? {}).map(([code, info]) => {
    const symbol = info.symbol ? ` ${info.symbol}` : "";
    return `${info.name ?? code} (${code})${symbol}`;
  });
  if (currencies.length > 0) {
    result += `💰 Currencies: ${currencies.join(", ")}\n`;
  }

  const latlng = country.latlng ?? [];
  if (latlng.length >= 2) {
    result += `📍 Coordinates: ${latlng[0]}, ${latlng[1]}\n`;
  }

  const timezones = country.timezones ?? [];
  if (timezones.length > 0) {
    result += `🕐 Time Zones: ${timezones.join(", ")}\n`;
  }

  if (country.flag) {
    result += `🏳️  Flag: ${country.flag}\n`;
  }

  return result;
}

export const getCountryInfo = defineCapability({
  name: "get_country_info",
  description:
    "Get detailed information about a specific country: official name, capital, population, " +
    "languages, currencies and time zones. If the name is not a country, do not use this tool.",
  inputShape: {
    country_name: z.string().min(1).describe("Name of the country (e.g., 'france', 'japan', 'brazil', 'australia')"),
  },
  handler: async (ctx, { country_name }) => formatCountry(country_name, await lookupCountry(ctx, country_name)),
});
