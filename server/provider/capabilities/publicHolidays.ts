import { z } from "zod";
import { API_ENDPOINTS, OUTPUT_LIMITS, RESPONSE_CONSTANTS } from "../../config/constants";
import { defineCapability, type ProviderContext } from "../types";

const holidaysSchema = z.array(
  z.object({
    date: z.string().optional(),
    name: z.string().optional(),
    localName: z.string().optional(),
  }).passthrough(),
);

export type Holiday = z.infer<typeof holidaysSchema>[number];

export function formatHolidays(countryCode: string, year: number, holidays: Holiday[] | null): string {
  if (!holidays) {
    return `The public holidays API is not working for ${countryCode} in ${year}.`;
  }
  if (holidays.length === 0) {
    return `No public holidays were found for ${countryCode} in ${year}.`;
  }

  let result = `${RESPONSE_CONSTANTS.SUMMARY_PREFIX} Public holidays in ${countryCode} for ${year}:\n\n`;

  for (const holiday of holidays.slice(0, OUTPUT_LIMITS.MAX_HOLIDAYS)) {
    const name = holiday.name ?? "Unknown";
    const localName = holiday.localName ?? name;
    result += `📅 ${holiday.date ?? "Unknown"}: ${name}`;
    if (localName !== name) {
      result += ` (${localName})`;
    }
    result += "\n";
  }

  if (holidays.length > OUTPUT_LIMITS.MAX_HOLIDAYS) {
    result += `\n... and ${holidays.length - OUTPUT_LIMITS.MAX_HOLIDAYS} more holidays`;
  }

  return result;
}

export async function fetchPublicHolidays(ctx: ProviderContext, year: number, countryCode: string): Promise<string> {
  const holidays = await ctx.http.getParsed(
    holidaysSchema,
    `${API_ENDPOINTS.PUBLIC_HOLIDAYS}/PublicHolidays/${year}/${encodeURIComponent(countryCode)}`,
  );
  return formatHolidays(countryCode, year, holidays);
}

export const getPublicHolidays = defineCapability({
  name: "get_public_holidays",
  description:
    "Get public holidays for a specific country and year. Returns official holiday dates " +
    "with their English and local names, for planning travel around national celebrations.",
  inputShape: {
    year: z.number().int().describe("Year to get holidays for (e.g., 2024, 2025)"),
    country_code: z.string().length(2).describe("Two letter country code (e.g., 'US', 'GB', 'DE', 'JP', 'AU')"),
  },
  handler: (ctx, { year, country_code }) => fetchPublicHolidays(ctx, year, country_code),
});
