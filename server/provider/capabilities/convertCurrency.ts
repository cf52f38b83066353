import { z } from "zod";
import { API_ENDPOINTS, RESPONSE_CONSTANTS } from "../../config/constants";
import { defineCapability, type ProviderContext } from "../types";

const ratesSchema = z.object({
  rates: z.record(z.number()).default({}),
}).passthrough();

export type Conversion = {
  amount: number;
  from: string;
  to: string;
};

export function formatConversion(conversion: Conversion, rate: number): string {
  const converted = conversion.amount * rate;
  return (
    `${RESPONSE_CONSTANTS.SUMMARY_PREFIX} Currency Conversion:\n` +
    `${conversion.amount} ${conversion.from} = ${converted.toFixed(2)} ${conversion.to}\n` +
    `(Exchange rate: 1 ${conversion.from} = ${rate.toFixed(4)} ${conversion.to})`
  );
}

export async function convert(ctx: ProviderContext, conversion: Conversion): Promise<string> {
  const data = await ctx.http.getParsed(
    ratesSchema,
    `${API_ENDPOINTS.EXCHANGE_RATES}/latest/${encodeURIComponent(conversion.from)}`,
  );
  if (!data) {
    return `Unable to fetch exchange rates for ${conversion.from}.`;
  }

  const rate = data.rates[conversion.to];
  if (rate === undefined) {
    return `Currency ${conversion.to} not found in exchange rates.`;
  }

  return formatConversion(conversion, rate);
}

export const convertCurrency = defineCapability({
  name: "convert_currency",
  description:
    "Convert an amount from one currency to another using current exchange rates. " +
    "Useful for travel budgeting and understanding local costs.",
  inputShape: {
    amount: z.number().describe("Amount to convert (e.g., 100.0)"),
    from_currency: z.string().min(3).max(3).describe("Source currency code (e.g., 'USD', 'EUR', 'JPY', 'GBP')"),
    to_currency: z.string().min(3).max(3).describe("Target currency code (e.g., 'EUR', 'USD', 'CAD', 'AUD')"),
  },
  handler: (ctx, { amount, from_currency, to_currency }) =>
    convert(ctx, { amount, from: from_currency.toUpperCase(), to: to_currency.toUpperCase() }),
});
