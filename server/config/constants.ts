/**
 * Application Constants
 *
 * Centralized configuration values used by the gateway and the capability
 * provider. Consolidates magic numbers and third-party endpoints.
 */

/**
 * Outbound HTTP behaviour for capability lookups.
 */
export const HTTP_CONSTANTS = {
  /**
   * Per-request timeout (milliseconds).
   */
  REQUEST_TIMEOUT_MS: 30000,

  /**
   * Total attempts for a transient failure (first try included).
   */
  MAX_ATTEMPTS: 2,

  /**
   * Backoff base; the delay after attempt n is BASE * 2^n.
   */
  BASE_RETRY_DELAY_MS: 1000,

  USER_AGENT: "travel-mcp/1.0",
} as const;

export const API_ENDPOINTS = {
  PUBLIC_HOLIDAYS: "https://date.nager.at/api/v3",
  WEATHER: "https://api.open-meteo.com/v1",
  COUNTRIES: "https://restcountries.com/v3.1",
  EXCHANGE_RATES: "https://api.exchangerate-api.com/v4",
  GEOCODING: "https://nominatim.openstreetmap.org/search",
  OVERPASS: "https://overpass-api.de/api/interpreter",
} as const;

/**
 * Output size limits for capability text.
 */
export const OUTPUT_LIMITS = {
  MAX_HOLIDAYS: 15,
  MAX_DAILY_ROWS: 7,
  MAX_FORECAST_DAYS: 16,
  MAX_POI_RESULTS: 50,
  MAX_POI_RADIUS_M: 50000,
  SUMMARY_FORECAST_DAYS: 5,
  SUMMARY_POI_LIMIT: 5,
} as const;

export const RESPONSE_CONSTANTS = {
  /**
   * Returned when a query produced no text at all.
   */
  NO_RESPONSE_SENTINEL: "No response generated",

  /**
   * Prefix on capability text so the model restates rather than embellishes.
   */
  SUMMARY_PREFIX: "Summarise this for me. Do not modify or add information.",
} as const;

/**
 * Worst case for one lookup: every attempt times out, plus the backoff
 * sleeps between them.
 */
const LOOKUP_BUDGET_MS =
  HTTP_CONSTANTS.MAX_ATTEMPTS * HTTP_CONSTANTS.REQUEST_TIMEOUT_MS +
  HTTP_CONSTANTS.BASE_RETRY_DELAY_MS * (2 ** (HTTP_CONSTANTS.MAX_ATTEMPTS - 1) - 1);

/**
 * Most lookups one capability call makes: the city summary does country,
 * geocode, forecast, geocode again when the first one missed, Overpass,
 * and holidays.
 */
const MAX_LOOKUPS_PER_CALL = 6;

export const PROVIDER_CONSTANTS = {
  SERVER_NAME: "travel",
  SERVER_VERSION: "1.0.0",
  CLIENT_NAME: "travel-gateway",
  CLIENT_VERSION: "1.0.0",
  DEFAULT_SCRIPT: "server/provider/index.ts",
  /**
   * Environment variables forwarded to the provider process on top of the
   * transport's minimal default environment.
   */
  FORWARDED_ENV: ["LOG_LEVEL", "LOG_DIR"],

  /**
   * Gateway-side limit on one tools/call. Outlasts the provider's own retry
   * budget so its fallback text arrives instead of a protocol timeout.
   */
  CALL_TIMEOUT_MS: MAX_LOOKUPS_PER_CALL * LOOKUP_BUDGET_MS + 5000,
} as const;
