import type { Capability } from "../types";
import { convertCurrency } from "./convertCurrency";
import { getCountryInfo } from "./countryInfo";
import { getPublicHolidays } from "./publicHolidays";
import { searchPoi } from "./searchPoi";
import { getTravelSummaryForCity, getTravelSummaryForCountry } from "./travelSummary";
import { getWeatherByLocation } from "./weather";

export const TRAVEL_CAPABILITIES: Capability[] = [
  getPublicHolidays,
  getWeatherByLocation,
  getCountryInfo,
  searchPoi,
  convertCurrency,
  getTravelSummaryForCountry,
  getTravelSummaryForCity,
];
