import { describe, it, expect } from "vitest";
import { formatHolidays, fetchPublicHolidays } from "../provider/capabilities/publicHolidays";
import { formatForecast, weatherForLocation } from "../provider/capabilities/weather";
import { formatCountry, lookupCountry } from "../provider/capabilities/countryInfo";
import { findPois, formatPois } from "../provider/capabilities/searchPoi";
import { convert, formatConversion } from "../provider/capabilities/convertCurrency";
import { buildTravelSummary } from "../provider/capabilities/travelSummary";
import { availablePoiTypes } from "../provider/overpass";
import { fakeProviderContext, requestedUrls, type FakeRoute } from "./helpers/fakeHttp";

const PREFIX = "Summarise this for me. Do not modify or add information.";

const GEOCODING = "https://nominatim.openstreetmap.org/search";
const WEATHER = "https://api.open-meteo.com/v1/forecast";
const COUNTRIES = "https://restcountries.com/v3.1/name/";
const RATES = "https://api.exchangerate-api.com/v4/latest/";
const HOLIDAYS = "https://date.nager.at/api/v3/PublicHolidays/";
const OVERPASS = "https://overpass-api.de/api/interpreter";

const parisGeocode: FakeRoute = { prefix: GEOCODING, body: [{ lat: "48.8566", lon: "2.3522" }] };

const france = {
  name: { common: "France", official: "French Republic" },
  cca2: "FR",
  capital: ["Paris"],
  region: "Europe",
  subregion: "Western Europe",
  population: 67391582,
  languages: { fra: "French" },
  currencies: { EUR: { name: "Euro", symbol: "€" } },
  latlng: [46, 2],
  timezones: ["UTC-10:00", "UTC+01:00"],
  flag: "🇫🇷",
};

describe("get_public_holidays", () => {
  it("explains a failed lookup", () => {
    expect(formatHolidays("FR", 2025, null)).toBe("The public holidays API is not working for FR in 2025.");
  });

  it("explains an empty year", () => {
    expect(formatHolidays("XX", 2025, [])).toBe("No public holidays were found for XX in 2025.");
  });

  it("lists holidays with local names when they differ", () => {
    const text = formatHolidays("FR", 2025, [
      { date: "2025-07-14", name: "Bastille Day", localName: "Fête nationale" },
      { date: "2025-12-25", name: "Christmas Day", localName: "Christmas Day" },
    ]);

    expect(text).toBe(
      `${PREFIX} Public holidays in FR for 2025:\n\n` +
        "📅 2025-07-14: Bastille Day (Fête nationale)\n" +
        "📅 2025-12-25: Christmas Day\n",
    );
  });

  it("truncates after fifteen holidays", () => {
    const holidays = Array.from({ length: 17 }, (_, i) => ({
      date: `2025-01-${String(i + 1).padStart(2, "0")}`,
      name: `Day ${i + 1}`,
    }));

    const text = formatHolidays("DE", 2025, holidays);

    expect(text).toContain("📅 2025-01-15: Day 15\n");
    expect(text).not.toContain("Day 16");
    expect(text.endsWith("\n... and 2 more holidays")).toBe(true);
  });

  it("requests the year and country from the holidays service", async () => {
    const { ctx, fetchImpl } = fakeProviderContext([{ prefix: HOLIDAYS, body: [] }]);

    const text = await fetchPublicHolidays(ctx, 2026, "JP");

    expect(text).toBe("No public holidays were found for JP in 2026.");
    expect(requestedUrls(fetchImpl)[0].pathname).toBe("/api/v3/PublicHolidays/2026/JP");
  });
});

describe("get_weather_by_location", () => {
  it("formats current conditions and daily rows", () => {
    const text = formatForecast({
      current_weather: { time: "2025-06-01T12:00", temperature: 21.5, windspeed: 12, weathercode: 1 },
      daily: {
        time: ["2025-06-01"],
        temperature_2m_max: [24],
        temperature_2m_min: [15],
        precipitation_probability_max: [10],
      },
    });

    expect(text).toBe(
      `${PREFIX} Weather Forecast:\n\n` +
        "Current Weather (2025-06-01T12:00):\n" +
        "   Temperature: 21.5°C\n" +
        "   Wind Speed: 12 km/h\n" +
        "   Weather Code: 1\n\n" +
        "📅 Daily Forecast:\n" +
        "   2025-06-01: 15°C - 24°C, 10% rain chance\n",
    );
  });

  it("shows at most seven days and fills gaps with Unknown", () => {
    const time = Array.from({ length: 10 }, (_, i) => `2025-06-${String(i + 1).padStart(2, "0")}`);
    const text = formatForecast({ daily: { time, temperature_2m_max: [20] } });

    expect(text).toContain("   2025-06-01: Unknown°C - 20°C, Unknown% rain chance\n");
    expect(text).toContain("2025-06-07");
    expect(text).not.toContain("2025-06-08");
  });

  it("caps the forecast length it asks for", async () => {
    const { ctx, fetchImpl } = fakeProviderContext([parisGeocode, { prefix: WEATHER, body: {} }]);

    await weatherForLocation(ctx, "Paris", 30);

    const forecastUrl = requestedUrls(fetchImpl)[1];
    expect(forecastUrl.searchParams.get("forecast_days")).toBe("16");
    expect(forecastUrl.searchParams.get("latitude")).toBe("48.8566");
  });

  it("explains a location that cannot be geocoded", async () => {
    const { ctx } = fakeProviderContext([{ prefix: GEOCODING, body: [] }]);

    await expect(weatherForLocation(ctx, "Atlantis", 3)).resolves.toBe(
      "Unable to find coordinates for location: Atlantis",
    );
  });

  it("explains a failed forecast", async () => {
    const { ctx } = fakeProviderContext([parisGeocode]);

    await expect(weatherForLocation(ctx, "Paris", 3)).resolves.toBe(
      "Unable to fetch weather data for coordinates (48.8566, 2.3522).",
    );
  });
});

describe("get_country_info", () => {
  it("formats the country record", () => {
    expect(formatCountry("france", france)).toBe(
      `${PREFIX} Country Information: France\n\n` +
        "📋 Official Name: French Republic\n" +
        "🏛️  Capital: Paris\n" +
        "🌐 Region: Europe (Western Europe)\n" +
        "👥 Population: 67,391,582\n" +
        "🗣️  Languages: French\n" +
        "💰 Currencies: Euro (EUR) €\n" +
        "📍 Coordinates: 46, 2\n" +
        "🕐 Time Zones: UTC-10:00, UTC+01:00\n" +
        "🏳️  Flag: 🇫🇷\n",
    );
  });

  it("explains a missing country", () => {
    expect(formatCountry("atlantis", null)).toBe("Unable to fetch information for country: atlantis");
  });

  it("takes the first match from the countries service", async () => {
    const { ctx, fetchImpl } = fakeProviderContext([
      { prefix: COUNTRIES, body: [france, { ...france, cca2: "XX" }] },
    ]);

    const country = await lookupCountry(ctx, "france");

    expect(country?.cca2).toBe("FR");
    expect(requestedUrls(fetchImpl)[0].pathname).toBe("/v3.1/name/france");
  });
});

describe("search_poi", () => {
  it("lists named nodes with their details", () => {
    const text = formatPois({ location: "Paris", poiType: "museums", limit: 10, radius: 10000 }, [
      {
        type: "node",
        tags: {
          name: "Louvre",
          website: "https://louvre.test",
          opening_hours: "Mo-Su 09:00-18:00",
          "addr:street": "Rue de Rivoli",
        },
      },
      { type: "way", tags: { name: "Not a node" } },
      { type: "node" },
      { type: "node", tags: { tourism: "museum" } },
    ]);

    expect(text).toBe(
      `${PREFIX} Points of Interest (museums) in Paris:\n\n` +
        "📍 Louvre\n" +
        "   🌐 Website: https://louvre.test\n" +
        "   🕐 Hours: Mo-Su 09:00-18:00\n" +
        "   🏠 Address:  Rue de Rivoli\n\n" +
        "📍 museum\n\n",
    );
  });

  it("counts what did not fit", () => {
    const elements = ["A", "B", "C"].map((name) => ({ type: "node", tags: { name } }));

    const text = formatPois({ location: "Rome", poiType: "cafes", limit: 1, radius: 500 }, elements);

    expect(text).toBe(`${PREFIX} Points of Interest (cafes) in Rome:\n\n📍 A\n\n... and 2 more POIs`);
  });

  it("explains an empty search", () => {
    expect(formatPois({ location: "Rome", poiType: "cafes", limit: 5, radius: 500 }, [])).toBe(
      "No cafes POIs found in Rome.",
    );
  });

  it("clamps limit and radius in the query", async () => {
    const { ctx, fetchImpl } = fakeProviderContext([parisGeocode, { prefix: OVERPASS, body: { elements: [] } }]);

    await findPois(ctx, { location: "Paris", poiType: "parks", limit: 80, radius: 90000 });

    const query = requestedUrls(fetchImpl)[1].searchParams.get("data");
    expect(query).toBe(
      '[out:json];(node["leisure"~"^(park|garden)$"](around:50000,48.8566,2.3522););out 50;',
    );
  });

  it("explains an unknown category", async () => {
    const { ctx } = fakeProviderContext([parisGeocode]);

    await expect(findPois(ctx, { location: "Paris", poiType: "spaceports", limit: 5, radius: 100 })).resolves.toBe(
      `Invalid POI type: spaceports. Available types: ${availablePoiTypes().join(", ")}`,
    );
  });

  it("explains a failed search", async () => {
    const { ctx } = fakeProviderContext([parisGeocode, { prefix: OVERPASS, body: {}, status: 504 }]);

    await expect(findPois(ctx, { location: "Paris", poiType: "cafes", limit: 5, radius: 100 })).resolves.toBe(
      "Unable to fetch POI data for Paris.",
    );
  });
});

describe("convert_currency", () => {
  it("formats the conversion", () => {
    expect(formatConversion({ amount: 100, from: "USD", to: "EUR" }, 0.935)).toBe(
      `${PREFIX} Currency Conversion:\n100 USD = 93.50 EUR\n(Exchange rate: 1 USD = 0.9350 EUR)`,
    );
  });

  it("reads the rate for the target currency", async () => {
    const { ctx, fetchImpl } = fakeProviderContext([{ prefix: RATES, body: { base: "GBP", rates: { JPY: 190.5 } } }]);

    const text = await convert(ctx, { amount: 2, from: "GBP", to: "JPY" });

    expect(text).toBe(`${PREFIX} Currency Conversion:\n2 GBP = 381.00 JPY\n(Exchange rate: 1 GBP = 190.5000 JPY)`);
    expect(requestedUrls(fetchImpl)[0].pathname).toBe("/v4/latest/GBP");
  });

  it("explains an unknown target currency", async () => {
    const { ctx } = fakeProviderContext([{ prefix: RATES, body: { rates: { EUR: 0.9 } } }]);

    await expect(convert(ctx, { amount: 1, from: "USD", to: "XYZ" })).resolves.toBe(
      "Currency XYZ not found in exchange rates.",
    );
  });

  it("explains a failed rates lookup", async () => {
    const { ctx } = fakeProviderContext([]);

    await expect(convert(ctx, { amount: 1, from: "ABC", to: "EUR" })).resolves.toBe(
      "Unable to fetch exchange rates for ABC.",
    );
  });
});

describe("travel summaries", () => {
  const summaryRoutes: FakeRoute[] = [
    parisGeocode,
    { prefix: COUNTRIES, body: [france] },
    { prefix: WEATHER, body: { current_weather: { temperature: 20 } } },
    { prefix: OVERPASS, body: { elements: [{ type: "node", tags: { name: "Eiffel Tower" } }] } },
    { prefix: HOLIDAYS, body: [{ date: "2025-07-14", name: "Bastille Day", localName: "Fête nationale" }] },
  ];

  it("combines every section for a city", async () => {
    const { ctx, fetchImpl } = fakeProviderContext(summaryRoutes);

    const text = await buildTravelSummary(ctx, { place: "Paris", countryName: "France" });

    expect(text.startsWith(`${PREFIX} Travel Summary for Paris:\n${"=".repeat(50)}\n\n`)).toBe(true);
    expect(text).toContain("🏛️  Capital: Paris\n");
    expect(text).toContain("   Temperature: 20°C\n");
    expect(text).toContain("📍 Eiffel Tower\n");
    expect(text).toContain("📅 2025-07-14: Bastille Day (Fête nationale)\n");

    const urls = requestedUrls(fetchImpl);
    expect(urls.filter((url) => url.hostname === "restcountries.com")).toHaveLength(1);
    expect(urls.filter((url) => url.hostname === "nominatim.openstreetmap.org")).toHaveLength(1);
    expect(urls.find((url) => url.hostname === "date.nager.at")?.pathname).toBe("/api/v3/PublicHolidays/2025/FR");
    expect(urls.find((url) => url.hostname === "api.open-meteo.com")?.searchParams.get("forecast_days")).toBe("5");
  });

  it("leaves out holidays when the country code is unknown", async () => {
    const { ctx, fetchImpl } = fakeProviderContext(summaryRoutes.filter((route) => route.prefix !== COUNTRIES));

    const text = await buildTravelSummary(ctx, { place: "Paris", countryName: "Frankreich" });

    expect(text).toContain("Unable to fetch information for country: Frankreich");
    expect(text).not.toContain("Bastille Day");
    expect(requestedUrls(fetchImpl).some((url) => url.hostname === "date.nager.at")).toBe(false);
  });
});
