import { describe, it, expect } from "vitest";
import { availablePoiTypes, buildOverpassQuery, isPoiCategory, overpassRequest } from "../provider/overpass";
import { UnknownPoiCategoryError } from "../utils/errorHandler";

describe("buildOverpassQuery", () => {
  it("builds a single-filter query", () => {
    expect(buildOverpassQuery("restaurants", 48.8566, 2.3522, 10000, 10)).toBe(
      '[out:json];(node["amenity"="restaurant"](around:10000,48.8566,2.3522););out 10;',
    );
  });

  it("unions every filter of a multi-filter category", () => {
    expect(buildOverpassQuery("all_pois", 1, 2, 500, 5)).toBe(
      "[out:json];(" +
        'node["amenity"~"^(restaurant|cafe|bar|hotel)$"](around:500,1,2);' +
        'node["tourism"~"^(attraction|museum|monument)$"](around:500,1,2);' +
        'node["shop"~"^(mall|supermarket)$"](around:500,1,2);' +
        'node["leisure"~"^(park|garden)$"](around:500,1,2);' +
        ");out 5;",
    );
  });

  it("supports key-only filters", () => {
    expect(buildOverpassQuery("historic", 0, 0, 100, 1)).toBe(
      '[out:json];(node["historic"](around:100,0,0););out 1;',
    );
  });

  it("rejects unknown categories", () => {
    expect(() => buildOverpassQuery("spaceports", 0, 0, 100, 1)).toThrow(UnknownPoiCategoryError);
    expect(() => buildOverpassQuery("toString", 0, 0, 100, 1)).toThrow(UnknownPoiCategoryError);
  });
});

describe("POI categories", () => {
  it("lists all categories in declaration order", () => {
    const types = availablePoiTypes();
    expect(types).toHaveLength(26);
    expect(types.slice(0, 3)).toEqual(["restaurants", "fast_food", "cafes"]);
    expect(types[types.length - 1]).toBe("all_pois");
  });

  it("recognizes category names", () => {
    expect(isPoiCategory("museums")).toBe(true);
    expect(isPoiCategory("Museums")).toBe(false);
  });
});

describe("overpassRequest", () => {
  it("targets the interpreter with the query as data", () => {
    expect(overpassRequest("cafes", 1, 2, 300, 4)).toEqual({
      url: "https://overpass-api.de/api/interpreter",
      params: { data: '[out:json];(node["amenity"="cafe"](around:300,1,2););out 4;' },
    });
  });
});
