import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults and leaves credentials unset", () => {
    const env = loadEnv({});

    expect(env).toEqual({
      ROXY_BASE_URL: "https://roxyapi.com/api/v1/data/astro/astrology/horoscope",
      UNSPLASH_BASE_URL: "https://api.unsplash.com",
      NUMBEO_BASE_URL: "https://www.numbeo.com/api",
      AMADEUS_BASE_URL: "https://test.api.amadeus.com",
      TRAVEL_WARNINGS_BASE_URL: "https://www.auswaertiges-amt.de/opendata",
      EQUALDEX_BASE_URL: "https://www.equaldex.com/api",
      STORE_BACKEND: "json",
      STORE_DIR: "data/results",
      CATALOG_DIR: "data",
      MONGO_URI: "mongodb://localhost:27017/travel_data",
      MONGO_DB: "travel_data"
    });
    expect(env.ROXY_API_KEY).toBeUndefined();
  });

  it("trims credentials and treats blank ones as unset", () => {
    const env = loadEnv({ ROXY_API_KEY: "  test-token ", NUMBEO_API_KEY: "   " });

    expect(env.ROXY_API_KEY).toBe("test-token");
    expect(env.NUMBEO_API_KEY).toBeUndefined();
  });

  it.each(["json", "csv", "mongo", " CSV "])("accepts STORE_BACKEND=%p", (backend) => {
    expect(["json", "csv", "mongo"]).toContain(loadEnv({ STORE_BACKEND: backend }).STORE_BACKEND);
  });

  it("rejects unknown store backends", () => {
    expect(() => loadEnv({ STORE_BACKEND: "sqlite" })).toThrow(
      "STORE_BACKEND must be one of json, csv, mongo. Received: sqlite"
    );
  });

  it.each([
    "http://localhost:3999",
    "https://api.unsplash.com"
  ])("accepts valid UNSPLASH_BASE_URL with http/https: %s", (baseUrl) => {
    expect(loadEnv({ UNSPLASH_BASE_URL: baseUrl }).UNSPLASH_BASE_URL).toBe(baseUrl);
  });

  it("rejects non-absolute base URLs", () => {
    expect(() => loadEnv({ ROXY_BASE_URL: "/horoscope" })).toThrow(
      "ROXY_BASE_URL must be a valid absolute http/https URL. Received: /horoscope"
    );
  });

  it("rejects unsupported base URL schemes", () => {
    expect(() => loadEnv({ NUMBEO_BASE_URL: "ftp://example.com" })).toThrow(
      "NUMBEO_BASE_URL must use http or https scheme. Received: ftp://example.com"
    );
  });
});
