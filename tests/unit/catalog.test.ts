import { promises as fs } from "fs";
import os from "os";
import path from "path";
import {
  CatalogUnavailableError,
  iso3ByCountryName,
  loadAirportCatalog,
  loadCountryCatalog
} from "../../src/infrastructure/catalog/catalog";

const shippedCatalogDir = path.join(__dirname, "..", "..", "data");

describe("catalog loader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "batch-fetch-catalog-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads the shipped country catalog", async () => {
    const countries = await loadCountryCatalog(shippedCatalogDir);

    expect(countries).toHaveLength(200);
    expect(countries[0]).toEqual({ iso3: "AFG", name: "Afghanistan" });
    expect(countries).toContainEqual({ iso3: "DEU", name: "Germany" });
  });

  it("resolves Numbeo country names through the shipped catalog", async () => {
    const lookup = iso3ByCountryName(await loadCountryCatalog(shippedCatalogDir));

    expect(lookup.get("Bosnia And Herzegovina")).toBe("BIH");
    expect(lookup.get("Hong Kong (China)")).toBe("HKG");
    expect(lookup.get("Kosovo (Disputed Territory)")).toBe("XKX");
  });

  it("loads the shipped airport catalog", async () => {
    const airports = await loadAirportCatalog(shippedCatalogDir);

    expect(airports).toHaveLength(56);
    expect(airports).toContainEqual({ iataCode: "ATL", iso2: "US", passengerVolume: 104_000_000 });
  });

  it("maps country names to ISO3 codes", () => {
    const lookup = iso3ByCountryName([{ iso3: "esp", name: "Spain" }]);

    expect(lookup.get("Spain")).toBe("ESP");
  });

  it("reports a missing catalog file", async () => {
    const load = loadCountryCatalog(dir);

    await expect(load).rejects.toBeInstanceOf(CatalogUnavailableError);
    await expect(load).rejects.toThrow(`Catalog ${path.join(dir, "countries.json")} is unavailable: ENOENT`);
  });

  it("reports invalid entries with the first failing path", async () => {
    await fs.writeFile(
      path.join(dir, "airports.json"),
      JSON.stringify([
        { iata_code: "ATL", iso2: "US", passenger_volume: 1 },
        { iata_code: "frankfurt", iso2: "DE", passenger_volume: 1 }
      ]),
      "utf8"
    );

    await expect(loadAirportCatalog(dir)).rejects.toThrow(
      `Catalog ${path.join(dir, "airports.json")} is unavailable: invalid entries (1 issue(s), first at 1.iata_code)`
    );
  });
});
