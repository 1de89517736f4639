import { promises as fs } from "fs";
import path from "path";
import { z, ZodError } from "zod";
import type { AirportRef, CountryRef } from "../../core/work/enumerators";
import { errorMessage } from "../../shared/errors/errorMessage";

export class CatalogUnavailableError extends Error {
  readonly cause?: unknown;

  constructor(file: string, cause: unknown) {
    const reason =
      cause instanceof ZodError
        ? `invalid entries (${cause.issues.length} issue(s), first at ${cause.issues[0]?.path.join(".") ?? "?"})`
        : errorMessage(cause);
    super(`Catalog ${file} is unavailable: ${reason}`);
    this.name = "CatalogUnavailableError";
    this.cause = cause;
  }
}

const countryCatalogSchema = z.array(
  z.object({
    iso3: z.string().regex(/^[A-Za-z]{3}$/),
    name: z.string().min(1)
  })
);

const airportCatalogSchema = z.array(
  z.object({
    iata_code: z.string().regex(/^[A-Z]{3}$/),
    iso2: z.string().regex(/^[A-Z]{2}$/),
    passenger_volume: z.number().nonnegative()
  })
);

export const countriesCatalogFile = "countries.json";
export const airportsCatalogFile = "airports.json";

const readCatalog = async <T>(file: string, schema: z.ZodType<T>): Promise<T> => {
  try {
    const text = await fs.readFile(file, "utf8");
    return schema.parse(JSON.parse(text));
  } catch (err) {
    throw new CatalogUnavailableError(file, err);
  }
};

export const loadCountryCatalog = async (catalogDir: string): Promise<CountryRef[]> =>
  readCatalog(path.join(catalogDir, countriesCatalogFile), countryCatalogSchema);

export const loadAirportCatalog = async (catalogDir: string): Promise<AirportRef[]> => {
  const rows = await readCatalog(path.join(catalogDir, airportsCatalogFile), airportCatalogSchema);
  return rows.map((row) => ({
    iataCode: row.iata_code,
    iso2: row.iso2,
    passengerVolume: row.passenger_volume
  }));
};

export const iso3ByCountryName = (catalog: readonly CountryRef[]): Map<string, string> =>
  new Map(catalog.map((country) => [country.name, country.iso3.toUpperCase()]));
