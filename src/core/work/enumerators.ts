import { createWorkItem, routeKey, type WorkItem } from "./workItem";

export class EnumerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnumerationError";
  }
}

export const zodiacSigns = [
  "aries", "taurus", "gemini", "cancer", "leo", "virgo",
  "libra", "scorpio", "sagittarius", "capricorn", "aquarius", "pisces"
] as const;

export type CountryRef = { iso3: string; name: string };

export type AirportRef = { iataCode: string; iso2: string; passengerVolume: number };

export type TravelWarningIndexEntry = {
  contentId: string;
  countryName?: string;
  countryCode?: string;
  iso3CountryCode?: string;
  title?: string;
  url?: string;
  lastModified?: string;
  warning?: boolean;
  partialWarning?: boolean;
  situationWarning?: boolean;
  situationPartWarning?: boolean;
};

const travelWarningFlags = ["warning", "partialWarning", "situationWarning", "situationPartWarning"] as const;

export const enumerateZodiacSigns = (): WorkItem[] => zodiacSigns.map((sign) => createWorkItem(sign));

export const enumerateCountries = (catalog: readonly CountryRef[]): WorkItem[] => {
  const seen = new Set<string>();
  const items: WorkItem[] = [];
  for (const country of catalog) {
    const iso3 = country.iso3.trim().toUpperCase();
    if (seen.has(iso3)) continue;
    seen.add(iso3);
    items.push(createWorkItem(iso3, { iso3, countryName: country.name }));
  }
  return items;
};

/**
 * Busiest airport per ISO2 country. Ties keep the airport listed first.
 */
export const busiestAirportPerCountry = (airports: readonly AirportRef[]): AirportRef[] => {
  const byCountry = new Map<string, AirportRef>();
  for (const airport of airports) {
    const current = byCountry.get(airport.iso2);
    if (!current || airport.passengerVolume > current.passengerVolume) {
      byCountry.set(airport.iso2, airport);
    }
  }
  return Array.from(byCountry.values()).sort((a, b) => b.passengerVolume - a.passengerVolume);
};

export type RouteEnumerationOptions = {
  originCountries: readonly string[];
  maxRoutes?: number;
};

export const enumerateRoutes = (
  airports: readonly AirportRef[],
  opts: RouteEnumerationOptions
): WorkItem[] => {
  const hubs = busiestAirportPerCountry(airports);
  const maxRoutes = opts.maxRoutes ?? 1000;

  const origins = opts.originCountries.map((iso2) => {
    const hub = hubs.find((airport) => airport.iso2 === iso2);
    if (!hub) {
      throw new EnumerationError(`No airport found for origin country ${iso2}`);
    }
    return hub.iataCode;
  });

  const items: WorkItem[] = [];
  for (const origin of origins) {
    for (const hub of hubs) {
      if (hub.iataCode === origin) continue;
      items.push(
        createWorkItem(routeKey(origin, hub.iataCode), { origin, destination: hub.iataCode })
      );
    }
  }

  if (items.length > maxRoutes) {
    throw new EnumerationError(`${items.length} routes exceed the limit of ${maxRoutes}`);
  }
  return items;
};

export const enumerateNumbeoCountries = (
  cityCountries: readonly string[],
  opts: { minCountries?: number } = {}
): WorkItem[] => {
  const minCountries = opts.minCountries ?? 50;
  const names = Array.from(
    new Set(cityCountries.map((name) => name.trim()).filter((name) => name !== ""))
  ).sort();

  if (names.length < minCountries) {
    throw new EnumerationError(
      `Suspiciously few countries returned: ${names.length} (minimum ${minCountries})`
    );
  }
  return names.map((name) => createWorkItem(name, { countryName: name }));
};

export const enumerateTravelWarnings = (index: readonly TravelWarningIndexEntry[]): WorkItem[] =>
  index.map((entry) => {
    const params: Record<string, string> = { contentId: entry.contentId };
    if (entry.countryName) params.countryName = entry.countryName;
    if (entry.countryCode) params.countryCode = entry.countryCode;
    if (entry.iso3CountryCode) params.iso3CountryCode = entry.iso3CountryCode;
    if (entry.title) params.title = entry.title;
    if (entry.url) params.url = entry.url;
    if (entry.lastModified) params.lastModified = entry.lastModified;
    // Index flags travel as "true"/"false" so the detail parser can fall back to them.
    for (const flag of travelWarningFlags) {
      const value = entry[flag];
      if (value != null) params[flag] = String(value);
    }
    return createWorkItem(entry.contentId, params);
  });
