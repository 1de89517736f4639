import { ZodError } from "zod";
import type { FetchSource } from "../ports/FetchClient";
import { createWorkItem, type WorkItem } from "../core/work/workItem";
import {
  EnumerationError,
  enumerateCountries,
  enumerateNumbeoCountries,
  enumerateRoutes,
  enumerateTravelWarnings,
  enumerateZodiacSigns
} from "../core/work/enumerators";
import type { Env } from "../shared/config/env";
import {
  CatalogUnavailableError,
  iso3ByCountryName,
  loadAirportCatalog,
  loadCountryCatalog
} from "../infrastructure/catalog/catalog";
import { requestJson, SetupRequestError } from "../infrastructure/http/getJson";
import { createHoroscopeSource } from "../infrastructure/sources/horoscope.source";
import { createUnsplashSource } from "../infrastructure/sources/unsplash.source";
import {
  assertNoNumbeoError,
  citiesSchema,
  createNumbeoExchangeRatesSource,
  createNumbeoIndicesSource,
  createNumbeoPricesSource,
  exchangeRatesItemKey,
  NumbeoApiError
} from "../infrastructure/sources/numbeo.source";
import { createEqualityIndexSource, equalityIndexItemKey } from "../infrastructure/sources/equality.source";
import { createFlightPriceSource, tokenSchema, travelDatesFrom } from "../infrastructure/sources/amadeus.source";
import { createTravelWarningsSource, parseTravelWarningIndex } from "../infrastructure/sources/travelWarnings.source";
import { BatchFetchFatalError, missingCredential } from "../application/batch-fetch/fetch.error-handler";
import { errorMessage } from "../shared/errors/errorMessage";

export const sourceNames = [
  "horoscope",
  "unsplash",
  "numbeo-indices",
  "numbeo-prices",
  "numbeo-exchange-rates",
  "flight-prices",
  "travel-warnings",
  "equality-index"
] as const;

export type SourceName = (typeof sourceNames)[number];

export const isSourceName = (value: string): value is SourceName =>
  sourceNames.some((name) => name === value);

export type SourceSetup = {
  source: FetchSource;
  items: WorkItem[];
  interCallDelayMs: number;
  minRows: number;
};

export type SourceContext = {
  env: Env;
  timeoutMs: number;
  now: () => Date;
};

export const flightOriginCountries = ["US", "DE"] as const;

const requireCredential = (source: SourceName, variable: string, value: string | undefined): string => {
  if (!value) throw missingCredential(source, variable);
  return value;
};


/**
 * Maps setup failures (catalog, enumeration, remote catalog) to fatal errors
 * so nothing is fetched and nothing is written.
 */
const asFatalSetupError = (err: unknown, source: SourceName): unknown => {
  if (err instanceof BatchFetchFatalError) return err;
  if (err instanceof CatalogUnavailableError) {
    return new BatchFetchFatalError({ code: "catalog_unavailable", message: err.message, context: { source }, cause: err });
  }
  if (err instanceof EnumerationError) {
    return new BatchFetchFatalError({ code: "enumeration_failed", message: err.message, context: { source }, cause: err });
  }
  if (err instanceof SetupRequestError || err instanceof NumbeoApiError || err instanceof ZodError) {
    return new BatchFetchFatalError({
      code: "setup_request_failed",
      message: `Setup request for ${source} failed: ${errorMessage(err)}`,
      context: { source },
      cause: err
    });
  }
  return err;
};

const prepareHoroscope = async ({ env }: SourceContext): Promise<SourceSetup> => ({
  source: createHoroscopeSource({
    baseUrl: env.ROXY_BASE_URL,
    apiKey: requireCredential("horoscope", "ROXY_API_KEY", env.ROXY_API_KEY)
  }),
  items: enumerateZodiacSigns(),
  interCallDelayMs: 250,
  minRows: 1
});

const prepareUnsplash = async ({ env }: SourceContext): Promise<SourceSetup> => {
  const accessKey = requireCredential("unsplash", "UNSPLASH_ACCESS_KEY", env.UNSPLASH_ACCESS_KEY);
  const catalog = await loadCountryCatalog(env.CATALOG_DIR);
  return {
    source: createUnsplashSource({ baseUrl: env.UNSPLASH_BASE_URL, accessKey }),
    items: enumerateCountries(catalog),
    interCallDelayMs: 500,
    minRows: 1
  };
};

const fetchNumbeoCountries = async (env: Env, apiKey: string, timeoutMs: number): Promise<WorkItem[]> => {
  const body = await requestJson(env.NUMBEO_BASE_URL, {
    path: "/cities",
    query: { api_key: apiKey },
    secretQueryKeys: ["api_key"],
    timeoutMs
  });
  assertNoNumbeoError(body);
  const { cities } = citiesSchema.parse(body);
  return enumerateNumbeoCountries(cities.map((city) => city.country));
};

const prepareNumbeoIndices = async ({ env, timeoutMs }: SourceContext): Promise<SourceSetup> => {
  const apiKey = requireCredential("numbeo-indices", "NUMBEO_API_KEY", env.NUMBEO_API_KEY);
  const catalog = await loadCountryCatalog(env.CATALOG_DIR);

  return {
    source: createNumbeoIndicesSource({
      baseUrl: env.NUMBEO_BASE_URL,
      apiKey,
      iso3ByCountryName: iso3ByCountryName(catalog)
    }),
    items: await fetchNumbeoCountries(env, apiKey, timeoutMs),
    interCallDelayMs: 350,
    minRows: 50
  };
};

const prepareNumbeoPrices = async ({ env, timeoutMs }: SourceContext): Promise<SourceSetup> => {
  const apiKey = requireCredential("numbeo-prices", "NUMBEO_API_KEY", env.NUMBEO_API_KEY);
  const catalog = await loadCountryCatalog(env.CATALOG_DIR);

  return {
    source: createNumbeoPricesSource({
      baseUrl: env.NUMBEO_BASE_URL,
      apiKey,
      iso3ByCountryName: iso3ByCountryName(catalog)
    }),
    items: await fetchNumbeoCountries(env, apiKey, timeoutMs),
    interCallDelayMs: 350,
    minRows: 50
  };
};

const prepareNumbeoExchangeRates = async ({ env }: SourceContext): Promise<SourceSetup> => {
  const apiKey = requireCredential("numbeo-exchange-rates", "NUMBEO_API_KEY", env.NUMBEO_API_KEY);
  return {
    source: createNumbeoExchangeRatesSource({ baseUrl: env.NUMBEO_BASE_URL, apiKey }),
    items: [createWorkItem(exchangeRatesItemKey)],
    interCallDelayMs: 350,
    minRows: 1
  };
};

const prepareFlightPrices = async ({ env, timeoutMs, now }: SourceContext): Promise<SourceSetup> => {
  const clientId = requireCredential("flight-prices", "AMADEUS_API_KEY", env.AMADEUS_API_KEY);
  const clientSecret = requireCredential("flight-prices", "AMADEUS_API_SECRET", env.AMADEUS_API_SECRET);
  const airports = await loadAirportCatalog(env.CATALOG_DIR);
  const items = enumerateRoutes(airports, { originCountries: flightOriginCountries, maxRoutes: 1000 });

  const token = tokenSchema.parse(
    await requestJson(env.AMADEUS_BASE_URL, {
      path: "/v1/security/oauth2/token",
      method: "POST",
      form: { grant_type: "client_credentials", client_id: clientId, client_secret: clientSecret },
      timeoutMs
    })
  );

  return {
    source: createFlightPriceSource({
      baseUrl: env.AMADEUS_BASE_URL,
      accessToken: token.access_token,
      dates: travelDatesFrom(now())
    }),
    items,
    interCallDelayMs: 300,
    minRows: 1
  };
};

const prepareTravelWarnings = async ({ env, timeoutMs }: SourceContext): Promise<SourceSetup> => {
  const index = await requestJson(env.TRAVEL_WARNINGS_BASE_URL, { path: "/travelwarning", timeoutMs });
  return {
    source: createTravelWarningsSource({ baseUrl: env.TRAVEL_WARNINGS_BASE_URL }),
    items: enumerateTravelWarnings(parseTravelWarningIndex(index)),
    interCallDelayMs: 150,
    minRows: 1
  };
};

const prepareEqualityIndex = async ({ env }: SourceContext): Promise<SourceSetup> => ({
  source: createEqualityIndexSource({ baseUrl: env.EQUALDEX_BASE_URL }),
  items: [createWorkItem(equalityIndexItemKey)],
  interCallDelayMs: 0,
  minRows: 1
});

const preparers: Record<SourceName, (ctx: SourceContext) => Promise<SourceSetup>> = {
  horoscope: prepareHoroscope,
  unsplash: prepareUnsplash,
  "numbeo-indices": prepareNumbeoIndices,
  "numbeo-prices": prepareNumbeoPrices,
  "numbeo-exchange-rates": prepareNumbeoExchangeRates,
  "flight-prices": prepareFlightPrices,
  "travel-warnings": prepareTravelWarnings,
  "equality-index": prepareEqualityIndex
};

export const prepareSource = async (name: SourceName, ctx: SourceContext): Promise<SourceSetup> => {
  try {
    return await preparers[name](ctx);
  } catch (err) {
    throw asFatalSetupError(err, name);
  }
};
