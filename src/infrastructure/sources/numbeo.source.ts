import { z } from "zod";
import type { FetchSource } from "../../ports/FetchClient";

const optionalIndex = z.number().nullish();

const countryIndicesSchema = z.object({
  name: z.string(),
  cpi_index: optionalIndex,
  cpi_and_rent_index: optionalIndex,
  rent_index: optionalIndex,
  groceries_index: optionalIndex,
  restaurant_price_index: optionalIndex,
  purchasing_power_incl_rent_index: optionalIndex,
  quality_of_life_index: optionalIndex,
  safety_index: optionalIndex,
  health_care_index: optionalIndex,
  pollution_index: optionalIndex,
  property_price_to_income_ratio: optionalIndex,
  yearLastUpdate: z.number().int().nullish()
});

export const citiesSchema = z.object({
  cities: z.array(z.object({ country: z.string() }).passthrough())
});

const apiErrorSchema = z.object({ error: z.string() });

export class NumbeoApiError extends Error {
  constructor(readonly apiMessage: string) {
    super(`Numbeo API error: ${apiMessage}`);
    this.name = "NumbeoApiError";
  }
}

/** Numbeo answers some failures with 200 and an `error` field. */
export const assertNoNumbeoError = (body: unknown): void => {
  const apiError = apiErrorSchema.safeParse(body);
  if (apiError.success) {
    throw new NumbeoApiError(apiError.data.error);
  }
};

export const createNumbeoIndicesSource = (opts: {
  baseUrl: string;
  apiKey: string;
  iso3ByCountryName: ReadonlyMap<string, string>;
}): FetchSource => ({
  name: "numbeo-indices",
  baseUrl: opts.baseUrl,
  secretQueryKeys: ["api_key"],
  request: (item) => ({
    path: "/country_indices",
    query: { api_key: opts.apiKey, country: item.params.countryName ?? item.key }
  }),
  parse: (body, item) => {
    assertNoNumbeoError(body);
    const data = countryIndicesSchema.parse(body);
    return {
      iso3: opts.iso3ByCountryName.get(data.name) ?? opts.iso3ByCountryName.get(item.key) ?? null,
      country_name: data.name,
      cost_of_living_index: data.cpi_index ?? null,
      cpi_and_rent_index: data.cpi_and_rent_index ?? null,
      rent_index: data.rent_index ?? null,
      groceries_index: data.groceries_index ?? null,
      restaurant_price_index: data.restaurant_price_index ?? null,
      purchasing_power_incl_rent_index: data.purchasing_power_incl_rent_index ?? null,
      quality_of_life_index: data.quality_of_life_index ?? null,
      safety_index: data.safety_index ?? null,
      health_care_index: data.health_care_index ?? null,
      pollution_index: data.pollution_index ?? null,
      property_price_to_income_ratio: data.property_price_to_income_ratio ?? null,
      year_last_update: data.yearLastUpdate ?? null
    };
  }
});

const priceSchema = z
  .object({
    item_id: z.number().int(),
    item_name: z.string(),
    lowest_price: optionalIndex,
    average_price: optionalIndex,
    highest_price: optionalIndex,
    data_points: z.number().int().nullish()
  })
  .passthrough();

const countryPricesSchema = z.object({
  name: z.string().nullish(),
  currency: z.string().nullish(),
  prices: z.array(priceSchema)
});

/** One stored row per country, holding every price item Numbeo returned for it. */
export const createNumbeoPricesSource = (opts: {
  baseUrl: string;
  apiKey: string;
  iso3ByCountryName: ReadonlyMap<string, string>;
}): FetchSource => ({
  name: "numbeo-prices",
  baseUrl: opts.baseUrl,
  secretQueryKeys: ["api_key"],
  request: (item) => ({
    path: "/country_prices",
    query: { api_key: opts.apiKey, country: item.params.countryName ?? item.key }
  }),
  parse: (body, item) => {
    assertNoNumbeoError(body);
    const data = countryPricesSchema.parse(body);
    const countryName = data.name ?? item.key;
    return {
      iso3: opts.iso3ByCountryName.get(countryName) ?? opts.iso3ByCountryName.get(item.key) ?? null,
      country_name: countryName,
      country_param_used: item.key,
      currency: data.currency ?? null,
      prices: data.prices.map((price) => ({
        item_id: price.item_id,
        item_name: price.item_name,
        lowest_price: price.lowest_price ?? null,
        average_price: price.average_price ?? null,
        highest_price: price.highest_price ?? null,
        data_points: price.data_points ?? null
      }))
    };
  }
});

const exchangeRatesSchema = z.object({
  exchange_rates: z.array(
    z
      .object({
        currency: z.string(),
        one_usd_to_currency: z.number(),
        one_eur_to_currency: z.number().nullish()
      })
      .passthrough()
  )
});

export const exchangeRatesItemKey = "latest";

export const createNumbeoExchangeRatesSource = (opts: { baseUrl: string; apiKey: string }): FetchSource => ({
  name: "numbeo-exchange-rates",
  baseUrl: opts.baseUrl,
  secretQueryKeys: ["api_key"],
  request: () => ({ path: "/currency_exchange_rates", query: { api_key: opts.apiKey } }),
  parse: (body) => {
    assertNoNumbeoError(body);
    const { exchange_rates } = exchangeRatesSchema.parse(body);
    if (exchange_rates.length === 0) {
      throw new Error("No exchange rates in response");
    }
    return {
      rates: exchange_rates.map((rate) => ({
        currency: rate.currency,
        one_usd_to_currency: rate.one_usd_to_currency,
        one_eur_to_currency: rate.one_eur_to_currency ?? null
      }))
    };
  }
});
