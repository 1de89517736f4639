import { z } from "zod";
import type { FetchSource } from "../../ports/FetchClient";

export const tokenSchema = z.object({ access_token: z.string().min(1) });

const offerSchema = z.object({
  price: z.object({ total: z.string() }),
  itineraries: z.array(z.object({ segments: z.array(z.unknown()).min(1) })).default([])
});

const offersSchema = z.object({ data: z.array(offerSchema) });

export type TravelDates = { departureDate: string; returnDate: string };

const addDays = (date: Date, days: number): Date => {
  const next = new Date(date.getTime());
  next.setUTCDate(next.getUTCDate() + days);
  return next;
};

const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

/** Departure 90 days out, return a week later. */
export const travelDatesFrom = (today: Date): TravelDates => {
  const departure = addDays(today, 90);
  return { departureDate: isoDate(departure), returnDate: isoDate(addDays(departure, 7)) };
};

/**
 * Cheapest round-trip offer per route. A route without offers is stored as a
 * success with null price so it is not asked again.
 */
export const createFlightPriceSource = (opts: {
  baseUrl: string;
  accessToken: string;
  dates: TravelDates;
}): FetchSource => ({
  name: "flight-prices",
  baseUrl: opts.baseUrl,
  request: (item) => ({
    path: "/v2/shopping/flight-offers",
    query: {
      originLocationCode: item.params.origin ?? "",
      destinationLocationCode: item.params.destination ?? "",
      departureDate: opts.dates.departureDate,
      returnDate: opts.dates.returnDate,
      adults: 1,
      nonStop: "false",
      currencyCode: "EUR",
      max: 1
    },
    headers: { Authorization: `Bearer ${opts.accessToken}` }
  }),
  parse: (body, item) => {
    const { data } = offersSchema.parse(body);
    const base = { origin: item.params.origin ?? null, destination: item.params.destination ?? null };
    const cheapest = data[0];
    if (!cheapest) {
      return { ...base, price_eur: null, is_direct: null, stops: null };
    }

    const price = Number.parseFloat(cheapest.price.total);
    if (!Number.isFinite(price)) {
      throw new Error(`price.total is not numeric: ${cheapest.price.total}`);
    }
    const outbound = cheapest.itineraries[0];
    const stops = outbound ? outbound.segments.length - 1 : 0;
    return { ...base, price_eur: price, is_direct: stops === 0, stops };
  }
});
