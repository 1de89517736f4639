import { z } from "zod";
import type { FetchSource } from "../../ports/FetchClient";

const horoscopeSchema = z
  .object({
    sign: z.string().optional(),
    date: z.string().optional(),
    horoscope: z.string().min(1)
  })
  .passthrough();

export const createHoroscopeSource = (opts: { baseUrl: string; apiKey: string }): FetchSource => ({
  name: "horoscope",
  baseUrl: opts.baseUrl,
  secretQueryKeys: ["token"],
  request: (item) => ({
    path: `/${encodeURIComponent(item.key)}`,
    query: { token: opts.apiKey }
  }),
  parse: (body, item) => {
    const data = horoscopeSchema.parse(body);
    return {
      sign: item.key,
      date: data.date ?? null,
      horoscope: data.horoscope
    };
  }
});
