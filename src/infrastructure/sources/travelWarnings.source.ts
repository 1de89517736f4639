import { z } from "zod";
import type { FetchSource } from "../../ports/FetchClient";
import type { TravelWarningIndexEntry } from "../../core/work/enumerators";

const timestamp = z.union([z.number(), z.string()]).nullish();

const warningDetailSchema = z
  .object({
    countryName: z.string().nullish(),
    country: z.string().nullish(),
    state: z.string().nullish(),
    countryCode: z.string().nullish(),
    iso3CountryCode: z.string().nullish(),
    title: z.string().nullish(),
    name: z.string().nullish(),
    lastModified: timestamp,
    effective: timestamp,
    content: z.string().nullish(),
    url: z.string().nullish(),
    warning: z.boolean().nullish(),
    partialWarning: z.boolean().nullish(),
    situationWarning: z.boolean().nullish(),
    situationPartWarning: z.boolean().nullish()
  })
  .passthrough();

const indexMetaSchema = z
  .object({
    countryName: z.string().nullish(),
    countryCode: z.string().nullish(),
    iso3CountryCode: z.string().nullish(),
    title: z.string().nullish(),
    url: z.string().nullish(),
    lastModified: timestamp,
    warning: z.boolean().nullish(),
    partialWarning: z.boolean().nullish(),
    situationWarning: z.boolean().nullish(),
    situationPartWarning: z.boolean().nullish()
  })
  .passthrough();

export const travelWarningIndexSchema = z.object({
  response: z.record(z.unknown())
});

/**
 * Unix timestamps in seconds or milliseconds to ISO-8601, `null` when absent
 * or not numeric.
 */
export const toIsoTimestamp = (value: number | string | null | undefined): string | null => {
  if (value == null) return null;
  const numeric = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(numeric)) return null;
  const ms = numeric > 1e11 ? numeric : numeric * 1000;
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
};

export const parseTravelWarningIndex = (body: unknown): TravelWarningIndexEntry[] => {
  const { response } = travelWarningIndexSchema.parse(body);
  const entries: TravelWarningIndexEntry[] = [];
  for (const [contentId, raw] of Object.entries(response)) {
    if (contentId === "lastModified" || contentId === "contentList") continue;
    const meta = indexMetaSchema.safeParse(raw);
    const entry: TravelWarningIndexEntry = { contentId };
    if (meta.success) {
      if (meta.data.countryName) entry.countryName = meta.data.countryName;
      if (meta.data.countryCode) entry.countryCode = meta.data.countryCode;
      if (meta.data.iso3CountryCode) entry.iso3CountryCode = meta.data.iso3CountryCode;
      if (meta.data.title) entry.title = meta.data.title;
      if (meta.data.url) entry.url = meta.data.url;
      if (meta.data.lastModified != null) entry.lastModified = String(meta.data.lastModified);
      if (meta.data.warning != null) entry.warning = meta.data.warning;
      if (meta.data.partialWarning != null) entry.partialWarning = meta.data.partialWarning;
      if (meta.data.situationWarning != null) entry.situationWarning = meta.data.situationWarning;
      if (meta.data.situationPartWarning != null) entry.situationPartWarning = meta.data.situationPartWarning;
    }
    entries.push(entry);
  }
  return entries;
};

// Detail responses are wrapped as { response: { <contentId>: {...} } }; unwrap when present.
const unwrapDetail = (body: unknown, contentId: string): unknown => {
  const wrapped = z.object({ response: z.record(z.unknown()) }).safeParse(body);
  if (wrapped.success && contentId in wrapped.data.response) {
    return wrapped.data.response[contentId];
  }
  return body;
};

const indexFlag = (value: string | undefined): boolean | undefined =>
  value === "true" ? true : value === "false" ? false : undefined;

export const createTravelWarningsSource = (opts: { baseUrl: string }): FetchSource => ({
  name: "travel-warnings",
  baseUrl: opts.baseUrl,
  request: (item) => ({ path: `/travelwarning/${encodeURIComponent(item.key)}` }),
  parse: (body, item) => {
    const detail = warningDetailSchema.parse(unwrapDetail(body, item.key));
    const contentId = Number.parseInt(item.key, 10);

    return {
      content_id: Number.isSafeInteger(contentId) ? contentId : item.key,
      title: detail.title ?? detail.name ?? item.params.title ?? null,
      country_name: detail.countryName ?? detail.country ?? detail.state ?? item.params.countryName ?? null,
      country_code: detail.countryCode ?? item.params.countryCode ?? null,
      iso3_country_code: detail.iso3CountryCode ?? item.params.iso3CountryCode ?? null,
      last_modified_iso: toIsoTimestamp(detail.lastModified ?? item.params.lastModified),
      effective_iso: toIsoTimestamp(detail.effective),
      warning: detail.warning ?? indexFlag(item.params.warning) ?? false,
      partial_warning: detail.partialWarning ?? indexFlag(item.params.partialWarning) ?? false,
      situation_warning: detail.situationWarning ?? indexFlag(item.params.situationWarning) ?? false,
      situation_part_warning: detail.situationPartWarning ?? indexFlag(item.params.situationPartWarning) ?? false,
      source_url: detail.url ?? item.params.url ?? null,
      content: detail.content ?? ""
    };
  }
});
