import { z } from "zod";
import type { FetchSource } from "../../ports/FetchClient";

const photoSchema = z.object({
  urls: z.object({ regular: z.string(), small: z.string() }),
  user: z.object({
    name: z.string(),
    links: z.object({ html: z.string() })
  })
});

const searchSchema = z.object({ results: z.array(photoSchema) });

export const imagesPerCountry = 3;

/**
 * Top landscape photos per country, searched by country name only.
 * An empty result list is still a success: the country has no images.
 */
export const createUnsplashSource = (opts: { baseUrl: string; accessKey: string }): FetchSource => ({
  name: "unsplash",
  baseUrl: opts.baseUrl,
  request: (item) => ({
    path: "/search/photos",
    query: {
      query: item.params.countryName ?? item.key,
      page: 1,
      per_page: imagesPerCountry,
      orientation: "landscape",
      content_filter: "high"
    },
    headers: {
      Authorization: `Client-ID ${opts.accessKey}`,
      "Accept-Version": "v1"
    }
  }),
  parse: (body, item) => {
    const { results } = searchSchema.parse(body);
    return {
      iso3: item.key,
      country_name: item.params.countryName ?? null,
      images: results.slice(0, imagesPerCountry).map((photo, index) => ({
        rank: index + 1,
        image_url: photo.urls.regular,
        image_small_url: photo.urls.small,
        photographer_name: photo.user.name,
        photographer_url: photo.user.links.html
      }))
    };
  }
});
