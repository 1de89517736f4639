export type StoreBackend = "json" | "csv" | "mongo";

export type Env = {
  ROXY_API_KEY?: string;
  ROXY_BASE_URL: string;
  UNSPLASH_ACCESS_KEY?: string;
  UNSPLASH_BASE_URL: string;
  NUMBEO_API_KEY?: string;
  NUMBEO_BASE_URL: string;
  AMADEUS_API_KEY?: string;
  AMADEUS_API_SECRET?: string;
  AMADEUS_BASE_URL: string;
  TRAVEL_WARNINGS_BASE_URL: string;
  EQUALDEX_BASE_URL: string;
  STORE_BACKEND: StoreBackend;
  STORE_DIR: string;
  CATALOG_DIR: string;
  MONGO_URI: string;
  MONGO_DB: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const storeBackends: readonly StoreBackend[] = ["json", "csv", "mongo"];

const isStoreBackend = (value: string): value is StoreBackend =>
  storeBackends.some((backend) => backend === value);

const parseStoreBackend = (raw: string | undefined): StoreBackend => {
  const value = raw?.trim().toLowerCase() ?? "";
  if (value === "") return "json";
  if (!isStoreBackend(value)) {
    throw new Error(`STORE_BACKEND must be one of ${storeBackends.join(", ")}. Received: ${raw}`);
  }
  return value;
};

const optionalSecret = (raw: string | undefined): string | undefined => {
  const value = raw?.trim();
  return value ? value : undefined;
};

const url = (env: NodeJS.ProcessEnv, name: string, fallback: string): string =>
  validateHttpUrl(name, env[name]?.trim() || fallback);

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => ({
  ROXY_API_KEY: optionalSecret(env.ROXY_API_KEY),
  ROXY_BASE_URL: url(env, "ROXY_BASE_URL", "https://roxyapi.com/api/v1/data/astro/astrology/horoscope"),
  UNSPLASH_ACCESS_KEY: optionalSecret(env.UNSPLASH_ACCESS_KEY),
  UNSPLASH_BASE_URL: url(env, "UNSPLASH_BASE_URL", "https://api.unsplash.com"),
  NUMBEO_API_KEY: optionalSecret(env.NUMBEO_API_KEY),
  NUMBEO_BASE_URL: url(env, "NUMBEO_BASE_URL", "https://www.numbeo.com/api"),
  AMADEUS_API_KEY: optionalSecret(env.AMADEUS_API_KEY),
  AMADEUS_API_SECRET: optionalSecret(env.AMADEUS_API_SECRET),
  AMADEUS_BASE_URL: url(env, "AMADEUS_BASE_URL", "https://test.api.amadeus.com"),
  TRAVEL_WARNINGS_BASE_URL: url(env, "TRAVEL_WARNINGS_BASE_URL", "https://www.auswaertiges-amt.de/opendata"),
  EQUALDEX_BASE_URL: url(env, "EQUALDEX_BASE_URL", "https://www.equaldex.com/api"),
  STORE_BACKEND: parseStoreBackend(env.STORE_BACKEND),
  STORE_DIR: env.STORE_DIR?.trim() || "data/results",
  CATALOG_DIR: env.CATALOG_DIR?.trim() || "data",
  MONGO_URI: env.MONGO_URI?.trim() || "mongodb://localhost:27017/travel_data",
  MONGO_DB: env.MONGO_DB?.trim() || "travel_data"
});
