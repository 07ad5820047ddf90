import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";
import { z } from "zod";

// Load .env before anything reads process.env.
// Resolve from deterministic locations so startup cwd does not matter.
const envPathCandidates = [
  pathResolve(__dirname, "..", ".env"),
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
} else {
  dotenv.config();
}

const DEFAULT_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:5173",
  "http://127.0.0.1:5500",
];

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),

  SESSION_SECRET: z.string().optional(),

  DATABASE_URL: z.string().optional(),
  DB_POOL_MAX: z.string().optional(),
  DB_IDLE_TIMEOUT: z.string().optional(),
  DB_CONNECT_TIMEOUT: z.string().optional(),
  DB_SSL: z.string().optional(),
  DB_SSL_REJECT_UNAUTHORIZED: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),

  GOOGLE_MAPS_API_KEY: z.string().optional(),
  NPI_REGISTRY_URL: z.string().url().default("https://npiregistry.cms.hhs.gov/api/"),

  GEOCODE_CACHE_TTL_MS: z.string().optional(),
  SEARCH_CACHE_TTL_MS: z.string().optional(),
  PLACES_MAX_PAGES: z.string().optional(),
  PLACES_PAGE_DELAY_MS: z.string().optional(),

  MAIL_TENANT_ID: z.string().optional(),
  MAIL_CLIENT_ID: z.string().optional(),
  MAIL_CLIENT_SECRET: z.string().optional(),
  MAIL_SENDER: z.string().optional(),
  CONTACT_TO: z.string().default("support@example.com"),
  APP_NAME: z.string().default("AI Clinic"),
});

export type AppConfig = {
  env: string;
  port: number;
  corsOrigins: string[];
  sessionSecret: string;
  database: {
    url?: string;
    poolMax: number;
    idleTimeoutMs: number;
    connectTimeoutMs: number;
    ssl: false | { rejectUnauthorized: boolean };
  };
  openai: {
    apiKey?: string;
    model: string;
  };
  maps: {
    googleApiKey?: string;
    registryUrl: string;
  };
  search: {
    geocodeCacheTtlMs: number;
    searchCacheTtlMs: number;
    placesMaxPages: number;
    placesPageDelayMs: number;
  };
  mail: {
    tenantId?: string;
    clientId?: string;
    clientSecret?: string;
    sender?: string;
    contactTo: string;
    appName: string;
  };
};

function toInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: toInt(parsed.PORT, 3001),
    corsOrigins: parsed.CORS_ORIGINS
      ? parsed.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
      : DEFAULT_ORIGINS,
    sessionSecret: nonEmpty(parsed.SESSION_SECRET) ?? "intake-dev-secret-change-in-production",
    database: {
      url: nonEmpty(parsed.DATABASE_URL),
      poolMax: toInt(parsed.DB_POOL_MAX, 20),
      idleTimeoutMs: toInt(parsed.DB_IDLE_TIMEOUT, 30000),
      connectTimeoutMs: toInt(parsed.DB_CONNECT_TIMEOUT, 5000),
      ssl: parsed.DB_SSL === "false"
        ? false
        : { rejectUnauthorized: parsed.DB_SSL_REJECT_UNAUTHORIZED !== "false" },
    },
    openai: {
      apiKey: nonEmpty(parsed.OPENAI_API_KEY),
      model: parsed.OPENAI_MODEL,
    },
    maps: {
      googleApiKey: nonEmpty(parsed.GOOGLE_MAPS_API_KEY),
      registryUrl: parsed.NPI_REGISTRY_URL,
    },
    search: {
      geocodeCacheTtlMs: toInt(parsed.GEOCODE_CACHE_TTL_MS, 15 * 60 * 1000),
      searchCacheTtlMs: toInt(parsed.SEARCH_CACHE_TTL_MS, 10 * 60 * 1000),
      placesMaxPages: toInt(parsed.PLACES_MAX_PAGES, 3),
      placesPageDelayMs: toInt(parsed.PLACES_PAGE_DELAY_MS, 2000),
    },
    mail: {
      tenantId: nonEmpty(parsed.MAIL_TENANT_ID),
      clientId: nonEmpty(parsed.MAIL_CLIENT_ID),
      clientSecret: nonEmpty(parsed.MAIL_CLIENT_SECRET),
      sender: nonEmpty(parsed.MAIL_SENDER),
      contactTo: parsed.CONTACT_TO,
      appName: parsed.APP_NAME,
    },
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
