/**
 * SERVER CONFIGURATION
 *
 * Environment -> typed config. Every key is optional: a missing model key or
 * fleet token disables that feature until the user adds one in settings.
 */

import { z } from "zod";
import { DEFAULT_NAV_SETTINGS, type NavSettings } from "@shared/schema";

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  NAV_BACKEND_URL: z.string().url().default(DEFAULT_NAV_SETTINGS.backendUrl),
  AI_INTEGRATIONS_GEMINI_API_KEY: optionalText,
  AI_INTEGRATIONS_GEMINI_BASE_URL: optionalText,
  LLM_MODEL: z.string().min(1).default(DEFAULT_NAV_SETTINGS.llmModel),
  FLEET_ACCESS_TOKEN: optionalText,
  FLEET_REFRESH_TOKEN: optionalText,
  GOOGLE_MAPS_API_KEY: optionalText,
  OPEN_METEO_URL: z.string().url().default("https://api.open-meteo.com/v1/forecast"),
  DEBUG: z
    .string()
    .optional()
    .transform((value) => value === "1" || value === "true"),
  NODE_ENV: z.string().default("development"),
  MAX_USERS: z.coerce.number().int().min(1).default(10_000),
  USER_IDLE_HOURS: z.coerce.number().positive().default(24),
});

export interface ServerConfig {
  port: number;
  backendUrl: string;
  geminiApiKey?: string;
  geminiBaseUrl?: string;
  llmModel: string;
  fleetAccessToken?: string;
  fleetRefreshToken?: string;
  mapsApiKey?: string;
  openMeteoUrl: string;
  debug: boolean;
  production: boolean;
  /** In-memory users kept before the least recently seen is dropped */
  maxUsers: number;
  userIdleMs: number;
}

export const OPTIONAL_ENV = [
  "AI_INTEGRATIONS_GEMINI_API_KEY",
  "FLEET_ACCESS_TOKEN",
  "GOOGLE_MAPS_API_KEY",
] as const;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment:\n${issues.map((issue) => `   - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    backendUrl: e.NAV_BACKEND_URL,
    geminiApiKey: e.AI_INTEGRATIONS_GEMINI_API_KEY,
    geminiBaseUrl: e.AI_INTEGRATIONS_GEMINI_BASE_URL,
    llmModel: e.LLM_MODEL,
    fleetAccessToken: e.FLEET_ACCESS_TOKEN,
    fleetRefreshToken: e.FLEET_REFRESH_TOKEN,
    mapsApiKey: e.GOOGLE_MAPS_API_KEY,
    openMeteoUrl: e.OPEN_METEO_URL,
    debug: e.DEBUG,
    production: e.NODE_ENV === "production",
    maxUsers: e.MAX_USERS,
    userIdleMs: e.USER_IDLE_HOURS * 60 * 60 * 1000,
  };
}

export function missingOptionalEnv(env: NodeJS.ProcessEnv = process.env): string[] {
  return OPTIONAL_ENV.filter((key) => !env[key]?.trim());
}

/**
 * Settings a new user starts with. Secrets from the environment seed the
 * record; the user can replace them through PUT /api/settings.
 */
export function seedSettings(config: ServerConfig): NavSettings {
  return {
    ...DEFAULT_NAV_SETTINGS,
    favorites: [],
    llmApiKey: config.geminiApiKey ?? "",
    llmModel: config.llmModel,
    backendUrl: config.backendUrl,
    fleetAccessToken: config.fleetAccessToken ?? "",
    fleetRefreshToken: config.fleetRefreshToken ?? "",
    mapsApiKey: config.mapsApiKey ?? "",
  };
}
