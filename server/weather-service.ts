/**
 * WEATHER SERVICE
 *
 * Current conditions from Open-Meteo (no API key). Used only when a vehicle
 * reports no temperature of its own.
 */

import { z } from "zod";
import type { WeatherProvider, WeatherReading } from "@core/climate/advisor";
import type { Logger } from "@core/logger";
import { createSilentLogger } from "@core/logger";

export const OPEN_METEO_URL = "https://api.open-meteo.com/v1/forecast";

const OpenMeteoResponseSchema = z.object({
  current: z
    .object({
      temperature_2m: z.number().optional(),
      apparent_temperature: z.number().optional(),
      weather_code: z.number().optional(),
    })
    .optional(),
});

export interface OpenMeteoConfig {
  baseUrl?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

export function buildWeatherUrl(baseUrl: string, latitude: number, longitude: number): string {
  const params = new URLSearchParams({
    latitude: latitude.toString(),
    longitude: longitude.toString(),
    current: "temperature_2m,apparent_temperature,weather_code",
  });
  return `${baseUrl}?${params.toString()}`;
}

export class OpenMeteoWeather implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: OpenMeteoConfig = {}) {
    this.baseUrl = config.baseUrl ?? OPEN_METEO_URL;
    this.fetchImpl = config.fetch ?? fetch;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.logger = config.logger ?? createSilentLogger();
  }

  /**
   * Returns null when the service is unreachable or answers without a
   * current block; weather is a fallback, never a hard dependency.
   */
  async current(latitude: number, longitude: number): Promise<WeatherReading | null> {
    const url = buildWeatherUrl(this.baseUrl, latitude, longitude);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      this.logger.warn("Failed to fetch weather", { error: error instanceof Error ? error.message : String(error) });
      return null;
    }

    if (!response.ok) {
      this.logger.warn(`Weather API returned ${response.status}`);
      return null;
    }

    const parsed = OpenMeteoResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success || !parsed.data.current) {
      this.logger.warn("Weather API returned no current conditions");
      return null;
    }

    const { temperature_2m, apparent_temperature } = parsed.data.current;
    const reading: WeatherReading = {
      temperatureC: temperature_2m,
      apparentTemperatureC: apparent_temperature,
    };
    this.logger.debug(`${latitude.toFixed(2)},${longitude.toFixed(2)}: ${temperature_2m ?? "?"}°C`);
    return reading;
  }
}
