/**
 * CLIMATE ADVISOR
 *
 * Pre-conditions the cabin of each selected vehicle. The target comes from
 * the best temperature reading available:
 *   interior telemetry -> exterior telemetry -> weather (feels-like, then actual)
 * A cabin already inside the comfort band gets no command.
 */

import type { TemperatureUnit, Vehicle, VehicleStatus } from "@shared/schema";
import { toUserMessage } from "../errors";
import type { FleetClient } from "../fleet/fleet-client";
import { vehicleName } from "../fleet/dispatcher";

// ============================================
// BANDS
// ============================================

/** Reference temperature below `belowC` -> target. Colder outside, warmer cabin. */
export const CABIN_TARGET_BANDS: ReadonlyArray<{ belowC: number; targetC: number }> = [
  { belowC: 5, targetC: 23 },
  { belowC: 15, targetC: 22 },
  { belowC: 25, targetC: 21 },
  { belowC: 32, targetC: 20 },
];
export const HOT_TARGET_C = 19;
export const DEFAULT_TARGET_C = 21;

/** Inclusive on both ends */
export const COMFORT_BAND_C = { min: 19, max: 24 } as const;

export function suggestCabinTempC(referenceC: number | undefined): number {
  if (referenceC === undefined) return DEFAULT_TARGET_C;
  for (const band of CABIN_TARGET_BANDS) {
    if (referenceC < band.belowC) return band.targetC;
  }
  return HOT_TARGET_C;
}

export function isCabinComfortable(interiorC: number | undefined): boolean {
  return interiorC !== undefined && interiorC >= COMFORT_BAND_C.min && interiorC <= COMFORT_BAND_C.max;
}

// ============================================
// WEATHER COLLABORATOR
// ============================================

export interface WeatherReading {
  temperatureC?: number;
  apparentTemperatureC?: number;
}

export interface WeatherProvider {
  current(latitude: number, longitude: number): Promise<WeatherReading | null>;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

// ============================================
// DECISION
// ============================================

export type TemperatureSource = "interior" | "exterior" | "weather" | "default";

export type ClimateDecision =
  | { action: "skip"; interiorC: number }
  | { action: "activate"; targetC: number; referenceC?: number; source: TemperatureSource };

export function decideClimate(status: VehicleStatus | undefined, weather?: WeatherReading | null): ClimateDecision {
  const interior = status?.interiorTempC;
  if (interior !== undefined && isCabinComfortable(interior)) {
    return { action: "skip", interiorC: interior };
  }

  let referenceC: number | undefined;
  let source: TemperatureSource = "default";
  if (interior !== undefined) {
    referenceC = interior;
    source = "interior";
  } else if (status?.exteriorTempC !== undefined) {
    referenceC = status.exteriorTempC;
    source = "exterior";
  } else {
    const ambient = weather?.apparentTemperatureC ?? weather?.temperatureC;
    if (ambient !== undefined) {
      referenceC = ambient;
      source = "weather";
    }
  }

  return { action: "activate", targetC: suggestCabinTempC(referenceC), referenceC, source };
}

export function formatTemperature(celsius: number, unit: TemperatureUnit): string {
  if (unit === "F") return `${Math.round((celsius * 9) / 5 + 32)}°F`;
  return `${Math.round(celsius)}°C`;
}

// ============================================
// ACTIVATION
// ============================================

export interface ClimateVehicleResult {
  vehicleId: number;
  success: boolean;
  /** Command skipped because the cabin is already comfortable */
  skipped: boolean;
  line: string;
  /** Telemetry read during activation, for the caller's status map */
  status?: VehicleStatus;
  error?: string;
}

export interface ClimateReport {
  success: boolean;
  message: string;
  results: ClimateVehicleResult[];
}

export interface ClimateOptions {
  weather?: WeatherProvider;
  /** Device position, used for weather when the car reports none */
  location?: Coordinates;
  unit?: TemperatureUnit;
}

async function ambientFor(
  status: VehicleStatus | undefined,
  fleet: FleetClient,
  options: ClimateOptions
): Promise<WeatherReading | null> {
  if (!options.weather) return null;
  const coords: Coordinates | undefined =
    status?.latitude !== undefined && status.longitude !== undefined
      ? { latitude: status.latitude, longitude: status.longitude }
      : options.location;
  if (!coords) return null;

  try {
    return await options.weather.current(coords.latitude, coords.longitude);
  } catch (error) {
    fleet.logger.warn("Weather lookup failed", { error: toUserMessage(error) });
    return null;
  }
}

async function activateOne(
  vehicleId: number,
  vehicles: readonly Vehicle[],
  fleet: FleetClient,
  options: ClimateOptions
): Promise<ClimateVehicleResult> {
  const vehicle = vehicles.find((v) => v.id === vehicleId);
  const name = vehicleName(vehicleId, vehicles);
  const unit = options.unit ?? "C";
  let status: VehicleStatus | undefined;

  try {
    if (!vehicle?.isOnline) {
      await fleet.ensureAwake(vehicleId);
    }

    try {
      status = await fleet.getVehicleData(vehicleId);
    } catch (error) {
      fleet.logger.warn(`Telemetry unavailable for ${name}`, { error: toUserMessage(error) });
    }

    const needsWeather = status?.interiorTempC === undefined && status?.exteriorTempC === undefined;
    const weather = needsWeather ? await ambientFor(status, fleet, options) : null;
    const decision = decideClimate(status, weather);

    if (decision.action === "skip") {
      return {
        vehicleId,
        success: true,
        skipped: true,
        line: `${name}: cabin already comfortable (${formatTemperature(decision.interiorC, unit)})`,
        status,
      };
    }

    await fleet.setClimate(vehicleId, true, decision.targetC);

    let line = `${name}: climate on → ${formatTemperature(decision.targetC, unit)}`;
    if (decision.referenceC !== undefined) {
      const where = decision.source === "interior" ? "cabin" : "outside";
      line += ` (${where} ${formatTemperature(decision.referenceC, unit)})`;
    }
    return { vehicleId, success: true, skipped: false, line, status };
  } catch (error) {
    const message = toUserMessage(error);
    return { vehicleId, success: false, skipped: false, line: `${name}: ${message}`, status, error: message };
  }
}

export async function activateClimate(
  selectedVehicleIds: Iterable<number>,
  vehicles: readonly Vehicle[],
  fleet: FleetClient,
  options: ClimateOptions = {}
): Promise<ClimateReport> {
  const targets = [...new Set(selectedVehicleIds)];
  if (targets.length === 0) {
    return { success: false, message: "No vehicle selected", results: [] };
  }

  // Results come back in selection order regardless of completion order.
  const results = await Promise.all(targets.map((id) => activateOne(id, vehicles, fleet, options)));

  if (results.some((r) => r.success)) {
    return { success: true, message: results.map((r) => r.line).join("; "), results };
  }

  const lastError = [...results].reverse().find((r) => r.error !== undefined)?.error ?? "unknown error";
  return { success: false, message: `Failed to start climate: ${lastError}`, results };
}
