/**
 * Decoders for the fleet proxy's vehicle listing and telemetry payloads.
 * Wire fields are snake_case; camelCase is accepted too.
 */

import { z } from "zod";
import type { Vehicle, VehicleState, VehicleStatus } from "@shared/schema";
import { VehicleStateSchema } from "@shared/schema";
import { DecodeError } from "../errors";

export const VEHICLE_DEFAULTS = {
  displayName: "Vehicle",
  vin: "",
  state: "offline",
} as const satisfies Partial<Vehicle>;

export const STATUS_DEFAULTS = {
  batteryLevel: 0,
  isClimateOn: false,
  locked: true,
  sentryMode: false,
} as const satisfies Partial<VehicleStatus>;

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First present key wins: lets one decoder accept both wire spellings. */
function pick(record: Json, ...keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

// Ids past 2^53 cannot round-trip through a number; such vehicles are dropped.
const IntIdSchema = z
  .union([z.number().int(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .refine(Number.isSafeInteger);
const NumberSchema = z.union([z.number().finite(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);
const StateSchema = z.string().trim().toLowerCase().pipe(VehicleStateSchema);

function numberOr<T>(raw: unknown, fallback: T): number | T {
  const parsed = NumberSchema.safeParse(raw);
  return parsed.success ? parsed.data : fallback;
}

function boolOr(raw: unknown, fallback: boolean): boolean {
  return typeof raw === "boolean" ? raw : fallback;
}

/** Unwrap the proxy's {"response": ...} envelope when present. */
export function unwrapResponse(body: unknown): unknown {
  if (isRecord(body) && "response" in body) return body.response;
  return body;
}

export function decodeVehicleState(raw: unknown): VehicleState {
  const parsed = StateSchema.safeParse(raw);
  return parsed.success ? parsed.data : VEHICLE_DEFAULTS.state;
}

/**
 * Returns null for entries without a usable integer id: such a vehicle could
 * never be addressed by a command.
 */
export function decodeVehicle(raw: unknown): Vehicle | null {
  if (!isRecord(raw)) return null;

  const id = IntIdSchema.safeParse(pick(raw, "id", "vehicle_id"));
  if (!id.success) return null;

  const name = pick(raw, "display_name", "displayName");
  const vin = pick(raw, "vin");
  const state = decodeVehicleState(pick(raw, "state"));

  return {
    id: id.data,
    displayName: typeof name === "string" && name.trim() ? name.trim() : VEHICLE_DEFAULTS.displayName,
    vin: typeof vin === "string" ? vin : VEHICLE_DEFAULTS.vin,
    state,
    isOnline: state === "online",
  };
}

export function decodeVehicleList(body: unknown): Vehicle[] {
  const list = unwrapResponse(body);
  if (!Array.isArray(list)) {
    throw new DecodeError("Vehicle listing is not a list");
  }
  const vehicles: Vehicle[] = [];
  for (const entry of list) {
    const vehicle = decodeVehicle(entry);
    if (vehicle) vehicles.push(vehicle);
  }
  return vehicles;
}

export function decodeVehicleStatus(body: unknown): VehicleStatus {
  const raw = unwrapResponse(body);
  if (!isRecord(raw)) {
    throw new DecodeError("Vehicle data is not an object");
  }

  const status: VehicleStatus = {
    batteryLevel: Math.max(0, Math.min(100, numberOr(pick(raw, "battery_level", "batteryLevel"), STATUS_DEFAULTS.batteryLevel))),
    isClimateOn: boolOr(pick(raw, "is_climate_on", "isClimateOn"), STATUS_DEFAULTS.isClimateOn),
    locked: boolOr(pick(raw, "locked"), STATUS_DEFAULTS.locked),
    sentryMode: boolOr(pick(raw, "sentry_mode", "sentryMode"), STATUS_DEFAULTS.sentryMode),
  };

  const range = numberOr(pick(raw, "battery_range", "batteryRange", "batteryRangeMiles"), undefined);
  if (range !== undefined && range >= 0) status.batteryRangeMiles = range;

  const inside = numberOr(pick(raw, "interior_temp", "inside_temp", "interiorTempC"), undefined);
  if (inside !== undefined) status.interiorTempC = inside;

  const outside = numberOr(pick(raw, "exterior_temp", "outside_temp", "exteriorTempC"), undefined);
  if (outside !== undefined) status.exteriorTempC = outside;

  const lat = numberOr(pick(raw, "latitude"), undefined);
  const lng = numberOr(pick(raw, "longitude"), undefined);
  if (lat !== undefined && lng !== undefined) {
    status.latitude = lat;
    status.longitude = lng;
  }

  return status;
}

/** State reported by a wake call, if the body carries one. */
export function decodeWakeState(body: unknown): VehicleState | undefined {
  const raw = unwrapResponse(body);
  if (!isRecord(raw) || raw.state === undefined) return undefined;
  return decodeVehicleState(raw.state);
}
