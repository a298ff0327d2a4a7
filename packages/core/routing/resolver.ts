/**
 * ROUTE RESOLVER
 *
 * Second pass over an interpreted itinerary: the backend turns search stops
 * into concrete places, geocodes, applies route preferences and returns per-leg
 * drive time and distance plus totals.
 */

import type { ParsedItinerary, ResolvedRoute, RoutePreferences, Stop } from "@shared/schema";
import { DecodeError } from "../errors";
import type { BackendClient } from "../fleet/backend-client";
import { decodeStopList } from "../itinerary/decode";

type ItineraryShape = Pick<ParsedItinerary, "stops" | "preferences">;

/**
 * True when the itinerary needs the remote pass. A single specific stop with
 * no preference flags is used as-is.
 */
export function needsResolution(itinerary: ItineraryShape): boolean {
  const { stops, preferences } = itinerary;
  return (
    stops.some((stop) => stop.stopType === "search") ||
    preferences.scenic ||
    preferences.avoidHighways ||
    preferences.avoidTolls ||
    preferences.avoidFerries ||
    stops.length > 1
  );
}

/**
 * Give every returned stop an id from the input set. Ids the service kept are
 * honoured; dropped or rewritten ones are mapped to the input id at the same
 * position (or the first input id not yet taken).
 */
export function remapStopIds(input: Stop[], returned: Stop[]): Stop[] {
  if (input.length !== returned.length) {
    throw new DecodeError(`Resolution returned ${returned.length} stop(s) for ${input.length}`);
  }

  const inputIds = new Set(input.map((s) => s.id));
  const taken = new Set<string>();
  const keep = returned.map((stop) => {
    if (inputIds.has(stop.id) && !taken.has(stop.id)) {
      taken.add(stop.id);
      return true;
    }
    return false;
  });

  return returned.map((stop, index) => {
    if (keep[index]) return stop;
    const positional = input[index].id;
    const id = !taken.has(positional) ? positional : input.find((s) => !taken.has(s.id))?.id;
    if (id === undefined) {
      throw new DecodeError("Resolution returned stops that cannot be matched to the itinerary");
    }
    taken.add(id);
    return { ...stop, id };
  });
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstNumber(record: Json, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value) && value >= 0) return value;
  }
  return undefined;
}

export function decodeDirections(raw: unknown): Pick<ResolvedRoute, "totalDriveMinutes" | "totalDistanceKm"> {
  if (!isRecord(raw)) return {};
  const totals: Pick<ResolvedRoute, "totalDriveMinutes" | "totalDistanceKm"> = {};

  const minutes = firstNumber(raw, ["totalDurationMinutes", "total_duration_min", "totalDurationMin"]);
  if (minutes !== undefined) totals.totalDriveMinutes = Math.round(minutes);

  const km = firstNumber(raw, ["totalDistanceKm", "total_distance_km"]);
  if (km !== undefined) totals.totalDistanceKm = km;

  return totals;
}

export async function resolve(
  stops: Stop[],
  origin: string | undefined,
  preferences: RoutePreferences,
  backend: BackendClient
): Promise<ResolvedRoute> {
  const response = await backend.requestOk("POST", "/route", {
    body: { origin: origin ?? null, stops, preferences },
  });

  const body = response.body;
  if (!isRecord(body) || !Array.isArray(body.stops)) {
    throw new DecodeError("Resolution response has no stop list");
  }

  const decoded = decodeStopList(body.stops);
  if (decoded.defaulted.length > 0) {
    backend.logger.warn("Resolution response had fields replaced by defaults", { fields: decoded.defaulted });
  }

  const route: ResolvedRoute = {
    stops: remapStopIds(stops, decoded.stops),
    ...decodeDirections(body.directions),
  };

  backend.logger.debug("Resolved route", {
    stops: route.stops.length,
    totalDriveMinutes: route.totalDriveMinutes ?? null,
    totalDistanceKm: route.totalDistanceKm ?? null,
  });

  return route;
}
