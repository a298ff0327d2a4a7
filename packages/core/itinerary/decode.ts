/**
 * ITINERARY DECODING
 *
 * Total decoders for stops, preferences and whole itineraries as they arrive
 * from the language model or the resolution service. A bad field falls back to
 * its named default and is reported; it never rejects the surrounding record.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import type { ParsedItinerary, RoutePreferences, Stop, StopType } from "@shared/schema";
import { MalformedResponseError } from "../errors";

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_DWELL_MINUTES = 20;

export const STOP_DEFAULTS = {
  address: "",
  stopType: "specific",
  dwellMinutes: DEFAULT_DWELL_MINUTES,
  hasConflict: false,
} as const satisfies Partial<Stop>;

export const PREFERENCE_DEFAULTS: RoutePreferences = {
  scenic: false,
  avoidHighways: false,
  avoidTolls: false,
  avoidFerries: false,
};

// ============================================
// FIELD RESULTS
// ============================================

export type DefaultReason = "missing" | "invalid" | "duplicate";

export type FieldResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "defaulted"; value: T; reason: DefaultReason };

export interface DefaultedField {
  field: string;
  reason: DefaultReason;
}

export interface DecodedStop {
  stop: Stop;
  defaulted: DefaultedField[];
}

export interface DecodedItinerary {
  itinerary: ParsedItinerary;
  /** "stops[1].id (invalid)" style paths, for logging */
  defaulted: string[];
}

export interface DecodeOptions {
  defaultDwellMinutes?: number;
}

const UuidSchema = z.string().uuid();
const FiniteNumberSchema = z.number().finite();
const NumericStringSchema = z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number);
const ClockSchema = z
  .string()
  .trim()
  .regex(/^([01]?\d|2[0-3]):([0-5]\d)$/)
  .transform((value) => value.padStart(5, "0"));

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * Required field: absent or invalid values take the default.
 */
function required<T>(raw: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): FieldResult<T> {
  if (isAbsent(raw)) return { kind: "defaulted", value: fallback, reason: "missing" };
  const parsed = schema.safeParse(raw);
  if (!parsed.success) return { kind: "defaulted", value: fallback, reason: "invalid" };
  return { kind: "ok", value: parsed.data };
}

/**
 * Optional field: absent is fine; invalid values are dropped and reported.
 */
function optional<T>(raw: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): FieldResult<T | undefined> {
  if (isAbsent(raw)) return { kind: "ok", value: undefined };
  const parsed = schema.safeParse(raw);
  if (!parsed.success) return { kind: "defaulted", value: undefined, reason: "invalid" };
  return { kind: "ok", value: parsed.data };
}

const TextSchema = z
  .string()
  .transform((value) => value.trim())
  .transform((value) => (value.length > 0 ? value : undefined));

const NumberSchema = z.union([FiniteNumberSchema, NumericStringSchema]);
const NonNegativeIntSchema = NumberSchema.pipe(z.number().nonnegative()).transform((value) => Math.round(value));
const BooleanSchema = z.union([z.boolean(), z.enum(["true", "false"]).transform((value) => value === "true")]);

// The resolution service reports resolved search stops as "resolved";
// by then they are concrete places.
const StopTypeWireSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["specific", "search", "resolved"]))
  .transform((value): StopType => (value === "search" ? "search" : "specific"));

// ============================================
// STOP
// ============================================

/**
 * Decode one stop. A bare string becomes a specific stop at that address.
 * Returns null only for values that cannot describe a stop at all.
 */
export function decodeStop(raw: unknown, options: DecodeOptions = {}): DecodedStop | null {
  if (typeof raw === "string") {
    const address = raw.trim();
    if (!address) return null;
    return decodeStop({ address, label: address }, options);
  }
  if (!isRecord(raw)) return null;

  const defaulted: DefaultedField[] = [];
  const take = <T>(field: string, result: FieldResult<T>): T => {
    if (result.kind === "defaulted") defaulted.push({ field, reason: result.reason });
    return result.value;
  };

  const dwellDefault = options.defaultDwellMinutes ?? STOP_DEFAULTS.dwellMinutes;

  const id = take("id", required(raw.id, UuidSchema.transform((v) => v.toLowerCase()), ""));
  const address = take("address", required(raw.address, z.string().transform((v) => v.trim()), STOP_DEFAULTS.address));
  const label = take("label", optional(raw.label, TextSchema));
  const notes = take("notes", optional(raw.notes, TextSchema));
  let stopType = take("stopType", required<StopType>(raw.stopType, StopTypeWireSchema, STOP_DEFAULTS.stopType));
  let searchQuery = take("searchQuery", optional(raw.searchQuery, TextSchema));
  const openTime = take("openTime", optional(raw.openTime, ClockSchema));
  const closeTime = take("closeTime", optional(raw.closeTime, ClockSchema));
  const dwellMinutes = take("dwellMinutes", required(raw.dwellMinutes, NonNegativeIntSchema, dwellDefault));
  const estimatedArrival = take("estimatedArrival", optional(raw.estimatedArrival, TextSchema));
  const driveMinutesFromPrev = take("driveMinutesFromPrev", optional(raw.driveMinutesFromPrev, NonNegativeIntSchema));
  const distanceMeters = take("distanceMeters", optional(raw.distanceMeters, NonNegativeIntSchema));
  const hasConflict = take("hasConflict", required(raw.hasConflict, BooleanSchema, STOP_DEFAULTS.hasConflict));
  const latitude = take("latitude", optional(raw.latitude, NumberSchema.pipe(z.number().min(-90).max(90))));
  const longitude = take("longitude", optional(raw.longitude, NumberSchema.pipe(z.number().min(-180).max(180))));

  // searchQuery only lives on search stops; a search stop needs something to search for.
  if (stopType === "search" && !searchQuery) {
    if (address) {
      searchQuery = address;
    } else {
      stopType = "specific";
      defaulted.push({ field: "stopType", reason: "invalid" });
    }
  }
  if (stopType === "specific") {
    searchQuery = undefined;
  }

  const stop: Stop = {
    id: id || randomUUID(),
    address: address || (stopType === "search" && searchQuery ? searchQuery : label ?? ""),
    stopType,
    dwellMinutes,
    hasConflict,
  };
  if (label !== undefined) stop.label = label;
  if (notes !== undefined) stop.notes = notes;
  if (searchQuery !== undefined) stop.searchQuery = searchQuery;
  if (openTime !== undefined) stop.openTime = openTime;
  if (closeTime !== undefined) stop.closeTime = closeTime;
  if (estimatedArrival !== undefined) stop.estimatedArrival = estimatedArrival;
  if (driveMinutesFromPrev !== undefined) stop.driveMinutesFromPrev = driveMinutesFromPrev;
  if (distanceMeters !== undefined) stop.distanceMeters = distanceMeters;
  if (latitude !== undefined) stop.latitude = latitude;
  if (longitude !== undefined) stop.longitude = longitude;

  return { stop, defaulted };
}

export interface DecodedStopList {
  stops: Stop[];
  defaulted: string[];
  /** Entries that could not describe a stop (numbers, nested arrays, null) */
  skipped: number;
}

/**
 * Decode a list of stops, keeping order. Ids repeated within the list are regenerated.
 */
export function decodeStopList(raw: unknown[], options: DecodeOptions = {}): DecodedStopList {
  const stops: Stop[] = [];
  const defaulted: string[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  raw.forEach((entry, index) => {
    const decoded = decodeStop(entry, options);
    if (!decoded) {
      skipped += 1;
      defaulted.push(`stops[${index}] (invalid)`);
      return;
    }
    const { stop } = decoded;
    for (const field of decoded.defaulted) {
      defaulted.push(`stops[${index}].${field.field} (${field.reason})`);
    }
    if (seen.has(stop.id)) {
      stop.id = randomUUID();
      defaulted.push(`stops[${index}].id (duplicate)`);
    }
    seen.add(stop.id);
    stops.push(stop);
  });

  return { stops, defaulted, skipped };
}

// ============================================
// PREFERENCES
// ============================================

export function decodePreferences(raw: unknown): { preferences: RoutePreferences; defaulted: string[] } {
  if (!isRecord(raw)) {
    return {
      preferences: { ...PREFERENCE_DEFAULTS },
      defaulted: isAbsent(raw) ? [] : ["preferences (invalid)"],
    };
  }

  const defaulted: string[] = [];
  const flag = (key: keyof Omit<RoutePreferences, "preferenceNotes">): boolean => {
    const result = optional(raw[key], BooleanSchema);
    if (result.kind === "defaulted") defaulted.push(`preferences.${key} (${result.reason})`);
    return result.value ?? PREFERENCE_DEFAULTS[key];
  };

  const scenic = flag("scenic");
  const preferences: RoutePreferences = {
    scenic,
    // Scenic routing means staying off the highway
    avoidHighways: flag("avoidHighways") || scenic,
    avoidTolls: flag("avoidTolls"),
    avoidFerries: flag("avoidFerries"),
  };

  const notes = optional(raw.preferenceNotes, TextSchema);
  if (notes.kind === "defaulted") defaulted.push("preferences.preferenceNotes (invalid)");
  if (notes.value !== undefined) preferences.preferenceNotes = notes.value;

  return { preferences, defaulted };
}

// ============================================
// ITINERARY
// ============================================

/**
 * Decode a parsed language-model answer.
 * Throws MalformedResponseError only when the top-level shape is unusable.
 */
export function decodeItinerary(raw: unknown, options: DecodeOptions = {}): DecodedItinerary {
  if (!isRecord(raw)) {
    throw new MalformedResponseError("Could not parse response: expected a JSON object");
  }
  if (!isAbsent(raw.stops) && !Array.isArray(raw.stops)) {
    throw new MalformedResponseError("Could not parse response: stops is not a list");
  }

  const list = decodeStopList(Array.isArray(raw.stops) ? raw.stops : [], options);
  const prefs = decodePreferences(raw.preferences);
  const defaulted = [...list.defaulted, ...prefs.defaulted];

  const itinerary: ParsedItinerary = {
    stops: list.stops,
    preferences: prefs.preferences,
  };

  const origin = optional(raw.origin, TextSchema);
  if (origin.kind === "defaulted") defaulted.push("origin (invalid)");
  if (origin.value !== undefined && origin.value.toLowerCase() !== "null") itinerary.origin = origin.value;

  const notes = optional(raw.notes, TextSchema);
  if (notes.kind === "defaulted") defaulted.push("notes (invalid)");
  if (notes.value !== undefined) itinerary.notes = notes.value;

  return { itinerary, defaulted };
}
