import { z } from "zod";

// ============================================
// STOPS
// ============================================

export const StopTypeSchema = z.enum(["specific", "search"]);
export type StopType = z.infer<typeof StopTypeSchema>;

/** "HH:MM", 24h clock */
export const ClockTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/);

export const StopSchema = z.object({
  id: z.string().uuid(),
  address: z.string(),
  label: z.string().optional(),
  notes: z.string().optional(),
  stopType: StopTypeSchema,
  searchQuery: z.string().optional(),
  openTime: ClockTimeSchema.optional(),
  closeTime: ClockTimeSchema.optional(),
  dwellMinutes: z.number().int().nonnegative(),
  // Populated by resolution / optimization only
  estimatedArrival: z.string().optional(),
  driveMinutesFromPrev: z.number().int().nonnegative().optional(),
  distanceMeters: z.number().int().nonnegative().optional(),
  hasConflict: z.boolean(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
});

export type Stop = z.infer<typeof StopSchema>;

// ============================================
// ROUTE PREFERENCES + ITINERARY
// ============================================

export const RoutePreferencesSchema = z.object({
  scenic: z.boolean(),
  avoidHighways: z.boolean(),
  avoidTolls: z.boolean(),
  avoidFerries: z.boolean(),
  preferenceNotes: z.string().optional(),
});

export type RoutePreferences = z.infer<typeof RoutePreferencesSchema>;

export const ParsedItinerarySchema = z.object({
  origin: z.string().optional(),
  stops: z.array(StopSchema),
  preferences: RoutePreferencesSchema,
  notes: z.string().optional(),
});

export type ParsedItinerary = z.infer<typeof ParsedItinerarySchema>;

export interface ResolvedRoute {
  stops: Stop[];
  /** Absent when resolution was skipped or the service returned no directions */
  totalDriveMinutes?: number;
  totalDistanceKm?: number;
}

// ============================================
// VEHICLES
// ============================================

export const VehicleStateSchema = z.enum(["online", "asleep", "offline"]);
export type VehicleState = z.infer<typeof VehicleStateSchema>;

export interface Vehicle {
  id: number;
  displayName: string;
  vin: string;
  state: VehicleState;
  isOnline: boolean;
}

/** Last-known telemetry. Stale between refreshes. */
export interface VehicleStatus {
  batteryLevel: number;
  batteryRangeMiles?: number;
  isClimateOn: boolean;
  interiorTempC?: number;
  exteriorTempC?: number;
  locked: boolean;
  sentryMode: boolean;
  latitude?: number;
  longitude?: number;
}

export interface SendOutcome {
  success: boolean;
  message: string;
}

// ============================================
// INTERPRETER CONTEXT
// ============================================

export const SavedPlaceSchema = z.object({
  name: z.string(),
  address: z.string(),
});

export type SavedPlace = z.infer<typeof SavedPlaceSchema>;

export const CalendarEventSchema = z.object({
  title: z.string(),
  location: z.string(),
  startDate: z.coerce.date(),
});

export type CalendarEvent = z.infer<typeof CalendarEventSchema>;

export const ContactAddressSchema = z.object({
  name: z.string(),
  address: z.string(),
});

export type ContactAddress = z.infer<typeof ContactAddressSchema>;

// ============================================
// SETTINGS (per user, threaded into every call)
// ============================================

export const TemperatureUnitSchema = z.enum(["C", "F"]);
export type TemperatureUnit = z.infer<typeof TemperatureUnitSchema>;

export const NavSettingsSchema = z.object({
  llmApiKey: z.string(),
  llmModel: z.string(),
  backendUrl: z.string(),
  fleetAccessToken: z.string(),
  fleetRefreshToken: z.string(),
  mapsApiKey: z.string(),
  homeAddress: z.string(),
  workAddress: z.string(),
  favorites: z.array(SavedPlaceSchema),
  defaultDwellMinutes: z.number().int().nonnegative(),
  calendarEnabled: z.boolean(),
  contactsEnabled: z.boolean(),
  temperatureUnit: TemperatureUnitSchema,
});

export type NavSettings = z.infer<typeof NavSettingsSchema>;

export const NavSettingsPatchSchema = NavSettingsSchema.partial();
export type NavSettingsPatch = z.infer<typeof NavSettingsPatchSchema>;

export const DEFAULT_NAV_SETTINGS: NavSettings = {
  llmApiKey: "",
  llmModel: "gemini-2.5-flash",
  backendUrl: "http://localhost:8000",
  fleetAccessToken: "",
  fleetRefreshToken: "",
  mapsApiKey: "",
  homeAddress: "",
  workAddress: "",
  favorites: [],
  defaultDwellMinutes: 20,
  calendarEnabled: true,
  contactsEnabled: true,
  temperatureUnit: "C",
};

/**
 * Saved locations with an address set, in display order: Home, Work, favorites.
 */
export function savedPlaces(settings: NavSettings): SavedPlace[] {
  const places: SavedPlace[] = [];
  if (settings.homeAddress) places.push({ name: "Home", address: settings.homeAddress });
  if (settings.workAddress) places.push({ name: "Work", address: settings.workAddress });
  for (const fav of settings.favorites) {
    if (!fav.address) continue;
    places.push({ name: fav.name || "Favorite", address: fav.address });
  }
  return places;
}
