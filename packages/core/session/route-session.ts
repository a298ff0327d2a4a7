/**
 * ROUTE SESSION
 *
 * Owns one user's in-memory state and runs the pipeline:
 * 1. Interpret (language model)
 * 2. Resolve (backend, only when needed)
 * 3. Optimize order (on demand)
 * 4. Dispatch / climate (on demand, per vehicle)
 *
 * Range is re-checked after every change to stops, totals, selection or telemetry.
 * Each run of parseAndOptimize is tagged; results of a superseded run are dropped.
 */

import type {
  CalendarEvent,
  ContactAddress,
  NavSettings,
  ParsedItinerary,
  RoutePreferences,
  SendOutcome,
  Stop,
  Vehicle,
  VehicleStatus,
} from "@shared/schema";
import { savedPlaces } from "@shared/schema";
import { isMissingCredential, toUserMessage } from "../errors";
import type { LLMClient } from "../llm/client";
import type { Logger } from "../logger";
import { createSilentLogger } from "../logger";
import { interpret } from "../itinerary/interpreter";
import { needsResolution, resolve } from "../routing/resolver";
import { optimize, MIN_STOPS_TO_OPTIMIZE } from "../routing/optimizer";
import type { BackendClient } from "../fleet/backend-client";
import type { FleetClient } from "../fleet/fleet-client";
import { dispatch } from "../fleet/dispatcher";
import { checkRange } from "../fleet/range-guard";
import { activateClimate, type Coordinates, type WeatherProvider } from "../climate/advisor";

export interface SessionFlags {
  parsing: boolean;
  resolving: boolean;
  optimizing: boolean;
  sending: boolean;
  climateActivating: boolean;
  loadingVehicles: boolean;
}

export interface ParseEnv {
  settings: NavSettings;
  llm: LLMClient;
  /** null when no backend URL is configured: resolution is skipped */
  backend: BackendClient | null;
  calendarEvents?: CalendarEvent[];
  contacts?: ContactAddress[];
  now?: Date;
}

export interface ClimateEnv {
  settings: NavSettings;
  weather?: WeatherProvider;
  location?: Coordinates;
}

export interface SessionSnapshot {
  stops: Stop[];
  origin: string | null;
  preferences: RoutePreferences | null;
  totalDriveMinutes: number | null;
  totalDistanceKm: number | null;
  rangeWarning: string | null;
  /** The one notice surface for parse / resolve / optimize problems */
  notice: string | null;
  climateStatus: string | null;
  fleetError: string | null;
  vehicles: Vehicle[];
  vehicleStatus: Record<number, VehicleStatus>;
  selectedVehicleIds: number[];
  sendOutcomes: Record<number, SendOutcome>;
  flags: SessionFlags;
}

export class RouteSession {
  private stops: Stop[] = [];
  private origin: string | undefined;
  private preferences: RoutePreferences | undefined;
  private totalDriveMinutes: number | undefined;
  private totalDistanceKm: number | undefined;
  private rangeWarning: string | null = null;
  private notice: string | undefined;
  private climateStatus: string | undefined;
  private fleetError: string | undefined;

  private vehicles: Vehicle[] = [];
  private readonly vehicleStatus = new Map<number, VehicleStatus>();
  private readonly selectedVehicleIds = new Set<number>();
  private readonly sendOutcomes = new Map<number, SendOutcome>();

  private readonly flags: SessionFlags = {
    parsing: false,
    resolving: false,
    optimizing: false,
    sending: false,
    climateActivating: false,
    loadingVehicles: false,
  };

  private parseRun = 0;
  private outcomeCycle = 0;

  constructor(private readonly logger: Logger = createSilentLogger()) {}

  // ============================================
  // PARSE + RESOLVE
  // ============================================

  async parseAndOptimize(promptText: string, env: ParseEnv): Promise<void> {
    const prompt = promptText.trim();
    if (!prompt) return;

    const run = ++this.parseRun;
    this.resetRouteState();
    this.flags.parsing = true;
    this.flags.resolving = false;

    const isCurrent = () => run === this.parseRun;
    const { settings } = env;
    const startedAt = Date.now();

    let parsed: ParsedItinerary;
    try {
      parsed = await interpret(prompt, env.llm, {
        savedPlaces: savedPlaces(settings),
        calendarEvents: settings.calendarEnabled ? env.calendarEvents : [],
        contacts: settings.contactsEnabled ? env.contacts : [],
        now: env.now,
        defaultDwellMinutes: settings.defaultDwellMinutes,
        logger: this.logger,
      });
    } catch (error) {
      if (isCurrent()) {
        this.notice = toUserMessage(error);
        this.flags.parsing = false;
      }
      if (isMissingCredential(error)) {
        this.logger.info("Interpretation skipped: no model key", { error: toUserMessage(error) });
      } else {
        this.logger.warn("Interpretation failed", { error: toUserMessage(error) });
      }
      return;
    }

    if (!isCurrent()) return;

    this.logger.debug("Interpretation done", { durationMs: Date.now() - startedAt });
    this.origin = parsed.origin;
    this.preferences = parsed.preferences;
    this.flags.parsing = false;

    if (parsed.stops.length === 0) {
      this.notice = parsed.notes ?? "No destinations found";
      return;
    }

    // Parsed stops are visible before resolution starts.
    this.stops = parsed.stops;
    this.recomputeRange();

    if (!needsResolution(parsed)) return;
    if (!env.backend) {
      this.logger.warn("No backend configured, using parsed stops as-is");
      return;
    }

    this.flags.resolving = true;
    try {
      const route = await resolve(parsed.stops, parsed.origin, parsed.preferences, env.backend);
      if (!isCurrent()) return;
      this.stops = route.stops;
      this.totalDriveMinutes = route.totalDriveMinutes;
      this.totalDistanceKm = route.totalDistanceKm;
    } catch (error) {
      if (!isCurrent()) return;
      // Keep the parsed stops; never leave totals from an earlier route behind.
      this.totalDriveMinutes = undefined;
      this.totalDistanceKm = undefined;
      this.logger.warn("Resolution failed, keeping parsed stops", { error: toUserMessage(error) });
    } finally {
      if (isCurrent()) {
        this.flags.resolving = false;
        this.recomputeRange();
      }
    }
  }

  async optimizeOrder(backend: BackendClient | null): Promise<void> {
    if (this.stops.length < MIN_STOPS_TO_OPTIMIZE || !backend || this.flags.optimizing) return;

    const run = this.parseRun;
    const before = this.stops;
    this.flags.optimizing = true;
    this.notice = undefined;

    try {
      const reordered = await optimize(before, this.origin, backend);
      // Only apply to the route it was computed for.
      if (run === this.parseRun && this.stops === before) {
        this.stops = reordered;
        this.recomputeRange();
      }
    } catch (error) {
      if (run === this.parseRun) this.notice = toUserMessage(error);
    } finally {
      this.flags.optimizing = false;
    }
  }

  // ============================================
  // VEHICLES
  // ============================================

  async refreshVehicles(fleet: FleetClient): Promise<void> {
    if (this.flags.loadingVehicles) return;
    this.flags.loadingVehicles = true;
    this.fleetError = undefined;

    try {
      this.vehicles = await fleet.listVehicles();

      const known = new Set(this.vehicles.map((v) => v.id));
      for (const id of [...this.selectedVehicleIds]) {
        if (!known.has(id)) this.selectedVehicleIds.delete(id);
      }
      for (const id of [...this.vehicleStatus.keys()]) {
        if (!known.has(id)) this.vehicleStatus.delete(id);
      }

      const statuses = await Promise.allSettled(this.vehicles.map((v) => fleet.getVehicleData(v.id)));
      statuses.forEach((result, index) => {
        const vehicle = this.vehicles[index];
        if (result.status === "fulfilled") {
          this.vehicleStatus.set(vehicle.id, result.value);
        } else {
          // Status is optional: the previous reading stays as last-known.
          this.logger.debug(`No telemetry for ${vehicle.displayName}`, { error: toUserMessage(result.reason) });
        }
      });
    } catch (error) {
      this.fleetError = toUserMessage(error);
    } finally {
      this.flags.loadingVehicles = false;
      this.recomputeRange();
    }
  }

  toggleVehicle(vehicleId: number): void {
    if (this.selectedVehicleIds.has(vehicleId)) {
      this.selectedVehicleIds.delete(vehicleId);
    } else {
      this.selectedVehicleIds.add(vehicleId);
    }
    this.recomputeRange();
  }

  async sendToSelectedVehicles(fleet: FleetClient): Promise<void> {
    if (this.stops.length === 0 || this.selectedVehicleIds.size === 0 || this.flags.sending) return;

    this.flags.sending = true;
    this.sendOutcomes.clear();
    const cycle = ++this.outcomeCycle;

    try {
      await dispatch([...this.stops], [...this.selectedVehicleIds], this.vehicles, fleet, {
        onOutcome: (vehicleId, outcome) => {
          if (cycle === this.outcomeCycle) this.sendOutcomes.set(vehicleId, outcome);
        },
      });
    } finally {
      this.flags.sending = false;
    }
  }

  async activateClimate(fleet: FleetClient, env: ClimateEnv): Promise<void> {
    if (this.selectedVehicleIds.size === 0 || this.flags.climateActivating) return;

    this.flags.climateActivating = true;
    this.climateStatus = undefined;

    try {
      const report = await activateClimate([...this.selectedVehicleIds], this.vehicles, fleet, {
        weather: env.weather,
        location: env.location,
        unit: env.settings.temperatureUnit,
      });
      for (const result of report.results) {
        if (result.status) this.vehicleStatus.set(result.vehicleId, result.status);
      }
      this.climateStatus = report.message;
    } catch (error) {
      this.climateStatus = `Failed to start climate: ${toUserMessage(error)}`;
    } finally {
      this.flags.climateActivating = false;
      this.recomputeRange();
    }
  }

  clearRoute(): void {
    this.parseRun++;
    this.resetRouteState();
    this.climateStatus = undefined;
    this.flags.parsing = false;
    this.flags.resolving = false;
  }

  // ============================================
  // STATE
  // ============================================

  private resetRouteState(): void {
    this.stops = [];
    this.origin = undefined;
    this.preferences = undefined;
    this.totalDriveMinutes = undefined;
    this.totalDistanceKm = undefined;
    this.rangeWarning = null;
    this.notice = undefined;
    this.sendOutcomes.clear();
    this.outcomeCycle++;
  }

  private recomputeRange(): void {
    this.rangeWarning = checkRange(this.totalDistanceKm, this.selectedVehicleIds, this.vehicleStatus, this.vehicles);
  }

  snapshot(): SessionSnapshot {
    return {
      stops: this.stops.map((s) => ({ ...s })),
      origin: this.origin ?? null,
      preferences: this.preferences ? { ...this.preferences } : null,
      totalDriveMinutes: this.totalDriveMinutes ?? null,
      totalDistanceKm: this.totalDistanceKm ?? null,
      rangeWarning: this.rangeWarning,
      notice: this.notice ?? null,
      climateStatus: this.climateStatus ?? null,
      fleetError: this.fleetError ?? null,
      vehicles: this.vehicles.map((v) => ({ ...v })),
      vehicleStatus: Object.fromEntries(this.vehicleStatus),
      selectedVehicleIds: [...this.selectedVehicleIds],
      sendOutcomes: Object.fromEntries(this.sendOutcomes),
      flags: { ...this.flags },
    };
  }
}
