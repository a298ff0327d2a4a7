/**
 * FLEET CLIENT
 *
 * Per-vehicle operations against the fleet proxy: listing, wake, telemetry,
 * navigation and climate. Vehicle command failures surface as
 * CommandFailedError tagged with the vehicle id.
 */

import type { Vehicle, VehicleState, VehicleStatus } from "@shared/schema";
import { CommandFailedError, UpstreamError, toUserMessage } from "../errors";
import { BackendClient, errorDetail } from "./backend-client";
import { decodeVehicleList, decodeVehicleStatus, decodeWakeState } from "./decode";

// ============================================
// WAKE POLICY
// ============================================

export interface WakePolicy {
  /** Wake calls before giving up */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_WAKE_POLICY: WakePolicy = {
  maxAttempts: 5,
  initialDelayMs: 1_000,
  maxDelayMs: 8_000,
};

/** A wake round-trip can take as long as the car's modem needs */
export const WAKE_REQUEST_TIMEOUT_MS = 45_000;

/** Telemetry status meaning "vehicle asleep, not ready" */
export const VEHICLE_NOT_READY_STATUS = 408;

export type WakeResult =
  | { awake: true; attempts: number }
  | { awake: false; attempts: number; reason: string };

export interface FleetClientOptions {
  wakePolicy?: Partial<WakePolicy>;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ============================================
// CLIENT
// ============================================

export class FleetClient {
  private readonly wakePolicy: WakePolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    readonly backend: BackendClient,
    options: FleetClientOptions = {}
  ) {
    this.wakePolicy = { ...DEFAULT_WAKE_POLICY, ...options.wakePolicy };
    this.sleep = options.sleep ?? defaultSleep;
  }

  get logger() {
    return this.backend.logger;
  }

  async listVehicles(): Promise<Vehicle[]> {
    const response = await this.backend.requestOk("GET", "/vehicles");
    return decodeVehicleList(response.body);
  }

  /**
   * One wake call. Returns the state the proxy reported, if any.
   */
  async wake(vehicleId: number): Promise<VehicleState | undefined> {
    const response = await this.backend.request("POST", `/vehicles/${vehicleId}/wake`, {
      timeoutMs: WAKE_REQUEST_TIMEOUT_MS,
    });
    if (!response.ok) {
      throw new CommandFailedError(vehicleId, `Wake failed: ${errorDetail(response)}`);
    }
    return decodeWakeState(response.body);
  }

  /**
   * Wake and poll with exponential backoff until the vehicle reports online.
   * Never throws: a vehicle that stays asleep is left for the next command to fail.
   */
  async ensureAwake(vehicleId: number): Promise<WakeResult> {
    const { maxAttempts, initialDelayMs, maxDelayMs } = this.wakePolicy;
    let delay = initialDelayMs;
    let reason = "vehicle did not report online";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const state = await this.wake(vehicleId);
        if (state === "online") {
          this.logger.debug(`Vehicle ${vehicleId} online after ${attempt} wake call(s)`);
          return { awake: true, attempts: attempt };
        }
        reason = state ? `vehicle still ${state}` : "vehicle did not report online";
      } catch (error) {
        reason = toUserMessage(error);
      }

      if (attempt < maxAttempts) {
        await this.sleep(delay);
        delay = Math.min(delay * 2, maxDelayMs);
      }
    }

    this.logger.warn(`Vehicle ${vehicleId} not confirmed awake, continuing`, { reason, attempts: maxAttempts });
    return { awake: false, attempts: maxAttempts, reason };
  }

  /**
   * Fetch telemetry. A "not ready" answer triggers one wake and one retry.
   */
  async getVehicleData(vehicleId: number): Promise<VehicleStatus> {
    const path = `/vehicles/${vehicleId}/vehicle_data`;
    let response = await this.backend.request("GET", path);

    if (response.status === VEHICLE_NOT_READY_STATUS) {
      await this.ensureAwake(vehicleId);
      response = await this.backend.request("GET", path);
    }

    if (!response.ok) {
      throw new UpstreamError(response.status, errorDetail(response));
    }
    return decodeVehicleStatus(response.body);
  }

  /**
   * Send the ordered address list; the last entry is the destination.
   */
  async navigate(vehicleId: number, addresses: string[]): Promise<void> {
    const response = await this.backend.request("POST", `/vehicles/${vehicleId}/navigate`, {
      body: { stops: addresses },
    });
    if (!response.ok) {
      throw new CommandFailedError(vehicleId, errorDetail(response));
    }
  }

  async setClimate(vehicleId: number, on: boolean, targetTempC?: number): Promise<void> {
    const body: Record<string, unknown> = { on };
    if (targetTempC !== undefined) {
      body.targetTempC = targetTempC;
      // Field name the existing proxy reads
      body.temp_c = targetTempC;
    }
    const response = await this.backend.request("POST", `/vehicles/${vehicleId}/command/climate`, { body });
    if (!response.ok) {
      throw new CommandFailedError(vehicleId, errorDetail(response));
    }
  }
}
