/**
 * VEHICLE DISPATCHER
 *
 * Sends one stop list to N vehicles. Every target runs as its own task
 * (wake if needed, then navigate); tasks never reject, so one vehicle's
 * failure cannot stop or rewrite another's outcome.
 */

import type { SendOutcome, Stop, Vehicle } from "@shared/schema";
import { toUserMessage } from "../errors";
import type { FleetClient } from "./fleet-client";

export interface DispatchOptions {
  /** Called as each vehicle finishes, in completion order */
  onOutcome?: (vehicleId: number, outcome: SendOutcome) => void;
}

/**
 * Address list for the navigation command, in stop order.
 */
export function navigationAddresses(stops: Stop[]): string[] {
  return stops
    .map((stop) => (stop.address.trim() ? stop.address.trim() : stop.label?.trim() ?? ""))
    .filter((address) => address.length > 0);
}

export function vehicleName(vehicleId: number, vehicles: readonly Vehicle[]): string {
  return vehicles.find((v) => v.id === vehicleId)?.displayName ?? String(vehicleId);
}

async function dispatchOne(
  vehicleId: number,
  addresses: string[],
  vehicles: readonly Vehicle[],
  fleet: FleetClient
): Promise<SendOutcome> {
  const vehicle = vehicles.find((v) => v.id === vehicleId);
  const name = vehicle?.displayName ?? String(vehicleId);

  try {
    // Unknown or not-online vehicles get a wake first; the result only gates logging.
    if (!vehicle?.isOnline) {
      const wake = await fleet.ensureAwake(vehicleId);
      if (!wake.awake) {
        fleet.logger.warn(`Sending to ${name} without wake confirmation`, { reason: wake.reason });
      }
    }
    await fleet.navigate(vehicleId, addresses);
    return { success: true, message: `Route sent to ${name}` };
  } catch (error) {
    return { success: false, message: `${name}: ${toUserMessage(error)}` };
  }
}

export async function dispatch(
  stops: Stop[],
  targetVehicleIds: Iterable<number>,
  vehicles: readonly Vehicle[],
  fleet: FleetClient,
  options: DispatchOptions = {}
): Promise<Map<number, SendOutcome>> {
  const outcomes = new Map<number, SendOutcome>();
  const targets = [...new Set(targetVehicleIds)];
  if (stops.length === 0 || targets.length === 0) {
    return outcomes;
  }

  const addresses = navigationAddresses(stops);

  await Promise.all(
    targets.map(async (vehicleId) => {
      const outcome = await dispatchOne(vehicleId, addresses, vehicles, fleet);
      outcomes.set(vehicleId, outcome);
      options.onOutcome?.(vehicleId, outcome);
    })
  );

  const sent = [...outcomes.values()].filter((o) => o.success).length;
  fleet.logger.info(`Dispatch finished: ${sent}/${targets.length} vehicle(s)`);

  return outcomes;
}
