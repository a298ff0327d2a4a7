import type { Vehicle, VehicleStatus } from "@shared/schema";
import { vehicleName } from "./dispatcher";

export const KM_PER_MILE = 1.60934;

/** Warn once the route uses more than this share of the reported range */
export const RANGE_WARNING_RATIO = 0.9;

/**
 * Coarse "might not make it" check. Pure: reports the first selected vehicle
 * whose last-known range is too short, or null.
 */
export function checkRange(
  totalDistanceKm: number | undefined,
  selectedVehicleIds: Iterable<number>,
  statusByVehicle: ReadonlyMap<number, VehicleStatus>,
  vehicles: readonly Vehicle[]
): string | null {
  if (totalDistanceKm === undefined || !(totalDistanceKm > 0)) {
    return null;
  }

  for (const vehicleId of selectedVehicleIds) {
    const rangeMiles = statusByVehicle.get(vehicleId)?.batteryRangeMiles;
    if (rangeMiles === undefined) continue;

    const rangeKm = rangeMiles * KM_PER_MILE;
    if (totalDistanceKm > rangeKm * RANGE_WARNING_RATIO) {
      const name = vehicles.some((v) => v.id === vehicleId) ? vehicleName(vehicleId, vehicles) : "Vehicle";
      return `${name} may not have enough range (${Math.trunc(rangeKm)} km) for this ${Math.trunc(totalDistanceKm)} km route`;
    }
  }

  return null;
}
