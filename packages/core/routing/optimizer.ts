/**
 * STOP ORDER OPTIMIZER
 *
 * Best-effort reorder of three or more stops by the backend. Any failure is
 * reported as OptimizeFailedError; the caller keeps its current order.
 */

import type { Stop } from "@shared/schema";
import { OptimizeFailedError, toUserMessage } from "../errors";
import type { BackendClient } from "../fleet/backend-client";
import { decodeStopList } from "../itinerary/decode";

export const MIN_STOPS_TO_OPTIMIZE = 3;

function sameIdSet(a: Stop[], b: Stop[]): boolean {
  if (a.length !== b.length) return false;
  const ids = new Set(a.map((s) => s.id));
  return b.every((s) => ids.has(s.id)) && new Set(b.map((s) => s.id)).size === b.length;
}

export async function optimize(stops: Stop[], origin: string | undefined, backend: BackendClient): Promise<Stop[]> {
  if (stops.length < MIN_STOPS_TO_OPTIMIZE) {
    return stops;
  }

  let body: unknown;
  try {
    const response = await backend.requestOk("POST", "/route/optimize-order", {
      body: { origin: origin ?? null, stops },
    });
    body = response.body;
  } catch (error) {
    throw new OptimizeFailedError(`Optimize failed: ${toUserMessage(error)}`, { cause: error });
  }

  const list: unknown = typeof body === "object" && body !== null ? Reflect.get(body, "stops") : undefined;
  if (!Array.isArray(list)) {
    throw new OptimizeFailedError("Optimize failed: response has no stop list");
  }

  const reordered = decodeStopList(list).stops;
  if (!sameIdSet(stops, reordered)) {
    throw new OptimizeFailedError("Optimize failed: returned stops do not match the current route");
  }

  return reordered;
}
