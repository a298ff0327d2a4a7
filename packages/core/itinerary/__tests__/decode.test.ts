/**
 * ITINERARY DECODING — TESTS
 */

import { describe, it, expect } from "vitest";
import { decodeItinerary, decodePreferences, decodeStop, decodeStopList } from "../decode";
import { MalformedResponseError } from "../../errors";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const STOP_ID = "3F2504E0-4F89-41D3-9A0C-0305E82C3301";

describe("decodeStop", () => {
  it("keeps a complete stop and normalizes its fields", () => {
    const decoded = decodeStop({
      id: STOP_ID,
      address: "  123 Main St ",
      label: "Costco",
      stopType: "specific",
      openTime: "9:00",
      closeTime: "17:30",
      dwellMinutes: 30,
      hasConflict: false,
    });

    expect(decoded?.defaulted).toEqual([]);
    expect(decoded?.stop).toEqual({
      id: "3f2504e0-4f89-41d3-9a0c-0305e82c3301",
      address: "123 Main St",
      label: "Costco",
      stopType: "specific",
      openTime: "09:00",
      closeTime: "17:30",
      dwellMinutes: 30,
      hasConflict: false,
    });
  });

  it("generates an id when the model left it out", () => {
    const decoded = decodeStop({ address: "SFO", stopType: "specific", dwellMinutes: 20, hasConflict: false });

    expect(decoded?.stop.id).toMatch(UUID);
    expect(decoded?.defaulted).toEqual([{ field: "id", reason: "missing" }]);
  });

  it("replaces an id that is not a UUID", () => {
    const decoded = decodeStop({ id: "stop-1", address: "SFO", stopType: "specific", dwellMinutes: 20, hasConflict: false });

    expect(decoded?.stop.id).toMatch(UUID);
    expect(decoded?.defaulted).toEqual([{ field: "id", reason: "invalid" }]);
  });

  it("turns a bare string into a specific stop", () => {
    const decoded = decodeStop("Costco");

    expect(decoded?.stop).toMatchObject({ address: "Costco", label: "Costco", stopType: "specific", dwellMinutes: 20 });
    expect(decoded?.stop.searchQuery).toBeUndefined();
  });

  it("returns null for values that cannot be a stop", () => {
    expect(decodeStop(42)).toBeNull();
    expect(decodeStop(null)).toBeNull();
    expect(decodeStop("   ")).toBeNull();
  });

  it("uses the address as the search term when a search stop has none", () => {
    const decoded = decodeStop({ id: STOP_ID, address: "gas station", stopType: "search" });

    expect(decoded?.stop.stopType).toBe("search");
    expect(decoded?.stop.searchQuery).toBe("gas station");
  });

  it("downgrades a search stop with nothing to search for", () => {
    const decoded = decodeStop({ id: STOP_ID, label: "Lunch", stopType: "search" });

    expect(decoded?.stop.stopType).toBe("specific");
    expect(decoded?.stop.address).toBe("Lunch");
    expect(decoded?.defaulted).toContainEqual({ field: "stopType", reason: "invalid" });
  });

  it("treats resolved stops as specific and drops their search term", () => {
    const decoded = decodeStop({
      id: STOP_ID,
      address: "Shell, 1 Camino Real",
      stopType: "resolved",
      searchQuery: "gas station",
    });

    expect(decoded?.stop.stopType).toBe("specific");
    expect(decoded?.stop.searchQuery).toBeUndefined();
  });

  it("defaults dwell time from options and accepts numeric strings", () => {
    expect(decodeStop({ address: "A" }, { defaultDwellMinutes: 10 })?.stop.dwellMinutes).toBe(10);
    expect(decodeStop({ address: "A", dwellMinutes: "15" })?.stop.dwellMinutes).toBe(15);

    const negative = decodeStop({ address: "A", dwellMinutes: -5 });
    expect(negative?.stop.dwellMinutes).toBe(20);
    expect(negative?.defaulted).toContainEqual({ field: "dwellMinutes", reason: "invalid" });
  });

  it("drops an unreadable time window", () => {
    const decoded = decodeStop({ id: STOP_ID, address: "Bank", closeTime: "5pm" });

    expect(decoded?.stop.closeTime).toBeUndefined();
    expect(decoded?.defaulted).toContainEqual({ field: "closeTime", reason: "invalid" });
  });
});

describe("decodeStopList", () => {
  it("skips unusable entries and regenerates repeated ids", () => {
    const stop = { id: STOP_ID, address: "A", stopType: "specific", dwellMinutes: 20, hasConflict: false };
    const result = decodeStopList([stop, 42, { ...stop, address: "B" }]);

    expect(result.stops.map((s) => s.address)).toEqual(["A", "B"]);
    expect(result.skipped).toBe(1);
    expect(result.stops[0].id).toBe(STOP_ID.toLowerCase());
    expect(result.stops[1].id).not.toBe(STOP_ID.toLowerCase());
    expect(result.stops[1].id).toMatch(UUID);
    expect(result.defaulted).toEqual(["stops[1] (invalid)", "stops[2].id (duplicate)"]);
  });
});

describe("decodePreferences", () => {
  it("makes scenic routes avoid highways", () => {
    const { preferences } = decodePreferences({ scenic: true });

    expect(preferences).toEqual({ scenic: true, avoidHighways: true, avoidTolls: false, avoidFerries: false });
  });

  it("defaults unreadable flags to false and reports them", () => {
    const result = decodePreferences({ avoidTolls: "yes", avoidFerries: "true", preferenceNotes: "coast road" });

    expect(result.preferences).toEqual({
      scenic: false,
      avoidHighways: false,
      avoidTolls: false,
      avoidFerries: true,
      preferenceNotes: "coast road",
    });
    expect(result.defaulted).toEqual(["preferences.avoidTolls (invalid)"]);
  });

  it("treats a null block as all defaults", () => {
    expect(decodePreferences(null)).toEqual({
      preferences: { scenic: false, avoidHighways: false, avoidTolls: false, avoidFerries: false },
      defaulted: [],
    });
  });
});

describe("decodeItinerary", () => {
  it("rejects a top level that is not an object", () => {
    expect(() => decodeItinerary(["a"])).toThrow(MalformedResponseError);
    expect(() => decodeItinerary("text")).toThrow("Could not parse response: expected a JSON object");
  });

  it("rejects stops that are not a list", () => {
    expect(() => decodeItinerary({ stops: "Costco" })).toThrow("Could not parse response: stops is not a list");
  });

  it("reads the empty answer shape", () => {
    const { itinerary } = decodeItinerary({ origin: null, stops: [], preferences: null, notes: "No destinations found" });

    expect(itinerary).toEqual({
      stops: [],
      preferences: { scenic: false, avoidHighways: false, avoidTolls: false, avoidFerries: false },
      notes: "No destinations found",
    });
  });

  it("ignores the literal string null as an origin", () => {
    const { itinerary } = decodeItinerary({ origin: "null", stops: [] });
    expect(itinerary.origin).toBeUndefined();

    const withOrigin = decodeItinerary({ origin: " 1 Market St ", stops: [] });
    expect(withOrigin.itinerary.origin).toBe("1 Market St");
  });
});
