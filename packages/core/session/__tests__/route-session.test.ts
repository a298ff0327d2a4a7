/**
 * ROUTE SESSION — TESTS
 *
 * Pipeline wiring, stale-state handling and the range warning.
 */

import { describe, it, expect, vi } from "vitest";
import { DEFAULT_NAV_SETTINGS, type NavSettings } from "@shared/schema";
import { RouteSession, type ParseEnv } from "../route-session";
import { UpstreamError } from "../../errors";
import type { Logger } from "../../logger";
import type { LLMClient, LLMRequest } from "../../llm/client";
import { FakeBackend, createBackend, createFleet, createGate, fakeLLM, unavailableLLM } from "../../__tests__/fake-backend";

const COSTCO_ID = "11111111-1111-4111-8111-111111111111";
const HOME_ID = "22222222-2222-4222-8222-222222222222";
const GAS_ID = "33333333-3333-4333-8333-333333333333";

const SETTINGS: NavSettings = { ...DEFAULT_NAV_SETTINGS, homeAddress: "10 Home Rd" };

const TWO_STOPS = JSON.stringify({
  stops: [
    { id: COSTCO_ID, address: "Costco", label: "Costco", stopType: "specific", dwellMinutes: 30, hasConflict: false },
    { id: HOME_ID, address: "10 Home Rd", label: "Home", stopType: "specific", dwellMinutes: 20, hasConflict: false },
  ],
  preferences: { scenic: false, avoidHighways: false, avoidTolls: false, avoidFerries: false },
});

const RESOLVED = {
  stops: [
    { id: COSTCO_ID, address: "Costco, 1 Warehouse Way", label: "Costco", stopType: "specific", dwellMinutes: 30, hasConflict: false, driveMinutesFromPrev: 12 },
    { id: HOME_ID, address: "10 Home Rd", label: "Home", stopType: "specific", dwellMinutes: 20, hasConflict: false, driveMinutesFromPrev: 15 },
  ],
  directions: { total_duration_min: 27, total_distance_km: 200 },
};

function env(llm: LLMClient, fake: FakeBackend | null, overrides: Partial<ParseEnv> = {}): ParseEnv {
  return { settings: SETTINGS, llm, backend: fake ? createBackend(fake) : null, ...overrides };
}

describe("RouteSession", () => {
  describe("parseAndOptimize", () => {
    it("interprets, resolves and records totals", async () => {
      const { client, complete } = fakeLLM(TWO_STOPS);
      const fake = new FakeBackend().on("POST", "/route", { body: RESOLVED });
      const session = new RouteSession();

      await session.parseAndOptimize("Costco then home", env(client, fake));

      const snap = session.snapshot();
      expect(complete.mock.calls[0][0].system).toContain("Home: 10 Home Rd");
      expect(snap.stops.map((s) => s.address)).toEqual(["Costco, 1 Warehouse Way", "10 Home Rd"]);
      expect(snap.totalDriveMinutes).toBe(27);
      expect(snap.totalDistanceKm).toBe(200);
      expect(snap.notice).toBeNull();
      expect(snap.flags).toMatchObject({ parsing: false, resolving: false });
    });

    it("keeps the parsed stops when resolution fails", async () => {
      const { client } = fakeLLM(TWO_STOPS);
      const fake = new FakeBackend().on("POST", "/route", { status: 503, body: { detail: "maps down" } });
      const session = new RouteSession();

      await session.parseAndOptimize("Costco then home", env(client, fake));

      const snap = session.snapshot();
      expect(snap.stops.map((s) => s.id)).toEqual([COSTCO_ID, HOME_ID]);
      expect(snap.stops[0].address).toBe("Costco");
      expect(snap.totalDistanceKm).toBeNull();
      expect(snap.notice).toBeNull();
      expect(snap.flags.resolving).toBe(false);
    });

    it("skips resolution for a single specific stop", async () => {
      const { client } = fakeLLM(
        JSON.stringify({ stops: [{ id: COSTCO_ID, address: "Costco", stopType: "specific", dwellMinutes: 20, hasConflict: false }] })
      );
      const fake = new FakeBackend();
      const session = new RouteSession();

      await session.parseAndOptimize("Costco", env(client, fake));

      expect(fake.calls).toHaveLength(0);
      expect(session.snapshot().stops).toHaveLength(1);
    });

    it("shows the model's note when no destination was found", async () => {
      const { client } = fakeLLM('{"stops": [], "notes": "No destinations found"}');
      const session = new RouteSession();

      await session.parseAndOptimize("hello there", env(client, null));

      expect(session.snapshot()).toMatchObject({ stops: [], notice: "No destinations found" });
    });

    it("surfaces an interpretation failure as the notice", async () => {
      const session = new RouteSession();

      await session.parseAndOptimize("Costco", env(unavailableLLM(), null));

      expect(session.snapshot()).toMatchObject({
        stops: [],
        notice: "No language model API key — add one in settings",
      });
      expect(session.snapshot().flags.parsing).toBe(false);
    });

    it("logs a missing model key as info and a failed call as a warning", async () => {
      const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
      const session = new RouteSession(logger);

      await session.parseAndOptimize("Costco", env(unavailableLLM(), null));
      expect(logger.info).toHaveBeenCalledWith("Interpretation skipped: no model key", {
        error: "No language model API key — add one in settings",
      });
      expect(logger.warn).not.toHaveBeenCalled();

      const { client, complete } = fakeLLM(TWO_STOPS);
      complete.mockRejectedValueOnce(new UpstreamError(503, "unavailable"));
      await session.parseAndOptimize("Costco", env(client, null));
      expect(logger.warn).toHaveBeenCalledWith("Interpretation failed", { error: "API error 503: unavailable" });
      expect(session.snapshot().notice).toBe("API error 503: unavailable");
    });

    it("clears the previous route before a new run", async () => {
      const { client, complete } = fakeLLM(TWO_STOPS);
      const fake = new FakeBackend().on("POST", "/route", { body: RESOLVED });
      const session = new RouteSession();
      await session.parseAndOptimize("Costco then home", env(client, fake));

      complete.mockResolvedValueOnce("not json at all");
      await session.parseAndOptimize("something else", env(client, fake));

      const snap = session.snapshot();
      expect(snap.stops).toEqual([]);
      expect(snap.totalDriveMinutes).toBeNull();
      expect(snap.totalDistanceKm).toBeNull();
      expect(snap.notice).toBe("Could not parse response: no JSON found");
    });

    it("ignores whitespace-only prompts", async () => {
      const { client, complete } = fakeLLM(TWO_STOPS);
      const session = new RouteSession();

      await session.parseAndOptimize("   ", env(client, null));

      expect(complete).not.toHaveBeenCalled();
    });

    it("drops the result of a superseded run", async () => {
      const gate = createGate();
      const replies = [
        gate.promise.then(() => JSON.stringify({ stops: [{ id: GAS_ID, address: "gas station", stopType: "specific" }] })),
        Promise.resolve(TWO_STOPS),
      ];
      const llm: LLMClient = {
        complete: vi.fn(async (_request: LLMRequest) => replies.shift() ?? ""),
        isAvailable: () => true,
      };
      const session = new RouteSession();

      const first = session.parseAndOptimize("get gas", env(llm, null));
      await session.parseAndOptimize("Costco then home", env(llm, null));
      gate.open();
      await first;

      const snap = session.snapshot();
      expect(snap.stops.map((s) => s.id)).toEqual([COSTCO_ID, HOME_ID]);
      expect(snap.flags.parsing).toBe(false);
    });

    it("leaves out calendar and contacts the user turned off", async () => {
      const { client, complete } = fakeLLM(TWO_STOPS);
      const session = new RouteSession();
      const now = new Date("2026-03-02T08:00:00Z");

      await session.parseAndOptimize(
        "go see Bob",
        env(client, null, {
          settings: { ...SETTINGS, calendarEnabled: false, contactsEnabled: false },
          now,
          calendarEvents: [{ title: "Dentist", location: "5 Tooth Ln", startDate: new Date("2026-03-02T10:00:00Z") }],
          contacts: [{ name: "Bob Stone", address: "2 Elm St" }],
        })
      );

      const system = complete.mock.calls[0][0].system;
      expect(system).not.toContain("5 Tooth Ln");
      expect(system).not.toContain("2 Elm St");
    });
  });

  describe("optimizeOrder", () => {
    const stopsJson = (ids: string[]) =>
      ids.map((id, i) => ({ id, address: `Stop ${i}`, stopType: "specific", dwellMinutes: 20, hasConflict: false }));

    async function sessionWithThreeStops(fake: FakeBackend) {
      const { client } = fakeLLM(JSON.stringify({ stops: stopsJson([COSTCO_ID, HOME_ID, GAS_ID]) }));
      fake.on("POST", "/route", { body: { stops: stopsJson([COSTCO_ID, HOME_ID, GAS_ID]) } });
      const session = new RouteSession();
      await session.parseAndOptimize("three stops", env(client, fake));
      return session;
    }

    it("applies the backend's order", async () => {
      const fake = new FakeBackend().on("POST", "/route/optimize-order", {
        body: { stops: stopsJson([GAS_ID, COSTCO_ID, HOME_ID]) },
      });
      const session = await sessionWithThreeStops(fake);

      await session.optimizeOrder(createBackend(fake));

      expect(session.snapshot().stops.map((s) => s.id)).toEqual([GAS_ID, COSTCO_ID, HOME_ID]);
      expect(session.snapshot().flags.optimizing).toBe(false);
    });

    it("keeps the current order and reports a failure", async () => {
      const fake = new FakeBackend().on("POST", "/route/optimize-order", { status: 500, body: { detail: "solver crashed" } });
      const session = await sessionWithThreeStops(fake);

      await session.optimizeOrder(createBackend(fake));

      const snap = session.snapshot();
      expect(snap.stops.map((s) => s.id)).toEqual([COSTCO_ID, HOME_ID, GAS_ID]);
      expect(snap.notice).toBe("Optimize failed: API error 500: solver crashed");
    });
  });

  describe("vehicles", () => {
    function fleetBackend() {
      return new FakeBackend()
        .on("POST", "/route", { body: RESOLVED })
        .on("GET", "/vehicles", {
          body: {
            response: [
              { id: 1, display_name: "Model 3", state: "online" },
              { id: 2, display_name: "Van", state: "online" },
            ],
          },
        })
        .on("GET", "/vehicles/1/vehicle_data", { body: { response: { battery_range: 100, inside_temp: 30 } } })
        .on("GET", "/vehicles/2/vehicle_data", { status: 500, body: { detail: "telemetry down" } });
    }

    it("loads vehicles with their telemetry", async () => {
      const fake = fleetBackend();
      const { fleet } = createFleet(fake);
      const session = new RouteSession();

      await session.refreshVehicles(fleet);

      const snap = session.snapshot();
      expect(snap.vehicles.map((v) => v.displayName)).toEqual(["Model 3", "Van"]);
      expect(snap.vehicleStatus[1]?.batteryRangeMiles).toBe(100);
      expect(snap.vehicleStatus[2]).toBeUndefined();
      expect(snap.fleetError).toBeNull();
      expect(snap.flags.loadingVehicles).toBe(false);
    });

    it("reports a listing failure", async () => {
      const fake = new FakeBackend().on("GET", "/vehicles", { status: 401, body: { detail: "token expired" } });
      const { fleet } = createFleet(fake);
      const session = new RouteSession();

      await session.refreshVehicles(fleet);

      expect(session.snapshot().fleetError).toBe("API error 401: token expired");
    });

    it("recomputes the range warning as selection changes", async () => {
      const fake = fleetBackend();
      const { fleet } = createFleet(fake);
      const { client } = fakeLLM(TWO_STOPS);
      const session = new RouteSession();
      await session.parseAndOptimize("Costco then home", env(client, fake));
      await session.refreshVehicles(fleet);

      expect(session.snapshot().rangeWarning).toBeNull();

      session.toggleVehicle(1);
      expect(session.snapshot().rangeWarning).toBe("Model 3 may not have enough range (160 km) for this 200 km route");

      session.toggleVehicle(1);
      expect(session.snapshot().rangeWarning).toBeNull();
    });

    it("sends the route to the selected vehicles", async () => {
      const fake = fleetBackend()
        .on("POST", "/vehicles/1/navigate", { body: {} })
        .on("POST", "/vehicles/2/navigate", { status: 500, body: { detail: "vehicle rejected" } });
      const { fleet } = createFleet(fake);
      const { client } = fakeLLM(TWO_STOPS);
      const session = new RouteSession();
      await session.parseAndOptimize("Costco then home", env(client, fake));
      await session.refreshVehicles(fleet);
      session.toggleVehicle(1);
      session.toggleVehicle(2);

      await session.sendToSelectedVehicles(fleet);

      const snap = session.snapshot();
      expect(snap.sendOutcomes).toEqual({
        1: { success: true, message: "Route sent to Model 3" },
        2: { success: false, message: "Van: vehicle rejected" },
      });
      expect(fake.callsTo("POST", "/vehicles/1/navigate")[0].body).toEqual({
        stops: ["Costco, 1 Warehouse Way", "10 Home Rd"],
      });
      expect(snap.flags.sending).toBe(false);
    });

    it("does not send without stops", async () => {
      const fake = fleetBackend();
      const { fleet } = createFleet(fake);
      const session = new RouteSession();
      await session.refreshVehicles(fleet);
      session.toggleVehicle(1);

      await session.sendToSelectedVehicles(fleet);

      expect(fake.callsTo("POST", "/vehicles/1/navigate")).toHaveLength(0);
    });

    it("starts climate and keeps the fresh telemetry", async () => {
      const fake = fleetBackend().on("POST", "/vehicles/1/command/climate", { body: {} });
      const { fleet } = createFleet(fake);
      const session = new RouteSession();
      await session.refreshVehicles(fleet);
      session.toggleVehicle(1);

      await session.activateClimate(fleet, { settings: SETTINGS });

      const snap = session.snapshot();
      expect(snap.climateStatus).toBe("Model 3: climate on → 20°C (cabin 30°C)");
      expect(snap.vehicleStatus[1]?.interiorTempC).toBe(30);
      expect(snap.flags.climateActivating).toBe(false);
    });
  });

  it("clearRoute resets the route but keeps vehicles", async () => {
    const fake = new FakeBackend()
      .on("POST", "/route", { body: RESOLVED })
      .on("GET", "/vehicles", { body: { response: [{ id: 1, display_name: "Model 3", state: "online" }] } })
      .on("GET", "/vehicles/1/vehicle_data", { body: { response: {} } });
    const { fleet } = createFleet(fake);
    const { client } = fakeLLM(TWO_STOPS);
    const session = new RouteSession();
    await session.parseAndOptimize("Costco then home", env(client, fake));
    await session.refreshVehicles(fleet);

    session.clearRoute();

    const snap = session.snapshot();
    expect(snap.stops).toEqual([]);
    expect(snap.totalDistanceKm).toBeNull();
    expect(snap.vehicles).toHaveLength(1);
  });
});
