import type { Express, Request, Response } from "express";
import { z } from "zod";
import { CalendarEventSchema, ContactAddressSchema } from "@shared/schema";
import type { WeatherProvider } from "@core/climate/advisor";
import { toUserMessage } from "@core/errors";
import type { Logger } from "@core/logger";
import { getUserId } from "./user-identity";
import { SettingsValidationError, toPublicSettings, type SettingsStore } from "./settings-store";
import type { SessionRegistry } from "./session-registry";

// ============================================
// REQUEST BODIES
// ============================================

export const ItineraryRequestSchema = z.object({
  prompt: z.string().trim().min(1, "prompt is required"),
  calendarEvents: z.array(CalendarEventSchema).optional(),
  contacts: z.array(ContactAddressSchema).optional(),
});

export const ClimateRequestSchema = z
  .object({
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
  })
  .refine((body) => (body.latitude === undefined) === (body.longitude === undefined), {
    message: "latitude and longitude must be sent together",
  });

const VehicleIdSchema = z.coerce.number().int().nonnegative();

export interface RouteDeps {
  settings: SettingsStore;
  sessions: SessionRegistry;
  weather?: WeatherProvider;
  logger: Logger;
}

function issuesOf(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const { settings, sessions, logger } = deps;

  const snapshotFor = (req: Request) => sessions.session(getUserId(req)).snapshot();

  /**
   * Wrap a handler so an unexpected failure becomes one JSON error line.
   */
  const handle =
    (label: string, fn: (req: Request, res: Response) => Promise<void> | void) =>
    async (req: Request, res: Response): Promise<void> => {
      try {
        await fn(req, res);
      } catch (error) {
        logger.error(`${label} failed`, { error: toUserMessage(error) });
        if (!res.headersSent) {
          res.status(500).json({ error: toUserMessage(error) });
        }
      }
    };

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ============================================
  // SETTINGS
  // ============================================

  app.get(
    "/api/settings",
    handle("settings/get", (req, res) => {
      res.json(toPublicSettings(settings.get(getUserId(req))));
    })
  );

  app.put(
    "/api/settings",
    handle("settings/put", (req, res) => {
      try {
        const updated = settings.update(getUserId(req), req.body);
        res.json(toPublicSettings(updated));
      } catch (error) {
        if (error instanceof SettingsValidationError) {
          res.status(error.status).json({ error: error.message });
          return;
        }
        throw error;
      }
    })
  );

  // ============================================
  // ROUTE
  // ============================================

  app.get(
    "/api/session",
    handle("session", (req, res) => {
      res.json(snapshotFor(req));
    })
  );

  app.post(
    "/api/itinerary",
    handle("itinerary", async (req, res) => {
      const parsed = ItineraryRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: issuesOf(parsed.error) });
        return;
      }

      const userId = getUserId(req);
      await sessions.session(userId).parseAndOptimize(parsed.data.prompt, {
        settings: settings.get(userId),
        llm: sessions.llm(userId),
        backend: sessions.backend(userId),
        calendarEvents: parsed.data.calendarEvents,
        contacts: parsed.data.contacts,
      });
      res.json(snapshotFor(req));
    })
  );

  app.post(
    "/api/route/optimize-order",
    handle("optimize-order", async (req, res) => {
      const userId = getUserId(req);
      await sessions.session(userId).optimizeOrder(sessions.backend(userId));
      res.json(snapshotFor(req));
    })
  );

  app.delete(
    "/api/route",
    handle("route/clear", (req, res) => {
      sessions.session(getUserId(req)).clearRoute();
      res.json(snapshotFor(req));
    })
  );

  // ============================================
  // VEHICLES
  // ============================================

  const requireFleet = (req: Request, res: Response) => {
    const fleet = sessions.fleet(getUserId(req));
    if (!fleet) {
      res.status(409).json({ error: "No backend configured. Add a backend URL in settings." });
    }
    return fleet;
  };

  app.post(
    "/api/vehicles/refresh",
    handle("vehicles/refresh", async (req, res) => {
      const fleet = requireFleet(req, res);
      if (!fleet) return;
      await sessions.session(getUserId(req)).refreshVehicles(fleet);
      res.json(snapshotFor(req));
    })
  );

  app.post(
    "/api/vehicles/:id/toggle",
    handle("vehicles/toggle", (req, res) => {
      const id = VehicleIdSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: "Invalid vehicle id" });
        return;
      }
      sessions.session(getUserId(req)).toggleVehicle(id.data);
      res.json(snapshotFor(req));
    })
  );

  app.post(
    "/api/dispatch",
    handle("dispatch", async (req, res) => {
      const fleet = requireFleet(req, res);
      if (!fleet) return;
      await sessions.session(getUserId(req)).sendToSelectedVehicles(fleet);
      res.json(snapshotFor(req));
    })
  );

  app.post(
    "/api/climate",
    handle("climate", async (req, res) => {
      const parsed = ClimateRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: issuesOf(parsed.error) });
        return;
      }
      const fleet = requireFleet(req, res);
      if (!fleet) return;

      const userId = getUserId(req);
      const { latitude, longitude } = parsed.data;
      await sessions.session(userId).activateClimate(fleet, {
        settings: settings.get(userId),
        weather: deps.weather,
        location: latitude !== undefined && longitude !== undefined ? { latitude, longitude } : undefined,
      });
      res.json(snapshotFor(req));
    })
  );
}
