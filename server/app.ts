import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cookieParser from "cookie-parser";
import type { WeatherProvider } from "@core/climate/advisor";
import { toUserMessage } from "@core/errors";
import { childLogger, type Logger } from "@core/logger";
import type { ServerConfig } from "./config";
import { seedSettings } from "./config";
import { registerRoutes } from "./routes";
import { SessionRegistry, type SessionRegistryOptions } from "./session-registry";
import { SettingsStore } from "./settings-store";
import { ensureUserId } from "./user-identity";
import { OpenMeteoWeather } from "./weather-service";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export interface AppOverrides {
  fetch?: typeof fetch;
  weather?: WeatherProvider;
  fleetOptions?: SessionRegistryOptions["fleetOptions"];
  createLLM?: SessionRegistryOptions["createLLM"];
  /** Log every /api request line (off in tests) */
  requestLog?: boolean;
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    for (const key of ["status", "statusCode"]) {
      const value: unknown = Reflect.get(err, key);
      if (typeof value === "number" && value >= 400 && value < 600) return value;
    }
  }
  return 500;
}

export function createApp(config: ServerConfig, logger: Logger, overrides: AppOverrides = {}): Express {
  const app = express();

  const limits = { maxUsers: config.maxUsers, idleMs: config.userIdleMs };
  const settings = new SettingsStore(seedSettings(config), childLogger(logger, "settings"), limits);
  const sessions = new SessionRegistry({
    settings,
    logger,
    limits,
    geminiBaseUrl: config.geminiBaseUrl,
    fetch: overrides.fetch,
    fleetOptions: overrides.fleetOptions,
    createLLM: overrides.createLLM,
  });
  const weather =
    overrides.weather ??
    new OpenMeteoWeather({ baseUrl: config.openMeteoUrl, fetch: overrides.fetch, logger: childLogger(logger, "Weather") });

  app.use(express.json());
  app.use(cookieParser());
  app.use("/api", ensureUserId({ secure: config.production, logger: childLogger(logger, "user-identity") }));

  if (overrides.requestLog ?? true) {
    app.use((req, res, next) => {
      const start = Date.now();
      const path = req.path;

      res.on("finish", () => {
        if (path.startsWith("/api")) {
          log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
        }
      });

      next();
    });
  }

  registerRoutes(app, { settings, sessions, weather, logger });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = statusOf(err);
    logger.error("Unhandled request error", { status, error: toUserMessage(err) });

    if (res.headersSent) {
      return next(err);
    }

    res.status(status).json({ error: status === 500 ? "Internal Server Error" : toUserMessage(err) });
  });

  return app;
}
