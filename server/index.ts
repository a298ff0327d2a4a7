import "dotenv/config";
import { createServer } from "http";
import { createConsoleLogger } from "@core/logger";
import { ConfigError, loadServerConfig, missingOptionalEnv, type ServerConfig } from "./config";
import { createApp, log } from "./app";

function loadConfigOrExit(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌  ${error.message}\n\nCopy .env.example to .env and fix the values.\n`);
      process.exit(1);
    }
    throw error;
  }
}

function start(): void {
  const config = loadConfigOrExit();

  const unset = missingOptionalEnv();
  if (unset.length > 0) {
    console.warn(`⚠️  Optional env vars not set (users must add these in settings): ${unset.join(", ")}`);
  }

  const logger = createConsoleLogger({ debugMode: config.debug });
  const app = createApp(config, logger);
  const httpServer = createServer(app);

  // Default to 5001 (5000 is used by macOS Control Center).
  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });
}

start();
