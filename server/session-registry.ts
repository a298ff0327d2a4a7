/**
 * SESSION REGISTRY
 *
 * One RouteSession per anonymous user, plus the collaborators each request
 * needs, built fresh from that user's current settings.
 */

import { RouteSession } from "@core/session/route-session";
import { BackendClient } from "@core/fleet/backend-client";
import { FleetClient, type FleetClientOptions } from "@core/fleet/fleet-client";
import { createGeminiClient, type LLMClient } from "@core/llm/client";
import { childLogger, type Logger } from "@core/logger";
import type { SettingsStore } from "./settings-store";
import { UserMap, type UserMapLimits } from "./user-map";

export interface SessionRegistryOptions {
  settings: SettingsStore;
  logger: Logger;
  geminiBaseUrl?: string;
  fetch?: typeof fetch;
  /** Swapped out by tests to drive the wake backoff without real delays */
  fleetOptions?: FleetClientOptions;
  /** Swapped out by tests to avoid the real model */
  createLLM?: (apiKey: string, model: string) => LLMClient;
  /** Idle sessions are dropped; so are the oldest beyond the cap */
  limits?: UserMapLimits;
}

export class SessionRegistry {
  private sessions: UserMap<RouteSession>;

  constructor(private readonly options: SessionRegistryOptions) {
    this.sessions = new UserMap(options.limits);
  }

  session(userId: string): RouteSession {
    let session = this.sessions.get(userId);
    if (!session) {
      session = new RouteSession(childLogger(this.options.logger, `session ${userId.slice(0, 8)}`));
      this.sessions.set(userId, session);
    }
    return session;
  }

  llm(userId: string): LLMClient {
    const { llmApiKey, llmModel } = this.options.settings.get(userId);
    if (this.options.createLLM) return this.options.createLLM(llmApiKey, llmModel);
    return createGeminiClient({ apiKey: llmApiKey, model: llmModel, baseUrl: this.options.geminiBaseUrl });
  }

  /** null when the user has no backend URL configured */
  backend(userId: string): BackendClient | null {
    const { backendUrl } = this.options.settings.get(userId);
    if (!backendUrl.trim()) return null;
    return new BackendClient({
      baseUrl: backendUrl,
      credentials: this.options.settings.credentialsFor(userId),
      fetch: this.options.fetch,
      logger: childLogger(this.options.logger, "backend"),
    });
  }

  fleet(userId: string): FleetClient | null {
    const backend = this.backend(userId);
    return backend ? new FleetClient(backend, this.options.fleetOptions) : null;
  }
}
