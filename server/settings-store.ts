/**
 * USER SETTINGS STORAGE
 *
 * Per-user NavSettings, in memory. Secrets never leave the server: the
 * public view replaces them with "is set" flags.
 */

import {
  NavSettingsPatchSchema,
  NavSettingsSchema,
  type NavSettings,
  type NavSettingsPatch,
} from "@shared/schema";
import type { CredentialStore, FleetCredentials } from "@core/fleet/credentials";
import type { Logger } from "@core/logger";
import { createSilentLogger } from "@core/logger";
import { UserMap, type UserMapLimits } from "./user-map";

const SECRET_KEYS = ["llmApiKey", "fleetAccessToken", "fleetRefreshToken", "mapsApiKey"] as const;
type SecretKey = (typeof SECRET_KEYS)[number];

export type PublicSettings = Omit<NavSettings, SecretKey> & {
  hasLlmApiKey: boolean;
  hasFleetAccessToken: boolean;
  hasFleetRefreshToken: boolean;
  hasMapsApiKey: boolean;
};

export function toPublicSettings(settings: NavSettings): PublicSettings {
  const { llmApiKey, fleetAccessToken, fleetRefreshToken, mapsApiKey, ...rest } = settings;
  return {
    ...rest,
    hasLlmApiKey: llmApiKey.length > 0,
    hasFleetAccessToken: fleetAccessToken.length > 0,
    hasFleetRefreshToken: fleetRefreshToken.length > 0,
    hasMapsApiKey: mapsApiKey.length > 0,
  };
}

export class SettingsValidationError extends Error {
  readonly status = 400;

  constructor(readonly issues: string[]) {
    super(`Invalid settings: ${issues.join("; ")}`);
    this.name = "SettingsValidationError";
  }
}

export class SettingsStore {
  private settings: UserMap<NavSettings>;

  constructor(
    private readonly seed: NavSettings,
    private readonly logger: Logger = createSilentLogger(),
    limits: UserMapLimits = {}
  ) {
    this.settings = new UserMap(limits);
  }

  get(userId: string): NavSettings {
    let current = this.settings.get(userId);
    if (!current) {
      current = { ...this.seed, favorites: [...this.seed.favorites] };
      this.settings.set(userId, current);
      this.logger.debug(`Created settings for user ${userId.slice(0, 8)}...`);
    }
    return current;
  }

  /**
   * Merge a partial update. Unknown keys are rejected; an empty string for a
   * secret clears it.
   */
  update(userId: string, patch: unknown): NavSettings {
    const parsed = NavSettingsPatchSchema.strict().safeParse(patch);
    if (!parsed.success) {
      throw new SettingsValidationError(
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      );
    }
    return this.apply(userId, parsed.data);
  }

  private apply(userId: string, patch: NavSettingsPatch): NavSettings {
    const next = NavSettingsSchema.parse({ ...this.get(userId), ...patch });
    this.settings.set(userId, next);
    return next;
  }

  /**
   * Credential view over one user's fleet tokens. Rotated tokens written by
   * the backend client land back in the settings record.
   */
  credentialsFor(userId: string): CredentialStore {
    const read = (): FleetCredentials => {
      const s = this.get(userId);
      return {
        accessToken: s.fleetAccessToken,
        refreshToken: s.fleetRefreshToken || undefined,
        mapsApiKey: s.mapsApiKey || undefined,
      };
    };

    return {
      read,
      update: (fn) => {
        const next = fn(read());
        this.apply(userId, {
          fleetAccessToken: next.accessToken,
          fleetRefreshToken: next.refreshToken ?? "",
          mapsApiKey: next.mapsApiKey ?? "",
        });
        this.logger.info(`Stored rotated fleet tokens for user ${userId.slice(0, 8)}...`);
      },
    };
  }
}
