/**
 * Bearer credentials for the fleet / resolution backend.
 *
 * The pair can be rotated by any backend response, so callers read it fresh
 * before every request and write through update() (last writer wins).
 */

export interface FleetCredentials {
  accessToken: string;
  refreshToken?: string;
  /** Forwarded to the backend for place search and directions */
  mapsApiKey?: string;
}

export interface CredentialStore {
  read(): FleetCredentials;
  update(fn: (current: FleetCredentials) => FleetCredentials): void;
}

export class InMemoryCredentialStore implements CredentialStore {
  private current: FleetCredentials;

  constructor(initial: FleetCredentials) {
    this.current = { ...initial };
  }

  read(): FleetCredentials {
    return { ...this.current };
  }

  update(fn: (current: FleetCredentials) => FleetCredentials): void {
    this.current = { ...fn(this.read()) };
  }
}

export const NEW_ACCESS_TOKEN_HEADER = "x-new-access-token";
export const NEW_REFRESH_TOKEN_HEADER = "x-new-refresh-token";

/**
 * Persist a rotated token pair carried in response headers. Returns true when
 * the store changed.
 */
export function applyRefreshedCredentials(store: CredentialStore, headers: Headers): boolean {
  const accessToken = headers.get(NEW_ACCESS_TOKEN_HEADER);
  if (!accessToken) return false;

  const refreshToken = headers.get(NEW_REFRESH_TOKEN_HEADER);
  store.update((current) => ({
    ...current,
    accessToken,
    refreshToken: refreshToken ?? current.refreshToken,
  }));
  return true;
}
