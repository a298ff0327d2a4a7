/**
 * BACKEND CLIENT
 *
 * Fetch wrapper for the route-resolution / fleet proxy. Adds bearer auth,
 * forwards the refresh token and maps key, and persists rotated credentials
 * from every response before handing it back.
 */

import type { Logger } from "../logger";
import { createSilentLogger } from "../logger";
import { UpstreamError } from "../errors";
import { applyRefreshedCredentials, type CredentialStore } from "./credentials";

export const DEFAULT_TIMEOUT_MS = 15_000;

export type HttpMethod = "GET" | "POST";

export interface BackendClientConfig {
  baseUrl: string;
  credentials: CredentialStore;
  fetch?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

export interface BackendRequestOptions {
  body?: unknown;
  timeoutMs?: number;
}

export interface BackendResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON body, or null when the body was empty or not JSON */
  body: unknown;
  text: string;
}

/**
 * Pull a readable message out of an error body: {"detail": ...}, {"error": ...},
 * {"message": ...} or the raw text.
 */
export function errorDetail(response: BackendResponse): string {
  const body = response.body;
  if (typeof body === "object" && body !== null) {
    for (const key of ["detail", "error", "message", "reason"]) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === "string" && value.trim()) return value.trim();
    }
  }
  const text = response.text.trim();
  if (text) return text.slice(0, 200);
  return `HTTP ${response.status}`;
}

function parseBody(text: string): unknown {
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class BackendClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  readonly credentials: CredentialStore;
  readonly logger: Logger;

  constructor(config: BackendClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.credentials = config.credentials;
    this.fetchImpl = config.fetch ?? fetch;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? createSilentLogger();
  }

  private headers(hasBody: boolean): Record<string, string> {
    // Re-read per request: a sibling call may have rotated the token pair.
    const creds = this.credentials.read();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${creds.accessToken}`,
      Accept: "application/json",
    };
    if (hasBody) headers["Content-Type"] = "application/json";
    if (creds.refreshToken) headers["X-Refresh-Token"] = creds.refreshToken;
    if (creds.mapsApiKey) headers["X-Google-Maps-Key"] = creds.mapsApiKey;
    return headers;
  }

  /**
   * Send one request. Throws UpstreamError only on transport failure;
   * HTTP error statuses are returned for the caller to interpret.
   */
  async request(method: HttpMethod, path: string, options: BackendRequestOptions = {}): Promise<BackendResponse> {
    const url = `${this.baseUrl}${path}`;
    const hasBody = options.body !== undefined;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers(hasBody),
        body: hasBody ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
      const detail = timedOut
        ? `request timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : "request failed";
      this.logger.warn(`${method} ${path} failed`, { detail });
      throw new UpstreamError(0, detail, { cause: error });
    }

    if (applyRefreshedCredentials(this.credentials, response.headers)) {
      this.logger.info("Stored refreshed fleet credentials");
    }

    const text = await response.text();
    this.logger.debug(`${method} ${path} ${response.status} in ${Date.now() - startTime}ms`);

    return {
      status: response.status,
      ok: response.ok,
      body: parseBody(text),
      text,
    };
  }

  /**
   * Request and require a 2xx status.
   */
  async requestOk(method: HttpMethod, path: string, options: BackendRequestOptions = {}): Promise<BackendResponse> {
    const response = await this.request(method, path, options);
    if (!response.ok) {
      throw new UpstreamError(response.status, errorDetail(response));
    }
    return response;
  }
}
