/**
 * NAV ERRORS
 *
 * One class per failure kind the core can surface. `code` tells a missing
 * setting apart from a failed call.
 */

export type NavErrorCode =
  | "no_credential"
  | "upstream"
  | "empty_response"
  | "malformed_response"
  | "decode"
  | "command_failed"
  | "optimize_failed";

export class NavError extends Error {
  constructor(
    public readonly code: NavErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "NavError";
  }
}

/** Required configuration (API key, token) is missing. Not retried. */
export class NoCredentialError extends NavError {
  constructor(message: string) {
    super("no_credential", message);
    this.name = "NoCredentialError";
  }
}

/**
 * Non-success HTTP status or transport failure.
 * `status` is 0 when the request never got a response.
 */
export class UpstreamError extends NavError {
  constructor(
    public readonly status: number,
    public readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super("upstream", status > 0 ? `API error ${status}: ${detail}` : `Network error: ${detail}`, options);
    this.name = "UpstreamError";
  }
}

export class EmptyResponseError extends NavError {
  constructor(message = "Empty response from language model") {
    super("empty_response", message);
    this.name = "EmptyResponseError";
  }
}

export class MalformedResponseError extends NavError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_response", message, options);
    this.name = "MalformedResponseError";
  }
}

export class DecodeError extends NavError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode", message, options);
    this.name = "DecodeError";
  }
}

/** A single vehicle rejected a command. Never fatal to a multi-vehicle operation. */
export class CommandFailedError extends NavError {
  constructor(
    public readonly vehicleId: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("command_failed", message, options);
    this.name = "CommandFailedError";
  }
}

export class OptimizeFailedError extends NavError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("optimize_failed", message, options);
    this.name = "OptimizeFailedError";
  }
}

/** A setting the user has to supply is missing; retrying will not help. */
export function isMissingCredential(error: unknown): boolean {
  return error instanceof NavError && error.code === "no_credential";
}

/**
 * Human-readable single line for any thrown value.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof NavError) {
    return error.message;
  }
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return "Request failed. Please try again.";
}
