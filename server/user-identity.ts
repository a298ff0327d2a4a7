/**
 * ANONYMOUS USER IDENTITY
 *
 * No login: an HttpOnly cookie keys each user's settings and route session.
 */

import { randomUUID } from "crypto";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "@core/logger";
import { createSilentLogger } from "@core/logger";

declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

export const COOKIE_NAME = "nav_uid";
const COOKIE_MAX_AGE = 365 * 24 * 60 * 60 * 1000; // 1 year in ms

const USER_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * User id from the request cookie, or undefined when absent or not one of ours.
 */
export function getUserIdFromRequest(req: Request): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== "object" || cookies === null) return undefined;
  const value: unknown = Reflect.get(cookies, COOKIE_NAME);
  return typeof value === "string" && USER_ID_PATTERN.test(value) ? value : undefined;
}

export function setUserIdCookie(res: Response, userId: string, secure: boolean): void {
  res.cookie(COOKIE_NAME, userId, {
    httpOnly: true,
    secure,
    sameSite: "lax",
    maxAge: COOKIE_MAX_AGE,
    path: "/",
  });
}

export function generateUserId(): string {
  return randomUUID();
}

/**
 * Middleware: make sure every /api request carries a user id, issuing a
 * cookie on first contact.
 */
export function ensureUserId(options: { secure?: boolean; logger?: Logger } = {}) {
  const logger = options.logger ?? createSilentLogger();

  return (req: Request, res: Response, next: NextFunction): void => {
    let userId = getUserIdFromRequest(req);

    if (!userId) {
      userId = generateUserId();
      setUserIdCookie(res, userId, options.secure ?? false);
      logger.info(`Created new anonymous user: ${userId.slice(0, 8)}...`);
    }

    req.userId = userId;
    next();
  };
}

/**
 * User id after ensureUserId has run. Throws when the middleware is missing.
 */
export function getUserId(req: Request): string {
  const userId = req.userId ?? getUserIdFromRequest(req);
  if (!userId) {
    throw new Error("User ID not found. Ensure ensureUserId middleware is applied.");
  }
  return userId;
}
