import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { AuthError } from "./error.js";

declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

export const USER_ID_HEADER = "x-user-id";

const userIdSchema = z.string().uuid();

/**
 * Resolves the acting user from the `X-User-Id` header. Token verification
 * happens upstream (gateway or identity provider); this only makes sure the
 * header is present and well-formed.
 */
export function requireUser(req: Request, _res: Response, next: NextFunction) {
  const raw = req.header(USER_ID_HEADER);
  const parsed = userIdSchema.safeParse(raw?.trim());
  if (!parsed.success) {
    return next(new AuthError(raw ? "Invalid user identity header" : "Authentication required"));
  }

  req.userId = parsed.data;
  next();
}

export function currentUserId(req: Request): string {
  if (!req.userId) {
    throw new AuthError();
  }
  return req.userId;
}
