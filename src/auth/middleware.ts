import type { Request, Response, NextFunction } from "express";
import { forbiddenError, unauthorizedError } from "../engine/errors.js";
import { isAdmin, parseAccessToken, type UserContext } from "./auth.js";

declare global {
  namespace Express {
    interface Request {
      user?: UserContext;
    }
  }
}

// Requests without a token go through as anonymous; a bad token is still rejected.
export function optionalAuth(secret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header) {
      return next();
    }

    const [scheme, token] = header.split(" ");
    if (!token || scheme?.toLowerCase() !== "bearer") {
      return next(unauthorizedError("Invalid auth header format"));
    }

    try {
      req.user = parseAccessToken(token, secret);
      next();
    } catch {
      next(unauthorizedError("Invalid or expired token"));
    }
  };
}

export function requireAdmin() {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) {
      return next(unauthorizedError("Missing auth token"));
    }
    if (!isAdmin(req.user)) {
      return next(forbiddenError("Admin access required"));
    }
    next();
  };
}
