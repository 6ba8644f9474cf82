import jwt from "jsonwebtoken";
import type { JwtPayload } from "jsonwebtoken";
import type { AccessPredicate } from "../files/scope.js";

export interface UserContext {
  id: string;
  roles: string[];
}

/** Anonymous requests reach the scope as undefined. */
export type Caller = UserContext | undefined;

export const ACCESS_TOKEN_TTL = 15 * 60; // 15 minutes in seconds

export function generateAccessToken(userID: string, roles: string[], secret: string): string {
  return jwt.sign({ roles }, secret, {
    subject: userID,
    expiresIn: ACCESS_TOKEN_TTL,
  });
}

// Throws whatever jsonwebtoken throws for bad signatures or expiry.
export function parseAccessToken(token: string, secret: string): UserContext {
  const decoded: string | JwtPayload = jwt.verify(token, secret);
  if (typeof decoded === "string" || typeof decoded.sub !== "string") {
    throw new Error("token has no subject");
  }
  const roles: unknown = decoded.roles;
  return {
    id: decoded.sub,
    roles: Array.isArray(roles) ? roles.filter((r): r is string => typeof r === "string") : [],
  };
}

export function isAdmin(caller: Caller): boolean {
  return caller?.roles.includes("admin") ?? false;
}

/**
 * Builds the read predicate from the `access` config block: slug -> roles.
 * "*" admits anyone, signed in or not; `default` applies to unlisted slugs;
 * with neither, the source is open. Admins see everything.
 */
export function accessPredicate(access: Record<string, string[]>): AccessPredicate<Caller> {
  return (caller, slug) => {
    if (isAdmin(caller)) return true;
    const roles = access[slug] ?? access["default"];
    if (!roles) return true;
    if (roles.includes("*")) return true;
    if (!caller) return false;
    return caller.roles.some((r) => roles.includes(r));
  };
}
