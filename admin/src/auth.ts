import { timingSafeEqual } from "node:crypto";

export type Authorizer = (req: Request) => boolean;

function presentedToken(req: Request): string {
  const header = req.headers.get("x-action-token") ?? "";
  if (header) return header;
  const authorization = req.headers.get("authorization") ?? "";
  if (authorization.toLowerCase().startsWith("bearer ")) return authorization.slice(7).trim();
  return "";
}

/**
 * Authorizer for mutating routes. With no token configured every request is
 * allowed (local default); otherwise `X-Action-Token` or a Bearer token must match.
 */
export function createTokenAuthorizer(token: string | undefined): Authorizer {
  if (!token) return () => true;
  const expected = Buffer.from(token, "utf8");
  return (req) => {
    const given = Buffer.from(presentedToken(req), "utf8");
    if (given.length !== expected.length) return false;
    return timingSafeEqual(given, expected);
  };
}
