import { createMiddleware } from "hono/factory";
import { getCookie } from "hono/cookie";
import { verifyToken } from "../services/auth.js";
import { getStore } from "../services/store.js";
import { isTokenBlacklisted } from "../services/token-blacklist.js";
import type { AuthEnv } from "../types.js";

export const ACCESS_COOKIE = "access_token";
export const REFRESH_COOKIE = "refresh_token";

// Verify the access token (Bearer header first, then cookie) and attach the user to context
export const requireAuth = createMiddleware<AuthEnv>(async (c, next) => {
  const authHeader = c.req.header("Authorization");
  const token = authHeader?.startsWith("Bearer ")
    ? authHeader.slice(7)
    : getCookie(c, ACCESS_COOKIE);

  if (!token) {
    return c.json({ detail: "Authentication credentials were not provided." }, 401);
  }

  const claims = await verifyToken(token, "access");
  if (!claims || (await isTokenBlacklisted(token))) {
    return c.json({ detail: "Invalid or expired token." }, 401);
  }

  const user = await getStore().findUserById(claims.userId);
  if (!user) {
    return c.json({ detail: "Invalid or expired token." }, 401);
  }

  c.set("userId", user.id);
  c.set("username", user.username);
  c.set("accessToken", token);

  await next();
});
