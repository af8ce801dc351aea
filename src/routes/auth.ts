import { Hono, type Context } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import { ACCESS_COOKIE, REFRESH_COOKIE, requireAuth } from "../middleware/auth.js";
import { LoginRequestSchema, RegisterRequestSchema } from "../schemas.js";
import {
  hashPassword,
  issueToken,
  issueTokenPair,
  tokenLifetimeSeconds,
  verifyPassword,
  verifyToken,
  type TokenType,
} from "../services/auth.js";
import { isDebug } from "../services/config.js";
import { StoreError, UNIQUE_VIOLATION } from "../services/errors.js";
import { toUserResponse } from "../services/serializers.js";
import { getStore } from "../services/store.js";
import { blacklistToken, isTokenBlacklisted } from "../services/token-blacklist.js";
import type { AuthEnv } from "../types.js";
import { validateBody } from "./http.js";

const COOKIE_NAMES: Record<TokenType, string> = {
  access: ACCESS_COOKIE,
  refresh: REFRESH_COOKIE,
};

function setTokenCookie(c: Context, type: TokenType, token: string): void {
  setCookie(c, COOKIE_NAMES[type], token, {
    path: "/",
    httpOnly: true,
    secure: !isDebug(),
    sameSite: "Lax",
    maxAge: tokenLifetimeSeconds(type),
  });
}

const USERNAME_TAKEN = "A user with this username already exists.";
const EMAIL_TAKEN = "A user with this email already exists.";

/** Field errors for an existing username or email, or null when both are free. */
async function duplicateUserErrors(
  username: string,
  email: string
): Promise<Record<string, string[]> | null> {
  const store = getStore();
  const errors: Record<string, string[]> = {};

  if (await store.findUserByUsername(username)) errors.username = [USERNAME_TAKEN];
  if (await store.findUserByEmail(email)) errors.email = [EMAIL_TAKEN];

  return Object.keys(errors).length > 0 ? errors : null;
}

export const authRoutes = new Hono<AuthEnv>();

authRoutes.post("/register", async (c) => {
  const body = await validateBody(c, RegisterRequestSchema);
  if (!body.ok) return body.response;

  const { username, email, password } = body.data;

  const taken = await duplicateUserErrors(username, email);
  if (taken) {
    return c.json({ detail: "Invalid request data.", errors: taken }, 400);
  }

  try {
    await getStore().createUser({
      username,
      email,
      password_hash: await hashPassword(password),
    });
  } catch (err: unknown) {
    // A concurrent registration took the name or address after the check above
    if (err instanceof StoreError && err.code === UNIQUE_VIOLATION) {
      const errors = (await duplicateUserErrors(username, email)) ?? {
        username: [USERNAME_TAKEN],
      };
      return c.json({ detail: "Invalid request data.", errors }, 400);
    }
    throw err;
  }

  return c.json({ detail: "User created successfully!" }, 201);
});

authRoutes.post("/login", async (c) => {
  const body = await validateBody(c, LoginRequestSchema, {
    message: "Must include username and password.",
  });
  if (!body.ok) return body.response;

  const user = await getStore().findUserByUsername(body.data.username);
  if (!user || !(await verifyPassword(body.data.password, user.password_hash))) {
    return c.json({ detail: "Invalid login credentials." }, 401);
  }

  const tokens = await issueTokenPair(user.id);
  setTokenCookie(c, "access", tokens.access);
  setTokenCookie(c, "refresh", tokens.refresh);

  return c.json({ detail: "Login successfully!", user: toUserResponse(user) });
});

authRoutes.post("/logout", requireAuth, async (c) => {
  // The verified token may have come from the Authorization header instead of the cookie
  const tokens = new Set([
    c.get("accessToken"),
    getCookie(c, ACCESS_COOKIE),
    getCookie(c, REFRESH_COOKIE),
  ]);
  for (const token of tokens) {
    if (token) await blacklistToken(token);
  }

  deleteCookie(c, ACCESS_COOKIE, { path: "/" });
  deleteCookie(c, REFRESH_COOKIE, { path: "/" });

  return c.json({
    detail: "Log-Out successfully! All Tokens will be deleted. Refresh token is now invalid.",
  });
});

authRoutes.post("/token/refresh", async (c) => {
  const refreshToken = getCookie(c, REFRESH_COOKIE);
  if (!refreshToken) {
    return c.json({ detail: "Refresh token not found." }, 401);
  }

  const claims = await verifyToken(refreshToken, "refresh");
  if (!claims || (await isTokenBlacklisted(refreshToken))) {
    return c.json({ detail: "Invalid refresh token." }, 401);
  }

  const user = await getStore().findUserById(claims.userId);
  if (!user) {
    return c.json({ detail: "Invalid refresh token." }, 401);
  }

  const access = await issueToken(user.id, "access");
  setTokenCookie(c, "access", access);

  return c.json({ detail: "Token refreshed", access });
});
