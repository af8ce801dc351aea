import crypto from "node:crypto";
import { decode, sign, verify } from "hono/jwt";
import { getJwtSecret, getTokenLifetimes } from "./config.js";

const ALGORITHM = "HS256";
const SALT_LENGTH = 16;
const KEY_LENGTH = 64;

// ─── Passwords ────────────────────────────────────────────────────────────────

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, KEY_LENGTH, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

/** Format: scrypt$salt$key (both base64) */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_LENGTH);
  const key = await deriveKey(password, salt);
  return `scrypt$${salt.toString("base64")}$${key.toString("base64")}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, saltB64, keyB64] = stored.split("$");
  if (scheme !== "scrypt" || !saltB64 || !keyB64) return false;

  const expected = Buffer.from(keyB64, "base64");
  const actual = await deriveKey(password, Buffer.from(saltB64, "base64"));
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
}

/** Returns the list of problems; empty when the password is acceptable. */
export function validatePasswordStrength(password: string, username = ""): string[] {
  const problems: string[] = [];

  if (password.length < 8) {
    problems.push("This password is too short. It must contain at least 8 characters.");
  }
  if (/^\d+$/.test(password)) {
    problems.push("This password is entirely numeric.");
  }
  if (username && password.toLowerCase() === username.toLowerCase()) {
    problems.push("The password is too similar to the username.");
  }

  return problems;
}

// ─── Tokens ───────────────────────────────────────────────────────────────────

export type TokenType = "access" | "refresh";

export interface TokenClaims {
  userId: string;
  type: TokenType;
  expiresAt: Date;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

export function tokenLifetimeSeconds(type: TokenType): number {
  const lifetimes = getTokenLifetimes();
  return type === "access" ? lifetimes.accessSeconds : lifetimes.refreshSeconds;
}

export function issueToken(userId: string, type: TokenType, now = new Date()): Promise<string> {
  const iat = Math.floor(now.getTime() / 1000);
  return sign(
    {
      sub: userId,
      type,
      // Unique per token so the blacklist never confuses two tokens issued in the same second
      jti: crypto.randomUUID(),
      iat,
      exp: iat + tokenLifetimeSeconds(type),
    },
    getJwtSecret(),
    ALGORITHM
  );
}

export async function issueTokenPair(userId: string): Promise<TokenPair> {
  return {
    access: await issueToken(userId, "access"),
    refresh: await issueToken(userId, "refresh"),
  };
}

/**
 * Verify signature, expiry and token type. Returns null for any token that
 * should not be accepted.
 */
export async function verifyToken(
  token: string,
  expectedType: TokenType
): Promise<TokenClaims | null> {
  const payload = await verify(token, getJwtSecret(), ALGORITHM).catch(() => null);
  if (!payload) return null;

  const { sub, type, exp } = payload;
  if (typeof sub !== "string" || type !== expectedType || typeof exp !== "number") {
    return null;
  }

  return { userId: sub, type: expectedType, expiresAt: new Date(exp * 1000) };
}

/** Expiry claim of a token without checking its signature. */
export function readTokenExpiry(token: string): Date | null {
  try {
    const { payload } = decode(token);
    return typeof payload.exp === "number" ? new Date(payload.exp * 1000) : null;
  } catch {
    return null;
  }
}
