import { readTokenExpiry, tokenLifetimeSeconds } from "./auth.js";
import { errorMessage } from "./errors.js";
import { getStore } from "./store.js";

/**
 * Invalidate a token before its natural expiry. The row keeps the token's own
 * expiry so the sweep can drop it once the token would be rejected anyway.
 */
export async function blacklistToken(token: string, now = new Date()): Promise<void> {
  const expiresAt =
    readTokenExpiry(token) ??
    new Date(now.getTime() + tokenLifetimeSeconds("refresh") * 1000);
  await getStore().blacklistToken(token, expiresAt);
}

export function isTokenBlacklisted(token: string): Promise<boolean> {
  return getStore().isTokenBlacklisted(token);
}

export async function pruneExpiredTokens(now = new Date()): Promise<number> {
  const removed = await getStore().deleteExpiredTokens(now);
  if (removed > 0) {
    console.log(`Removed ${removed} expired token(s) from the blacklist`);
  }
  return removed;
}

export function startBlacklistSweep(intervalMs: number): NodeJS.Timeout {
  const timer = setInterval(() => {
    pruneExpiredTokens().catch((err: unknown) => {
      console.error(`Token blacklist sweep failed: ${errorMessage(err)}`);
    });
  }, intervalMs);
  timer.unref();
  return timer;
}
