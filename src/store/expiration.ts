const THIRTY_DAYS_SECONDS = 30 * 24 * 60 * 60;

/**
 * Resolves an `expire` argument to an absolute timestamp in milliseconds,
 * or `null` when the value never expires.
 */
export function resolveExpiry(expire: number, now: number): number | null {
  if (expire === 0) {
    return null;
  }
  if (expire < 0) {
    return now - 1;
  }
  if (expire < THIRTY_DAYS_SECONDS) {
    return now + expire * 1000;
  }
  return expire * 1000;
}

export function isExpired(expiresAt: number | null, now: number): boolean {
  return expiresAt !== null && expiresAt <= now;
}
