import { createHash, timingSafeEqual } from "node:crypto";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Constant-time string comparison to prevent timing attacks.
 *
 * Both sides are hashed to a fixed-size digest first, so the comparison
 * time does not leak the length of either input (attacker may control
 * either one).
 */
export function constantTimeEqual(a: string, b: string): boolean {
  const equalDigest = timingSafeEqual(digest(a), digest(b));
  return equalDigest && a.length === b.length;
}
