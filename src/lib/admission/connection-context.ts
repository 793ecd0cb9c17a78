import type { SessionData } from "@/lib/auth-session-store";
import { logger, maskSessionId, toLogError } from "@/lib/logger";
import type { SemaphorePermit } from "./connection-semaphore";
import type { SessionConnectionCounter } from "./session-connection-counter";

/**
 * Who owns the reservations of a connection:
 * - `pending`: the admission controller (releases when the handshake returns)
 * - `handshake_complete`: the lifecycle coordinator (releases on disconnect)
 * - `aborted`: nobody; the admission controller already released
 *
 * Only `pending` may move, and only once, so exactly one side releases.
 */
export type HandshakeState = "pending" | "handshake_complete" | "aborted";

/**
 * Request-scoped state shared between admission and the lifecycle
 * coordinator.
 */
export interface ConnectionContext {
  handshake: HandshakeState;
  clientIp: string;
  userAgent: string;
  session: SessionData | null;
  permit: SemaphorePermit | null;
  sessionCounterKey: string | null;
  clientId: string | null;
}

export function createConnectionContext(clientIp: string, userAgent?: string | null): ConnectionContext {
  return {
    handshake: "pending",
    clientIp,
    userAgent: userAgent ?? "",
    session: null,
    permit: null,
    sessionCounterKey: null,
    clientId: null,
  };
}

/**
 * Give back everything the connection reserved. A failing shared counter is
 * logged and skipped; the semaphore permit is released regardless.
 */
export async function releaseReservations(
  context: ConnectionContext,
  counter: SessionConnectionCounter
): Promise<void> {
  const counterKey = context.sessionCounterKey;
  context.sessionCounterKey = null;

  try {
    if (counterKey) {
      await counter.release(counterKey);
    }
  } catch (error) {
    logger.warn("[Admission] Failed to decrement session connection counter", {
      sessionId: maskSessionId(context.session?.sessionId),
      error: toLogError(error),
    });
  } finally {
    context.permit?.release();
  }
}
