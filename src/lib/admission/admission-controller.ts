import { type SessionData, type SessionStore, SessionValidationError } from "@/lib/auth-session-store";
import { logger, toLogError } from "@/lib/logger";
import { type CacheClient, pingRedis } from "@/lib/redis/client";
import {
  type ConnectionContext,
  createConnectionContext,
  releaseReservations,
} from "./connection-context";
import type { ConnectionSemaphore } from "./connection-semaphore";
import type { ConnectionMetrics, RejectionReason } from "./connection-stats";
import type { SessionConnectionCounter } from "./session-connection-counter";

export const CAPACITY_RETRY_AFTER_SECONDS = 5;

export interface AdmissionRequest {
  /** Signed session token, when the client presented one. */
  token: string | null;
  clientIp: string;
  userAgent?: string | null;
}

export interface AdmissionRejection {
  status: 401 | 429 | 503;
  reason: RejectionReason;
  /** Generic, safe to show to the client. */
  message: string;
  retryAfterSeconds?: number;
}

export type AdmissionOutcome =
  | { outcome: "admitted"; context: ConnectionContext }
  | { outcome: "rejected"; rejection: AdmissionRejection }
  | { outcome: "aborted"; context: ConnectionContext };

/**
 * Establishes the persistent connection. Must move `context.handshake` to
 * `handshake_complete` (through the lifecycle coordinator) once the
 * transport has accepted the connection.
 */
export type InnerHandshake = (context: ConnectionContext) => Promise<void>;

export interface AdmissionControllerOptions {
  sessionStore: Pick<SessionStore, "validate">;
  semaphore: ConnectionSemaphore;
  counter: SessionConnectionCounter;
  metrics: ConnectionMetrics;
  redis: Pick<CacheClient, "ping">;
  validationTimeoutMs: number;
  handshakeTimeoutMs: number;
  drainRetryAfterSeconds: number;
}

export type ReadinessStatus =
  | { ready: true }
  | { ready: false; reason: "draining" | "redis_unavailable" };

class AdmissionTimeoutError extends Error {
  constructor(stage: string, timeoutMs: number) {
    super(`${stage} timed out after ${timeoutMs}ms`);
    this.name = "AdmissionTimeoutError";
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, stage: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AdmissionTimeoutError(stage, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

type SessionCheck = { ok: true; session: SessionData } | { ok: false; rejection: AdmissionRejection };

/**
 * Gatekeeper for persistent-connection upgrades.
 *
 * ARRIVED → (draining? 503) → session path | anonymous path → ADMITTED | REJECTED
 *
 * Reservations (semaphore permit, per-session counter) are released here
 * while the handshake is still `pending`; once the handshake completes the
 * lifecycle coordinator owns them.
 */
export class AdmissionController {
  private draining = false;
  private readonly options: AdmissionControllerOptions;

  constructor(options: AdmissionControllerOptions) {
    this.options = options;
  }

  async admit(request: AdmissionRequest, handshake: InnerHandshake): Promise<AdmissionOutcome> {
    if (this.draining) {
      return this.reject({
        status: 503,
        reason: "draining",
        message: "Server is shutting down",
        retryAfterSeconds: this.options.drainRetryAfterSeconds,
      });
    }

    const context = createConnectionContext(request.clientIp, request.userAgent);

    if (request.token) {
      const check = await this.validateSession(request.token, request.clientIp, request.userAgent);
      if (!check.ok) {
        return this.reject(check.rejection);
      }
      context.session = check.session;
    }

    const permit = this.options.semaphore.tryAcquire();
    if (!permit) {
      return this.reject({
        status: 503,
        reason: "at_capacity",
        message: "Server at capacity",
        retryAfterSeconds: CAPACITY_RETRY_AFTER_SECONDS,
      });
    }
    context.permit = permit;

    try {
      if (context.session) {
        const rejection = await this.reserveSessionSlot(context, context.session.sessionId);
        if (rejection) {
          return this.reject(rejection);
        }
      }

      try {
        await withTimeout(handshake(context), this.options.handshakeTimeoutMs, "Handshake");
      } catch (error) {
        if (!(error instanceof AdmissionTimeoutError)) throw error;
        logger.warn("[Admission] Handshake timed out", { timeoutMs: this.options.handshakeTimeoutMs });
      }
    } finally {
      if (context.handshake === "pending") {
        context.handshake = "aborted";
        await releaseReservations(context, this.options.counter);
      }
    }

    return context.handshake === "handshake_complete"
      ? { outcome: "admitted", context }
      : { outcome: "aborted", context };
  }

  /**
   * Readiness only: new admissions get 503, live connections stay.
   */
  startDraining(): void {
    if (!this.draining) {
      logger.info("[Admission] Draining, new connections will be rejected");
    }
    this.draining = true;
  }

  isDraining(): boolean {
    return this.draining;
  }

  async checkReadiness(): Promise<ReadinessStatus> {
    if (this.draining) {
      return { ready: false, reason: "draining" };
    }
    return (await pingRedis(this.options.redis))
      ? { ready: true }
      : { ready: false, reason: "redis_unavailable" };
  }

  private async validateSession(
    token: string,
    clientIp: string,
    userAgent?: string | null
  ): Promise<SessionCheck> {
    try {
      const session = await withTimeout(
        this.options.sessionStore.validate(token, clientIp, userAgent),
        this.options.validationTimeoutMs,
        "Session validation"
      );
      if (!session) {
        return {
          ok: false,
          rejection: { status: 401, reason: "invalid_session", message: "Authentication required" },
        };
      }
      return { ok: true, session };
    } catch (error) {
      if (error instanceof AdmissionTimeoutError) {
        logger.warn("[Admission] Session validation timed out", {
          timeoutMs: this.options.validationTimeoutMs,
        });
        return { ok: false, rejection: this.unavailable("validation_timeout") };
      }
      if (error instanceof SessionValidationError) {
        logger.error("[Admission] Session store unavailable", { error: toLogError(error) });
        return { ok: false, rejection: this.unavailable("validation_unavailable") };
      }
      throw error;
    }
  }

  private async reserveSessionSlot(
    context: ConnectionContext,
    sessionId: string
  ): Promise<AdmissionRejection | null> {
    try {
      const result = await this.options.counter.acquire(sessionId);
      if (!result.admitted) {
        return {
          status: 429,
          reason: "session_connection_limit",
          message: "Too many connections for this session",
          retryAfterSeconds: CAPACITY_RETRY_AFTER_SECONDS,
        };
      }
      context.sessionCounterKey = result.key;
      return null;
    } catch (error) {
      logger.error("[Admission] Session connection counter unavailable", {
        error: toLogError(error),
      });
      return this.unavailable("counter_unavailable");
    }
  }

  private unavailable(reason: RejectionReason): AdmissionRejection {
    return {
      status: 503,
      reason,
      message: "Service temporarily unavailable",
      retryAfterSeconds: CAPACITY_RETRY_AFTER_SECONDS,
    };
  }

  private reject(rejection: AdmissionRejection): AdmissionOutcome {
    this.options.metrics.recordRejection(rejection.reason);
    return { outcome: "rejected", rejection };
  }
}
