import { logger, maskSessionId, toLogError } from "@/lib/logger";

export type AuthAuditEventType =
  | "login_success"
  | "logout"
  | "rate_limit_exceeded"
  | "session_validation_failure"
  | "device_mismatch"
  | "session_rotation"
  | "auth_failure"
  | "account_locked"
  | "admin_unlock";

export interface AuthAuditEvent {
  eventType: AuthAuditEventType;
  userId: string | null;
  sessionId: string | null;
  clientIp: string;
  userAgent: string;
  authType: string;
  outcome: "success" | "failure";
  failureReason?: string;
  /** Who performed an administrative override. */
  actor?: string;
  timestamp: number;
}

/**
 * Persistence for audit events lives outside this package (database,
 * log shipper). Implementations may be sync or async.
 */
export interface AuthAuditSink {
  logEvent(event: AuthAuditEvent): void | Promise<void>;
}

/**
 * Default sink: structured log lines, session id masked.
 */
export class LoggerAuditSink implements AuthAuditSink {
  logEvent(event: AuthAuditEvent): void {
    logger.info("[AuthAudit] Event", {
      ...event,
      sessionId: maskSessionId(event.sessionId),
    });
  }
}

export type AuthAuditInput = Omit<AuthAuditEvent, "timestamp" | "authType"> &
  Partial<Pick<AuthAuditEvent, "authType">>;

/**
 * Fire-and-forget front for an {@link AuthAuditSink}. A degraded sink never
 * blocks or fails the operation that emitted the event.
 */
export class AuthAuditLogger {
  constructor(
    private readonly sink: AuthAuditSink,
    private readonly authType: string
  ) {}

  log(input: AuthAuditInput): void {
    const event: AuthAuditEvent = {
      ...input,
      authType: input.authType ?? this.authType,
      timestamp: Date.now(),
    };

    let pending: void | Promise<void>;
    try {
      pending = this.sink.logEvent(event);
    } catch (error) {
      this.reportSinkFailure(event, error);
      return;
    }

    if (pending instanceof Promise) {
      void pending.catch((error: unknown) => this.reportSinkFailure(event, error));
    }
  }

  private reportSinkFailure(event: AuthAuditEvent, error: unknown): void {
    logger.warn("[AuthAudit] Sink failed, event dropped", {
      eventType: event.eventType,
      outcome: event.outcome,
      error: toLogError(error),
    });
  }
}
