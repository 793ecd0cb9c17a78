import { randomBytes } from "node:crypto";
import { ZodError } from "zod";
import type { AuthAuditLogger } from "@/lib/audit/auth-audit-logger";
import type { DeviceBindingConfig, SessionTimeouts } from "@/lib/config/session-security";
import { logger, maskSessionId, toLogError } from "@/lib/logger";
import type { CacheClient } from "@/lib/redis/client";
import { INCREMENT_WINDOW, REFRESH_SESSION, ROTATE_SESSION } from "@/lib/redis/lua-scripts";
import type { ScriptRunner } from "@/lib/redis/script-runner";
import { constantTimeEqual } from "@/lib/security/constant-time-compare";
import { buildDeviceFingerprint, sameDevice } from "@/lib/security/device-fingerprint";
import { parseToken, SessionDecryptionError, type SessionCrypto } from "@/lib/security/session-crypto";
import {
  type DeviceInfo,
  type IssuedSession,
  RATE_LIMIT_WINDOW_SECONDS,
  RateLimitExceededError,
  SESSION_KEY_PREFIX,
  SESSION_RATE_KEY_PREFIX,
  SessionCreationError,
  type SessionData,
  SessionDataSchema,
  type SessionStore,
  type SessionUser,
  SessionUserSchema,
  SessionValidationError,
} from "./index";

const SESSION_ID_BYTES = 32;

type RateLimitedAction = "create" | "validate";

export interface RedisSessionStoreOptions {
  redis: CacheClient;
  scripts: ScriptRunner;
  crypto: SessionCrypto;
  audit: AuthAuditLogger;
  timeouts: SessionTimeouts;
  deviceBinding: DeviceBindingConfig;
  createRateLimitPerMinute: number;
  validateRateLimitPerMinute: number;
}

type DecodeResult =
  | { ok: true; session: SessionData }
  | { ok: false; reason: "decrypt_error" | "json_decode_error" | "corrupt_session_payload" };

function buildSessionKey(sessionId: string): string {
  return `${SESSION_KEY_PREFIX}${sessionId}`;
}

function generateOpaqueToken(): string {
  return randomBytes(SESSION_ID_BYTES).toString("base64url");
}

export class RedisSessionStore implements SessionStore {
  private readonly redis: CacheClient;
  private readonly scripts: ScriptRunner;
  private readonly crypto: SessionCrypto;
  private readonly audit: AuthAuditLogger;
  private readonly idleTimeoutMs: number;
  private readonly absoluteTimeoutSeconds: number;
  private readonly deviceBinding: DeviceBindingConfig;
  private readonly createRateLimit: number;
  private readonly validateRateLimit: number;

  constructor(options: RedisSessionStoreOptions) {
    this.redis = options.redis;
    this.scripts = options.scripts;
    this.crypto = options.crypto;
    this.audit = options.audit;
    this.idleTimeoutMs = options.timeouts.idleTimeoutSeconds * 1000;
    this.absoluteTimeoutSeconds = options.timeouts.absoluteTimeoutSeconds;
    this.deviceBinding = options.deviceBinding;
    this.createRateLimit = options.createRateLimitPerMinute;
    this.validateRateLimit = options.validateRateLimitPerMinute;
  }

  /**
   * Persist a session for an already-authenticated identity.
   *
   * @throws RateLimitExceededError when the per-IP creation limit is hit
   * @throws SessionCreationError when the cache is unavailable
   */
  async create(user: SessionUser, deviceInfo: DeviceInfo, clientIp: string): Promise<IssuedSession> {
    const userAgent = deviceInfo.userAgent ?? "";
    // contract check: a payload that fails here would later read back as corrupt
    const validatedUser = SessionUserSchema.parse(user);

    let allowed: boolean;
    try {
      allowed = await this.withinRateLimit(clientIp, "create", this.createRateLimit);
    } catch (error) {
      logger.error("[AuthSessionStore] Rate limit check failed during create", {
        error: toLogError(error),
      });
      throw new SessionCreationError(undefined, { cause: error });
    }

    if (!allowed) {
      this.audit.log({
        eventType: "rate_limit_exceeded",
        userId: user.userId,
        sessionId: null,
        clientIp,
        userAgent,
        outcome: "failure",
        failureReason: "create_rate_limit",
      });
      throw new RateLimitExceededError();
    }

    const now = Date.now();
    const session: SessionData = {
      sessionId: generateOpaqueToken(),
      user: validatedUser,
      csrfToken: generateOpaqueToken(),
      createdAt: now,
      issuedAt: now,
      lastActivity: now,
      device: buildDeviceFingerprint(clientIp, userAgent, this.deviceBinding.subnetMask),
    };

    try {
      await this.redis.setex(
        buildSessionKey(session.sessionId),
        this.absoluteTimeoutSeconds,
        this.crypto.encrypt(JSON.stringify(session))
      );
    } catch (error) {
      logger.error("[AuthSessionStore] Failed to create session", {
        error: toLogError(error),
        sessionId: maskSessionId(session.sessionId),
      });
      throw new SessionCreationError(undefined, { cause: error });
    }

    this.audit.log({
      eventType: "login_success",
      userId: user.userId,
      sessionId: session.sessionId,
      clientIp,
      userAgent,
      outcome: "success",
    });

    return { token: this.crypto.buildToken(session.sessionId), csrfToken: session.csrfToken };
  }

  /**
   * Resolve a presented token to its session.
   *
   * Returns null for anything that is not a live, correctly signed session
   * (including a rate-limited caller). Throws SessionValidationError only
   * when the cache cannot answer.
   */
  async validate(
    token: string,
    clientIp: string,
    userAgent?: string | null
  ): Promise<SessionData | null> {
    const ua = userAgent ?? "";

    try {
      if (!(await this.withinRateLimit(clientIp, "validate", this.validateRateLimit))) {
        this.audit.log({
          eventType: "rate_limit_exceeded",
          userId: null,
          sessionId: null,
          clientIp,
          userAgent: ua,
          outcome: "failure",
          failureReason: "validate_rate_limit",
        });
        return null;
      }

      const parsed = parseToken(token);
      if (!parsed) {
        this.auditValidationFailure(null, null, clientIp, ua, "malformed_token");
        return null;
      }

      const { sessionId } = parsed;
      if (!this.crypto.verify(sessionId, `${parsed.keyId}:${parsed.signature}`)) {
        this.auditValidationFailure(null, sessionId, clientIp, ua, "invalid_signature");
        return null;
      }

      const key = buildSessionKey(sessionId);
      const blob = await this.redis.getBuffer(key);
      if (!blob) {
        return null;
      }

      const decoded = this.decode(blob, sessionId);
      if (!decoded.ok) {
        // a corrupt record must never be resurrected by a later write
        await this.redis.del(key);
        this.auditValidationFailure(null, sessionId, clientIp, ua, decoded.reason);
        return null;
      }

      const { session } = decoded;
      const now = Date.now();
      const ageMs = now - session.createdAt;

      if (ageMs > this.absoluteTimeoutSeconds * 1000) {
        await this.redis.del(key);
        this.auditValidationFailure(session.user.userId, sessionId, clientIp, ua, "absolute_timeout");
        return null;
      }

      if (now - session.lastActivity > this.idleTimeoutMs) {
        await this.redis.del(key);
        this.auditValidationFailure(session.user.userId, sessionId, clientIp, ua, "idle_timeout");
        return null;
      }

      if (this.deviceBinding.enabled) {
        const current = buildDeviceFingerprint(clientIp, ua, this.deviceBinding.subnetMask);
        if (!sameDevice(session.device, current)) {
          await this.redis.del(key);
          this.audit.log({
            eventType: "device_mismatch",
            userId: session.user.userId,
            sessionId,
            clientIp,
            userAgent: ua,
            outcome: "failure",
            failureReason: "device_binding_failed",
          });
          return null;
        }
      }

      const remainingTtl = this.remainingTtlSeconds(session, now);
      if (remainingTtl <= 0) {
        await this.redis.del(key);
        return null;
      }

      // A concurrent validate may win with its own lastActivity; a rotate or
      // logout that lands after the read leaves the key gone and it stays gone.
      const refreshed: SessionData = { ...session, lastActivity: now };
      const stillLive = await this.scripts.run(
        REFRESH_SESSION,
        [key],
        [this.crypto.encrypt(JSON.stringify(refreshed)), String(remainingTtl)]
      );
      if (!stillLive) {
        logger.debug("[AuthSessionStore] Session ended during validation", {
          sessionId: maskSessionId(sessionId),
        });
        return null;
      }

      return refreshed;
    } catch (error) {
      logger.error("[AuthSessionStore] Cache error during session validation", {
        error: toLogError(error),
      });
      throw new SessionValidationError(undefined, { cause: error });
    }
  }

  /**
   * Mint a new session id and CSRF token for an existing session, keeping
   * `createdAt` so the absolute timeout is not reset. The new record is
   * written and the old one deleted by a single script; if the old record
   * is gone by then, nothing is written and null is returned.
   *
   * @throws ZodError when the merged user no longer satisfies SessionUserSchema
   * @throws SessionValidationError when the cache is unavailable
   */
  async rotate(
    oldSessionId: string,
    userUpdates?: Partial<SessionUser>
  ): Promise<IssuedSession | null> {
    const oldKey = buildSessionKey(oldSessionId);

    try {
      const blob = await this.redis.getBuffer(oldKey);
      if (!blob) {
        return null;
      }

      const decoded = this.decode(blob, oldSessionId);
      if (!decoded.ok) {
        logger.warn("[AuthSessionStore] Session rotation failed - invalid session data", {
          oldSessionId: maskSessionId(oldSessionId),
          reason: decoded.reason,
        });
        return null;
      }

      const now = Date.now();
      const remainingTtl = this.remainingTtlSeconds(decoded.session, now);
      if (remainingTtl <= 0) {
        await this.redis.del(oldKey);
        return null;
      }

      // 与 create 相同的契约校验：失败时旧会话保持不变
      const user = SessionUserSchema.parse({ ...decoded.session.user, ...userUpdates });
      const rotated: SessionData = {
        ...decoded.session,
        sessionId: generateOpaqueToken(),
        csrfToken: generateOpaqueToken(),
        issuedAt: now,
        lastActivity: now,
        user,
      };

      const swapped = await this.scripts.run(
        ROTATE_SESSION,
        [oldKey, buildSessionKey(rotated.sessionId)],
        [this.crypto.encrypt(JSON.stringify(rotated)), String(remainingTtl)]
      );
      if (!swapped) {
        logger.info("[AuthSessionStore] Session vanished before rotation, aborting", {
          oldSessionId: maskSessionId(oldSessionId),
        });
        return null;
      }

      this.audit.log({
        eventType: "session_rotation",
        userId: rotated.user.userId,
        sessionId: rotated.sessionId,
        clientIp: rotated.device.ipSubnet,
        userAgent: "",
        outcome: "success",
      });

      return { token: this.crypto.buildToken(rotated.sessionId), csrfToken: rotated.csrfToken };
    } catch (error) {
      if (error instanceof ZodError) {
        throw error;
      }
      logger.error("[AuthSessionStore] Session rotation failed - cache error", {
        error: toLogError(error),
        oldSessionId: maskSessionId(oldSessionId),
      });
      throw new SessionValidationError("Session rotation failed - storage unavailable", {
        cause: error,
      });
    }
  }

  async invalidate(sessionId: string): Promise<void> {
    try {
      await this.redis.del(buildSessionKey(sessionId));
    } catch (error) {
      logger.error("[AuthSessionStore] Failed to invalidate session", {
        error: toLogError(error),
        sessionId: maskSessionId(sessionId),
      });
      throw new SessionValidationError("Session invalidation failed - storage unavailable", {
        cause: error,
      });
    }
  }

  /**
   * Explicit logout for a presented token. Unsigned or malformed tokens are
   * ignored.
   */
  async logout(token: string, clientIp: string, userAgent?: string | null): Promise<void> {
    const sessionId = this.crypto.verifyToken(token);
    if (!sessionId) {
      return;
    }

    await this.invalidate(sessionId);
    this.audit.log({
      eventType: "logout",
      userId: null,
      sessionId,
      clientIp,
      userAgent: userAgent ?? "",
      outcome: "success",
    });
  }

  /**
   * Signature-only check, no cache round-trip.
   */
  verifyToken(token: string): string | null {
    return this.crypto.verifyToken(token);
  }

  /**
   * Double-submit check of the CSRF token echoed by the client.
   */
  verifyCsrf(session: Pick<SessionData, "csrfToken">, presented: string | null | undefined): boolean {
    if (!presented) {
      return false;
    }
    return constantTimeEqual(presented, session.csrfToken);
  }

  private async withinRateLimit(
    clientIp: string,
    action: RateLimitedAction,
    limit: number
  ): Promise<boolean> {
    const count = await this.scripts.run(
      INCREMENT_WINDOW,
      [`${SESSION_RATE_KEY_PREFIX}${action}:${clientIp}`],
      [String(RATE_LIMIT_WINDOW_SECONDS)]
    );
    return count <= limit;
  }

  private remainingTtlSeconds(session: SessionData, now: number): number {
    return Math.floor((this.absoluteTimeoutSeconds * 1000 - (now - session.createdAt)) / 1000);
  }

  private decode(blob: Buffer, sessionId: string): DecodeResult {
    let plaintext: string;
    try {
      plaintext = this.crypto.decrypt(blob);
    } catch (error) {
      if (!(error instanceof SessionDecryptionError)) throw error;
      logger.warn("[AuthSessionStore] Session decryption failed", {
        sessionId: maskSessionId(sessionId),
      });
      return { ok: false, reason: "decrypt_error" };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(plaintext);
    } catch {
      return { ok: false, reason: "json_decode_error" };
    }

    const result = SessionDataSchema.safeParse(payload);
    if (!result.success || result.data.sessionId !== sessionId) {
      return { ok: false, reason: "corrupt_session_payload" };
    }
    return { ok: true, session: result.data };
  }

  private auditValidationFailure(
    userId: string | null,
    sessionId: string | null,
    clientIp: string,
    userAgent: string,
    reason: string
  ): void {
    this.audit.log({
      eventType: "session_validation_failure",
      userId,
      sessionId,
      clientIp,
      userAgent,
      outcome: "failure",
      failureReason: reason,
    });
  }
}
