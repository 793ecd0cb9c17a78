import { AdmissionController } from "./admission/admission-controller";
import { ConnectionLifecycle } from "./admission/connection-lifecycle";
import { ConnectionSemaphore } from "./admission/connection-semaphore";
import { ConnectionStats } from "./admission/connection-stats";
import { SessionConnectionCounter } from "./admission/session-connection-counter";
import { AuthAuditLogger, type AuthAuditSink, LoggerAuditSink } from "./audit/auth-audit-logger";
import { RedisSessionStore } from "./auth-session-store/redis-session-store";
import type { EnvConfig } from "./config/env.schema";
import { ConfigurationError, loadSessionSecurityConfig } from "./config/session-security";
import { logger, toLogError } from "./logger";
import { AuthRateLimiter } from "./rate-limit/auth-rate-limiter";
import { closeRedis, createRedisClient, type OwnedCacheClient } from "./redis/client";
import { createScriptRunner, type ScriptRunner } from "./redis/script-runner";
import { SessionCrypto } from "./security/session-crypto";
import { type GatewayServer, WebSocketManager } from "./websocket-manager";

export interface SessionRuntime {
  readonly env: EnvConfig;
  readonly redis: OwnedCacheClient;
  readonly scripts: ScriptRunner;
  readonly crypto: SessionCrypto;
  readonly audit: AuthAuditLogger;
  readonly sessionStore: RedisSessionStore;
  readonly rateLimiter: AuthRateLimiter;
  readonly semaphore: ConnectionSemaphore;
  readonly stats: ConnectionStats;
  readonly admission: AdmissionController;
  readonly lifecycle: ConnectionLifecycle;
  attachWebSocket(io: GatewayServer): WebSocketManager;
  /** Drain, close live connections, release the cache client. Idempotent. */
  shutdown(): Promise<void>;
}

export interface SessionRuntimeDependencies {
  /** Defaults to a fresh ioredis client for `REDIS_URL`. */
  redis?: OwnedCacheClient;
  auditSink?: AuthAuditSink;
}

/**
 * Single owner of every long-lived dependency. Nothing below this point
 * looks anything up globally.
 */
export function createSessionRuntime(
  env: EnvConfig,
  dependencies: SessionRuntimeDependencies = {}
): SessionRuntime {
  const security = loadSessionSecurityConfig(env);

  let redis = dependencies.redis;
  if (!redis) {
    if (!env.REDIS_URL) {
      throw new ConfigurationError("REDIS_URL environment variable not set");
    }
    redis = createRedisClient(env.REDIS_URL);
  }

  const scripts = createScriptRunner(redis, env.REDIS_SCRIPTING_MODE);
  const crypto = new SessionCrypto({
    encryptionKeys: security.encryptionKeys,
    signingKeys: security.signingKeys,
    currentSigningKeyId: security.currentSigningKeyId,
  });
  const audit = new AuthAuditLogger(dependencies.auditSink ?? new LoggerAuditSink(), security.authType);

  const sessionStore = new RedisSessionStore({
    redis,
    scripts,
    crypto,
    audit,
    timeouts: security.timeouts,
    deviceBinding: security.deviceBinding,
    createRateLimitPerMinute: security.createRateLimitPerMinute,
    validateRateLimitPerMinute: security.validateRateLimitPerMinute,
  });

  const rateLimiter = new AuthRateLimiter({
    scripts,
    redis,
    audit,
    config: {
      maxAttemptsPerIp: env.AUTH_IP_MAX_ATTEMPTS,
      lockoutThreshold: env.AUTH_ACCOUNT_LOCKOUT_THRESHOLD,
      failureWindowSeconds: env.AUTH_FAILURE_WINDOW_SECONDS,
      lockoutSeconds: env.AUTH_LOCKOUT_SECONDS,
    },
  });

  const semaphore = new ConnectionSemaphore(env.WS_MAX_CONNECTIONS);
  const counter = new SessionConnectionCounter(scripts, {
    maxPerSession: env.WS_MAX_CONNECTIONS_PER_SESSION,
    ttlSeconds: env.WS_SESSION_CONN_TTL,
  });
  const stats = new ConnectionStats();

  const admission = new AdmissionController({
    sessionStore,
    semaphore,
    counter,
    metrics: stats,
    redis,
    validationTimeoutMs: env.WS_SESSION_VALIDATION_TIMEOUT_MS,
    handshakeTimeoutMs: env.WS_HANDSHAKE_TIMEOUT_MS,
    drainRetryAfterSeconds: env.WS_DRAIN_RETRY_AFTER_SECONDS,
  });
  const lifecycle = new ConnectionLifecycle({ counter, metrics: stats });

  const ownedRedis = redis;
  let wsManager: WebSocketManager | null = null;
  let shutdownPromise: Promise<void> | null = null;

  async function teardown(): Promise<void> {
    admission.startDraining();

    try {
      if (wsManager) {
        await wsManager.close();
      }
    } finally {
      try {
        await closeRedis(ownedRedis);
      } catch (error) {
        logger.error("[Runtime] Failed to close Redis", { error: toLogError(error) });
      }
    }
  }

  return {
    env,
    redis: ownedRedis,
    scripts,
    crypto,
    audit,
    sessionStore,
    rateLimiter,
    semaphore,
    stats,
    admission,
    lifecycle,
    attachWebSocket(io) {
      wsManager = new WebSocketManager(io, {
        admission,
        lifecycle,
        stats,
        cookieName: env.SESSION_COOKIE_NAME,
      });
      return wsManager;
    },
    shutdown() {
      if (!shutdownPromise) {
        shutdownPromise = teardown();
      }
      return shutdownPromise;
    },
  };
}
