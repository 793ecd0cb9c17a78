import type { AuthAuditLogger } from "@/lib/audit/auth-audit-logger";
import { logger, toLogError } from "@/lib/logger";
import type { CacheClient } from "@/lib/redis/client";
import {
  AUTH_CHECK_AND_INCREMENT_IP,
  AUTH_CHECK_ONLY,
  AUTH_DECISION,
  AUTH_RECORD_FAILURE,
} from "@/lib/redis/lua-scripts";
import type { ScriptRunner } from "@/lib/redis/script-runner";

export interface AuthRateLimitConfig {
  /** Failed attempts per IP inside the fixed 60s window. */
  maxAttemptsPerIp: number;
  /** Account failures that trigger a lockout. */
  lockoutThreshold: number;
  failureWindowSeconds: number;
  lockoutSeconds: number;
}

export const DEFAULT_AUTH_RATE_LIMIT_CONFIG: AuthRateLimitConfig = {
  maxAttemptsPerIp: 10,
  lockoutThreshold: 5,
  failureWindowSeconds: 900,
  lockoutSeconds: 900,
};

export const IP_WINDOW_SECONDS = 60;

export interface Allowed {
  allowed: true;
  reason: "allowed";
  retryAfterSeconds: 0;
}

export interface FailureRecorded {
  allowed: true;
  reason: "failure_recorded";
  retryAfterSeconds: 0;
}

export interface IpRateLimited {
  allowed: false;
  reason: "ip_rate_limit";
  retryAfterSeconds: number;
}

export interface AccountLocked {
  allowed: false;
  reason: "account_locked";
  retryAfterSeconds: number;
}

export interface AccountLockedNow {
  allowed: false;
  reason: "account_locked_now";
  retryAfterSeconds: number;
}

export type CheckDecision = Allowed | IpRateLimited | AccountLocked;
export type FailureDecision = FailureRecorded | IpRateLimited | AccountLocked | AccountLockedNow;
export type IpDecision = Allowed | IpRateLimited;
export type RateLimitDecision = Allowed | FailureRecorded | IpRateLimited | AccountLocked | AccountLockedNow;

/**
 * The cache could not answer. The limiter never degrades to "allowed";
 * the caller decides how to fail closed.
 */
export class RateLimiterUnavailableError extends Error {
  constructor(options?: ErrorOptions) {
    super("Auth rate limiter unavailable", options);
    this.name = "RateLimiterUnavailableError";
  }
}

const ALLOWED: Allowed = { allowed: true, reason: "allowed", retryAfterSeconds: 0 };
const FAILURE_RECORDED: FailureRecorded = {
  allowed: true,
  reason: "failure_recorded",
  retryAfterSeconds: 0,
};

const KEY_PREFIX = "console:auth:";

export function normalizeAccount(account: string): string {
  return account.trim().toLowerCase();
}

/**
 * User-facing wording for a decision. Never includes internal detail.
 */
export function describeRateLimitDecision(decision: RateLimitDecision): string | null {
  switch (decision.reason) {
    case "allowed":
    case "failure_recorded":
      return null;
    case "ip_rate_limit":
      return `Too many attempts from this network. Try again in ${decision.retryAfterSeconds} seconds.`;
    case "account_locked":
    case "account_locked_now":
      return `Account temporarily locked. Try again in ${Math.ceil(decision.retryAfterSeconds / 60)} minutes.`;
    default: {
      const exhaustive: never = decision;
      return exhaustive;
    }
  }
}

export interface AuthRateLimiterOptions {
  scripts: ScriptRunner;
  redis: Pick<CacheClient, "del">;
  audit: AuthAuditLogger;
  config?: Partial<AuthRateLimitConfig>;
}

/**
 * Brute-force protection for the login handlers.
 *
 * Protocol: `checkOnly` before verifying credentials, `recordFailure` after
 * a failed attempt, `clearOnSuccess` after a successful one. Every check
 * that reads and writes a counter runs as one server-side script.
 */
export class AuthRateLimiter {
  private readonly scripts: ScriptRunner;
  private readonly redis: Pick<CacheClient, "del">;
  private readonly audit: AuthAuditLogger;
  private readonly config: AuthRateLimitConfig;

  constructor(options: AuthRateLimiterOptions) {
    this.scripts = options.scripts;
    this.redis = options.redis;
    this.audit = options.audit;
    this.config = { ...DEFAULT_AUTH_RATE_LIMIT_CONFIG, ...options.config };
  }

  /**
   * Read-only; safe to call unconditionally before credential checks.
   */
  async checkOnly(ip: string, account?: string | null): Promise<CheckDecision> {
    const keys = [this.ipKey(ip)];
    if (account) {
      keys.push(this.lockoutKey(account));
    }

    const [code, retryAfter] = await this.run("checkOnly", () =>
      this.scripts.run(AUTH_CHECK_ONLY, keys, [String(this.config.maxAttemptsPerIp)])
    );

    switch (code) {
      case AUTH_DECISION.ALLOWED:
        return ALLOWED;
      case AUTH_DECISION.IP_RATE_LIMITED:
        return { allowed: false, reason: "ip_rate_limit", retryAfterSeconds: retryAfter };
      case AUTH_DECISION.ACCOUNT_LOCKED:
        return { allowed: false, reason: "account_locked", retryAfterSeconds: retryAfter };
      default:
        throw new RateLimiterUnavailableError({ cause: new Error(`Unknown decision code ${code}`) });
    }
  }

  async recordFailure(ip: string, account?: string | null): Promise<FailureDecision> {
    const keys = [this.ipKey(ip)];
    if (account) {
      keys.push(this.failureKey(account), this.lockoutKey(account));
    }

    const [code, retryAfter] = await this.run("recordFailure", () =>
      this.scripts.run(AUTH_RECORD_FAILURE, keys, [
        String(this.config.maxAttemptsPerIp),
        String(IP_WINDOW_SECONDS),
        String(this.config.failureWindowSeconds),
        String(this.config.lockoutThreshold),
        String(this.config.lockoutSeconds),
      ])
    );

    switch (code) {
      case AUTH_DECISION.ALLOWED:
        this.audit.log({
          eventType: "auth_failure",
          userId: account ? normalizeAccount(account) : null,
          sessionId: null,
          clientIp: ip,
          userAgent: "",
          outcome: "failure",
          failureReason: "invalid_credentials",
        });
        return FAILURE_RECORDED;
      case AUTH_DECISION.IP_RATE_LIMITED:
        return { allowed: false, reason: "ip_rate_limit", retryAfterSeconds: retryAfter };
      case AUTH_DECISION.ACCOUNT_LOCKED:
        return { allowed: false, reason: "account_locked", retryAfterSeconds: retryAfter };
      case AUTH_DECISION.ACCOUNT_LOCKED_NOW:
        logger.warn("[AuthRateLimiter] Account locked after repeated failures", {
          lockoutSeconds: retryAfter,
        });
        this.audit.log({
          eventType: "account_locked",
          userId: account ? normalizeAccount(account) : null,
          sessionId: null,
          clientIp: ip,
          userAgent: "",
          outcome: "failure",
          failureReason: "lockout_threshold_reached",
        });
        return { allowed: false, reason: "account_locked_now", retryAfterSeconds: retryAfter };
      default:
        throw new RateLimiterUnavailableError({ cause: new Error(`Unknown decision code ${code}`) });
    }
  }

  async clearOnSuccess(account: string): Promise<void> {
    await this.run("clearOnSuccess", () =>
      this.redis.del(this.failureKey(account), this.lockoutKey(account))
    );
  }

  /**
   * Combined check + increment keyed on IP only, for flows that have no
   * account identifier yet (e.g. an identity-provider callback).
   */
  async checkAndIncrementIp(ip: string): Promise<IpDecision> {
    const [code, retryAfter] = await this.run("checkAndIncrementIp", () =>
      this.scripts.run(AUTH_CHECK_AND_INCREMENT_IP, [this.ipKey(ip)], [
        String(this.config.maxAttemptsPerIp),
        String(IP_WINDOW_SECONDS),
      ])
    );

    return code === AUTH_DECISION.IP_RATE_LIMITED
      ? { allowed: false, reason: "ip_rate_limit", retryAfterSeconds: retryAfter }
      : ALLOWED;
  }

  /**
   * Administrative override. Always audited with the acting administrator.
   */
  async unlock(account: string, adminIdentity: string): Promise<void> {
    await this.clearOnSuccess(account);

    logger.info("[AuthRateLimiter] Account unlocked by administrator", {
      account: normalizeAccount(account),
      admin: adminIdentity,
    });
    this.audit.log({
      eventType: "admin_unlock",
      userId: normalizeAccount(account),
      sessionId: null,
      clientIp: "",
      userAgent: "",
      outcome: "success",
      actor: adminIdentity,
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error("[AuthRateLimiter] Cache error", { operation, error: toLogError(error) });
      throw new RateLimiterUnavailableError({ cause: error });
    }
  }

  private ipKey(ip: string): string {
    return `${KEY_PREFIX}ip:${ip}`;
  }

  private failureKey(account: string): string {
    return `${KEY_PREFIX}fail:${normalizeAccount(account)}`;
  }

  private lockoutKey(account: string): string {
    return `${KEY_PREFIX}lock:${normalizeAccount(account)}`;
  }
}
