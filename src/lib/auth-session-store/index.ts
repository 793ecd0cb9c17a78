import { z } from "zod";

export const SessionUserSchema = z
  .object({
    userId: z.string().min(1),
    role: z.string().min(1),
    strategies: z.array(z.string()),
    authMethod: z.enum(["dev", "basic", "mtls", "oauth2"]),
    displayName: z.string().optional(),
    mfaPending: z.boolean().optional(),
    upstreamTokens: z
      .object({
        accessToken: z.string(),
        refreshToken: z.string().optional(),
        idToken: z.string().optional(),
        expiresAt: z.number().optional(),
      })
      .optional(),
  })
  // identity providers may attach claims of their own
  .passthrough();

export type SessionUser = z.infer<typeof SessionUserSchema>;

export const DeviceFingerprintSchema = z.object({
  ipSubnet: z.string(),
  uaHash: z.string(),
});

export const SessionDataSchema = z.object({
  sessionId: z.string().min(1),
  user: SessionUserSchema,
  csrfToken: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  issuedAt: z.number().int().nonnegative(),
  lastActivity: z.number().int().nonnegative(),
  device: DeviceFingerprintSchema,
});

/** Timestamps are epoch milliseconds. */
export type SessionData = z.infer<typeof SessionDataSchema>;

export interface DeviceInfo {
  userAgent?: string | null;
}

export interface IssuedSession {
  /** `{sessionId}.{keyId}:{hexHmac}`, safe to place in a cookie. */
  token: string;
  csrfToken: string;
}

export interface SessionStore {
  create(user: SessionUser, deviceInfo: DeviceInfo, clientIp: string): Promise<IssuedSession>;
  validate(token: string, clientIp: string, userAgent?: string | null): Promise<SessionData | null>;
  rotate(oldSessionId: string, userUpdates?: Partial<SessionUser>): Promise<IssuedSession | null>;
  invalidate(sessionId: string): Promise<void>;
}

/**
 * Storage unavailable while creating a session. Respond 503, not 401/403.
 */
export class SessionCreationError extends Error {
  constructor(message = "Session creation failed - storage unavailable", options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionCreationError";
  }
}

/**
 * Storage unavailable while validating. Distinct from an invalid session:
 * callers respond 503 ("cannot currently tell"), never 401.
 */
export class SessionValidationError extends Error {
  constructor(message = "Session validation failed - storage unavailable", options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionValidationError";
  }
}

export class RateLimitExceededError extends Error {
  constructor(message = "Session creation rate limit exceeded") {
    super(message);
    this.name = "RateLimitExceededError";
  }
}

export const SESSION_KEY_PREFIX = "console:session:";
export const SESSION_RATE_KEY_PREFIX = "console:rate:";
export const RATE_LIMIT_WINDOW_SECONDS = 60;
