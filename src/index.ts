export * from "./lib/admission";
export {
  type AuthAuditEvent,
  type AuthAuditEventType,
  type AuthAuditInput,
  AuthAuditLogger,
  type AuthAuditSink,
  LoggerAuditSink,
} from "./lib/audit/auth-audit-logger";
export {
  type DeviceInfo,
  type IssuedSession,
  RateLimitExceededError,
  SessionCreationError,
  type SessionData,
  type SessionStore,
  type SessionUser,
  SessionUserSchema,
  SessionValidationError,
} from "./lib/auth-session-store";
export { RedisSessionStore, type RedisSessionStoreOptions } from "./lib/auth-session-store/redis-session-store";
export {
  ConfigurationError,
  type EnvConfig,
  getEnvConfig,
  loadSessionSecurityConfig,
  type SessionSecurityConfig,
} from "./lib/config";
export {
  type AccountLocked,
  type AccountLockedNow,
  type Allowed,
  AuthRateLimiter,
  type AuthRateLimitConfig,
  describeRateLimitDecision,
  type FailureRecorded,
  type IpRateLimited,
  type RateLimitDecision,
  RateLimiterUnavailableError,
} from "./lib/rate-limit/auth-rate-limiter";
export * from "./lib/redis";
export { createSessionRuntime, type SessionRuntime, type SessionRuntimeDependencies } from "./lib/runtime";
export {
  extractSessionId,
  parseToken,
  SessionCrypto,
  SessionDecryptionError,
} from "./lib/security/session-crypto";
export {
  AdmissionRejectedError,
  extractSessionToken,
  WebSocketManager,
} from "./lib/websocket-manager";
