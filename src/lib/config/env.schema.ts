import { z } from "zod";

/**
 * 布尔值转换函数
 * - 将字符串 "false" 和 "0" 转换为 false
 * - 其他所有值转换为 true
 */
const booleanTransform = (s: string) => s !== "false" && s !== "0";

const optionalSecret = z.preprocess((val) => {
  if (!val || typeof val !== "string") return undefined;
  const trimmed = val.trim();
  return trimmed === "" || trimmed === "change-me" ? undefined : trimmed;
}, z.string().min(1).optional());

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/**
 * 环境变量验证schema
 */
export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  APP_PORT: z.coerce.number().int().min(1).max(65535).default(23000),

  REDIS_URL: z.string().optional(),
  // ⚠️ best-effort 仅用于测试替身：INCR 与 EXPIRE 之间存在竞态
  REDIS_SCRIPTING_MODE: z.enum(["atomic", "best-effort"]).default("atomic"),

  AUTH_TYPE: z.enum(["dev", "basic", "mtls", "oauth2"]).default("dev"),

  SESSION_IDLE_TIMEOUT_MINUTES: positiveInt(15),
  SESSION_ABSOLUTE_TIMEOUT_HOURS: positiveInt(4),
  SESSION_ENCRYPTION_KEY: optionalSecret,
  SESSION_ENCRYPTION_KEY_PREV: optionalSecret,
  HMAC_SIGNING_KEYS: optionalSecret,
  HMAC_CURRENT_KEY_ID: z.string().trim().optional(),
  SESSION_COOKIE_NAME: z.string().min(1).default("console_session"),

  DEVICE_BINDING_ENABLED: z.string().default("false").transform(booleanTransform),
  DEVICE_BINDING_SUBNET_MASK: z.coerce.number().int().min(0).max(128).default(24),

  SESSION_CREATE_RATE_LIMIT: positiveInt(10),
  SESSION_VALIDATE_RATE_LIMIT: positiveInt(100),

  AUTH_IP_MAX_ATTEMPTS: positiveInt(10),
  AUTH_ACCOUNT_LOCKOUT_THRESHOLD: positiveInt(5),
  AUTH_FAILURE_WINDOW_SECONDS: positiveInt(900),
  AUTH_LOCKOUT_SECONDS: positiveInt(900),

  ENABLE_WEBSOCKET: z.string().default("true").transform(booleanTransform),
  WEBSOCKET_PATH: z.string().default("/socket.io"),
  WS_MAX_CONNECTIONS: positiveInt(1000),
  WS_MAX_CONNECTIONS_PER_SESSION: positiveInt(2),
  WS_SESSION_CONN_TTL: positiveInt(3600),
  WS_SESSION_VALIDATION_TIMEOUT_MS: positiveInt(2000),
  WS_HANDSHAKE_TIMEOUT_MS: positiveInt(10000),
  WS_DRAIN_RETRY_AFTER_SECONDS: positiveInt(30),
});

/**
 * 环境变量类型
 */
export type EnvConfig = z.infer<typeof EnvSchema>;

let _envConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!_envConfig) {
    _envConfig = EnvSchema.parse(process.env);
  }
  return _envConfig;
}

export function resetEnvConfigForTests(): void {
  _envConfig = null;
}
