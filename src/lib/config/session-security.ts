import type { EnvConfig } from "./env.schema";

/**
 * Thrown for malformed configuration. Raised at startup so an insecure
 * default is never picked silently.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface SessionTimeouts {
  idleTimeoutSeconds: number;
  absoluteTimeoutSeconds: number;
}

export interface DeviceBindingConfig {
  enabled: boolean;
  subnetMask: number;
}

export interface SessionSecurityConfig {
  encryptionKeys: Buffer[];
  signingKeys: Map<string, Buffer>;
  currentSigningKeyId: string;
  timeouts: SessionTimeouts;
  deviceBinding: DeviceBindingConfig;
  createRateLimitPerMinute: number;
  validateRateLimitPerMinute: number;
  authType: EnvConfig["AUTH_TYPE"];
}

const ENCRYPTION_KEY_BYTES = 32;
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

export function decodeEncryptionKey(value: string | undefined, envName: string): Buffer {
  if (!value) {
    throw new ConfigurationError(`${envName} environment variable not set`);
  }
  if (!BASE64_PATTERN.test(value)) {
    throw new ConfigurationError(`${envName} must be base64-encoded`);
  }
  // Node's base64 decoder accepts the URL-safe alphabet as well
  const key = Buffer.from(value, "base64");
  if (key.length !== ENCRYPTION_KEY_BYTES) {
    throw new ConfigurationError(
      `${envName} must decode to ${ENCRYPTION_KEY_BYTES} bytes (got ${key.length})`
    );
  }
  return key;
}

/**
 * Format: `HMAC_SIGNING_KEYS="01:abcd...,02:dead..."` (hex-encoded keys).
 * Insertion order is preserved so the first id is the default current key.
 */
export function parseSigningKeys(raw: string | undefined): Map<string, Buffer> {
  if (!raw) {
    throw new ConfigurationError("HMAC_SIGNING_KEYS environment variable not set");
  }

  const keys = new Map<string, Buffer>();
  for (const entry of raw.split(",")) {
    const pair = entry.trim();
    if (!pair) continue;

    const separator = pair.indexOf(":");
    if (separator === -1) {
      throw new ConfigurationError(
        "HMAC_SIGNING_KEYS must be in format 'id:key' separated by commas"
      );
    }

    const keyId = pair.slice(0, separator).trim();
    const keyHex = pair.slice(separator + 1).trim();
    if (!keyId) {
      throw new ConfigurationError("HMAC_SIGNING_KEYS entry missing key id");
    }
    if (!HEX_PATTERN.test(keyHex)) {
      throw new ConfigurationError(`HMAC_SIGNING_KEYS[${keyId}] must be hex-encoded`);
    }
    keys.set(keyId, Buffer.from(keyHex, "hex"));
  }

  if (keys.size === 0) {
    throw new ConfigurationError("HMAC_SIGNING_KEYS must contain at least one key");
  }
  return keys;
}

export function resolveCurrentSigningKeyId(
  signingKeys: Map<string, Buffer>,
  configured: string | undefined
): string {
  if (configured) {
    if (!signingKeys.has(configured)) {
      throw new ConfigurationError(
        "HMAC_CURRENT_KEY_ID does not match any key id in HMAC_SIGNING_KEYS"
      );
    }
    return configured;
  }

  const [first] = signingKeys.keys();
  if (first === undefined) {
    throw new ConfigurationError("HMAC_SIGNING_KEYS must contain at least one key");
  }
  return first;
}

export function loadSessionSecurityConfig(env: EnvConfig): SessionSecurityConfig {
  const encryptionKeys = [decodeEncryptionKey(env.SESSION_ENCRYPTION_KEY, "SESSION_ENCRYPTION_KEY")];
  if (env.SESSION_ENCRYPTION_KEY_PREV) {
    encryptionKeys.push(
      decodeEncryptionKey(env.SESSION_ENCRYPTION_KEY_PREV, "SESSION_ENCRYPTION_KEY_PREV")
    );
  }

  const signingKeys = parseSigningKeys(env.HMAC_SIGNING_KEYS);
  const currentSigningKeyId = resolveCurrentSigningKeyId(
    signingKeys,
    env.HMAC_CURRENT_KEY_ID || undefined
  );

  if (env.NODE_ENV === "production" && env.AUTH_TYPE === "dev") {
    throw new ConfigurationError("AUTH_TYPE='dev' is not allowed in production");
  }
  if (env.NODE_ENV === "production" && env.REDIS_SCRIPTING_MODE !== "atomic") {
    throw new ConfigurationError("REDIS_SCRIPTING_MODE must be 'atomic' in production");
  }

  return {
    encryptionKeys,
    signingKeys,
    currentSigningKeyId,
    timeouts: {
      idleTimeoutSeconds: env.SESSION_IDLE_TIMEOUT_MINUTES * 60,
      absoluteTimeoutSeconds: env.SESSION_ABSOLUTE_TIMEOUT_HOURS * 3600,
    },
    deviceBinding: {
      enabled: env.DEVICE_BINDING_ENABLED,
      subnetMask: env.DEVICE_BINDING_SUBNET_MASK,
    },
    createRateLimitPerMinute: env.SESSION_CREATE_RATE_LIMIT,
    validateRateLimitPerMinute: env.SESSION_VALIDATE_RATE_LIMIT,
    authType: env.AUTH_TYPE,
  };
}
