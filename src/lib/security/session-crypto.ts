import { createCipheriv, createDecipheriv, createHmac, randomBytes } from "node:crypto";
import { ConfigurationError } from "@/lib/config/session-security";
import { logger } from "@/lib/logger";
import { constantTimeEqual } from "./constant-time-compare";

const ALGORITHM = "aes-256-gcm";
const IV_BYTES = 12;
const AUTH_TAG_BYTES = 16;
const KEY_BYTES = 32;

/**
 * The only error `decrypt` ever raises. Tampering, a wrong key and corrupt
 * bytes all look the same to the caller.
 */
export class SessionDecryptionError extends Error {
  constructor() {
    super("Session payload could not be decrypted");
    this.name = "SessionDecryptionError";
  }
}

export interface SessionCryptoOptions {
  /** Newest first. Encryption always uses index 0; decryption tries each in order. */
  encryptionKeys: Buffer[];
  signingKeys: Map<string, Buffer>;
  currentSigningKeyId: string;
}

export interface ParsedToken {
  sessionId: string;
  keyId: string;
  signature: string;
}

/**
 * Authenticated encryption of session blobs plus detached HMAC signing of
 * session ids, both with rotation-friendly key sets.
 *
 * Blob layout: `iv(12) | tag(16) | ciphertext`.
 * Token layout: `{sessionId}.{keyId}:{hexHmac}`.
 */
export class SessionCrypto {
  private readonly encryptionKeys: readonly Buffer[];
  private readonly signingKeys: ReadonlyMap<string, Buffer>;
  private readonly currentSigningKeyId: string;

  constructor(options: SessionCryptoOptions) {
    if (options.encryptionKeys.length === 0) {
      throw new ConfigurationError("At least one session encryption key is required");
    }
    for (const key of options.encryptionKeys) {
      if (key.length !== KEY_BYTES) {
        throw new ConfigurationError(`Session encryption keys must be ${KEY_BYTES} bytes`);
      }
    }
    if (!options.signingKeys.has(options.currentSigningKeyId)) {
      throw new ConfigurationError(
        `Current signing key id '${options.currentSigningKeyId}' is not configured`
      );
    }

    this.encryptionKeys = [...options.encryptionKeys];
    this.signingKeys = new Map(options.signingKeys);
    this.currentSigningKeyId = options.currentSigningKeyId;
  }

  encrypt(plaintext: string): Buffer {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.encryptionKeys[0], iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]);
  }

  decrypt(blob: Buffer): string {
    if (blob.length <= IV_BYTES + AUTH_TAG_BYTES) {
      throw new SessionDecryptionError();
    }

    const iv = blob.subarray(0, IV_BYTES);
    const authTag = blob.subarray(IV_BYTES, IV_BYTES + AUTH_TAG_BYTES);
    const ciphertext = blob.subarray(IV_BYTES + AUTH_TAG_BYTES);

    for (const key of this.encryptionKeys) {
      try {
        const decipher = createDecipheriv(ALGORITHM, key, iv);
        decipher.setAuthTag(authTag);
        return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
      } catch {
        // GCM auth failure: try the next (older) key
        continue;
      }
    }

    throw new SessionDecryptionError();
  }

  sign(sessionId: string): string {
    const key = this.signingKeys.get(this.currentSigningKeyId);
    if (!key) {
      throw new ConfigurationError(
        `Current signing key id '${this.currentSigningKeyId}' is not configured`
      );
    }
    return `${this.currentSigningKeyId}:${hmacHex(key, sessionId)}`;
  }

  verify(sessionId: string, keySignature: string): boolean {
    const separator = keySignature.indexOf(":");
    if (separator === -1) {
      return false;
    }

    const keyId = keySignature.slice(0, separator);
    const signature = keySignature.slice(separator + 1);
    const key = this.signingKeys.get(keyId);
    if (!key) {
      logger.warn("[SessionCrypto] Signature verification failed: unknown key id", { keyId });
      return false;
    }

    return constantTimeEqual(signature, hmacHex(key, sessionId));
  }

  buildToken(sessionId: string): string {
    return `${sessionId}.${this.sign(sessionId)}`;
  }

  /**
   * Returns the session id when the token is well-formed and correctly signed.
   */
  verifyToken(token: string): string | null {
    const parsed = parseToken(token);
    if (!parsed) {
      return null;
    }
    return this.verify(parsed.sessionId, `${parsed.keyId}:${parsed.signature}`)
      ? parsed.sessionId
      : null;
  }
}

function hmacHex(key: Buffer, data: string): string {
  return createHmac("sha256", key).update(data, "utf8").digest("hex");
}

/**
 * Splits on the last `.` so session ids that contain dots still parse.
 */
export function parseToken(token: string): ParsedToken | null {
  if (!token) {
    return null;
  }

  const dot = token.lastIndexOf(".");
  if (dot <= 0) {
    return null;
  }

  const sessionId = token.slice(0, dot);
  const keySignature = token.slice(dot + 1);
  const colon = keySignature.indexOf(":");
  if (colon <= 0 || colon === keySignature.length - 1) {
    return null;
  }

  return {
    sessionId,
    keyId: keySignature.slice(0, colon),
    signature: keySignature.slice(colon + 1),
  };
}

/**
 * Session id of a token without checking its signature. Only for log
 * correlation and cleanup paths that already hold a validated session.
 */
export function extractSessionId(token: string): string {
  const dot = token.lastIndexOf(".");
  if (dot === -1) {
    throw new Error("Invalid token format: missing signature");
  }
  const sessionId = token.slice(0, dot);
  if (!sessionId) {
    throw new Error("Invalid token format: empty session id");
  }
  return sessionId;
}
