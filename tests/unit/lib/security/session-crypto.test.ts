import { describe, expect, it, vi } from "vitest";

const { loggerMock } = vi.hoisted(() => ({
  loggerMock: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  },
}));

vi.mock("@/lib/logger", () => ({
  logger: loggerMock,
}));

import { ConfigurationError } from "@/lib/config/session-security";
import {
  extractSessionId,
  parseToken,
  SessionCrypto,
  SessionDecryptionError,
} from "@/lib/security/session-crypto";
import {
  createTestCrypto,
  flipCharAt,
  TEST_ENCRYPTION_KEY,
  TEST_PREVIOUS_ENCRYPTION_KEY,
} from "../../../helpers/session-fixtures";

describe("SessionCrypto", () => {
  describe("encrypt / decrypt", () => {
    it("round-trips a payload", () => {
      const crypto = createTestCrypto();
      const blob = crypto.encrypt('{"sessionId":"s1"}');

      expect(crypto.decrypt(blob)).toBe('{"sessionId":"s1"}');
    });

    it("lays out iv, tag and ciphertext", () => {
      const crypto = createTestCrypto();
      const blob = crypto.encrypt("hello");

      expect(blob.length).toBe(12 + 16 + 5);
    });

    it("uses a fresh IV per call", () => {
      const crypto = createTestCrypto();

      const first = crypto.encrypt("same");
      const second = crypto.encrypt("same");

      expect(first.subarray(0, 12).equals(second.subarray(0, 12))).toBe(false);
    });

    it("decrypts blobs written with the previous key", () => {
      const before = createTestCrypto({ encryptionKeys: [TEST_PREVIOUS_ENCRYPTION_KEY] });
      const after = createTestCrypto({
        encryptionKeys: [TEST_ENCRYPTION_KEY, TEST_PREVIOUS_ENCRYPTION_KEY],
      });

      expect(after.decrypt(before.encrypt("legacy"))).toBe("legacy");
    });

    it("fails once the old key is retired", () => {
      const before = createTestCrypto({ encryptionKeys: [TEST_PREVIOUS_ENCRYPTION_KEY] });
      const after = createTestCrypto({ encryptionKeys: [TEST_ENCRYPTION_KEY] });

      expect(() => after.decrypt(before.encrypt("legacy"))).toThrow(SessionDecryptionError);
    });

    it("rejects a tampered ciphertext byte", () => {
      const crypto = createTestCrypto();
      const blob = crypto.encrypt("payload");
      blob[blob.length - 1] ^= 0x01;

      expect(() => crypto.decrypt(blob)).toThrow(SessionDecryptionError);
    });

    it("rejects a blob too short to hold iv and tag", () => {
      const crypto = createTestCrypto();

      expect(() => crypto.decrypt(Buffer.alloc(28))).toThrow(SessionDecryptionError);
    });
  });

  describe("sign / verify", () => {
    it("prefixes the signature with the current key id", () => {
      const signature = createTestCrypto().sign("session-1");

      expect(signature).toMatch(/^k1:[0-9a-f]{64}$/);
    });

    it("verifies its own signature", () => {
      const crypto = createTestCrypto();

      expect(crypto.verify("session-1", crypto.sign("session-1"))).toBe(true);
    });

    it("rejects a signature for another session id", () => {
      const crypto = createTestCrypto();

      expect(crypto.verify("session-2", crypto.sign("session-1"))).toBe(false);
    });

    it("rejects an unknown key id and logs it", () => {
      const crypto = createTestCrypto();
      const signature = crypto.sign("session-1").replace(/^k1:/, "k9:");

      expect(crypto.verify("session-1", signature)).toBe(false);
      expect(loggerMock.warn).toHaveBeenCalledWith(
        "[SessionCrypto] Signature verification failed: unknown key id",
        { keyId: "k9" }
      );
    });

    it("still verifies tokens signed with a retired signing key", () => {
      const oldKey = Buffer.from("test-secret-old");
      const before = createTestCrypto({
        signingKeys: new Map([["k0", oldKey]]),
        currentSigningKeyId: "k0",
      });
      const after = createTestCrypto({
        signingKeys: new Map([
          ["k1", Buffer.from("test-secret-one")],
          ["k0", oldKey],
        ]),
        currentSigningKeyId: "k1",
      });

      expect(after.verify("session-1", before.sign("session-1"))).toBe(true);
      expect(after.sign("session-1").startsWith("k1:")).toBe(true);
    });
  });

  describe("tokens", () => {
    it("builds and verifies `{sessionId}.{keyId}:{hmac}`", () => {
      const crypto = createTestCrypto();
      const token = crypto.buildToken("abc_DEF-123");

      expect(token.startsWith("abc_DEF-123.k1:")).toBe(true);
      expect(crypto.verifyToken(token)).toBe("abc_DEF-123");
    });

    it("returns null for a single flipped character", () => {
      const crypto = createTestCrypto();
      const token = crypto.buildToken("abc_DEF-123");

      expect(crypto.verifyToken(flipCharAt(token, 0))).toBeNull();
      expect(crypto.verifyToken(flipCharAt(token, token.length - 1))).toBeNull();
    });
  });

  describe("constructor", () => {
    it("requires 32-byte encryption keys", () => {
      expect(() => createTestCrypto({ encryptionKeys: [Buffer.alloc(16)] })).toThrow(
        ConfigurationError
      );
    });

    it("requires at least one encryption key", () => {
      expect(() => createTestCrypto({ encryptionKeys: [] })).toThrow(ConfigurationError);
    });

    it("requires the current signing key id to exist", () => {
      expect(
        () =>
          new SessionCrypto({
            encryptionKeys: [TEST_ENCRYPTION_KEY],
            signingKeys: new Map([["k1", Buffer.from("test-secret-one")]]),
            currentSigningKeyId: "k2",
          })
      ).toThrow(ConfigurationError);
    });
  });
});

describe("parseToken", () => {
  it("splits on the last dot", () => {
    expect(parseToken("a.b.k1:cafe")).toEqual({ sessionId: "a.b", keyId: "k1", signature: "cafe" });
  });

  it.each([
    ["", "empty"],
    ["no-separator", "missing dot"],
    [".k1:cafe", "empty session id"],
    ["abc.k1cafe", "missing colon"],
    ["abc.:cafe", "empty key id"],
    ["abc.k1:", "empty signature"],
  ])("rejects %j (%s)", (token) => {
    expect(parseToken(token)).toBeNull();
  });
});

describe("extractSessionId", () => {
  it("returns the id without checking the signature", () => {
    expect(extractSessionId("abc.k1:not-checked")).toBe("abc");
  });

  it("throws on a token without a signature part", () => {
    expect(() => extractSessionId("abc")).toThrow("Invalid token format: missing signature");
  });
});
