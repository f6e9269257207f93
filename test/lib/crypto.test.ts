import { randomBytes } from "node:crypto";
import { base64UrlDecode, base64UrlEncode, pkceChallenge, urlSafeRandomToken } from "../../src/lib/crypto";

describe("crypto helpers", () => {
  describe("base64UrlEncode", () => {
    it("uses the URL-safe alphabet without padding", () => {
      expect(base64UrlEncode(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
    });

    it("restores 32 random bytes after a decode", () => {
      const bytes = new Uint8Array(randomBytes(32));
      const encoded = base64UrlEncode(bytes);

      expect(encoded).toHaveLength(43);
      expect(encoded).not.toContain("=");
      expect(Array.from(base64UrlDecode(encoded))).toEqual(Array.from(bytes));
    });
  });

  describe("urlSafeRandomToken", () => {
    it("returns 43 URL-safe characters", () => {
      expect(urlSafeRandomToken()).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });

    it("returns a different value on each call", () => {
      expect(urlSafeRandomToken()).not.toBe(urlSafeRandomToken());
    });
  });

  describe("pkceChallenge", () => {
    it("hashes the verifier with SHA-256", () => {
      expect(pkceChallenge("dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk")).toBe(
        "E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM",
      );
    });

    it("is deterministic for one verifier and differs across verifiers", () => {
      const verifier = urlSafeRandomToken();
      expect(pkceChallenge(verifier)).toBe(pkceChallenge(verifier));
      expect(pkceChallenge(verifier)).not.toBe(pkceChallenge(urlSafeRandomToken()));
    });
  });
});
