import { Buffer } from "node:buffer";
import { createHash, randomBytes } from "node:crypto";

const TOKEN_BYTES = 32;

export function base64UrlEncode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

export function base64UrlDecode(text: string): Uint8Array {
  const b64 = text.replace(/-/g, "+").replace(/_/g, "/");
  const padded = b64 + "=".repeat((4 - (b64.length % 4)) % 4);
  return new Uint8Array(Buffer.from(padded, "base64"));
}

// 32 random bytes, base64url without padding (43 chars). Used for state, nonce and PKCE verifier.
export function urlSafeRandomToken(): string {
  return base64UrlEncode(randomBytes(TOKEN_BYTES));
}

/** S256 code challenge for a PKCE verifier. */
export function pkceChallenge(verifier: string): string {
  return base64UrlEncode(createHash("sha256").update(verifier, "utf8").digest());
}
