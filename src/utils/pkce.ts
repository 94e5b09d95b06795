import { createHash, randomBytes } from "node:crypto";

const STATE_BYTES = 24; // base64url で 32 文字
const VERIFIER_BYTES = 48; // base64url で 64 文字（RFC 7636: 43〜128 文字）
const SESSION_ID_BYTES = 32;

/**
 * URL セーフなランダム文字列を生成
 */
export function randomToken(bytes: number): string {
  return randomBytes(bytes).toString("base64url");
}

export function generateState(): string {
  return randomToken(STATE_BYTES);
}

export function generateCodeVerifier(): string {
  return randomToken(VERIFIER_BYTES);
}

export function generateSessionId(): string {
  return randomToken(SESSION_ID_BYTES);
}

/**
 * PKCE code_challenge（S256）
 * @see https://datatracker.ietf.org/doc/html/rfc7636#section-4.2
 */
export function deriveCodeChallenge(codeVerifier: string): string {
  return createHash("sha256").update(codeVerifier).digest("base64url");
}
