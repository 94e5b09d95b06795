import type { Context, Next } from "hono";
import type { HonoEnv } from "../types/bindings";
import { SessionService } from "../services/sessionService";
import { readCookies } from "../utils/cookies";
import { UnauthenticatedError } from "../utils/errors";

/**
 * セッション必須ミドルウェア
 * sid Cookie を KV のセッションに解決して c.var.session に入れる
 */
export async function requireSession(
  c: Context<HonoEnv>,
  next: Next
): Promise<void> {
  const { sessionId } = readCookies(c);

  if (!sessionId) {
    throw new UnauthenticatedError("No session cookie");
  }

  const lookup = await new SessionService(c.env.KV).get(sessionId);

  if (lookup.status !== "active") {
    throw new UnauthenticatedError("Session expired or not found");
  }

  c.set("session", lookup.token);
  await next();
}
