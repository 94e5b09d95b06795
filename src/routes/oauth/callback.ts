import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { AuthFlowService } from "../../services/authFlowService";
import type { EstablishedSession } from "../../services/authFlowService";
import { transition } from "../../services/sessionStateMachine";
import {
  clearAppCookie,
  readCookies,
  SESSION_COOKIE,
  setAppCookie,
  STATE_COOKIE,
} from "../../utils/cookies";
import { AppError, MalformedRequestError } from "../../utils/errors";

const app = new Hono<HonoEnv>();

/**
 * OAuth コールバック処理
 */
app.get("/", async (c) => {
  const providerError = c.req.query("error");
  if (providerError) {
    throw new MalformedRequestError(`Authorization denied: ${providerError}`);
  }

  const code = c.req.query("code");
  const state = c.req.query("state");

  if (!code || !state) {
    throw new MalformedRequestError("Missing code or state parameter");
  }

  const authService = new AuthFlowService(c.env);
  const { stateToken } = readCookies(c);

  // 1. このブラウザが認可待ちかどうか（state Cookie と KV で判定）
  const pending = await authService.resolveCallbackEstablishment(stateToken);

  // 2. State 検証・トークン交換・セッション保存
  let established: EstablishedSession;
  try {
    established = await authService.handleCallback(pending, state, code);
  } catch (error) {
    if (error instanceof AppError && pending.status === "pending") {
      const next = transition(pending, { type: "callback_rejected" });
      console.warn("[Auth] Callback rejected", {
        requestId: c.get("requestId"),
        code: error.code,
        status: next.status,
      });
    }
    throw error;
  }

  const next = transition(pending, {
    type: "callback_accepted",
    sessionId: established.sessionId,
  });

  console.log("[Auth] Session established", {
    requestId: c.get("requestId"),
    status: next.status,
    ttlSeconds: established.ttlSeconds,
  });

  // 3. Cookie を差し替えてアプリへ
  clearAppCookie(c, STATE_COOKIE);
  setAppCookie(c, SESSION_COOKIE, established.sessionId, established.ttlSeconds);

  return c.redirect(new URL("/app", c.env.APP_URL).toString());
});

export default app;
