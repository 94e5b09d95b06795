import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { AuthFlowService } from "../../services/authFlowService";
import {
  clearAppCookie,
  readCookies,
  SESSION_COOKIE,
} from "../../utils/cookies";

const app = new Hono<HonoEnv>();

/**
 * 現在のセッション状態（no_session / pending / authenticated）
 */
app.get("/", async (c) => {
  const { sessionId, stateToken } = readCookies(c);
  const authService = new AuthFlowService(c.env);

  const current = await authService.describeEstablishment(sessionId, stateToken);

  // 期限切れ・不明な sid Cookie は消す
  if (sessionId && current.status !== "authenticated") {
    clearAppCookie(c, SESSION_COOKIE);
  }

  return c.json({ status: current.status });
});

export default app;
