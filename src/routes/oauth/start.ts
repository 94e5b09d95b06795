import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { AuthFlowService } from "../../services/authFlowService";
import { transition } from "../../services/sessionStateMachine";
import { readCookies, setAppCookie, STATE_COOKIE } from "../../utils/cookies";

const app = new Hono<HonoEnv>();

/**
 * OAuth 認証開始
 */
app.get("/", async (c) => {
  const authService = new AuthFlowService(c.env);
  const { sessionId, stateToken } = readCookies(c);

  const current = await authService.describeEstablishment(sessionId, stateToken);
  const started = await authService.startAuth();

  const next = transition(current, {
    type: "auth_started",
    stateToken: started.stateToken,
  });

  console.log("[Auth] Authorization started", {
    requestId: c.get("requestId"),
    from: current.status,
    to: next.status,
  });

  setAppCookie(c, STATE_COOKIE, started.stateToken, started.stateRetentionSeconds);

  return c.redirect(started.authorizationUrl);
});

export default app;
