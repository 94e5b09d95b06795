import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { HonoEnv } from "../types/bindings";

export const REQUEST_ID_HEADER = "X-Request-Id";

// 上流（リバースプロキシ等）が付けた ID はこの形式なら引き継ぐ
const INBOUND_REQUEST_ID = /^[A-Za-z0-9._-]{1,64}$/;

function resolveRequestId(c: Context<HonoEnv>): string {
  const inbound = c.req.header(REQUEST_ID_HEADER);
  return inbound && INBOUND_REQUEST_ID.test(inbound) ? inbound : randomUUID();
}

/**
 * リクエストロギングミドルウェア
 * requestId は [Auth] / [Slides] / [Error] のログとレスポンスヘッダにも載る
 */
export async function requestLogger(
  c: Context<HonoEnv>,
  next: Next
): Promise<void> {
  const requestId = resolveRequestId(c);
  const startTime = Date.now();

  c.set("requestId", requestId);
  c.set("startTime", startTime);

  console.log("[Request]", {
    requestId,
    method: c.req.method,
    path: c.req.path,
  });

  await next();

  c.header(REQUEST_ID_HEADER, requestId);

  // セッションはトークンを出さず、解決できたかどうかだけ
  console.log("[Response]", {
    requestId,
    status: c.res.status,
    authenticated: c.get("session") !== undefined,
    duration: `${Date.now() - startTime}ms`,
  });
}
