import type { Context } from "hono";
import type { HonoEnv } from "../types/bindings";
import { AppError } from "../utils/errors";

/**
 * エラーハンドリングミドルウェア
 */
export async function errorHandler(
  err: Error,
  c: Context<HonoEnv>
): Promise<Response> {
  const log = {
    timestamp: new Date().toISOString(),
    requestId: c.get("requestId"),
    path: c.req.path,
    method: c.req.method,
    error: {
      name: err.name,
      message: err.message,
      code: err instanceof AppError ? err.code : undefined,
    },
  };

  // 想定外のエラーだけスタックを出す
  if (err instanceof AppError) {
    console.error("[Error]", log);
  } else {
    console.error("[Error]", { ...log, stack: err.stack });
  }

  const errorResponse = {
    error: {
      code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
      message:
        err instanceof AppError ? err.message : "An unexpected error occurred",
      ...(err instanceof AppError ? err.details : {}),
    },
  };

  const statusCode = err instanceof AppError ? err.statusCode : 500;

  return new Response(JSON.stringify(errorResponse), {
    status: statusCode,
    headers: {
      "Content-Type": "application/json",
    },
  });
}
