import { Hono } from "hono";
import type { HonoEnv } from "./types/bindings";
import { requestLogger } from "./middleware/requestLogger";
import { errorHandler } from "./middleware/errorHandler";
import oauthStartRoute from "./routes/oauth/start";
import oauthCallbackRoute from "./routes/oauth/callback";
import createSlidesRoute from "./routes/api/createSlides";
import splittersRoute from "./routes/api/splitters";
import sessionRoute from "./routes/api/session";

const app = new Hono<HonoEnv>();

// ミドルウェア
app.use("*", requestLogger);
app.onError(errorHandler);

// ヘルスチェック
app.get("/health", (c) => {
  return c.json({
    status: "ok",
    service: "text-to-deck",
    timestamp: new Date().toISOString(),
  });
});

// ルート
app.route("/oauth/start", oauthStartRoute);
app.route("/oauth/callback", oauthCallbackRoute);
app.route("/api/create-slides", createSlidesRoute);
app.route("/api/splitters", splittersRoute);
app.route("/api/session", sessionRoute);

export default app;
