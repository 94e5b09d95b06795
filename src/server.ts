import { serve } from "@hono/node-server";
import app from "./index";
import { loadConfig, redirectUri } from "./config";
import type { AppConfig } from "./config";
import type { Bindings } from "./types/bindings";
import { MemoryKVStore } from "./libs/memoryKvStore";
import { GoogleOAuthProvider } from "./libs/googleOAuthProvider";
import { GoogleSlidesClient } from "./libs/googleSlidesClient";

/**
 * 設定からバインディングを組み立てる
 */
function createBindings(config: AppConfig): Bindings {
  return {
    KV: new MemoryKVStore(),
    OAUTH_PROVIDER: new GoogleOAuthProvider({
      clientId: config.GOOGLE_CLIENT_ID,
      clientSecret: config.GOOGLE_CLIENT_SECRET,
      redirectUri: redirectUri(config),
      timeoutMs: config.GOOGLE_API_TIMEOUT_MS,
    }),
    SLIDES_API: (accessToken) =>
      new GoogleSlidesClient(accessToken, config.GOOGLE_API_TIMEOUT_MS),
    APP_URL: config.APP_URL,
    SESSION_TTL_SECONDS: config.SESSION_TTL_SECONDS,
    STATE_TTL_SECONDS: config.STATE_TTL_SECONDS,
  };
}

const config = loadConfig();
const bindings = createBindings(config);

if (!config.GOOGLE_CLIENT_ID || !config.GOOGLE_CLIENT_SECRET) {
  console.warn("[Server] GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET are not set");
}

const server = serve(
  {
    fetch: (request) => app.fetch(request, bindings),
    port: config.PORT,
    hostname: config.HOST,
  },
  (info) => {
    console.log("[Server]", {
      message: "Listening",
      address: `${info.address}:${info.port}`,
      appUrl: config.APP_URL,
    });
  }
);

const shutdown = () => {
  console.log("[Server]", { message: "Shutting down" });
  server.close(() => process.exit(0));
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
