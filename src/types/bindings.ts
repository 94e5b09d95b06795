import type { KVStore } from "./kv";
import type { OAuthProvider, PresentationApiFactory } from "./google";
import type { SessionToken } from "../services/sessionService";

/**
 * アプリケーションに渡す環境（設定とバックエンド）
 */
export interface Bindings {
  // KV ストア（OAuth state・セッション）
  KV: KVStore;

  // 外部サービス
  OAUTH_PROVIDER: OAuthProvider;
  SLIDES_API: PresentationApiFactory;

  // 設定
  APP_URL: string;
  SESSION_TTL_SECONDS: number;
  STATE_TTL_SECONDS: number;
}

/**
 * Hono コンテキストの型定義
 */
export type HonoEnv = {
  Bindings: Bindings;
  Variables: Variables;
};

/**
 * Hono Variables（リクエストスコープの変数）
 */
export interface Variables {
  requestId?: string;
  startTime?: number;
  session?: SessionToken;
}
