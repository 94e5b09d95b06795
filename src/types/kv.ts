/**
 * KV バックエンドの最小インターフェース（put/get/delete + TTL）
 */
export interface KVStore {
  get(key: string): Promise<string | null>;
  put(
    key: string,
    value: string,
    options?: { expirationTtl?: number }
  ): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * OAuth 認可リクエストの状態（KV に保存）
 * Key: state:{state}
 */
export interface AuthorizationState {
  codeVerifier: string;
  createdAt: number; // Unix timestamp (ms)
}

/**
 * セッション（KV に保存）
 * Key: session:{sessionId}
 */
export interface SessionRecord {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * KV キー生成ヘルパー
 */
export const KVKeys = {
  oauthState: (state: string) => `state:${state}`,
  session: (sessionId: string) => `session:${sessionId}`,
} as const;
