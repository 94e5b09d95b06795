import type { KVStore, SessionRecord } from "../types/kv";
import { KVKeys } from "../types/kv";
import { BackendUnavailableError } from "../utils/errors";

/**
 * 認証済みセッション
 */
export interface SessionToken {
  sessionId: string;
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * セッション参照結果
 * expired と not_found は呼び出し側で同じ扱いにする
 */
export type SessionLookup =
  | { status: "active"; token: SessionToken }
  | { status: "expired" }
  | { status: "not_found" };

/**
 * セッション管理サービス
 * 更新・リフレッシュはしない（期限切れなら再認証）
 */
export class SessionService {
  constructor(
    private readonly kv: KVStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * セッションを保存
   */
  async put(
    sessionId: string,
    accessToken: string,
    ttlSeconds: number
  ): Promise<SessionToken> {
    const record: SessionRecord = {
      accessToken,
      expiresAt: this.now() + ttlSeconds * 1000,
    };

    try {
      await this.kv.put(KVKeys.session(sessionId), JSON.stringify(record), {
        expirationTtl: ttlSeconds,
      });
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to store session: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return { sessionId, ...record };
  }

  /**
   * セッションを取得
   */
  async get(sessionId: string): Promise<SessionLookup> {
    let raw: string | null;
    try {
      raw = await this.kv.get(KVKeys.session(sessionId));
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to read session: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    if (!raw) {
      return { status: "not_found" };
    }

    const record = parseSessionRecord(raw);
    if (!record) {
      return { status: "not_found" };
    }

    // KV の TTL とは別に expiresAt で判定する
    if (this.now() >= record.expiresAt) {
      await this.kv.delete(KVKeys.session(sessionId)).catch((error: unknown) => {
        console.error("[Session] Failed to delete expired session", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return { status: "expired" };
    }

    return { status: "active", token: { sessionId, ...record } };
  }
}

function parseSessionRecord(raw: string): SessionRecord | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    typeof data === "object" &&
    data !== null &&
    "accessToken" in data &&
    "expiresAt" in data &&
    typeof data.accessToken === "string" &&
    typeof data.expiresAt === "number"
  ) {
    return { accessToken: data.accessToken, expiresAt: data.expiresAt };
  }

  return null;
}
