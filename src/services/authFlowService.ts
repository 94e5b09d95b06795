import type { Bindings } from "../types/bindings";
import type { AuthorizationState } from "../types/kv";
import { KVKeys } from "../types/kv";
import {
  BackendUnavailableError,
  CsrfMismatchError,
  StateExpiredError,
} from "../utils/errors";
import {
  deriveCodeChallenge,
  generateCodeVerifier,
  generateSessionId,
  generateState,
} from "../utils/pkce";
import { SessionService } from "./sessionService";
import type { SessionEstablishment } from "./sessionStateMachine";
import { NO_SESSION } from "./sessionStateMachine";

// KV と state Cookie の寿命 = STATE_TTL_SECONDS + 猶予。猶予中の state は StateExpired になる
const STATE_GRACE_SECONDS = 60;

export interface StartedAuthorization {
  authorizationUrl: string;
  stateToken: string;
  // state Cookie の Max-Age
  stateRetentionSeconds: number;
}

export interface EstablishedSession {
  sessionId: string;
  ttlSeconds: number;
}

/**
 * OAuth 2.0 + PKCE 認証フロー
 */
export class AuthFlowService {
  private readonly sessions: SessionService;

  constructor(
    private readonly env: Bindings,
    private readonly now: () => number = Date.now
  ) {
    this.sessions = new SessionService(env.KV, now);
  }

  /**
   * 認可を開始（state と PKCE ペアを発行）
   */
  async startAuth(): Promise<StartedAuthorization> {
    const stateToken = generateState();
    const codeVerifier = generateCodeVerifier();

    // 設定不足はここで ConfigurationError になる（KV に書く前）
    const authorizationUrl = this.env.OAUTH_PROVIDER.authorizationUrl({
      state: stateToken,
      codeChallenge: deriveCodeChallenge(codeVerifier),
    });

    const stateData: AuthorizationState = {
      codeVerifier,
      createdAt: this.now(),
    };

    const stateRetentionSeconds = this.env.STATE_TTL_SECONDS + STATE_GRACE_SECONDS;

    try {
      await this.env.KV.put(
        KVKeys.oauthState(stateToken),
        JSON.stringify(stateData),
        { expirationTtl: stateRetentionSeconds }
      );
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to store OAuth state: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return {
      authorizationUrl,
      stateToken,
      stateRetentionSeconds,
    };
  }

  /**
   * コールバックを処理してセッションを作成
   */
  async handleCallback(
    establishment: SessionEstablishment,
    receivedState: string,
    code: string
  ): Promise<EstablishedSession> {
    if (
      establishment.status !== "pending" ||
      establishment.stateToken !== receivedState
    ) {
      throw new CsrfMismatchError("State does not match this browser");
    }

    const stateData = await this.consumeState(receivedState);

    const tokenData = await this.env.OAUTH_PROVIDER.exchangeCode(
      code,
      stateData.codeVerifier
    );

    const ttlSeconds =
      tokenData.expires_in === undefined
        ? this.env.SESSION_TTL_SECONDS
        : Math.min(this.env.SESSION_TTL_SECONDS, tokenData.expires_in);

    const sessionId = generateSessionId();
    await this.sessions.put(sessionId, tokenData.access_token, ttlSeconds);

    return { sessionId, ttlSeconds };
  }

  /**
   * Cookie の値から現在の状態を解決（KV を参照する）
   */
  async describeEstablishment(
    sessionId: string | undefined,
    stateToken: string | undefined
  ): Promise<SessionEstablishment> {
    if (sessionId) {
      const lookup = await this.sessions.get(sessionId);
      if (lookup.status === "active") {
        return { status: "authenticated", sessionId };
      }
    }

    if (stateToken) {
      const stateData = await this.readState(stateToken);
      if (stateData && !this.isExpired(stateData)) {
        return { status: "pending", stateToken };
      }
    }

    return NO_SESSION;
  }

  /**
   * コールバック時点の状態を state Cookie から解決
   * KV に残っていれば期限切れでも pending（年齢は handleCallback で判定）
   */
  async resolveCallbackEstablishment(
    stateToken: string | undefined
  ): Promise<SessionEstablishment> {
    if (stateToken && (await this.readState(stateToken))) {
      return { status: "pending", stateToken };
    }
    return NO_SESSION;
  }

  /**
   * State を検証して削除（一度しか使えない）
   */
  private async consumeState(state: string): Promise<AuthorizationState> {
    const stateData = await this.readState(state);

    if (!stateData) {
      throw new CsrfMismatchError("Unknown or already used state");
    }

    try {
      await this.env.KV.delete(KVKeys.oauthState(state));
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to delete OAuth state: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    if (this.isExpired(stateData)) {
      throw new StateExpiredError();
    }

    return stateData;
  }

  private isExpired(stateData: AuthorizationState): boolean {
    return this.now() - stateData.createdAt > this.env.STATE_TTL_SECONDS * 1000;
  }

  private async readState(state: string): Promise<AuthorizationState | null> {
    let raw: string | null;
    try {
      raw = await this.env.KV.get(KVKeys.oauthState(state));
    } catch (error) {
      throw new BackendUnavailableError(
        `Failed to read OAuth state: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return raw ? parseAuthorizationState(raw) : null;
  }
}

function parseAuthorizationState(raw: string): AuthorizationState | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    typeof data === "object" &&
    data !== null &&
    "codeVerifier" in data &&
    "createdAt" in data &&
    typeof data.codeVerifier === "string" &&
    typeof data.createdAt === "number"
  ) {
    return { codeVerifier: data.codeVerifier, createdAt: data.createdAt };
  }

  return null;
}
