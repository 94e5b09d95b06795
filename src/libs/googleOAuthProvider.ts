import { z } from "zod";
import type {
  AuthorizationUrlParams,
  GoogleTokenResponse,
  OAuthProvider,
} from "../types/google";
import { ConfigurationError, TokenExchangeFailedError } from "../utils/errors";

const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/presentations",
  "https://www.googleapis.com/auth/drive.file",
].join(" ");

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive().optional(),
  token_type: z.string(),
  scope: z.string().optional(),
  refresh_token: z.string().optional(),
});

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface GoogleOAuthSettings {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  timeoutMs: number;
}

/**
 * Google OAuth 2.0（Authorization Code + PKCE）
 * @see https://developers.google.com/identity/protocols/oauth2/web-server
 */
export class GoogleOAuthProvider implements OAuthProvider {
  constructor(
    private readonly settings: GoogleOAuthSettings,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  /**
   * 認可 URL を生成
   */
  authorizationUrl({ state, codeChallenge }: AuthorizationUrlParams): string {
    const { clientId, redirectUri } = this.requireSettings();

    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: redirectUri,
      response_type: "code",
      scope: GOOGLE_SCOPES,
      state,
      code_challenge: codeChallenge,
      code_challenge_method: "S256",
    });

    return `${GOOGLE_AUTH_URL}?${params.toString()}`;
  }

  /**
   * 認可コードをアクセストークンに交換
   */
  async exchangeCode(
    code: string,
    codeVerifier: string
  ): Promise<GoogleTokenResponse> {
    const { clientId, clientSecret, redirectUri } = this.requireSettings();

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.settings.timeoutMs
    );

    try {
      const response = await this.fetchFn(GOOGLE_TOKEN_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          grant_type: "authorization_code",
          code,
          code_verifier: codeVerifier,
          client_id: clientId,
          client_secret: clientSecret,
          redirect_uri: redirectUri,
        }).toString(),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new TokenExchangeFailedError(
          `Token endpoint returned ${response.status}: ${error}`
        );
      }

      const parsed = TokenResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new TokenExchangeFailedError("Malformed token response");
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof TokenExchangeFailedError) {
        throw error;
      }
      throw new TokenExchangeFailedError(
        `Failed to exchange code for token: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private requireSettings(): {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
  } {
    const { clientId, clientSecret, redirectUri } = this.settings;
    if (!clientId || !clientSecret || !redirectUri) {
      throw new ConfigurationError(
        "GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REDIRECT_URI must be set"
      );
    }
    return { clientId, clientSecret, redirectUri };
  }
}
