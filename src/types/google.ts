import type { slides_v1 } from "googleapis";

/**
 * Google OAuth トークンレスポンス
 * @see https://developers.google.com/identity/protocols/oauth2/web-server#exchange-authorization-code
 */
export interface GoogleTokenResponse {
  access_token: string;
  expires_in?: number; // 秒
  token_type: string;
  scope?: string;
  refresh_token?: string;
}

/**
 * 認可 URL の生成に必要なパラメータ
 */
export interface AuthorizationUrlParams {
  state: string;
  codeChallenge: string;
}

/**
 * OAuth プロバイダ（認可 URL の生成とコード交換）
 */
export interface OAuthProvider {
  authorizationUrl(params: AuthorizationUrlParams): string;
  exchangeCode(code: string, codeVerifier: string): Promise<GoogleTokenResponse>;
}

/**
 * Slides API のリクエスト（batchUpdate の 1 要素）
 */
export type SlidesRequest = slides_v1.Schema$Request;

/**
 * プレゼンテーション API クライアント
 */
export interface PresentationApiClient {
  createPresentation(title: string): Promise<{ presentationId: string }>;
  batchUpdate(presentationId: string, requests: SlidesRequest[]): Promise<void>;
}

/**
 * アクセストークンからクライアントを生成する
 */
export type PresentationApiFactory = (
  accessToken: string
) => PresentationApiClient;
