import { vi } from "vitest";
import type { Bindings } from "../types/bindings";
import type {
  AuthorizationUrlParams,
  GoogleTokenResponse,
  PresentationApiClient,
  SlidesRequest,
} from "../types/google";
import { MemoryKVStore } from "../libs/memoryKvStore";

export const TEST_APP_URL = "http://app.test";

/**
 * テスト用の OAuth プロバイダ
 */
export function createFakeProvider() {
  return {
    authorizationUrl: vi.fn(
      ({ state, codeChallenge }: AuthorizationUrlParams) =>
        `https://auth.test/authorize?${new URLSearchParams({
          state,
          code_challenge: codeChallenge,
          code_challenge_method: "S256",
        }).toString()}`
    ),
    exchangeCode: vi.fn(
      async (
        _code: string,
        _codeVerifier: string
      ): Promise<GoogleTokenResponse> => ({
        access_token: "test-access-token",
        token_type: "Bearer",
        expires_in: 3600,
      })
    ),
  };
}

type ApiCall =
  | { method: "createPresentation"; title: string }
  | { method: "batchUpdate"; presentationId: string; requests: SlidesRequest[] };

/**
 * テスト用の Slides API（呼び出しを記録する）
 */
export class FakePresentationApi implements PresentationApiClient {
  readonly calls: ApiCall[] = [];
  createError: Error | null = null;
  batchError: Error | null = null;

  constructor(private readonly presentationId: string = "deck-123") {}

  async createPresentation(title: string): Promise<{ presentationId: string }> {
    this.calls.push({ method: "createPresentation", title });
    if (this.createError) {
      throw this.createError;
    }
    return { presentationId: this.presentationId };
  }

  async batchUpdate(
    presentationId: string,
    requests: SlidesRequest[]
  ): Promise<void> {
    this.calls.push({ method: "batchUpdate", presentationId, requests });
    if (this.batchError) {
      throw this.batchError;
    }
  }
}

export function createTestBindings(overrides: Partial<Bindings> = {}) {
  const kv = new MemoryKVStore();
  const provider = createFakeProvider();
  const slidesApi = new FakePresentationApi();
  const slidesFactory = vi.fn((_accessToken: string) => slidesApi);

  const bindings: Bindings = {
    KV: kv,
    OAUTH_PROVIDER: provider,
    SLIDES_API: slidesFactory,
    APP_URL: TEST_APP_URL,
    SESSION_TTL_SECONDS: 1_209_600,
    STATE_TTL_SECONDS: 600,
    ...overrides,
  };

  return { bindings, kv, provider, slidesApi, slidesFactory };
}

/**
 * Set-Cookie ヘッダから値を取り出す
 */
export function setCookieValue(
  response: Response,
  name: string
): string | undefined {
  for (const header of response.headers.getSetCookie()) {
    const [pair = ""] = header.split(";");
    const separator = pair.indexOf("=");
    if (pair.slice(0, separator) === name) {
      return pair.slice(separator + 1);
    }
  }
  return undefined;
}

export function setCookieHeader(
  response: Response,
  name: string
): string | undefined {
  return response.headers
    .getSetCookie()
    .find((header) => header.startsWith(`${name}=`));
}
