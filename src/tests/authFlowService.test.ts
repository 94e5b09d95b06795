import { describe, it, expect, beforeEach, vi } from "vitest";
import { AuthFlowService } from "../services/authFlowService";
import { SessionService } from "../services/sessionService";
import { MemoryKVStore } from "../libs/memoryKvStore";
import { GoogleOAuthProvider } from "../libs/googleOAuthProvider";
import { KVKeys } from "../types/kv";
import type { Bindings } from "../types/bindings";
import { deriveCodeChallenge } from "../utils/pkce";
import {
  ConfigurationError,
  CsrfMismatchError,
  StateExpiredError,
  TokenExchangeFailedError,
} from "../utils/errors";
import { createTestBindings } from "./helpers";

describe("AuthFlowService", () => {
  let now: number;
  let kv: MemoryKVStore;
  let bindings: Bindings;
  let provider: ReturnType<typeof createTestBindings>["provider"];
  let service: AuthFlowService;

  beforeEach(() => {
    now = 1_700_000_000_000;
    kv = new MemoryKVStore(() => now);
    ({ bindings, provider } = createTestBindings({ KV: kv }));
    service = new AuthFlowService(bindings, () => now);
  });

  async function storedVerifier(state: string): Promise<string> {
    const raw = await kv.get(KVKeys.oauthState(state));
    if (!raw) {
      throw new Error(`state ${state} is not stored`);
    }
    const data: unknown = JSON.parse(raw);
    if (
      typeof data !== "object" ||
      data === null ||
      !("codeVerifier" in data) ||
      typeof data.codeVerifier !== "string"
    ) {
      throw new Error("unexpected state record");
    }
    return data.codeVerifier;
  }

  describe("startAuth", () => {
    it("stores the verifier and embeds its challenge in the redirect", async () => {
      const started = await service.startAuth();
      const url = new URL(started.authorizationUrl);
      const verifier = await storedVerifier(started.stateToken);

      expect(url.searchParams.get("state")).toBe(started.stateToken);
      expect(url.searchParams.get("code_challenge")).toBe(
        deriveCodeChallenge(verifier)
      );
      expect(url.searchParams.get("code_challenge_method")).toBe("S256");
      expect(started.stateRetentionSeconds).toBe(660);
    });

    it("never reuses a state token or verifier", async () => {
      const first = await service.startAuth();
      const second = await service.startAuth();

      expect(first.stateToken).not.toBe(second.stateToken);
      expect(await storedVerifier(first.stateToken)).not.toBe(
        await storedVerifier(second.stateToken)
      );
    });

    it("fails with ConfigurationError before storing anything when the client is not configured", async () => {
      const unconfigured = new AuthFlowService(
        {
          ...bindings,
          OAUTH_PROVIDER: new GoogleOAuthProvider({ timeoutMs: 1000 }),
        },
        () => now
      );

      const put = vi.spyOn(kv, "put");

      await expect(unconfigured.startAuth()).rejects.toThrow(ConfigurationError);
      expect(put).not.toHaveBeenCalled();
    });
  });

  describe("handleCallback", () => {
    it("exchanges the code with the matching verifier and stores a session", async () => {
      const { stateToken } = await service.startAuth();
      const verifier = await storedVerifier(stateToken);

      const established = await service.handleCallback(
        { status: "pending", stateToken },
        stateToken,
        "auth-code"
      );

      expect(provider.exchangeCode).toHaveBeenCalledWith("auth-code", verifier);
      expect(established.ttlSeconds).toBe(3600);

      const lookup = await new SessionService(kv, () => now).get(
        established.sessionId
      );
      expect(lookup).toEqual({
        status: "active",
        token: {
          sessionId: established.sessionId,
          accessToken: "test-access-token",
          expiresAt: now + 3_600_000,
        },
      });
    });

    it("uses the configured session TTL when the provider gives no expiry", async () => {
      provider.exchangeCode.mockResolvedValueOnce({
        access_token: "test-access-token",
        token_type: "Bearer",
      });
      const { stateToken } = await service.startAuth();

      const established = await service.handleCallback(
        { status: "pending", stateToken },
        stateToken,
        "auth-code"
      );

      expect(established.ttlSeconds).toBe(1_209_600);
    });

    it("accepts a state only once", async () => {
      const { stateToken } = await service.startAuth();
      const pending = { status: "pending", stateToken } as const;

      await service.handleCallback(pending, stateToken, "auth-code");

      await expect(
        service.handleCallback(pending, stateToken, "auth-code")
      ).rejects.toThrow(CsrfMismatchError);
      expect(provider.exchangeCode).toHaveBeenCalledTimes(1);
    });

    it("rejects a state that belongs to another browser", async () => {
      const { stateToken } = await service.startAuth();

      await expect(
        service.handleCallback(
          { status: "pending", stateToken: "other-browser" },
          stateToken,
          "auth-code"
        )
      ).rejects.toThrow(CsrfMismatchError);
      await expect(
        service.handleCallback({ status: "no_session" }, stateToken, "auth-code")
      ).rejects.toThrow(CsrfMismatchError);
      expect(provider.exchangeCode).not.toHaveBeenCalled();
    });

    it("rejects an unknown state", async () => {
      await expect(
        service.handleCallback(
          { status: "pending", stateToken: "forged" },
          "forged",
          "auth-code"
        )
      ).rejects.toThrow(CsrfMismatchError);
    });

    it("rejects a state older than the TTL", async () => {
      const { stateToken } = await service.startAuth();
      now += 601_000;

      await expect(
        service.handleCallback({ status: "pending", stateToken }, stateToken, "auth-code")
      ).rejects.toThrow(StateExpiredError);
      expect(provider.exchangeCode).not.toHaveBeenCalled();
    });

    it("propagates a failed exchange and still consumes the state", async () => {
      provider.exchangeCode.mockRejectedValueOnce(
        new TokenExchangeFailedError("invalid_grant")
      );
      const { stateToken } = await service.startAuth();
      const pending = { status: "pending", stateToken } as const;

      await expect(
        service.handleCallback(pending, stateToken, "auth-code")
      ).rejects.toThrow(TokenExchangeFailedError);
      await expect(
        service.handleCallback(pending, stateToken, "auth-code")
      ).rejects.toThrow(CsrfMismatchError);
    });
  });

  describe("describeEstablishment", () => {
    it("resolves each state from the store", async () => {
      expect(await service.describeEstablishment(undefined, undefined)).toEqual({
        status: "no_session",
      });

      const { stateToken } = await service.startAuth();
      expect(await service.describeEstablishment(undefined, stateToken)).toEqual({
        status: "pending",
        stateToken,
      });

      const { sessionId } = await service.handleCallback(
        { status: "pending", stateToken },
        stateToken,
        "auth-code"
      );
      expect(await service.describeEstablishment(sessionId, stateToken)).toEqual({
        status: "authenticated",
        sessionId,
      });
    });

    it("stops reporting pending once the state TTL has passed", async () => {
      const { stateToken } = await service.startAuth();
      now += 601_000;

      expect(await service.describeEstablishment(undefined, stateToken)).toEqual({
        status: "no_session",
      });
    });

    it("ignores cookies that no longer resolve", async () => {
      expect(await service.describeEstablishment("stale-sid", "stale-state")).toEqual({
        status: "no_session",
      });
    });
  });

  describe("resolveCallbackEstablishment", () => {
    it("keeps an expired state pending while it is retained", async () => {
      const { stateToken } = await service.startAuth();
      now += 601_000;

      expect(await service.resolveCallbackEstablishment(stateToken)).toEqual({
        status: "pending",
        stateToken,
      });
    });

    it("drops the state once retention ends", async () => {
      const { stateToken } = await service.startAuth();
      now += 660_000;

      expect(await service.resolveCallbackEstablishment(stateToken)).toEqual({
        status: "no_session",
      });
    });

    it("returns no_session without a cookie or for an unknown token", async () => {
      expect(await service.resolveCallbackEstablishment(undefined)).toEqual({
        status: "no_session",
      });
      expect(await service.resolveCallbackEstablishment("forged")).toEqual({
        status: "no_session",
      });
    });
  });
});
