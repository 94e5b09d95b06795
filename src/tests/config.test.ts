import { describe, it, expect } from "vitest";
import { loadConfig, redirectUri } from "../config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      PORT: 8787,
      HOST: "0.0.0.0",
      APP_URL: "http://localhost:8787",
      GOOGLE_CLIENT_ID: undefined,
      GOOGLE_CLIENT_SECRET: undefined,
      GOOGLE_REDIRECT_URI: undefined,
      GOOGLE_API_TIMEOUT_MS: 10_000,
      SESSION_TTL_SECONDS: 1_209_600,
      STATE_TTL_SECONDS: 600,
    });
    expect(redirectUri(config)).toBe("http://localhost:8787/oauth/callback");
  });

  it("parses numeric settings and treats empty strings as unset", () => {
    const config = loadConfig({
      PORT: "3000",
      APP_URL: "https://slides.example.com",
      GOOGLE_CLIENT_ID: "test-client",
      GOOGLE_CLIENT_SECRET: "",
      STATE_TTL_SECONDS: "120",
    });

    expect(config.PORT).toBe(3000);
    expect(config.GOOGLE_CLIENT_ID).toBe("test-client");
    expect(config.GOOGLE_CLIENT_SECRET).toBeUndefined();
    expect(config.STATE_TTL_SECONDS).toBe(120);
    expect(redirectUri(config)).toBe("https://slides.example.com/oauth/callback");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(
      "Invalid environment: PORT:"
    );
  });
});
