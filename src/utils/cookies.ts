import type { Context } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";

type CookieOptions = NonNullable<Parameters<typeof setCookie>[3]>;

export const SESSION_COOKIE = "sid";
export const STATE_COOKIE = "oauth_state";

const BASE_OPTIONS: CookieOptions = {
  path: "/",
  httpOnly: true,
  secure: true,
  sameSite: "Lax",
};

export function setAppCookie(
  c: Context,
  name: string,
  value: string,
  maxAgeSeconds: number
): void {
  setCookie(c, name, value, { ...BASE_OPTIONS, maxAge: maxAgeSeconds });
}

export function clearAppCookie(c: Context, name: string): void {
  deleteCookie(c, name, BASE_OPTIONS);
}

export function readCookies(c: Context): {
  sessionId: string | undefined;
  stateToken: string | undefined;
} {
  return {
    sessionId: getCookie(c, SESSION_COOKIE) || undefined,
    stateToken: getCookie(c, STATE_COOKIE) || undefined,
  };
}
