/**
 * Module `client/src/data/cookies.ts`: persist small UI preferences as JSON cookies.
 */

import { CookieError } from "../errors";

/** Upper bound browsers enforce on cookie lifetime. */
export const TOUGH_COOKIE_SECONDS = 60 * 60 * 24 * 400;

const COOKIE_ATTRIBUTES = "path=/; samesite=lax";
const INVALID_NAME_PATTERN = /[=;,\s]/;

/**
 * Handle set cookie.
 * A lifetime of 0 keeps the cookie until the browser session ends.
 */
export function setCookie(name: string, value: unknown, secondsAlive = 0): void {
  assertCookieName(name);
  // undefined for functions, symbols and undefined itself
  const json: string | undefined = JSON.stringify(value);
  if (json === undefined) {
    throw new CookieError(
      "UNSERIALIZABLE_COOKIE_VALUE",
      name,
      `Cookie "${name}" value cannot be serialized as JSON`
    );
  }
  const body = encodeURIComponent(json);
  const age = secondsAlive > 0 ? `; max-age=${Math.floor(secondsAlive)}` : "";
  document.cookie = `${name}=${body}; ${COOKIE_ATTRIBUTES}${age}`;
}

/**
 * Handle set tough cookie.
 */
export function setToughCookie(name: string, value: unknown): void {
  setCookie(name, value, TOUGH_COOKIE_SECONDS);
}

/**
 * Handle get cookie.
 */
export function getCookie<T = unknown>(name: string): T | null;
export function getCookie<T>(name: string, fallback: T): T;
export function getCookie<T>(name: string, fallback: T | null = null): T | null {
  const raw = readCookieRaw(name);
  if (raw === null) return fallback;
  try {
    return JSON.parse(decodeURIComponent(raw)) as T;
  } catch (error) {
    console.warn(`[cookies] ignoring unreadable cookie "${name}"`, error);
    return fallback;
  }
}

/**
 * Handle remove cookie.
 */
export function removeCookie(name: string): void {
  assertCookieName(name);
  document.cookie = `${name}=; ${COOKIE_ATTRIBUTES}; max-age=0`;
}

/**
 * Handle read cookie raw value.
 */
export function readCookieRaw(name: string): string | null {
  const header = document.cookie;
  if (!header) return null;
  for (const cookie of header.split("; ")) {
    const separator = cookie.indexOf("=");
    if (separator === -1) continue;
    if (cookie.slice(0, separator) === name) {
      return cookie.slice(separator + 1);
    }
  }
  return null;
}

function assertCookieName(name: string) {
  if (!name || INVALID_NAME_PATTERN.test(name)) {
    throw new CookieError("INVALID_COOKIE_NAME", name, `Invalid cookie name "${name}"`);
  }
}
