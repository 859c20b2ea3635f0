import { afterEach, describe, expect, it, vi } from "vitest";
import { isCookieError } from "../errors";
import {
  TOUGH_COOKIE_SECONDS,
  getCookie,
  readCookieRaw,
  removeCookie,
  setCookie,
  setToughCookie,
} from "./cookies";

function clearCookies() {
  for (const cookie of document.cookie.split("; ")) {
    const name = cookie.split("=")[0];
    if (name) removeCookie(name);
  }
}

describe("cookies", () => {
  afterEach(() => {
    clearCookies();
  });

  it("returns what was stored", () => {
    setCookie("pref", { a: 1 });
    expect(getCookie("pref")).toEqual({ a: 1 });
  });

  it.each([
    ["a string", "dark; mode=on"],
    ["a number", 42],
    ["a nested value", { volume: 0.5, queue: ["abc", "def"], muted: false, last: null }],
  ])("round-trips %s", (_label, value) => {
    setCookie("roundtrip", value);
    expect(getCookie("roundtrip")).toEqual(value);
  });

  it("percent-encodes the JSON body", () => {
    setCookie("pref", { a: 1 });
    expect(readCookieRaw("pref")).toBe("%7B%22a%22%3A1%7D");
  });

  it("returns the fallback once the cookie is gone", () => {
    setCookie("pref", { a: 1 });
    removeCookie("pref");
    expect(getCookie("pref", { a: 0 })).toEqual({ a: 0 });
    expect(getCookie("pref")).toBeNull();
  });

  it("matches the whole name", () => {
    setCookie("theme-old", "light");
    setCookie("theme", "dark");
    expect(getCookie("theme")).toBe("dark");
    expect(getCookie("them", "none")).toBe("none");
  });

  it("falls back when the stored value is not JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    document.cookie = "broken=%7Bnope; path=/";

    expect(getCookie("broken", "default")).toBe("default");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("writes session cookies without a max-age", () => {
    const write = vi.spyOn(document, "cookie", "set").mockImplementation(() => {});
    setCookie("pref", true);
    expect(write).toHaveBeenCalledWith("pref=true; path=/; samesite=lax");
  });

  it("keeps tough cookies for 400 days", () => {
    const write = vi.spyOn(document, "cookie", "set").mockImplementation(() => {});
    setToughCookie("pref", 1);
    expect(TOUGH_COOKIE_SECONDS).toBe(34_560_000);
    expect(write).toHaveBeenCalledWith("pref=1; path=/; samesite=lax; max-age=34560000");
  });

  it("rejects names that would corrupt the cookie header", () => {
    expect(() => setCookie("bad name", 1)).toThrowError('Invalid cookie name "bad name"');
    let caught: unknown = null;
    try {
      setCookie("a=b", 1);
    } catch (error) {
      caught = error;
    }
    expect(isCookieError(caught) && caught.code).toBe("INVALID_COOKIE_NAME");
  });

  it("rejects values JSON cannot represent", () => {
    let caught: unknown = null;
    try {
      setCookie("fn", () => 1);
    } catch (error) {
      caught = error;
    }
    expect(isCookieError(caught) && caught.code).toBe("UNSERIALIZABLE_COOKIE_VALUE");
    expect(readCookieRaw("fn")).toBeNull();
  });
});
