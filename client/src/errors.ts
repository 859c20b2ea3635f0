export type CookieErrorCode = "INVALID_COOKIE_NAME" | "UNSERIALIZABLE_COOKIE_VALUE";

/**
 * Represent cookie write error behavior.
 */
export class CookieError extends Error {
  readonly code: CookieErrorCode;
  readonly cookieName: string;

  constructor(code: CookieErrorCode, cookieName: string, message: string) {
    super(message);
    this.name = "CookieError";
    this.code = code;
    this.cookieName = cookieName;
  }
}

/**
 * Check whether is cookie error.
 */
export function isCookieError(error: unknown): error is CookieError {
  return error instanceof CookieError;
}
