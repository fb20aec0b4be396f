import type { IncomingHttpHeaders } from "node:http";

/** Cookie carrying the session identifier. */
export const SESSION_COOKIE_NAME = "RELAY_SESSION_ID";

/** Parses a `Cookie` header into name/value pairs. The first occurrence of a name wins. */
export function parseCookieHeader(header: string | undefined): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!header) {
    return cookies;
  }
  for (const part of header.split(";")) {
    const separator = part.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (name && !cookies.has(name)) {
      cookies.set(name, value);
    }
  }
  return cookies;
}

/** Returns the session identifier from the request cookies, or `null`. */
export function readSessionCookie(headers: IncomingHttpHeaders): string | null {
  const value = parseCookieHeader(headers.cookie).get(SESSION_COOKIE_NAME);
  return value && value.length > 0 ? value : null;
}
