// A combined header joins cookies with ", "; expiry dates contain ", " too,
// so only split where the next segment starts a new `name=` pair.
const COMBINED_COOKIE_SPLIT = /,\s*(?=[^;,=\s]+=)/;

export function readSetCookieHeaders(headers: Headers): string[] {
  const values = headers.getSetCookie();
  if (values.length > 0) {
    return values;
  }
  const combined = headers.get('set-cookie');
  return combined ? combined.split(COMBINED_COOKIE_SPLIT) : [];
}

/** Cookie name -> value; attributes such as `Path` or `HttpOnly` are ignored. */
export function parseSetCookie(values: readonly string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const header of values) {
    for (const entry of header.split(COMBINED_COOKIE_SPLIT)) {
      const pair = entry.split(';')[0] ?? '';
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      if (name) {
        cookies[name] = value;
      }
    }
  }
  return cookies;
}
