/**
 * Cookie configuration shared by the session filter and adapters.
 */
export type CookieOptions = {
  name?: string; // default "SESSION"
  path?: string; // default "/"
  domain?: string;
  httpOnly?: boolean; // default true
  secure?: boolean;
  sameSite?: "lax" | "strict" | "none"; // default "lax"
  maxAgeSeconds?: number; // omitted: browser-session cookie
};

export const DEFAULT_COOKIE_NAME = "SESSION";

export type ResolvedCookieOptions = Omit<CookieOptions, "name" | "path" | "httpOnly" | "sameSite"> & {
  path: string;
  httpOnly: boolean;
  sameSite: "lax" | "strict" | "none";
};

/**
 * Applies cookie defaults. The cookie name is not part of the result.
 */
export function resolveCookieOptions(options: CookieOptions): ResolvedCookieOptions {
  const resolved: ResolvedCookieOptions = {
    path: options.path ?? "/",
    httpOnly: options.httpOnly ?? true,
    sameSite: options.sameSite ?? "lax",
  };
  if (options.domain !== undefined) resolved.domain = options.domain;
  if (options.secure !== undefined) resolved.secure = options.secure;
  if (options.maxAgeSeconds !== undefined) resolved.maxAgeSeconds = Math.max(0, Math.floor(options.maxAgeSeconds));
  return resolved;
}
