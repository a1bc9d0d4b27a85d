import type { CookieOptions } from "../cookie/CookieOptions";

/**
 * Framework-neutral HTTP context required by {@link SessionFilter}.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: CookieOptions): void;
    clearCookie(name: string, options: CookieOptions): void;

    // Per-request slot owned by the session filter
    setSessionState(value: unknown): void;
    getSessionState(): unknown;
}

/**
 * Middleware function signature used by sessiondb core.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
