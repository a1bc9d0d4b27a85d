import {
  defaultErrorBody,
  isSessionDbError,
  resolveCookieOptions,
  statusFromErrorCode,
  type CookieOptions,
  type ErrorCode,
  type HttpContext,
  type HttpMiddleware,
  type SessionDbError,
} from "@sessiondb/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

/**
 * Context variable holding the per-request session state.
 */
export const SESSIONDB_HONO_STATE_KEY = "sessionState";

/**
 * Hono environment the adapter reads and writes. Apps that reach the session
 * from route handlers declare it: `new Hono<SessionDbHonoEnv>()`.
 */
export type SessionDbHonoEnv = {
  Variables: {
    [SESSIONDB_HONO_STATE_KEY]: unknown;
  };
};

/**
 * Adapter options for Hono integration.
 */
export type SessionDbHonoAdapterOptions = {
  onError?: (
    error: SessionDbError,
    c: Context<SessionDbHonoEnv>,
  ) => Promise<Response | void> | Response | void;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context<SessionDbHonoEnv>): HttpContext {
  return {
    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const parsed = parseCookie(raw);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, toSerializeOptions(options)), { append: true });
    },

    clearCookie(name, options) {
      c.header("Set-Cookie", serializeCookie(name, "", toSerializeOptions({ ...options, maxAgeSeconds: 0 })), {
        append: true,
      });
    },

    setSessionState(value: unknown): void {
      c.set(SESSIONDB_HONO_STATE_KEY, value);
    },

    getSessionState(): unknown {
      return c.get(SESSIONDB_HONO_STATE_KEY);
    },
  };
}

/**
 * Converts core middleware into a Hono middleware handler. The session is
 * committed once the downstream handlers resolve.
 */
export function toHonoMiddleware(
  middleware: HttpMiddleware,
  options?: SessionDbHonoAdapterOptions,
): MiddlewareHandler<SessionDbHonoEnv> {
  return async (c, next) => {
    const ctx = createHonoHttpContext(c);

    try {
      await middleware(ctx, () => next());
    } catch (error) {
      if (!isSessionDbError(error)) {
        throw error;
      }

      if (options?.onError) {
        const handled = await options.onError(error, c);
        if (handled) {
          return handled;
        }
      }
      return c.json(defaultErrorBody(error.code, error.message), toHonoStatus(error.code));
    }
  };
}

function toHonoStatus(code: ErrorCode): 400 | 500 {
  return statusFromErrorCode(code) === 400 ? 400 : 500;
}

function toSerializeOptions(options: CookieOptions): SerializeOptions {
  const resolved = resolveCookieOptions(options);
  const serialize: SerializeOptions = {
    path: resolved.path,
    httpOnly: resolved.httpOnly,
    sameSite: resolved.sameSite,
  };
  if (resolved.domain !== undefined) serialize.domain = resolved.domain;
  if (resolved.secure !== undefined) serialize.secure = resolved.secure;
  if (resolved.maxAgeSeconds !== undefined) serialize.maxAge = resolved.maxAgeSeconds;
  return serialize;
}
