import {
  defaultErrorBody,
  isSessionDbError,
  resolveCookieOptions,
  statusFromErrorCode,
  type CookieOptions,
  type HttpContext,
  type HttpMiddleware,
  type Logger,
  type SessionDbError,
} from "@sessiondb/core";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

export type SessionDbExpressRequest = {
  headers: Record<string, string | string[] | undefined>;
  sessionState?: unknown;
};

export type SessionDbExpressResponse = {
  headersSent: boolean;
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: string | string[]): unknown;
  end(...args: unknown[]): unknown;
  once(event: "close", listener: () => void): unknown;
};

export type SessionDbExpressNext = (error?: unknown) => void;
export type SessionDbExpressHandler = (
  req: SessionDbExpressRequest,
  res: SessionDbExpressResponse,
  next: SessionDbExpressNext,
) => Promise<void>;

export type SessionDbExpressAdapterOptions = {
  onError?: (error: SessionDbError, req: SessionDbExpressRequest, res: SessionDbExpressResponse) => Promise<void> | void;
  /** Receives failures that happen once the response is already on the wire. */
  logger?: Logger;
};

/**
 * Builds an `HttpContext` over an Express request/response pair. Session
 * state lives on the request, so contexts created for the same request in
 * different handlers see the same session.
 */
export function createExpressHttpContext(req: SessionDbExpressRequest, res: SessionDbExpressResponse): HttpContext {
  return {
    getCookie(name: string): string | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const parsed = parseCookie(Array.isArray(header) ? header.join("; ") : header);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeCookie(name, value, toSerializeOptions(options)));
    },

    clearCookie(name, options) {
      appendSetCookie(res, serializeCookie(name, "", toSerializeOptions({ ...options, maxAgeSeconds: 0 })));
    },

    setSessionState(value: unknown): void {
      req.sessionState = value;
    },

    getSessionState(): unknown {
      return req.sessionState;
    },
  };
}

/**
 * Runs core middleware as Express middleware. The downstream chain counts as
 * done when the handler ends the response; that `end()` is held back until
 * the session is committed, so the cookie never reaches the client before the
 * session it names is stored.
 */
export function toExpressMiddleware(
  middleware: HttpMiddleware,
  options?: SessionDbExpressAdapterOptions,
): SessionDbExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);
    const end = holdResponseEnd(res);

    try {
      await middleware(ctx, async () => {
        next();
        await end.requested;
      });
      end.release();
    } catch (error) {
      if (res.headersSent) {
        end.release();
        if (options?.logger) {
          options.logger.error("Session commit failed after the response was sent.", { error });
          return;
        }
        next(error);
        return;
      }

      // Nothing is on the wire yet; the held reply is replaced by the error.
      end.discard();

      if (isSessionDbError(error)) {
        if (options?.onError) {
          await options.onError(error, req, res);
          return;
        }

        res.status(statusFromErrorCode(error.code));
        res.json(defaultErrorBody(error.code, error.message));
        return;
      }

      next(error);
    }
  };
}

type HeldEnd = {
  /** Settles on the first `end()` call or when the connection closes. */
  requested: Promise<void>;
  release(): void;
  discard(): void;
};

function holdResponseEnd(res: SessionDbExpressResponse): HeldEnd {
  const originalEnd = res.end;
  let heldArgs: unknown[] | null = null;
  let signal: () => void = () => undefined;

  const requested = new Promise<void>((resolve) => {
    signal = resolve;
    res.once("close", () => resolve());
  });

  res.end = (...args: unknown[]) => {
    heldArgs = args;
    signal();
    return res;
  };

  const restore = () => {
    res.end = originalEnd;
  };

  return {
    requested,
    release() {
      restore();
      const args = heldArgs;
      heldArgs = null;
      if (args) {
        originalEnd.apply(res, args);
      }
    },
    discard() {
      restore();
      heldArgs = null;
    },
  };
}

function appendSetCookie(res: SessionDbExpressResponse, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
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
