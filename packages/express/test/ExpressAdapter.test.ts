import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import {
  MapSessionRepository,
  SessionDbError,
  SessionFilter,
  type HttpMiddleware,
  type TrackedSession,
} from "@sessiondb/core";
import { createExpressHttpContext, toExpressMiddleware, type SessionDbExpressRequest } from "../src";

class FakeResponse extends EventEmitter {
  statusCode = 200;
  body: unknown = null;
  headersSent = false;
  endCount = 0;
  onEnd: (() => void) | undefined;
  private readonly headers = new Map<string, string | string[]>();

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.end();
    return this;
  }

  flushHeaders(): void {
    this.headersSent = true;
  }

  end(): this {
    this.headersSent = true;
    this.endCount += 1;
    this.onEnd?.();
    this.emit("finish");
    return this;
  }

  getHeader(name: string): string | string[] | undefined {
    return this.headers.get(name.toLowerCase());
  }

  setHeader(name: string, value: string | string[]): this {
    this.headers.set(name.toLowerCase(), value);
    return this;
  }
}

class FailingRepository extends MapSessionRepository {
  constructor(private readonly failure: Error) {
    super();
  }

  override async save(): Promise<void> {
    throw this.failure;
  }
}

function createReqRes(cookie?: string): { req: SessionDbExpressRequest; res: FakeResponse } {
  return {
    req: { headers: cookie === undefined ? {} : { cookie } },
    res: new FakeResponse(),
  };
}

/**
 * Mounts the filter and plays a route that touches the session and replies.
 */
async function serve(
  filter: SessionFilter,
  cookie: string | undefined,
  route: (session: TrackedSession | null, res: FakeResponse) => void,
  options?: Parameters<typeof toExpressMiddleware>[1],
) {
  const { req, res } = createReqRes(cookie);
  let routeDone: Promise<void> = Promise.resolve();
  const next = vi.fn((error?: unknown) => {
    if (error !== undefined) {
      return;
    }
    routeDone = (async () => {
      route(await filter.getSession(createExpressHttpContext(req, res)), res);
    })();
  });

  await toExpressMiddleware(filter.middleware(), options)(req, res, next);
  await routeDone;
  return { req, res, next };
}

const invalidIdMiddleware: HttpMiddleware = async () => {
  throw new SessionDbError("INVALID_SESSION_ID", "Session id is not a valid UUID.");
};

describe("ExpressAdapter", () => {
  it("stores the session before the response ends", async () => {
    const repository = new MapSessionRepository();
    const filter = new SessionFilter({ repository });
    let storedAtEnd = -1;

    const { res } = await serve(filter, undefined, (session, reply) => {
      reply.onEnd = () => {
        storedAtEnd = repository.size;
      };
      session?.setAttribute("visits", 1);
      reply.json({ ok: true });
    });

    expect(storedAtEnd).toBe(1);
    expect(res.endCount).toBe(1);
    expect(res.body).toEqual({ ok: true });
    const setCookie = res.getHeader("set-cookie");
    expect(typeof setCookie).toBe("string");
    const match = /^SESSION=([0-9a-f-]{36}); Path=\/; HttpOnly; SameSite=Lax$/.exec(String(setCookie));
    expect(match).not.toBeNull();
    expect((await repository.findById(match?.[1] ?? ""))?.getAttribute("visits")).toBe(1);
  });

  it("loads the session named by the request cookie", async () => {
    const repository = new MapSessionRepository();
    const stored = repository.createSession();
    stored.setAttribute("visits", 1);
    await repository.save(stored);
    const filter = new SessionFilter({ repository });

    const { res } = await serve(filter, `theme=dark; SESSION=${stored.id}`, (session, reply) => {
      const visits = session?.getAttribute("visits");
      session?.setAttribute("visits", typeof visits === "number" ? visits + 1 : 0);
      reply.json({ ok: true });
    });

    expect(res.getHeader("set-cookie")).toBeUndefined();
    expect((await repository.findById(stored.id))?.getAttribute("visits")).toBe(2);
  });

  it("commits when the connection closes before a reply", async () => {
    const repository = new MapSessionRepository();
    const filter = new SessionFilter({ repository });

    const { res } = await serve(filter, undefined, (session, reply) => {
      session?.setAttribute("visits", 1);
      reply.emit("close");
    });

    expect(res.endCount).toBe(0);
    expect(repository.size).toBe(1);
  });

  it("replaces the held reply with an error response when the commit fails", async () => {
    const failure = new SessionDbError("SERIALIZATION_FAILED", 'Failed to serialize session attribute "cart".');
    const filter = new SessionFilter({ repository: new FailingRepository(failure) });

    const { res, next } = await serve(filter, undefined, (_session, reply) => {
      reply.json({ ok: true });
    });

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.endCount).toBe(1);
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({
      error: {
        code: "SERIALIZATION_FAILED",
        message: 'Failed to serialize session attribute "cart".',
      },
    });
  });

  it("hands a commit failure to next before anything was sent", async () => {
    const filter = new SessionFilter({ repository: new FailingRepository(new Error("disk full")) });

    const { res, next } = await serve(filter, undefined, (_session, reply) => {
      reply.json({ ok: true });
    });

    expect(res.endCount).toBe(0);
    expect(next).toHaveBeenCalledTimes(2);
    const error: unknown = next.mock.calls[1]?.[0];
    expect(error instanceof Error ? error.message : null).toBe("disk full");
  });

  it("logs a commit failure once headers are on the wire", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const filter = new SessionFilter({ repository: new FailingRepository(new Error("disk full")) });

    const { res, next } = await serve(
      filter,
      undefined,
      (_session, reply) => {
        reply.flushHeaders();
        reply.json({ ok: true });
      },
      { logger },
    );

    expect(res.statusCode).toBe(200);
    expect(res.endCount).toBe(1);
    expect(next).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[0]).toBe("Session commit failed after the response was sent.");
  });

  it("hands a late commit failure to next without a logger", async () => {
    const filter = new SessionFilter({ repository: new FailingRepository(new Error("disk full")) });

    const { res, next } = await serve(filter, undefined, (_session, reply) => {
      reply.flushHeaders();
      reply.json({ ok: true });
    });

    expect(res.endCount).toBe(1);
    expect(next).toHaveBeenCalledTimes(2);
    const error: unknown = next.mock.calls[1]?.[0];
    expect(error instanceof Error ? error.message : null).toBe("disk full");
  });

  it("maps SessionDbError to default JSON response", async () => {
    const middleware = toExpressMiddleware(invalidIdMiddleware);
    const { req, res } = createReqRes();
    const next = vi.fn();

    await middleware(req, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: {
        code: "INVALID_SESSION_ID",
        message: "Session id is not a valid UUID.",
      },
    });
  });

  it("supports onError override", async () => {
    const middleware = toExpressMiddleware(invalidIdMiddleware, {
      onError(error, _req, res): void {
        expect(error.code).toBe("INVALID_SESSION_ID");
        res.status(302);
        res.json({ redirect: "/login" });
      },
    });

    const { req, res } = createReqRes();
    const next = vi.fn();

    await middleware(req, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(302);
    expect(res.body).toEqual({ redirect: "/login" });
  });

  it("passes other errors to next", async () => {
    const failure = new Error("boom");
    const middleware = toExpressMiddleware(async () => {
      throw failure;
    });
    const { req, res } = createReqRes();
    const next = vi.fn();

    await middleware(req, res, next);

    expect(next).toHaveBeenCalledWith(failure);
  });

  it("appends multiple Set-Cookie values", () => {
    const { req, res } = createReqRes();
    const ctx = createExpressHttpContext(req, res);

    ctx.setCookie("sid", "token-1", { path: "/", httpOnly: true });
    ctx.clearCookie("sid", { path: "/", httpOnly: true });

    expect(res.getHeader("set-cookie")).toEqual([
      "sid=token-1; Path=/; HttpOnly; SameSite=Lax",
      "sid=; Max-Age=0; Path=/; HttpOnly; SameSite=Lax",
    ]);
  });

  it("reads cookies and shares session state across contexts of one request", () => {
    const { req, res } = createReqRes("a=1; SESSION=abc");
    const first = createExpressHttpContext(req, res);
    const second = createExpressHttpContext(req, res);

    first.setSessionState("state");

    expect(first.getCookie("SESSION")).toBe("abc");
    expect(first.getCookie("missing")).toBeNull();
    expect(second.getSessionState()).toBe("state");
  });
});
