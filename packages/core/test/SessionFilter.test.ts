import { describe, expect, it, vi } from "vitest";
import { MapSessionRepository, SessionFilter } from "../src";
import type { CookieOptions, HttpContext } from "../src";

type CookieRecord = {
  name: string;
  value: string;
  options: CookieOptions;
};

class FakeHttpContext implements HttpContext {
  private state: unknown = undefined;
  private readonly requestCookies: Map<string, string>;
  readonly setCookies: CookieRecord[] = [];
  readonly clearedCookies: string[] = [];

  constructor(private readonly jar: Map<string, string>) {
    this.requestCookies = new Map(jar);
  }

  getCookie(name: string): string | null {
    return this.requestCookies.get(name) ?? null;
  }

  setCookie(name: string, value: string, options: CookieOptions): void {
    this.jar.set(name, value);
    this.setCookies.push({ name, value, options });
  }

  clearCookie(name: string): void {
    this.jar.delete(name);
    this.clearedCookies.push(name);
  }

  setSessionState(value: unknown): void {
    this.state = value;
  }

  getSessionState(): unknown {
    return this.state;
  }
}

const T0 = 1_700_000_000_000;

function setup() {
  const clock = { now: T0 };
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const repository = new MapSessionRepository({ clock: () => clock.now });
  const filter = new SessionFilter({ repository, clock: () => clock.now, logger });
  return { clock, logger, repository, filter };
}

async function storedSession(repository: MapSessionRepository, name: string, value: unknown): Promise<string> {
  const session = repository.createSession();
  session.setAttribute(name, value);
  await repository.save(session);
  return session.id;
}

describe("SessionFilter", () => {
  it("creates_session_sets_cookie_and_saves_on_commit", async () => {
    const { repository, filter } = setup();
    const jar = new Map<string, string>();
    const ctx = new FakeHttpContext(jar);

    await filter.middleware()(ctx, async () => {
      const session = await filter.getSession(ctx);
      session?.setAttribute("cart", ["apple"]);
    });

    expect(ctx.setCookies).toHaveLength(1);
    expect(ctx.setCookies[0]?.name).toBe("SESSION");
    expect(ctx.setCookies[0]?.options).toEqual({ path: "/", httpOnly: true, sameSite: "lax" });

    const stored = await repository.findById(jar.get("SESSION") ?? "");
    expect(stored?.getAttribute("cart")).toEqual(["apple"]);
  });

  it("loads_existing_session_and_touches_it", async () => {
    const { clock, repository, filter } = setup();
    const id = await storedSession(repository, "user", "alice");
    clock.now = T0 + 5_000;
    const ctx = new FakeHttpContext(new Map([["SESSION", id]]));

    await filter.middleware()(ctx, async () => {
      const session = await filter.getSession(ctx);
      expect(session?.id).toBe(id);
      expect(session?.getAttribute("user")).toBe("alice");
      expect(session?.lastAccessedTime).toBe(T0 + 5_000);
    });

    expect(ctx.setCookies).toHaveLength(0);
    expect((await repository.findById(id))?.lastAccessedTime).toBe(T0 + 5_000);
  });

  it("getSession_returns_same_session_within_one_request", async () => {
    const { filter } = setup();
    const ctx = new FakeHttpContext(new Map());

    const first = await filter.getSession(ctx);
    const second = await filter.getSession(ctx);

    expect(second).toBe(first);
    expect(ctx.setCookies).toHaveLength(1);
  });

  it("ignores_malformed_cookie", async () => {
    const { logger, filter } = setup();
    const ctx = new FakeHttpContext(new Map([["SESSION", "garbage"]]));

    await expect(filter.getSession(ctx, { create: false })).resolves.toBeNull();
    expect(logger.debug).toHaveBeenCalledWith("Ignoring malformed session cookie.", { cookie: "SESSION" });
  });

  it("treats_unknown_id_as_no_session", async () => {
    const { filter } = setup();
    const ctx = new FakeHttpContext(new Map([["SESSION", "00000000-0000-0000-0000-000000000001"]]));

    await expect(filter.getSession(ctx, { create: false })).resolves.toBeNull();

    const created = await filter.getSession(ctx);
    expect(created?.id).not.toBe("00000000-0000-0000-0000-000000000001");
  });

  it("changeSessionId_moves_session_and_rewrites_cookie", async () => {
    const { repository, filter } = setup();
    const id = await storedSession(repository, "user", "alice");
    const jar = new Map([["SESSION", id]]);
    const ctx = new FakeHttpContext(jar);
    const rotated: { id: string | null } = { id: null };

    await filter.middleware()(ctx, async () => {
      rotated.id = await filter.changeSessionId(ctx);
    });

    expect(rotated.id).not.toBeNull();
    expect(rotated.id).not.toBe(id);
    expect(jar.get("SESSION")).toBe(rotated.id);
    await expect(repository.findById(id)).resolves.toBeNull();
    expect((await repository.findById(rotated.id ?? ""))?.getAttribute("user")).toBe("alice");
  });

  it("changeSessionId_without_session_returns_null", async () => {
    const { filter } = setup();
    const ctx = new FakeHttpContext(new Map());

    await expect(filter.changeSessionId(ctx)).resolves.toBeNull();
    expect(ctx.setCookies).toHaveLength(0);
  });

  it("invalidate_deletes_session_and_clears_cookie", async () => {
    const { repository, filter } = setup();
    const id = await storedSession(repository, "user", "alice");
    const ctx = new FakeHttpContext(new Map([["SESSION", id]]));

    await filter.middleware()(ctx, async () => {
      await filter.invalidate(ctx);
    });

    expect(ctx.clearedCookies).toEqual(["SESSION"]);
    expect(repository.size).toBe(0);
  });

  it("invalidate_then_getSession_starts_a_new_session", async () => {
    const { repository, filter } = setup();
    const id = await storedSession(repository, "user", "alice");
    const ctx = new FakeHttpContext(new Map([["SESSION", id]]));

    await filter.middleware()(ctx, async () => {
      await filter.invalidate(ctx);
      const fresh = await filter.getSession(ctx);
      fresh?.setAttribute("user", "guest");
    });

    expect(repository.size).toBe(1);
    await expect(repository.findById(id)).resolves.toBeNull();
  });

  it("uses_configured_cookie_options", async () => {
    const repository = new MapSessionRepository();
    const filter = new SessionFilter({
      repository,
      cookie: { name: "sid", secure: true, sameSite: "strict", maxAgeSeconds: 3600 },
    });
    const ctx = new FakeHttpContext(new Map());

    await filter.getSession(ctx);

    expect(ctx.setCookies[0]?.name).toBe("sid");
    expect(ctx.setCookies[0]?.options).toEqual({
      path: "/",
      httpOnly: true,
      sameSite: "strict",
      secure: true,
      maxAgeSeconds: 3600,
    });
  });
});
