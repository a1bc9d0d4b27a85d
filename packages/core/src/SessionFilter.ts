import type { GetSessionOptions, SessionFilterOptions } from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import { DEFAULT_COOKIE_NAME, resolveCookieOptions, type ResolvedCookieOptions } from "./cookie/CookieOptions";
import { invalidConfiguration, isSessionDbError } from "./errors";
import type { TrackedSession } from "./session/TrackedSession";
import { systemClock, type Clock } from "./utils/time";

class RequestSessionState {
    session: TrackedSession | null = null;
    loaded = false;
    invalidated = false;
}

/**
 * Binds a session repository to HTTP requests: resolves the session named by
 * the session cookie, hands it to application code and saves it once the
 * downstream handler is done.
 */
export class SessionFilter {
    private readonly cookieName: string;
    private readonly cookieOptions: ResolvedCookieOptions;
    private readonly clock: Clock;

    constructor(private readonly opts: SessionFilterOptions) {
        if (!opts?.repository) {
            throw invalidConfiguration("SessionFilter requires a repository.");
        }
        this.cookieName = opts.cookie?.name ?? DEFAULT_COOKIE_NAME;
        this.cookieOptions = resolveCookieOptions(opts.cookie ?? {});
        this.clock = opts.clock ?? systemClock;
    }

    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            this.stateFor(ctx);
            await next();
            await this.commit(ctx);
        };
    }

    /**
     * Current request's session. Creates one (and sets its cookie) unless
     * `create` is false.
     */
    async getSession(ctx: HttpContext, options?: GetSessionOptions): Promise<TrackedSession | null> {
        const state = this.stateFor(ctx);
        if (!state.loaded) {
            state.session = await this.load(ctx);
            state.loaded = true;
        }

        if (state.session && !state.invalidated) {
            return state.session;
        }

        if (!(options?.create ?? true)) {
            return null;
        }

        const session = this.opts.repository.createSession();
        state.session = session;
        state.invalidated = false;
        this.writeCookie(ctx, session);
        return session;
    }

    /**
     * Rotates the id of the current session and rewrites the cookie. Resolves
     * `null` when the request has no session.
     */
    async changeSessionId(ctx: HttpContext): Promise<string | null> {
        const session = await this.getSession(ctx, { create: false });
        if (!session) {
            return null;
        }

        const id = session.rotateId();
        this.writeCookie(ctx, session);
        return id;
    }

    async invalidate(ctx: HttpContext): Promise<void> {
        const state = this.stateFor(ctx);
        const session = await this.getSession(ctx, { create: false });

        try {
            if (session && !session.isNew) {
                await this.opts.repository.deleteById((session.previousId ?? session.sessionId).toString());
            }
        } finally {
            state.invalidated = true;
            ctx.clearCookie(this.cookieName, this.cookieOptions);
        }
    }

    /**
     * Persists the request's session, if one was used and not invalidated.
     */
    async commit(ctx: HttpContext): Promise<void> {
        const state = this.stateFor(ctx);
        if (!state.session || state.invalidated) {
            return;
        }
        await this.opts.repository.save(state.session);
    }

    private async load(ctx: HttpContext): Promise<TrackedSession | null> {
        const sid = ctx.getCookie(this.cookieName);
        if (!sid) {
            return null;
        }

        let session: TrackedSession | null;
        try {
            session = await this.opts.repository.findById(sid);
        } catch (e) {
            if (isSessionDbError(e) && e.code === "INVALID_SESSION_ID") {
                this.opts.logger?.debug("Ignoring malformed session cookie.", { cookie: this.cookieName });
                return null;
            }
            throw e;
        }

        if (!session) {
            this.opts.logger?.debug("Session not found.", { sessionId: sid });
            return null;
        }

        session.setLastAccessedTime(this.clock());
        return session;
    }

    private writeCookie(ctx: HttpContext, session: TrackedSession): void {
        ctx.setCookie(this.cookieName, session.id, this.cookieOptions);
    }

    private stateFor(ctx: HttpContext): RequestSessionState {
        const existing = ctx.getSessionState();
        if (existing instanceof RequestSessionState) {
            return existing;
        }

        const state = new RequestSessionState();
        ctx.setSessionState(state);
        return state;
    }
}
