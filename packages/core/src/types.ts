import type { CookieOptions } from "./cookie/CookieOptions";
import type { SessionRepository } from "./store/SessionRepository";
import type { TrackedSession } from "./session/TrackedSession";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import type { Logger } from "./errors";
import type { Clock } from "./utils/time";

/**
 * Root configuration for creating a {@link SessionFilter} instance.
 */
export type SessionFilterOptions = {
    repository: SessionRepository<TrackedSession>;

    cookie?: CookieOptions;

    clock?: Clock;

    logger?: Logger;
};

/**
 * Options for {@link SessionFilter.getSession}.
 */
export type GetSessionOptions = {
    create?: boolean; // default true
};

// Re-export commonly used types
export type { Clock, CookieOptions, HttpContext, HttpMiddleware, SessionRepository };
