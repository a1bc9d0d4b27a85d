export * from "./types";
export * from "./errors";
export * from "./utils/time";

export * from "./http/HttpContext";
export * from "./cookie/CookieOptions";

export * from "./session/Session";
export * from "./session/SessionId";
export * from "./session/TrackedSession";
export * from "./session/AttributeSerializer";
export * from "./session/PrincipalNameResolver";

export * from "./store/SessionRepository";
export * from "./store/MapSessionRepository";
export * from "./store/CleanupScheduler";

export * from "./SessionFilter";
