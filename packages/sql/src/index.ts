export * from "./SqlSessionRepository";
export * from "./SessionRowAssembler";
export * from "./queries";
export * from "./internal/sqlClient";
export * from "./internal/pgClient";
export * from "./internal/sqliteClient";
