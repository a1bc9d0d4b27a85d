import type { Session } from "../session/Session";

/**
 * Storage abstraction for session lifecycle operations.
 *
 * `findById` resolves `null` for unknown and expired sessions alike; storage
 * failures reject with the driver's own error.
 */
export interface SessionRepository<S extends Session = Session> {
  createSession(): S;
  save(session: S): Promise<void>;
  findById(id: string): Promise<S | null>;
  deleteById(id: string): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Repository that can list sessions by a secondary index.
 */
export interface IndexedSessionRepository<S extends Session = Session> extends SessionRepository<S> {
  /**
   * Sessions whose index value equals `indexValue`, keyed by id. Unsupported
   * index names yield an empty map.
   */
  findByIndexNameAndIndexValue(indexName: string, indexValue: string): Promise<Map<string, S>>;
}

/**
 * Repository that can purge expired sessions in bulk.
 */
export interface ExpiringSessionRepository {
  /** Resolves to the number of sessions removed. */
  cleanUpExpiredSessions(): Promise<number>;
}

export function isExpiringSessionRepository(value: unknown): value is ExpiringSessionRepository {
  return (
    typeof value === "object" &&
    value !== null &&
    "cleanUpExpiredSessions" in value &&
    typeof value.cleanUpExpiredSessions === "function"
  );
}
