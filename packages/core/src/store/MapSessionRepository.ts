import type { ExpiringSessionRepository, IndexedSessionRepository } from "./SessionRepository";
import { invalidConfiguration } from "../errors";
import { SessionId } from "../session/SessionId";
import {
  DEFAULT_MAX_INACTIVE_INTERVAL_SECONDS,
  TrackedSession,
  type SessionSnapshot,
  type TrackedSessionOptions,
} from "../session/TrackedSession";
import {
  defaultPrincipalNameResolver,
  PRINCIPAL_NAME_INDEX_NAME,
  type PrincipalNameResolver,
} from "../session/PrincipalNameResolver";
import { systemClock, type Clock } from "../utils/time";

type Entry = {
  snapshot: SessionSnapshot;
  expiryTime: number;
  principalName: string | null;
};

export type MapSessionRepositoryOptions = {
  defaultMaxInactiveIntervalSeconds?: number;
  principalNameResolver?: PrincipalNameResolver;
  clock?: Clock;
};

/**
 * In-process repository with the same change-tracking semantics as the SQL
 * one. Attribute values are structured-cloned on the way in and out.
 */
export class MapSessionRepository
  implements IndexedSessionRepository<TrackedSession>, ExpiringSessionRepository
{
  private readonly map = new Map<string, Entry>();
  private readonly defaultMaxInactiveInterval: number;
  private readonly principalNameResolver: PrincipalNameResolver;
  private readonly clock: Clock;

  constructor(options?: MapSessionRepositoryOptions) {
    const interval = options?.defaultMaxInactiveIntervalSeconds ?? DEFAULT_MAX_INACTIVE_INTERVAL_SECONDS;
    if (!Number.isInteger(interval)) {
      throw invalidConfiguration("defaultMaxInactiveIntervalSeconds must be an integer.", { value: interval });
    }
    this.defaultMaxInactiveInterval = interval;
    this.principalNameResolver = options?.principalNameResolver ?? defaultPrincipalNameResolver;
    this.clock = options?.clock ?? systemClock;
  }

  get size(): number {
    return this.map.size;
  }

  createSession(): TrackedSession {
    return TrackedSession.create(this.defaultMaxInactiveInterval, this.sessionOptions());
  }

  async save(session: TrackedSession): Promise<void> {
    if (session.isNew) {
      this.map.set(session.id, {
        snapshot: {
          id: session.sessionId,
          creationTime: session.creationTime,
          lastAccessedTime: session.lastAccessedTime,
          maxInactiveIntervalSeconds: session.maxInactiveIntervalSeconds,
          attributes: new Map(structuredClone([...session.getAttributes()])),
        },
        expiryTime: session.getExpiryTime(),
        principalName: this.principalNameResolver.resolve(session.getAttributes()),
      });
      session.clearChangeFlags();
      return;
    }

    const storedKey = (session.previousId ?? session.sessionId).toString();
    const entry = this.map.get(storedKey);
    if (entry) {
      if (session.isChanged) {
        this.map.delete(storedKey);
        entry.snapshot.id = session.sessionId;
        entry.snapshot.lastAccessedTime = session.lastAccessedTime;
        entry.snapshot.maxInactiveIntervalSeconds = session.maxInactiveIntervalSeconds;
        entry.expiryTime = session.getExpiryTime();
        entry.principalName = this.principalNameResolver.resolve(session.getAttributes());
        this.map.set(session.id, entry);
      }

      for (const [name, change] of session.getDelta()) {
        if (change.type === "removed") {
          entry.snapshot.attributes.delete(name);
        } else {
          entry.snapshot.attributes.set(name, structuredClone(change.value));
        }
      }
    }

    session.clearChangeFlags();
  }

  async findById(id: string): Promise<TrackedSession | null> {
    const key = SessionId.parse(id).toString();
    const entry = this.map.get(key);
    if (!entry) {
      return null;
    }

    const session = this.restore(entry);
    if (session.isExpired()) {
      this.map.delete(key);
      return null;
    }
    return session;
  }

  async deleteById(id: string): Promise<void> {
    this.map.delete(SessionId.parse(id).toString());
  }

  async findByIndexNameAndIndexValue(indexName: string, indexValue: string): Promise<Map<string, TrackedSession>> {
    const found = new Map<string, TrackedSession>();
    if (indexName !== PRINCIPAL_NAME_INDEX_NAME) {
      return found;
    }

    for (const [key, entry] of this.map.entries()) {
      if (entry.principalName === indexValue) {
        found.set(key, this.restore(entry));
      }
    }
    return found;
  }

  async cleanUpExpiredSessions(): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiryTime < now) {
        this.map.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async close(): Promise<void> {
    this.map.clear();
  }

  private restore(entry: Entry): TrackedSession {
    return TrackedSession.restore(
      { ...entry.snapshot, attributes: new Map(structuredClone([...entry.snapshot.attributes])) },
      this.sessionOptions(),
    );
  }

  private sessionOptions(): TrackedSessionOptions {
    return {
      clock: this.clock,
      indexedAttributeNames: this.principalNameResolver.attributeNames,
    };
  }
}
