import type { AttributeChange, Session } from "./Session";
import { SessionId } from "./SessionId";
import { defaultPrincipalNameResolver } from "./PrincipalNameResolver";
import { secondsToMs, systemClock, type Clock } from "../utils/time";

export const DEFAULT_MAX_INACTIVE_INTERVAL_SECONDS = 1800;

/**
 * Persisted state of a session, as read back from a repository.
 */
export type SessionSnapshot = {
  id: SessionId;
  creationTime: number;
  lastAccessedTime: number;
  maxInactiveIntervalSeconds: number;
  attributes: Map<string, unknown>;
};

export type TrackedSessionOptions = {
  clock?: Clock;
  /** Attribute names whose change forces a rewrite of the session row. */
  indexedAttributeNames?: ReadonlySet<string>;
};

/**
 * Session with dirty-tracking: attribute writes are recorded in a sparse
 * delta and metadata writes raise {@link TrackedSession.isChanged}, so a
 * repository only writes back what moved.
 */
export class TrackedSession implements Session {
  readonly creationTime: number;
  private sessionIdValue: SessionId;
  private previousIdValue: SessionId | null = null;
  private lastAccessedTimeValue: number;
  private maxInactiveIntervalValue: number;
  private newFlag: boolean;
  private changedFlag = false;
  private readonly attributes: Map<string, unknown>;
  private readonly delta = new Map<string, AttributeChange>();
  private readonly clock: Clock;
  private readonly indexedAttributeNames: ReadonlySet<string>;

  private constructor(snapshot: SessionSnapshot, isNew: boolean, options?: TrackedSessionOptions) {
    this.sessionIdValue = snapshot.id;
    this.creationTime = snapshot.creationTime;
    this.lastAccessedTimeValue = snapshot.lastAccessedTime;
    this.maxInactiveIntervalValue = snapshot.maxInactiveIntervalSeconds;
    this.attributes = new Map(snapshot.attributes);
    this.newFlag = isNew;
    this.clock = options?.clock ?? systemClock;
    this.indexedAttributeNames = options?.indexedAttributeNames ?? defaultPrincipalNameResolver.attributeNames;
  }

  /**
   * Fresh, never-saved session with a random id.
   */
  static create(maxInactiveIntervalSeconds: number, options?: TrackedSessionOptions): TrackedSession {
    const now = (options?.clock ?? systemClock)();
    return new TrackedSession(
      {
        id: SessionId.random(),
        creationTime: now,
        lastAccessedTime: now,
        maxInactiveIntervalSeconds,
        attributes: new Map(),
      },
      true,
      options,
    );
  }

  /**
   * Rehydrates a stored session: not new, nothing pending.
   */
  static restore(snapshot: SessionSnapshot, options?: TrackedSessionOptions): TrackedSession {
    return new TrackedSession(snapshot, false, options);
  }

  get id(): string {
    return this.sessionIdValue.toString();
  }

  get sessionId(): SessionId {
    return this.sessionIdValue;
  }

  /**
   * Id the backing store still knows this session by, while a rotation is
   * pending; `null` otherwise.
   */
  get previousId(): SessionId | null {
    return this.previousIdValue;
  }

  get lastAccessedTime(): number {
    return this.lastAccessedTimeValue;
  }

  get maxInactiveIntervalSeconds(): number {
    return this.maxInactiveIntervalValue;
  }

  get isNew(): boolean {
    return this.newFlag;
  }

  get isChanged(): boolean {
    return this.changedFlag;
  }

  getAttribute(name: string): unknown {
    return this.attributes.get(name);
  }

  getAttributeNames(): string[] {
    return [...this.attributes.keys()];
  }

  getAttributes(): ReadonlyMap<string, unknown> {
    return this.attributes;
  }

  getDelta(): ReadonlyMap<string, AttributeChange> {
    return this.delta;
  }

  setAttribute(name: string, value: unknown): void {
    if (value === undefined || value === null) {
      this.removeAttribute(name);
      return;
    }

    this.attributes.set(name, value);
    this.delta.set(name, { type: "set", value });
    this.markIndexChange(name);
  }

  removeAttribute(name: string): void {
    this.attributes.delete(name);
    this.delta.set(name, { type: "removed" });
    this.markIndexChange(name);
  }

  setLastAccessedTime(epochMs: number): void {
    this.lastAccessedTimeValue = epochMs;
    this.changedFlag = true;
  }

  setMaxInactiveInterval(seconds: number): void {
    this.maxInactiveIntervalValue = Math.trunc(seconds);
    this.changedFlag = true;
  }

  rotateId(): string {
    if (!this.newFlag && this.previousIdValue === null) {
      this.previousIdValue = this.sessionIdValue;
    }
    this.sessionIdValue = SessionId.random();
    this.changedFlag = true;
    return this.id;
  }

  /**
   * `lastAccessedTime + maxInactiveInterval`; a negative interval never
   * expires and reports `Number.MAX_SAFE_INTEGER`.
   */
  getExpiryTime(): number {
    if (this.maxInactiveIntervalValue < 0) {
      return Number.MAX_SAFE_INTEGER;
    }
    return this.lastAccessedTimeValue + secondsToMs(this.maxInactiveIntervalValue);
  }

  isExpired(nowMs: number = this.clock()): boolean {
    return nowMs >= this.getExpiryTime();
  }

  /**
   * Called by repositories once a save has committed.
   */
  clearChangeFlags(): void {
    this.newFlag = false;
    this.changedFlag = false;
    this.previousIdValue = null;
    this.delta.clear();
  }

  // Principal-bearing attributes feed the session row, not just the delta.
  private markIndexChange(name: string): void {
    if (this.indexedAttributeNames.has(name)) {
      this.changedFlag = true;
    }
  }
}
