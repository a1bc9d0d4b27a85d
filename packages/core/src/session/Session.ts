/**
 * Public view of a session handed to application code.
 */
export interface Session {
  readonly id: string;
  readonly creationTime: number;
  readonly lastAccessedTime: number;
  readonly maxInactiveIntervalSeconds: number;

  getAttribute(name: string): unknown;
  getAttributeNames(): string[];
  setAttribute(name: string, value: unknown): void;
  removeAttribute(name: string): void;

  setLastAccessedTime(epochMs: number): void;
  setMaxInactiveInterval(seconds: number): void;

  /** Assigns a fresh id and returns it. */
  rotateId(): string;
  getExpiryTime(): number;
  isExpired(nowMs?: number): boolean;
}

/**
 * A single pending attribute write: the new value, or a tombstone for a
 * removal.
 */
export type AttributeChange =
  | { readonly type: "set"; readonly value: unknown }
  | { readonly type: "removed" };
