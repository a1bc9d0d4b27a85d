import {
  SessionDbError,
  SessionId,
  TrackedSession,
  type AttributeSerializer,
  type SessionSnapshot,
  type TrackedSessionOptions,
} from "@sessiondb/core";
import type { SqlRow } from "./internal/sqlClient";

/**
 * Rebuilds sessions from the flat session/attribute join.
 *
 * Rows of one session must arrive next to each other; grouping only looks at
 * the previous row, so a session split across the result would come back
 * twice.
 */
export class SessionRowAssembler {
  constructor(
    private readonly serializer: AttributeSerializer,
    private readonly sessionOptions: TrackedSessionOptions,
  ) {}

  assemble(rows: readonly SqlRow[]): TrackedSession[] {
    const snapshots: SessionSnapshot[] = [];
    let current: SessionSnapshot | undefined;

    for (const row of rows) {
      const id = SessionId.of(readInt64(row, "session_id1"), readInt64(row, "session_id2"));
      if (!current || !current.id.equals(id)) {
        current = {
          id,
          creationTime: readNumber(row, "creation_time"),
          lastAccessedTime: readNumber(row, "last_access_time"),
          maxInactiveIntervalSeconds: readNumber(row, "max_inactive_interval"),
          attributes: new Map(),
        };
        snapshots.push(current);
      }

      const attributeName = readNullableString(row, "attribute_name");
      if (attributeName !== null) {
        current.attributes.set(attributeName, this.deserialize(id, attributeName, readBytes(row, "attribute_bytes")));
      }
    }

    return snapshots.map((snapshot) => TrackedSession.restore(snapshot, this.sessionOptions));
  }

  private deserialize(id: SessionId, name: string, bytes: Uint8Array): unknown {
    try {
      return this.serializer.deserialize(bytes);
    } catch (error) {
      throw new SessionDbError("SERIALIZATION_FAILED", `Failed to deserialize session attribute "${name}".`, error, {
        sessionId: id.toString(),
        attribute: name,
      });
    }
  }
}

function readInt64(row: SqlRow, column: string): bigint {
  const value = row[column];
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^-?\d+$/.test(value)) return BigInt(value);
  throw invalidColumn(column, value);
}

function readNumber(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && /^-?\d+$/.test(value)) return Number(value);
  throw invalidColumn(column, value);
}

function readNullableString(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  throw invalidColumn(column, value);
}

function readBytes(row: SqlRow, column: string): Uint8Array {
  const value = row[column];
  if (value instanceof Uint8Array) return value;
  throw invalidColumn(column, value);
}

function invalidColumn(column: string, value: unknown): SessionDbError {
  return new SessionDbError("INVALID_ROW", `Unexpected value in column "${column}".`, undefined, {
    column,
    type: value === null ? "null" : typeof value,
  });
}
