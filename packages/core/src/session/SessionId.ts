import { randomUUID } from "node:crypto";
import { SessionDbError } from "../errors";

const CANONICAL_FORM = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * 128-bit session identifier stored as two signed 64-bit halves.
 *
 * The halves map one-to-one onto the `SESSION_ID1` / `SESSION_ID2` columns;
 * the textual form is the canonical lowercase UUID string.
 */
export class SessionId {
  private constructor(
    readonly mostSignificantBits: bigint,
    readonly leastSignificantBits: bigint,
  ) {}

  /**
   * Builds an id from its halves. Values outside the signed 64-bit range are
   * wrapped the way a database `BIGINT` would store them.
   */
  static of(mostSignificantBits: bigint, leastSignificantBits: bigint): SessionId {
    return new SessionId(BigInt.asIntN(64, mostSignificantBits), BigInt.asIntN(64, leastSignificantBits));
  }

  static random(): SessionId {
    return SessionId.parse(randomUUID());
  }

  /**
   * Parses the canonical 8-4-4-4-12 form. Anything else fails with
   * `INVALID_SESSION_ID`.
   */
  static parse(text: string): SessionId {
    if (typeof text !== "string" || !CANONICAL_FORM.test(text)) {
      throw new SessionDbError("INVALID_SESSION_ID", "Session id is not a valid UUID.", undefined, {
        sessionId: typeof text === "string" ? text.slice(0, 64) : typeof text,
      });
    }

    const hex = text.replace(/-/g, "");
    return SessionId.of(BigInt(`0x${hex.slice(0, 16)}`), BigInt(`0x${hex.slice(16)}`));
  }

  equals(other: SessionId): boolean {
    return (
      this.mostSignificantBits === other.mostSignificantBits &&
      this.leastSignificantBits === other.leastSignificantBits
    );
  }

  toString(): string {
    const hex = toUnsignedHex(this.mostSignificantBits) + toUnsignedHex(this.leastSignificantBits);
    return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join("-");
  }

  toJSON(): string {
    return this.toString();
  }
}

function toUnsignedHex(half: bigint): string {
  return BigInt.asUintN(64, half).toString(16).padStart(16, "0");
}
