import {
  createV8AttributeSerializer,
  defaultPrincipalNameResolver,
  DEFAULT_MAX_INACTIVE_INTERVAL_SECONDS,
  invalidConfiguration,
  isAttributeSerializer,
  PRINCIPAL_NAME_INDEX_NAME,
  SessionDbError,
  SessionId,
  systemClock,
  TrackedSession,
  type AttributeSerializer,
  type Clock,
  type ExpiringSessionRepository,
  type IndexedSessionRepository,
  type Logger,
  type PrincipalNameResolver,
  type TrackedSessionOptions,
} from "@sessiondb/core";
import { DEFAULT_TABLE_NAME, prepareQueries, type SessionQueries } from "./queries";
import { SessionRowAssembler } from "./SessionRowAssembler";
import { isSqlClientLike, type SqlClientLike, type SqlExecutor, type SqlParameter } from "./internal/sqlClient";

/**
 * Configuration for {@link SqlSessionRepository}.
 */
export type SqlSessionRepositoryOptions = {
  tableName?: string;
  defaultMaxInactiveIntervalSeconds?: number;
  serializer?: AttributeSerializer;
  principalNameResolver?: PrincipalNameResolver;
  clock?: Clock;
  /** Replacement statement templates; `%TABLE_NAME%` is substituted. */
  queries?: Partial<SessionQueries>;
  logger?: Logger;
};

type EncodedChange = { name: string; bytes: Uint8Array | null };

/**
 * Relational session repository.
 *
 * Sessions live in `<table>` (one row each) and `<table>_ATTRIBUTES` (one row
 * per attribute). Saves write only what the session's change tracking
 * recorded, each operation in its own transaction.
 */
export class SqlSessionRepository
  implements IndexedSessionRepository<TrackedSession>, ExpiringSessionRepository
{
  private readonly queries: SessionQueries;
  private readonly defaultMaxInactiveInterval: number;
  private readonly serializer: AttributeSerializer;
  private readonly principalNameResolver: PrincipalNameResolver;
  private readonly clock: Clock;
  private readonly assembler: SessionRowAssembler;
  private readonly sessionOptions: TrackedSessionOptions;

  constructor(
    private readonly client: SqlClientLike,
    private readonly options?: SqlSessionRepositoryOptions,
  ) {
    if (!isSqlClientLike(client)) {
      throw invalidConfiguration("SqlSessionRepository requires a SQL client with inTransaction().");
    }

    const interval = options?.defaultMaxInactiveIntervalSeconds ?? DEFAULT_MAX_INACTIVE_INTERVAL_SECONDS;
    if (!Number.isInteger(interval)) {
      throw invalidConfiguration("defaultMaxInactiveIntervalSeconds must be an integer.", { value: interval });
    }

    const serializer = options?.serializer ?? createV8AttributeSerializer();
    if (!isAttributeSerializer(serializer)) {
      throw invalidConfiguration("serializer must provide serialize() and deserialize().");
    }

    const resolver = options?.principalNameResolver ?? defaultPrincipalNameResolver;
    if (typeof resolver.resolve !== "function" || !(resolver.attributeNames instanceof Set)) {
      throw invalidConfiguration("principalNameResolver must provide resolve() and attributeNames.");
    }

    this.queries = prepareQueries(options?.tableName ?? DEFAULT_TABLE_NAME, options?.queries);
    this.defaultMaxInactiveInterval = interval;
    this.serializer = serializer;
    this.principalNameResolver = resolver;
    this.clock = options?.clock ?? systemClock;
    this.sessionOptions = { clock: this.clock, indexedAttributeNames: resolver.attributeNames };
    this.assembler = new SessionRowAssembler(serializer, this.sessionOptions);
  }

  createSession(): TrackedSession {
    return TrackedSession.create(this.defaultMaxInactiveInterval, this.sessionOptions);
  }

  async save(session: TrackedSession): Promise<void> {
    if (session.isNew) {
      await this.insertSession(session);
    } else if (session.isChanged || session.getDelta().size > 0) {
      await this.updateSession(session);
    }
    session.clearChangeFlags();
  }

  async findById(id: string): Promise<TrackedSession | null> {
    const sessionId = SessionId.parse(id);
    const { rows } = await this.client.inTransaction((tx) => tx.query(this.queries.getSession, idParams(sessionId)));

    const session = this.assembler.assemble(rows)[0];
    if (!session) {
      return null;
    }

    if (session.isExpired()) {
      this.options?.logger?.debug("Removing expired session on read.", { sessionId: session.id });
      await this.delete(sessionId);
      return null;
    }
    return session;
  }

  async deleteById(id: string): Promise<void> {
    await this.delete(SessionId.parse(id));
  }

  async findByIndexNameAndIndexValue(indexName: string, indexValue: string): Promise<Map<string, TrackedSession>> {
    const found = new Map<string, TrackedSession>();
    if (indexName !== PRINCIPAL_NAME_INDEX_NAME) {
      return found;
    }

    const { rows } = await this.client.inTransaction((tx) =>
      tx.query(this.queries.listSessionsByPrincipalName, [indexValue]),
    );
    for (const session of this.assembler.assemble(rows)) {
      found.set(session.id, session);
    }
    return found;
  }

  async cleanUpExpiredSessions(): Promise<number> {
    const now = this.clock();
    const { rowCount } = await this.client.inTransaction((tx) =>
      tx.query(this.queries.deleteSessionsByExpiryTime, [now]),
    );
    this.options?.logger?.debug(`Cleaned up ${rowCount} expired sessions`, { expiredBefore: now });
    return rowCount;
  }

  private async insertSession(session: TrackedSession): Promise<void> {
    const id = idParams(session.sessionId);
    const attributes = session
      .getAttributeNames()
      .map((name) => [...id, name, this.serialize(session, name, session.getAttribute(name))]);

    await this.client.inTransaction(async (tx) => {
      await tx.query(this.queries.createSession, [
        ...id,
        session.creationTime,
        session.lastAccessedTime,
        session.maxInactiveIntervalSeconds,
        session.getExpiryTime(),
        this.principalNameResolver.resolve(session.getAttributes()),
      ]);
      if (attributes.length > 0) {
        await tx.batch(this.queries.createSessionAttribute, attributes);
      }
    });
  }

  private async updateSession(session: TrackedSession): Promise<void> {
    const id = idParams(session.sessionId);
    const changes: EncodedChange[] = [...session.getDelta()].map(([name, change]) => ({
      name,
      bytes: change.type === "removed" ? null : this.serialize(session, name, change.value),
    }));

    await this.client.inTransaction(async (tx) => {
      if (session.isChanged) {
        await tx.query(this.queries.updateSession, [
          ...id,
          session.lastAccessedTime,
          session.maxInactiveIntervalSeconds,
          session.getExpiryTime(),
          this.principalNameResolver.resolve(session.getAttributes()),
          ...idParams(session.previousId ?? session.sessionId),
        ]);
      }

      for (const change of changes) {
        await this.applyAttributeChange(tx, id, change);
      }
    });
  }

  private async applyAttributeChange(tx: SqlExecutor, id: SqlParameter[], change: EncodedChange): Promise<void> {
    if (change.bytes === null) {
      await tx.query(this.queries.deleteSessionAttribute, [...id, change.name]);
      return;
    }

    const { rowCount } = await tx.query(this.queries.updateSessionAttribute, [change.bytes, ...id, change.name]);
    if (rowCount === 0) {
      await tx.query(this.queries.createSessionAttribute, [...id, change.name, change.bytes]);
    }
  }

  private async delete(sessionId: SessionId): Promise<void> {
    await this.client.inTransaction((tx) => tx.query(this.queries.deleteSession, idParams(sessionId)));
  }

  private serialize(session: TrackedSession, name: string, value: unknown): Uint8Array {
    try {
      return this.serializer.serialize(value);
    } catch (error) {
      throw new SessionDbError("SERIALIZATION_FAILED", `Failed to serialize session attribute "${name}".`, error, {
        sessionId: session.id,
        attribute: name,
      });
    }
  }
}

function idParams(id: SessionId): SqlParameter[] {
  return [id.mostSignificantBits, id.leastSignificantBits];
}
