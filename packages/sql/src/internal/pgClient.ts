import pg from "pg";
import type { PoolConfig } from "pg";
import type { Logger } from "@sessiondb/core";
import { runBatch, type SqlClientLike, type SqlExecutor, type SqlParameter, type SqlRow } from "./sqlClient";

export interface PgPoolClientLike {
  query(text: string, values?: unknown[]): Promise<{ rows: SqlRow[]; rowCount: number | null }>;
  release(err?: Error | boolean): void;
}

export interface PgPoolLike {
  connect(): Promise<PgPoolClientLike>;
  end?(): Promise<void>;
}

export type PgPoolWrapper = {
  pool: PgPoolLike;
  managePool?: boolean;
};

export type PgConnectionInput = PgPoolLike | PgPoolWrapper | PoolConfig;

export type PgSqlClientOptions = {
  logger?: Logger;
};

/**
 * {@link SqlClientLike} over a `pg` pool. Every transaction checks out its own
 * client and gives it back when done.
 */
export class PgSqlClient implements SqlClientLike {
  private readonly pool: PgPoolLike;
  private readonly ownsPool: boolean;
  private readonly statements = new Map<string, string>();

  constructor(
    connection: PgConnectionInput,
    private readonly options?: PgSqlClientOptions,
  ) {
    if (isPgPoolLike(connection)) {
      this.pool = connection;
      this.ownsPool = false;
      return;
    }

    if (isPgPoolWrapper(connection)) {
      this.pool = connection.pool;
      this.ownsPool = connection.managePool ?? false;
      return;
    }

    this.pool = new pg.Pool(connection);
    this.ownsPool = true;
  }

  async inTransaction<T>(body: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;

    try {
      await client.query("BEGIN");
      const result = await body(this.executorFor(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        this.options?.logger?.warn("Rollback failed; discarding connection.", { error: rollbackError });
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    if (!this.ownsPool) {
      return;
    }
    await this.pool.end?.();
  }

  private executorFor(client: PgPoolClientLike): SqlExecutor {
    const query = async (sql: string, params: readonly SqlParameter[] = []) => {
      const result = await client.query(this.toPgStatement(sql), params.map(toPgValue));
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    };

    return {
      query,
      batch: (sql, paramSets) => runBatch({ query }, sql, paramSets),
    };
  }

  private toPgStatement(sql: string): string {
    let statement = this.statements.get(sql);
    if (statement === undefined) {
      statement = toPositionalPlaceholders(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }
}

/**
 * Rewrites `?` placeholders as `$1`, `$2`, ... in order of appearance.
 */
export function toPositionalPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

function toPgValue(value: SqlParameter): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  return value;
}

export function isPgPoolLike(value: unknown): value is PgPoolLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  const target = value as Partial<PgPoolLike>;
  return typeof target.connect === "function";
}

export function isPgPoolWrapper(value: unknown): value is PgPoolWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  const target = value as { pool?: unknown };
  return isPgPoolLike(target.pool);
}
