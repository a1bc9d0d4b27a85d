import Database from "better-sqlite3";
import { runBatch, type SqlClientLike, type SqlExecutor, type SqlParameter, type SqlRow } from "./sqlClient";

type SqliteValue = string | number | bigint | Buffer | null;

export type SqliteConnectionParams = {
  filename: string;
  options?: Database.Options;
};

export type SqliteConnectionInput = Database.Database | SqliteConnectionParams;

/**
 * {@link SqlClientLike} over a single better-sqlite3 connection.
 *
 * The connection is shared, so transactions are queued and run one at a
 * time. Foreign keys are switched on: attribute rows rely on the cascade.
 */
export class SqliteSqlClient implements SqlClientLike {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly statements = new Map<string, Database.Statement<SqliteValue[], SqlRow>>();
  private readonly executor: SqlExecutor;
  private queue: Promise<void> = Promise.resolve();

  constructor(connection: SqliteConnectionInput) {
    if (isSqliteDatabase(connection)) {
      this.db = connection;
      this.ownsDatabase = false;
    } else {
      this.db = new Database(connection.filename, connection.options);
      this.ownsDatabase = true;
    }
    this.db.pragma("foreign_keys = ON");

    const query = async (sql: string, params: readonly SqlParameter[] = []) => this.run(sql, params);
    this.executor = {
      query,
      batch: (sql, paramSets) => runBatch({ query }, sql, paramSets),
    };
  }

  get database(): Database.Database {
    return this.db;
  }

  inTransaction<T>(body: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(body));
    // the caller observes failures through `run`; the queue only orders work
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async close(): Promise<void> {
    await this.queue;
    if (this.ownsDatabase) {
      this.db.close();
    }
  }

  private async runTransaction<T>(body: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    this.db.exec("BEGIN IMMEDIATE");
    try {
      const result = await body(this.executor);
      this.db.exec("COMMIT");
      return result;
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      throw error;
    }
  }

  private run(sql: string, params: readonly SqlParameter[]): { rows: SqlRow[]; rowCount: number } {
    const statement = this.prepare(sql);
    const values = params.map(toSqliteValue);

    if (statement.reader) {
      const rows = statement.all(...values);
      return { rows, rowCount: rows.length };
    }

    const info = statement.run(...values);
    return { rows: [], rowCount: info.changes };
  }

  private prepare(sql: string): Database.Statement<SqliteValue[], SqlRow> {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare<SqliteValue[], SqlRow>(sql);
      if (statement.reader) {
        statement.safeIntegers(true);
      }
      this.statements.set(sql, statement);
    }
    return statement;
  }
}

function toSqliteValue(value: SqlParameter): SqliteValue {
  if (value instanceof Uint8Array) {
    return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  return value;
}

function isSqliteDatabase(value: SqliteConnectionInput): value is Database.Database {
  return "prepare" in value && typeof value.prepare === "function";
}
