export type SqlParameter = string | number | bigint | Uint8Array | null;

export type SqlRow = Record<string, unknown>;

export type SqlResult = {
  rows: SqlRow[];
  rowCount: number;
};

/**
 * Statement runner bound to one open transaction.
 */
export interface SqlExecutor {
  query(sql: string, params?: readonly SqlParameter[]): Promise<SqlResult>;
  /** Runs `sql` once per parameter set; resolves to the affected row counts. */
  batch(sql: string, paramSets: readonly (readonly SqlParameter[])[]): Promise<number[]>;
}

/**
 * Transactional SQL facility consumed by {@link SqlSessionRepository}.
 *
 * `inTransaction` must run `body` in a transaction of its own, on a
 * connection held only for that call, committing when `body` resolves and
 * rolling back when it rejects.
 */
export interface SqlClientLike {
  inTransaction<T>(body: (executor: SqlExecutor) => Promise<T>): Promise<T>;
  close?(): Promise<void>;
}

export function isSqlClientLike(value: unknown): value is SqlClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  const target = value as Partial<SqlClientLike>;
  return typeof target.inTransaction === "function";
}

export async function runBatch(
  executor: Pick<SqlExecutor, "query">,
  sql: string,
  paramSets: readonly (readonly SqlParameter[])[],
): Promise<number[]> {
  const counts: number[] = [];
  for (const params of paramSets) {
    const { rowCount } = await executor.query(sql, params);
    counts.push(rowCount);
  }
  return counts;
}
