import { invalidConfiguration } from "@sessiondb/core";

export const DEFAULT_TABLE_NAME = "SESSION_STORE";

const TABLE_NAME_PLACEHOLDER = /%TABLE_NAME%/g;
const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

const SESSION_COLUMNS =
  "S.SESSION_ID1 AS session_id1, S.SESSION_ID2 AS session_id2, S.CREATION_TIME AS creation_time, " +
  "S.LAST_ACCESS_TIME AS last_access_time, S.MAX_INACTIVE_INTERVAL AS max_inactive_interval, " +
  "SA.ATTRIBUTE_NAME AS attribute_name, SA.ATTRIBUTE_BYTES AS attribute_bytes";

const SESSION_JOIN =
  "FROM %TABLE_NAME% S " +
  "LEFT OUTER JOIN %TABLE_NAME%_ATTRIBUTES SA ON S.SESSION_ID1 = SA.SESSION_ID1 AND S.SESSION_ID2 = SA.SESSION_ID2";

/**
 * Statement templates. `%TABLE_NAME%` is replaced with the configured table
 * name; parameters are positional `?`.
 */
export const DEFAULT_QUERY_TEMPLATES = {
  createSession:
    "INSERT INTO %TABLE_NAME% (SESSION_ID1, SESSION_ID2, CREATION_TIME, LAST_ACCESS_TIME, MAX_INACTIVE_INTERVAL, EXPIRY_TIME, PRINCIPAL_NAME) " +
    "VALUES (?, ?, ?, ?, ?, ?, ?)",
  createSessionAttribute:
    "INSERT INTO %TABLE_NAME%_ATTRIBUTES (SESSION_ID1, SESSION_ID2, ATTRIBUTE_NAME, ATTRIBUTE_BYTES) VALUES (?, ?, ?, ?)",
  getSession: `SELECT ${SESSION_COLUMNS} ${SESSION_JOIN} WHERE S.SESSION_ID1 = ? AND S.SESSION_ID2 = ?`,
  updateSession:
    "UPDATE %TABLE_NAME% SET SESSION_ID1 = ?, SESSION_ID2 = ?, LAST_ACCESS_TIME = ?, MAX_INACTIVE_INTERVAL = ?, EXPIRY_TIME = ?, PRINCIPAL_NAME = ? " +
    "WHERE SESSION_ID1 = ? AND SESSION_ID2 = ?",
  updateSessionAttribute:
    "UPDATE %TABLE_NAME%_ATTRIBUTES SET ATTRIBUTE_BYTES = ? WHERE SESSION_ID1 = ? AND SESSION_ID2 = ? AND ATTRIBUTE_NAME = ?",
  deleteSessionAttribute:
    "DELETE FROM %TABLE_NAME%_ATTRIBUTES WHERE SESSION_ID1 = ? AND SESSION_ID2 = ? AND ATTRIBUTE_NAME = ?",
  deleteSession: "DELETE FROM %TABLE_NAME% WHERE SESSION_ID1 = ? AND SESSION_ID2 = ?",
  listSessionsByPrincipalName: `SELECT ${SESSION_COLUMNS} ${SESSION_JOIN} WHERE S.PRINCIPAL_NAME = ? ORDER BY S.SESSION_ID1, S.SESSION_ID2`,
  deleteSessionsByExpiryTime: "DELETE FROM %TABLE_NAME% WHERE EXPIRY_TIME < ?",
} as const;

export type SessionQueryName = keyof typeof DEFAULT_QUERY_TEMPLATES;
export type SessionQueries = Record<SessionQueryName, string>;

export function normalizeTableName(tableName: string): string {
  const trimmed = typeof tableName === "string" ? tableName.trim() : "";
  if (!trimmed) {
    throw invalidConfiguration("Table name must not be empty.");
  }
  if (!TABLE_NAME_PATTERN.test(trimmed)) {
    throw invalidConfiguration("Table name may only contain letters, digits, underscores and one schema dot.", {
      tableName: trimmed,
    });
  }
  return trimmed;
}

/**
 * Renders every statement for `tableName`, with `overrides` taking the place
 * of the matching default template.
 */
export function prepareQueries(tableName: string, overrides?: Partial<SessionQueries>): SessionQueries {
  const table = normalizeTableName(tableName);
  const render = (template: string): string => template.replace(TABLE_NAME_PLACEHOLDER, table);

  const resolve = (name: SessionQueryName): string => {
    const override = overrides?.[name];
    if (override !== undefined && (typeof override !== "string" || !override.trim())) {
      throw invalidConfiguration(`Query "${name}" must not be empty.`);
    }
    return render(override ?? DEFAULT_QUERY_TEMPLATES[name]);
  };

  return {
    createSession: resolve("createSession"),
    createSessionAttribute: resolve("createSessionAttribute"),
    getSession: resolve("getSession"),
    updateSession: resolve("updateSession"),
    updateSessionAttribute: resolve("updateSessionAttribute"),
    deleteSessionAttribute: resolve("deleteSessionAttribute"),
    deleteSession: resolve("deleteSession"),
    listSessionsByPrincipalName: resolve("listSessionsByPrincipalName"),
    deleteSessionsByExpiryTime: resolve("deleteSessionsByExpiryTime"),
  };
}
