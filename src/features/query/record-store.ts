/**
 * Query execution.
 *
 * {@link RecordQueryExecutor} is the seam between the lookup core and a
 * data store. {@link executeQuery} runs a {@link QuerySpec} through an
 * executor and reports any failure as a single {@link ExecutionError}.
 *
 * {@link SqliteRecordStore} executes against the store built by
 * `rlk build` (see `pipeline/store-builder.ts`). One-hop relationship
 * fields such as `Owner.Name` are served by a LEFT JOIN on the reference
 * field, exposed as a column literally named `Owner.Name`. Search terms
 * match through a registered SQL function that folds case beyond ASCII.
 */
import { createRequire } from "node:module";
import type { Catalog, EntityDefinition, RecordRow, ScalarValue } from "../../shared/types/lookup.js";
import { ExecutionError, NotFoundError, errorMessage } from "../../shared/errors.js";
import { ID_FIELD, resolveFieldPath } from "../../shared/catalog.js";
import { CONTAINS_FUNCTION, containsText, renderCondition, sqliteDialect } from "./dialect.js";
import type { QuerySpec } from "./query-builder.js";

// better-sqlite3 is a CJS package; use createRequire for ESM interop.
const require = createRequire(import.meta.url);
const Database = require("better-sqlite3") as typeof import("better-sqlite3");

// ── Executor seam ─────────────────────────────────────────────────────

/** Runs a built query against some data store. */
export interface RecordQueryExecutor {
  execute(spec: QuerySpec): Promise<RecordRow[]>;
}

/**
 * Execute `spec`, wrapping any executor failure (unknown entity, unknown
 * field, permissions, malformed filter) into one {@link ExecutionError}
 * that keeps the original message. Failures are not retried.
 */
export async function executeQuery(executor: RecordQueryExecutor, spec: QuerySpec): Promise<RecordRow[]> {
  try {
    return await executor.execute(spec);
  } catch (err: unknown) {
    throw new ExecutionError(errorMessage(err), { cause: err });
  }
}

// ── SQLite store ──────────────────────────────────────────────────────

/** Options for {@link SqliteRecordStore}. */
export interface SqliteRecordStoreOptions {
  /** Path of the database written by `buildStore()`. */
  dbPath: string;
  /** Catalog the store was built from; used for joins and type coercion. */
  catalog: Catalog;
}

const q = sqliteDialect.field;

function isRow(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null;
}

/** Turn a raw SQLite row into a {@link RecordRow}. */
function toRecordRow(raw: unknown, fields: string[], booleanFields: Set<string>): RecordRow {
  if (!isRow(raw)) throw new Error("Unexpected row shape returned by SQLite");
  const row: RecordRow = { Id: String(raw[ID_FIELD] ?? "") };
  for (const field of fields) {
    if (field === ID_FIELD) continue;
    const value = raw[field];
    let scalar: ScalarValue = null;
    if (typeof value === "string" || typeof value === "number") {
      scalar = booleanFields.has(field) ? value === 1 || value === "1" : value;
    } else if (typeof value === "bigint") {
      scalar = Number(value);
    }
    row[field] = scalar;
  }
  return row;
}

export class SqliteRecordStore implements RecordQueryExecutor {
  private readonly dbPath: string;
  private readonly catalog: Catalog;

  constructor(options: SqliteRecordStoreOptions) {
    this.dbPath = options.dbPath;
    this.catalog = options.catalog;
  }

  async execute(spec: QuerySpec): Promise<RecordRow[]> {
    const entity = this.catalog.get(spec.entityType);
    if (!entity) throw new NotFoundError(`Unknown entity type "${spec.entityType}"`);

    const sql = this.toSql(entity, spec);
    const booleanFields = this.booleanFields(entity, spec.fields);

    const db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
    try {
      db.function(CONTAINS_FUNCTION, { deterministic: true }, containsText);
      const rows = db.prepare(sql).all(spec.limit);
      return rows.map((raw) => toRecordRow(raw, spec.fields, booleanFields));
    } finally {
      db.close();
    }
  }

  /** Translate a {@link QuerySpec} into SQLite SQL with one bound parameter (the limit). */
  toSql(entity: EntityDefinition, spec: QuerySpec): string {
    const columns = ["base.*"];
    const joins: string[] = [];
    const joined = new Set<string>();

    for (const path of spec.fields) {
      if (!path.includes(".")) continue;
      const resolved = resolveFieldPath(this.catalog, entity, path);
      if (resolved?.kind !== "relationship") {
        throw new NotFoundError(`Unknown field "${path}" on ${entity.name}`);
      }
      const alias = q(resolved.relationshipName);
      if (!joined.has(resolved.relationshipName)) {
        joined.add(resolved.relationshipName);
        joins.push(
          `LEFT JOIN ${q(resolved.target.name)} AS ${alias} ON ${alias}.${q(ID_FIELD)} = base.${q(resolved.reference.name)}`,
        );
      }
      columns.push(`${alias}.${q(resolved.field.name)} AS ${q(path)}`);
    }

    const source = [`SELECT ${columns.join(", ")} FROM ${q(entity.name)} AS base`, ...joins].join(" ");
    const where = renderCondition(spec.condition, sqliteDialect);

    return [
      `SELECT ${spec.fields.map(q).join(", ")} FROM (${source}) AS src`,
      where ? `WHERE ${where}` : "",
      `ORDER BY ${q(spec.orderBy)} COLLATE NOCASE ASC`,
      "LIMIT ?",
    ]
      .filter(Boolean)
      .join(" ");
  }

  private booleanFields(entity: EntityDefinition, fields: string[]): Set<string> {
    const result = new Set<string>();
    for (const path of fields) {
      const resolved = resolveFieldPath(this.catalog, entity, path);
      if (resolved?.field.type === "boolean") result.add(path);
    }
    return result;
  }
}
