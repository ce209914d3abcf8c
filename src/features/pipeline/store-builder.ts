/**
 * SQLite store builder.
 *
 * Creates / rebuilds `.rlk/store/records.db` with one table per catalog
 * entity and loads the record fixtures into it. The rebuild is
 * idempotent: every entity table is dropped and re-created.
 *
 * Column affinity follows the catalog field type; booleans are stored as
 * 0/1 and turned back into booleans by the record store.
 */
import { mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { createRequire } from "node:module";
import type { EntityDefinition, FieldType, LookupProject, ScalarValue } from "../../shared/types/lookup.js";
import { ID_FIELD } from "../../shared/catalog.js";
import { sqliteDialect } from "../query/dialect.js";
import { storeFile } from "../../shared/paths.js";
import { getLogger, type Logger } from "../../shared/logger.js";

// better-sqlite3 is a CJS package; use createRequire for ESM interop.
const require = createRequire(import.meta.url);
const Database = require("better-sqlite3") as typeof import("better-sqlite3");

// ── Types ─────────────────────────────────────────────────────────────

/** Options for {@link buildStore}. */
export interface StoreBuilderOptions {
  /** Override repository root. */
  root?: string;
  /** Override output path (default: `<root>/.rlk/store/records.db`). */
  dbPath?: string;
  logger?: Logger;
}

/** Summary of a build. */
export interface StoreBuildResult {
  dbPath: string;
  /** Rows written per entity. */
  tables: Record<string, number>;
}

// ── Helpers ───────────────────────────────────────────────────────────

const q = sqliteDialect.field;

function affinity(type: FieldType): string {
  switch (type) {
    case "int":
    case "boolean":
      return "INTEGER";
    case "double":
    case "currency":
    case "percent":
      return "REAL";
    default:
      return "TEXT";
  }
}

function storedValue(value: ScalarValue | undefined): string | number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

/** Catalog fields other than `Id`, which every table gets as its key. */
function dataFields(entity: EntityDefinition) {
  return entity.fields.filter((f) => f.name !== ID_FIELD);
}

// ── Public API ────────────────────────────────────────────────────────

/**
 * Build (or rebuild) the SQLite store from a loaded project.
 *
 * Record files for entities missing from the catalog are skipped, as are
 * record keys that are not catalog fields; `rlk validate` reports both.
 */
export function buildStore(project: LookupProject, options: StoreBuilderOptions = {}): StoreBuildResult {
  const dbPath = options.dbPath ?? storeFile(options.root);
  const logger = options.logger ?? getLogger();

  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  const tables: Record<string, number> = {};

  try {
    for (const entity of project.catalog.values()) {
      const fields = dataFields(entity);
      const columns = [`${q(ID_FIELD)} TEXT PRIMARY KEY`, ...fields.map((f) => `${q(f.name)} ${affinity(f.type)}`)];

      db.exec(`DROP TABLE IF EXISTS ${q(entity.name)};`);
      db.exec(`CREATE TABLE ${q(entity.name)} (${columns.join(", ")});`);

      const names = [ID_FIELD, ...fields.map((f) => f.name)];
      const insert = db.prepare(
        `INSERT OR REPLACE INTO ${q(entity.name)} (${names.map(q).join(", ")}) VALUES (${names.map(() => "?").join(", ")})`,
      );

      const rows = project.records.get(entity.name) ?? [];
      const insertAll = db.transaction(() => {
        for (const row of rows) {
          insert.run(...names.map((name) => storedValue(row[name])));
        }
      });
      insertAll();

      tables[entity.name] = rows.length;
      logger.debug("store table written", { entity: entity.name, rows: rows.length });
    }

    for (const entityName of project.records.keys()) {
      if (!project.catalog.has(entityName)) {
        logger.warn("records skipped: entity not in catalog", { entity: entityName });
      }
    }

    return { dbPath, tables };
  } finally {
    db.close();
  }
}
