/**
 * Query dialects: how a {@link QueryCondition} is written for a target
 * query language.
 *
 * Each dialect owns identifier quoting, string-literal quoting and the
 * way a user-supplied search term is matched.
 */
import { ID_FIELD } from "../../shared/catalog.js";

// ── Types ─────────────────────────────────────────────────────────────

/** OR-ed substring match of one term over several fields. */
export interface SearchCondition {
  term: string;
  fields: string[];
}

/** Structured WHERE clause; present parts are AND-ed in this order. */
export interface QueryCondition {
  search?: SearchCondition;
  ids?: string[];
  /** Trusted fragment from configuration, inserted as-is. */
  raw?: string;
}

export interface QueryDialect {
  name: string;
  /** Write a field reference. */
  field(name: string): string;
  /** Write a quoted string literal. */
  literal(value: string): string;
  /** Case-insensitive "field contains term" expression. */
  contains(fieldRef: string, term: string): string;
}

// ── Escaping ──────────────────────────────────────────────────────────

/** SOQL string-literal escaping: backslash before `\` and `'`. */
export function escapeSoqlString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** SQL string-literal escaping: double every `'`. */
export function escapeSqlString(value: string): string {
  return value.replace(/'/g, "''");
}

// ── Dialects ──────────────────────────────────────────────────────────

/**
 * SOQL-style text. Field paths stay bare (`Owner.Name`); LIKE is
 * case-insensitive and treats `\%` and `\_` as literals.
 */
export const soqlDialect: QueryDialect = {
  name: "soql",
  field: (name) => name,
  literal: (value) => `'${escapeSoqlString(value)}'`,
  contains(fieldRef, term) {
    // one pass: SOQL uses the same backslash for quotes and wildcards
    const pattern = term.replace(/[\\'%_]/g, (c) => `\\${c}`);
    return `${fieldRef} LIKE '%${pattern}%'`;
  },
};

/** SQL function the SQLite record store registers for substring matches. */
export const CONTAINS_FUNCTION = "rlk_contains";

/**
 * Case-insensitive substring test behind {@link CONTAINS_FUNCTION}. Folds
 * case with `toLowerCase`, so non-ASCII letters match too (SQLite's LIKE
 * folds ASCII only). Returns 1/0 for SQLite.
 */
export function containsText(value: unknown, term: unknown): number {
  if (value === null || value === undefined || typeof term !== "string") return 0;
  return String(value).toLowerCase().includes(term.toLowerCase()) ? 1 : 0;
}

/**
 * SQLite SQL. Every field is a double-quoted identifier so that
 * relationship columns such as `"Owner.Name"` resolve. Substring matches
 * call {@link CONTAINS_FUNCTION}; the term is a plain literal, so `%` and
 * `_` need no escaping.
 */
export const sqliteDialect: QueryDialect = {
  name: "sqlite",
  field: (name) => `"${name.replace(/"/g, '""')}"`,
  literal: (value) => `'${escapeSqlString(value)}'`,
  contains(fieldRef, term) {
    return `${CONTAINS_FUNCTION}(${fieldRef}, '${escapeSqlString(term)}')`;
  },
};

// ── Rendering ─────────────────────────────────────────────────────────

/** Render a condition; returns `""` when it has no parts. */
export function renderCondition(condition: QueryCondition, dialect: QueryDialect): string {
  const parts: string[] = [];

  const search = condition.search;
  if (search && search.fields.length > 0) {
    const matches = search.fields.map((f) => dialect.contains(dialect.field(f), search.term));
    parts.push(`(${matches.join(" OR ")})`);
  }

  if (condition.ids && condition.ids.length > 0) {
    parts.push(`${dialect.field(ID_FIELD)} IN (${condition.ids.map((id) => dialect.literal(id)).join(", ")})`);
  }

  if (condition.raw) {
    parts.push(`(${condition.raw})`);
  }

  return parts.join(" AND ");
}
