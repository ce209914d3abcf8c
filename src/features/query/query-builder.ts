/**
 * Query builder for record lookups.
 *
 * Turns a runtime-chosen entity type and field list into a ready-to-run
 * {@link QuerySpec}: projection (always including `Id`), an optional
 * search condition over the projected fields, an optional trusted filter
 * fragment, ordering and a capped row limit. Building never executes
 * anything.
 */
import { ValidationError } from "../../shared/errors.js";
import { ID_FIELD } from "../../shared/catalog.js";
import { renderCondition, soqlDialect, type QueryCondition, type QueryDialect } from "./dialect.js";

// ── Types ─────────────────────────────────────────────────────────────

/** Input to {@link buildQuery}. */
export interface SearchRequest {
  entityType: string;
  /** Blank means unfiltered. */
  searchTerm?: string;
  /** Fields to project; `Id` is appended when absent. */
  fields: string[];
  /**
   * Trusted filter fragment supplied by configuration. Not escaped.
   * The SQLite store applies it to the projected columns, so a relationship
   * path must be written as a quoted column (`"Owner.Name" = 'x'`) there;
   * the bare `Owner.Name` form only fits the rendered query text.
   */
  extraFilter?: string;
  /** Requested row cap; clamped to [1, {@link MAX_RESULTS}]. */
  cap?: number;
}

/** A fully-formed query, ready for a {@link RecordQueryExecutor}. */
export interface QuerySpec {
  entityType: string;
  /** Projected fields, deduplicated, `Id` exactly once. */
  fields: string[];
  condition: QueryCondition;
  orderBy: string;
  limit: number;
  /** WHERE clause in SOQL-style text; `""` when unconditioned. */
  where: string;
  /** Complete SOQL-style query text. */
  query: string;
}

// ── Limits ────────────────────────────────────────────────────────────

export const DEFAULT_RESULTS = 10;
export const MAX_RESULTS = 50;

/** Clamp a requested cap to [1, MAX_RESULTS]; absent or `NaN` → default. */
export function resolveCap(requested?: number): number {
  const cap = requested === undefined || Number.isNaN(requested) ? DEFAULT_RESULTS : Math.floor(requested);
  return Math.min(MAX_RESULTS, Math.max(1, cap));
}

// ── Helpers ───────────────────────────────────────────────────────────

/** `Name` or one relationship hop such as `Owner.Name`. */
const FIELD_PATH = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const ENTITY_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isIdField(field: string): boolean {
  return field.toLowerCase() === ID_FIELD.toLowerCase();
}

function requireEntityType(entityType: string): string {
  const name = entityType.trim();
  if (!name) throw new ValidationError("Entity type is required");
  if (!ENTITY_NAME.test(name)) throw new ValidationError(`Invalid entity type "${name}"`);
  return name;
}

/**
 * Trim, drop blanks, validate, dedupe case-insensitively (first spelling
 * wins) and append `Id` when absent.
 */
function projectFields(fields: string[]): string[] {
  const seen = new Set<string>();
  const projected: string[] = [];

  for (const raw of fields) {
    const field = raw.trim();
    if (!field) continue;
    if (!FIELD_PATH.test(field)) throw new ValidationError(`Invalid field "${field}"`);
    const key = field.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    projected.push(isIdField(field) ? ID_FIELD : field);
  }

  if (projected.length === 0) throw new ValidationError("At least one field to return is required");
  if (!seen.has(ID_FIELD.toLowerCase())) projected.push(ID_FIELD);
  return projected;
}

function assemble(
  entityType: string,
  fields: string[],
  condition: QueryCondition,
  limit: number,
  dialect: QueryDialect,
): QuerySpec {
  const orderBy = fields.find((f) => !isIdField(f)) ?? ID_FIELD;
  const where = renderCondition(condition, dialect);
  const query = [
    `SELECT ${fields.join(", ")} FROM ${entityType}`,
    where ? `WHERE ${where}` : "",
    `ORDER BY ${orderBy} ASC`,
    `LIMIT ${limit}`,
  ]
    .filter(Boolean)
    .join(" ");

  return { entityType, fields, condition, orderBy, limit, where, query };
}

// ── Public API ────────────────────────────────────────────────────────

/**
 * Build a search query.
 *
 * - A non-blank search term becomes an OR of substring matches over every
 *   projected field except `Id`. With no such field the term is ignored.
 * - A non-blank `extraFilter` is AND-ed as its own parenthesized group.
 *
 * @throws {ValidationError} when the entity type is blank or no field is given.
 */
export function buildQuery(request: SearchRequest, dialect: QueryDialect = soqlDialect): QuerySpec {
  const entityType = requireEntityType(request.entityType);
  const fields = projectFields(request.fields);

  const condition: QueryCondition = {};
  const term = request.searchTerm?.trim() ?? "";
  const searchFields = fields.filter((f) => !isIdField(f));
  if (term && searchFields.length > 0) {
    condition.search = { term, fields: searchFields };
  }

  const extraFilter = request.extraFilter?.trim();
  if (extraFilter) condition.raw = extraFilter;

  return assemble(entityType, fields, condition, resolveCap(request.cap), dialect);
}

/**
 * Build a query that fetches specific records by id, e.g. to restore a
 * pre-selected record. Blank ids are dropped and duplicates removed.
 *
 * @throws {ValidationError} when the entity type is blank, no field is
 * given or no id remains.
 */
export function buildRecordDetailsQuery(
  entityType: string,
  ids: string[],
  fields: string[],
  dialect: QueryDialect = soqlDialect,
): QuerySpec {
  const name = requireEntityType(entityType);
  const projected = projectFields(fields);
  const unique = [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
  if (unique.length === 0) throw new ValidationError("At least one record id is required");

  return assemble(name, projected, { ids: unique }, resolveCap(unique.length), dialect);
}
