/**
 * Lookup service: composes the query builder, an executor, the metadata
 * resolver and the result shaper for one lookup configuration.
 *
 * The components never call each other; this is the only place that
 * wires them together (besides the CLI commands, which go through here).
 */
import type { DisplayRecord, LookupConfig } from "../../shared/types/lookup.js";
import { ValidationError, errorMessage } from "../../shared/errors.js";
import { getLogger, type Logger } from "../../shared/logger.js";
import { buildQuery, buildRecordDetailsQuery, DEFAULT_RESULTS, type QuerySpec } from "../query/query-builder.js";
import { executeQuery, type RecordQueryExecutor } from "../query/record-store.js";
import type { MetadataResolver } from "../metadata/resolver.js";
import { excludeSelected, shape } from "../display/result-shaper.js";
import { toSelectedRecord, type SelectedRecord } from "../selection/selection.js";
import { fieldsToReturn, roleConfigOf } from "../config/lookup-config.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface LookupServiceOptions {
  resolver: MetadataResolver;
  executor: RecordQueryExecutor;
  logger?: Logger;
}

export interface SearchOptions {
  /** Ids already selected; removed from the results. */
  selectedIds?: Iterable<string>;
  /** Trusted filter fragment from configuration; see `SearchRequest.extraFilter`. */
  extraFilter?: string;
  cap?: number;
}

export interface LookupSearchResult {
  query: QuerySpec;
  records: DisplayRecord[];
}

// ── Error messages ────────────────────────────────────────────────────

const UNKNOWN_ENTITY = /no such table|unknown entity/i;
const UNKNOWN_FIELD = /no such column|unknown field/i;

/** One inline message for a failed lookup. */
export function describeLookupError(err: unknown, entityType: string): string {
  if (err instanceof ValidationError) return "Please configure the entity to search.";

  const message = errorMessage(err);
  if (UNKNOWN_ENTITY.test(message)) {
    return `The entity "${entityType}" is not accessible or does not exist.`;
  }
  if (UNKNOWN_FIELD.test(message)) {
    return "One or more selected fields are not accessible. Please check your configuration.";
  }
  return message;
}

// ── Service ───────────────────────────────────────────────────────────

export class LookupService {
  private readonly resolver: MetadataResolver;
  private readonly executor: RecordQueryExecutor;
  private readonly logger: Logger;

  constructor(options: LookupServiceOptions) {
    this.resolver = options.resolver;
    this.executor = options.executor;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Search `config.entityType` for `term`. Records already selected are
   * left out of the result.
   *
   * @throws {ValidationError} before execution for an unusable config.
   * @throws {ExecutionError} when the executor fails.
   */
  async search(config: LookupConfig, term: string, options: SearchOptions = {}): Promise<LookupSearchResult> {
    const query = buildQuery({
      entityType: config.entityType,
      searchTerm: term,
      fields: fieldsToReturn(config),
      extraFilter: options.extraFilter,
      cap: options.cap ?? DEFAULT_RESULTS,
    });
    this.logger.debug("lookup search", { entityType: query.entityType, term, limit: query.limit });

    const rows = await executeQuery(this.executor, query);
    const icon = this.resolver.getEntityIcon(query.entityType);
    const shaped = shape(rows, roleConfigOf(config), { icon });
    const records = excludeSelected(shaped, options.selectedIds ?? []);

    this.logger.debug("lookup search done", { rows: rows.length, returned: records.length });
    return { query, records };
  }

  /** Fetch the records behind `ids` (e.g. a pre-selected value), in `ids` order. */
  async loadRecords(config: LookupConfig, ids: string[]): Promise<SelectedRecord[]> {
    const query = buildRecordDetailsQuery(config.entityType, ids, fieldsToReturn(config));
    this.logger.debug("lookup load records", { entityType: query.entityType, ids: query.limit });

    const rows = await executeQuery(this.executor, query);
    const byId = new Map(rows.map((row) => [row.Id, row]));
    const roles = roleConfigOf(config);
    const icon = this.resolver.getEntityIcon(query.entityType);

    // trimmed, deduplicated and blank-free, in request order
    const wanted = query.condition.ids ?? [];
    const selected: SelectedRecord[] = [];
    for (const id of wanted) {
      const row = byId.get(id);
      if (row) selected.push(toSelectedRecord(row, roles, icon));
    }

    const missing = wanted.length - selected.length;
    if (missing > 0) this.logger.warn("selected records not found", { missing });
    return selected;
  }
}
