/**
 * Result shaper: raw rows → display-ready records.
 *
 * Every function here is pure; output order follows input order.
 */
import type {
  DisplayRecord,
  FieldRoleConfig,
  PillItem,
  RecordRow,
  ScalarValue,
  TableColumn,
} from "../../shared/types/lookup.js";
import { FALLBACK_ICON, ID_FIELD } from "../../shared/catalog.js";

/** Separator between secondary / tertiary values. */
export const VALUE_SEPARATOR = " • ";

/** Options for {@link shape}. */
export interface ShapeOptions {
  /** Icon of the entity type (default {@link FALLBACK_ICON}). */
  icon?: string;
}

// ── Text ──────────────────────────────────────────────────────────────

/** Display text of a scalar; `null`/absent → `""`. `0` and `false` are kept. */
export function displayText(value: ScalarValue | undefined): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/** Join the non-empty values of `fields` with {@link VALUE_SEPARATOR}. */
export function joinFieldValues(row: RecordRow, fields: string[]): string {
  return fields
    .map((field) => displayText(row[field]))
    .filter((text) => text !== "")
    .join(VALUE_SEPARATOR);
}

/**
 * Column label from an API field name: drop a trailing `__c`, underscores
 * become spaces, each word is title-cased (`annual_revenue__c` →
 * `Annual Revenue`).
 */
export function fieldLabel(fieldName: string): string {
  return fieldName
    .replace(/__c$/, "")
    .replace(/_/g, " ")
    .replace(/\b\w/g, (letter) => letter.toUpperCase());
}

// ── Records ───────────────────────────────────────────────────────────

/** Shape one row. */
export function shapeRow(row: RecordRow, roles: FieldRoleConfig, options: ShapeOptions = {}): DisplayRecord {
  const primaryText = displayText(row[roles.primary]);
  const record: DisplayRecord = {
    id: row.Id,
    primaryText,
    secondaryText: joinFieldValues(row, roles.secondary),
    tertiaryText: joinFieldValues(row, roles.tertiary),
    icon: options.icon ?? FALLBACK_ICON,
    displayLabel: primaryText || row.Id,
  };

  if (roles.tableFields.length > 0) {
    const fields: Record<string, ScalarValue> = {};
    for (const field of roles.tableFields) {
      fields[field] = row[field] ?? null;
    }
    record.fields = fields;
  }
  return record;
}

/** Shape rows into display records, one per row, in order. */
export function shape(rows: RecordRow[], roles: FieldRoleConfig, options: ShapeOptions = {}): DisplayRecord[] {
  return rows.map((row) => shapeRow(row, roles, options));
}

/**
 * Drop records whose id is already selected. The shaper never applies
 * this on its own; the orchestrating layer decides.
 */
export function excludeSelected<T extends { id: string }>(records: T[], selectedIds: Iterable<string>): T[] {
  const selected = new Set(selectedIds);
  return records.filter((record) => !selected.has(record.id));
}

// ── Datatable / pills ─────────────────────────────────────────────────

/** Table fields, or the primary field alone when none are configured. */
export function tableFieldsOf(roles: FieldRoleConfig): string[] {
  return roles.tableFields.length > 0 ? roles.tableFields : [roles.primary];
}

/** One text column per table field. */
export function tableColumns(roles: FieldRoleConfig): TableColumn[] {
  return tableFieldsOf(roles).map((fieldName) => ({
    label: fieldLabel(fieldName),
    fieldName,
    type: "text",
  }));
}

/** Datatable rows: `Id`, the table field values, and the primary text. */
export function tableRows(records: DisplayRecord[], roles: FieldRoleConfig): Record<string, ScalarValue>[] {
  return records.map((record) => ({
    [ID_FIELD]: record.id,
    ...record.fields,
    [roles.primary]: record.primaryText,
  }));
}

/** Pill descriptors for a pill container. */
export function pillItems(records: DisplayRecord[], icon: string = FALLBACK_ICON): PillItem[] {
  return records.map((record) => ({
    type: "icon",
    label: record.displayLabel,
    name: record.id,
    iconName: icon,
    fallbackIconName: FALLBACK_ICON,
  }));
}
