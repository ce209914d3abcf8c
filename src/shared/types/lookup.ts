/**
 * TypeScript interfaces for the lookup core and the project files.
 * The catalog and configuration shapes align with the JSON Schemas under
 * tools/rlk/schema/.
 */

// ── Records ───────────────────────────────────────────────────────────

/** A single field value as returned by query execution. */
export type ScalarValue = string | number | boolean | null;

/** One row returned by the query executor. */
export interface RecordRow {
  /** Unique key every entity type carries. */
  Id: string;
  [field: string]: ScalarValue;
}

// ── Catalog ───────────────────────────────────────────────────────────

/** Data type of a catalog field. */
export type FieldType =
  | "id"
  | "string"
  | "textarea"
  | "email"
  | "phone"
  | "url"
  | "picklist"
  | "multipicklist"
  | "reference"
  | "boolean"
  | "int"
  | "double"
  | "currency"
  | "percent"
  | "date"
  | "datetime";

/** A field on a catalog entity. */
export interface FieldDefinition {
  /** API name (e.g. "Industry", "OwnerId", "Region__c"). */
  name: string;
  /** Display label. */
  label: string;
  type: FieldType;
  /** Target entity for `reference` fields. */
  referenceTo?: string;
  /**
   * Relationship name used in one-hop paths (e.g. "Owner" for "OwnerId").
   * Derived from the field name when absent.
   */
  relationshipName?: string;
}

/** An entity type in the catalog (one `.rlk/catalog/<Entity>.yml`). */
export interface EntityDefinition {
  /** API name (e.g. "Account"). */
  name: string;
  /** Display label. */
  label: string;
  /** Icon identifier (e.g. "standard:account"). */
  icon?: string;
  /** Field used as the display name when this entity is referenced. Default "Name". */
  nameField?: string;
  /** Hidden entities are never offered for search. */
  hidden?: boolean;
  fields: FieldDefinition[];
}

/** Entity definitions keyed by API name. */
export type Catalog = Map<string, EntityDefinition>;

/** Shape of `.rlk/records/<Entity>.yml`. */
export interface RecordsFile {
  records: RecordRow[];
}

// ── Options ───────────────────────────────────────────────────────────

/** A selectable label/value pair. */
export interface SelectOption {
  label: string;
  value: string;
}

/** An entity type offered by the configuration surface. */
export type EntityOption = SelectOption;

/** A field offered by the configuration surface. */
export type FieldOption = SelectOption;

// ── Display ───────────────────────────────────────────────────────────

/** Mapping of display roles to field names. */
export interface FieldRoleConfig {
  primary: string;
  secondary: string[];
  tertiary: string[];
  tableFields: string[];
}

/** A display-ready record derived from a {@link RecordRow}. */
export interface DisplayRecord {
  id: string;
  primaryText: string;
  secondaryText: string;
  tertiaryText: string;
  icon: string;
  /** Primary text, or the id when the primary text is empty. */
  displayLabel: string;
  /** Values of the table fields, for datatable display. */
  fields?: Record<string, ScalarValue>;
}

/** A datatable column descriptor. */
export interface TableColumn {
  label: string;
  fieldName: string;
  type: "text";
}

/** A pill descriptor for the multi-select pill container. */
export interface PillItem {
  type: "icon";
  label: string;
  name: string;
  iconName: string;
  fallbackIconName: string;
}

// ── Configuration ─────────────────────────────────────────────────────

/** How selected records are shown in multi-select mode. */
export type DisplayFormat = "pills" | "datatable";

/** The lookup configuration surface (`.rlk/lookup.yml`). */
export interface LookupConfig {
  entityType: string;
  primaryField: string;
  secondaryFields: string[];
  tertiaryFields: string[];
  allowMultipleSelection: boolean;
  displayFormat: DisplayFormat;
  tableFields: string[];
  placeholder: string;
  selectedRecordsTitle: string;
}

/** A field-level configuration problem. */
export interface ConfigIssue {
  /** Configuration key the problem belongs to. */
  key: keyof LookupConfig;
  errorString: string;
}

// ── Selection ─────────────────────────────────────────────────────────

/** Output produced on every selection change. */
export interface SelectionOutput {
  recordId: string;
  primaryFieldValue: string;
  secondaryFieldValue: string;
  tertiaryFieldValue: string;
  selectedRecordIds: string[];
  selectedRecords: DisplayRecord[];
}

// ── Project ───────────────────────────────────────────────────────────

/** Everything loaded from a `.rlk/` project directory. */
export interface LookupProject {
  catalog: Catalog;
  /** Records keyed by entity API name. */
  records: Map<string, RecordRow[]>;
  /** Raw lookup configuration as read from disk (may be absent). */
  rawConfig: Record<string, unknown> | null;
}
