/**
 * Lookup configuration: the property-editor model.
 *
 * Raw configuration (from `.rlk/lookup.yml` or any other source) is
 * normalized into a {@link LookupConfig} with defaults. Editor transitions
 * return a new config; `validateLookupConfig` lists field-level problems.
 */
import type {
  ConfigIssue,
  DisplayFormat,
  FieldOption,
  FieldRoleConfig,
  LookupConfig,
} from "../../shared/types/lookup.js";

// ── Defaults ──────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: Readonly<LookupConfig> = {
  entityType: "Account",
  primaryField: "Name",
  secondaryFields: [],
  tertiaryFields: [],
  allowMultipleSelection: false,
  displayFormat: "pills",
  tableFields: [],
  placeholder: "Search...",
  selectedRecordsTitle: "Selected Records",
};

/** Leading "no field" choice for the secondary/tertiary selectors. */
export const NONE_OPTION: FieldOption = { label: "-- None --", value: "" };

const DISPLAY_FORMATS: readonly DisplayFormat[] = ["pills", "datatable"];

export function isDisplayFormat(value: unknown): value is DisplayFormat {
  return typeof value === "string" && DISPLAY_FORMATS.some((f) => f === value);
}

// ── Parsing ───────────────────────────────────────────────────────────

/**
 * Parse a field list given either as an array or as a comma-separated
 * string. Entries are trimmed; blanks are dropped.
 */
export function parseFieldList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [];
  return items
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter(Boolean);
}

/** Absent values take the fallback; an explicit blank string stays blank. */
function stringOr(value: unknown, fallback: string): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return fallback;
}

function booleanOf(value: unknown): boolean {
  return value === true || value === "true";
}

/**
 * Normalize raw configuration. Missing values take their defaults;
 * unknown keys are ignored. An unrecognized display format becomes
 * `pills` (the schema check in `rlk validate` reports it).
 */
export function normalizeLookupConfig(raw: Record<string, unknown> | null | undefined): LookupConfig {
  const source = raw ?? {};
  return {
    entityType: stringOr(source.entityType, DEFAULT_CONFIG.entityType),
    primaryField: stringOr(source.primaryField, DEFAULT_CONFIG.primaryField),
    secondaryFields: parseFieldList(source.secondaryFields),
    tertiaryFields: parseFieldList(source.tertiaryFields),
    allowMultipleSelection: booleanOf(source.allowMultipleSelection),
    displayFormat: isDisplayFormat(source.displayFormat) ? source.displayFormat : DEFAULT_CONFIG.displayFormat,
    tableFields: parseFieldList(source.tableFields),
    placeholder: stringOr(source.placeholder, DEFAULT_CONFIG.placeholder),
    selectedRecordsTitle: stringOr(source.selectedRecordsTitle, DEFAULT_CONFIG.selectedRecordsTitle),
  };
}

// ── Validation ────────────────────────────────────────────────────────

/** Field-level problems of a configuration; empty when valid. */
export function validateLookupConfig(config: LookupConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!config.entityType.trim()) {
    issues.push({ key: "entityType", errorString: "Entity type is required" });
  }
  if (!config.primaryField.trim()) {
    issues.push({ key: "primaryField", errorString: "Primary field is required" });
  }
  return issues;
}

// ── Editor transitions ────────────────────────────────────────────────

/** Keys an editor may change. */
export type ConfigKey = keyof LookupConfig;

const CONFIG_KEYS: readonly ConfigKey[] = [
  "entityType",
  "primaryField",
  "secondaryFields",
  "tertiaryFields",
  "allowMultipleSelection",
  "displayFormat",
  "tableFields",
  "placeholder",
  "selectedRecordsTitle",
];

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

/**
 * Apply one editor change and return the new config.
 *
 * - Changing the entity type resets the primary field to `Name` and
 *   clears the secondary and tertiary fields.
 * - Turning multi-select off resets the display format to `pills` and
 *   clears the table fields.
 */
export function applyConfigChange(config: LookupConfig, key: ConfigKey, value: unknown): LookupConfig {
  const next: Record<string, unknown> = { ...config, [key]: value };
  const normalized = normalizeLookupConfig(next);

  if (key === "entityType" && normalized.entityType !== config.entityType) {
    return { ...normalized, primaryField: DEFAULT_CONFIG.primaryField, secondaryFields: [], tertiaryFields: [] };
  }
  if (key === "allowMultipleSelection" && !normalized.allowMultipleSelection) {
    return { ...normalized, displayFormat: "pills", tableFields: [] };
  }
  return normalized;
}

/**
 * Choices for the secondary or tertiary selector: `-- None --` followed by
 * every field except the primary field and the other role's field.
 */
export function fieldChoices(
  options: FieldOption[],
  config: LookupConfig,
  role: "secondary" | "tertiary",
): FieldOption[] {
  const other = role === "secondary" ? config.tertiaryFields : config.secondaryFields;
  const excluded = new Set([config.primaryField, ...other]);
  return [NONE_OPTION, ...options.filter((o) => !excluded.has(o.value))];
}

// ── Derived values ────────────────────────────────────────────────────

export function roleConfigOf(config: LookupConfig): FieldRoleConfig {
  return {
    primary: config.primaryField,
    secondary: config.secondaryFields,
    tertiary: config.tertiaryFields,
    tableFields: config.tableFields,
  };
}

/** Primary, secondary, tertiary and table fields, deduplicated in that order. */
export function fieldsToReturn(config: LookupConfig): string[] {
  return [
    ...new Set([config.primaryField, ...config.secondaryFields, ...config.tertiaryFields, ...config.tableFields]),
  ].filter(Boolean);
}

/** Plain object form for writing back to YAML. */
export function serializeLookupConfig(config: LookupConfig): Record<string, unknown> {
  return { ...config };
}
