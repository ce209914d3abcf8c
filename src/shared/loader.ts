/**
 * Lookup project loader.
 *
 * Walks `.rlk/` and assembles a {@link LookupProject}:
 *
 *   .rlk/
 *     lookup.yml            ← lookup configuration (optional)
 *     catalog/<Entity>.yml  ← one entity definition per file
 *     records/<Entity>.yml  ← `records:` list per entity
 *
 * The raw parsed documents are returned next to the typed view so the
 * validator can check them against the JSON Schemas.
 */
import { readFileSync, readdirSync, existsSync } from "node:fs";
import { join, basename, extname } from "node:path";
import type {
  Catalog,
  EntityDefinition,
  FieldDefinition,
  FieldType,
  LookupProject,
  RecordRow,
  ScalarValue,
} from "./types/lookup.js";
import { isYamlMapping, parseYaml } from "./yaml.js";
import { catalogDir, lookupConfigFile, recordsDir } from "./paths.js";

// ── Types ─────────────────────────────────────────────────────────────

/** A parsed YAML document and the file it came from. */
export interface SourceDocument {
  file: string;
  data: unknown;
}

/** Raw documents backing a loaded project. */
export interface ProjectSources {
  catalog: SourceDocument[];
  records: SourceDocument[];
  config: SourceDocument | null;
}

/** A loaded project plus its raw sources. */
export interface LoadedProject extends LookupProject {
  sources: ProjectSources;
}

/** Options for the loader. */
export interface LoaderOptions {
  /** Override repository root (default: working directory). */
  root?: string;
}

// ── Helpers ───────────────────────────────────────────────────────────

const FIELD_TYPES: readonly FieldType[] = [
  "id",
  "string",
  "textarea",
  "email",
  "phone",
  "url",
  "picklist",
  "multipicklist",
  "reference",
  "boolean",
  "int",
  "double",
  "currency",
  "percent",
  "date",
  "datetime",
];

function isFieldType(value: unknown): value is FieldType {
  return typeof value === "string" && FIELD_TYPES.some((t) => t === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function readDocument(file: string): SourceDocument {
  return { file, data: parseYaml(readFileSync(file, "utf-8"), file) };
}

/**
 * Discover all `.yml` / `.yaml` files under a directory (non-recursive).
 * Skips dotfiles.
 */
function listYamlFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => {
      const ext = extname(f).toLowerCase();
      return (ext === ".yml" || ext === ".yaml") && !f.startsWith(".");
    })
    .sort()
    .map((f) => join(dir, f));
}

/** Entity name implied by a file name (`Account.yml` → `Account`). */
function stem(file: string): string {
  return basename(file, extname(file));
}

function toFieldDefinition(raw: unknown): FieldDefinition | null {
  if (!isYamlMapping(raw)) return null;
  const name = optionalString(raw.name);
  if (!name) return null;

  const field: FieldDefinition = {
    name,
    label: optionalString(raw.label) ?? name,
    type: isFieldType(raw.type) ? raw.type : "string",
  };
  const referenceTo = optionalString(raw.referenceTo);
  if (referenceTo) field.referenceTo = referenceTo;
  const relationshipName = optionalString(raw.relationshipName);
  if (relationshipName) field.relationshipName = relationshipName;
  return field;
}

function toEntityDefinition(doc: SourceDocument): EntityDefinition | null {
  if (!isYamlMapping(doc.data)) return null;
  const raw = doc.data;
  const name = optionalString(raw.name) ?? stem(doc.file);

  const fields = Array.isArray(raw.fields)
    ? raw.fields.map(toFieldDefinition).filter((f): f is FieldDefinition => f !== null)
    : [];

  const entity: EntityDefinition = {
    name,
    label: optionalString(raw.label) ?? name,
    fields,
  };
  const icon = optionalString(raw.icon);
  if (icon) entity.icon = icon;
  const nameField = optionalString(raw.nameField);
  if (nameField) entity.nameField = nameField;
  if (raw.hidden === true) entity.hidden = true;
  return entity;
}

function toScalar(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
}

function toRecordRow(raw: unknown): RecordRow | null {
  if (!isYamlMapping(raw)) return null;
  const id = raw.Id;
  if (typeof id !== "string" && typeof id !== "number") return null;

  const row: RecordRow = { Id: String(id) };
  for (const [key, value] of Object.entries(raw)) {
    if (key === "Id") continue;
    row[key] = toScalar(value);
  }
  return row;
}

function toRecords(doc: SourceDocument): RecordRow[] {
  if (!isYamlMapping(doc.data) || !Array.isArray(doc.data.records)) return [];
  return doc.data.records.map(toRecordRow).filter((r): r is RecordRow => r !== null);
}

// ── Public API ────────────────────────────────────────────────────────

/**
 * Load the lookup project from disk.
 *
 * 1. Parses every entity file under `.rlk/catalog/`
 * 2. Parses every record file under `.rlk/records/` (keyed by file stem)
 * 3. Parses `.rlk/lookup.yml` when present
 */
export function loadLookupProject(options: LoaderOptions = {}): LoadedProject {
  const root = options.root;

  const catalogDocs = listYamlFiles(catalogDir(root)).map(readDocument);
  const catalog: Catalog = new Map();
  for (const doc of catalogDocs) {
    const entity = toEntityDefinition(doc);
    if (entity) catalog.set(entity.name, entity);
  }

  const recordDocs = listYamlFiles(recordsDir(root)).map(readDocument);
  const records = new Map<string, RecordRow[]>();
  for (const doc of recordDocs) {
    records.set(stem(doc.file), toRecords(doc));
  }

  const configPath = lookupConfigFile(root);
  const configDoc = existsSync(configPath) ? readDocument(configPath) : null;
  const rawConfig = configDoc && isYamlMapping(configDoc.data) ? configDoc.data : null;

  return {
    catalog,
    records,
    rawConfig,
    sources: { catalog: catalogDocs, records: recordDocs, config: configDoc },
  };
}
