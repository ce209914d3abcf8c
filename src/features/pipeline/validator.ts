/**
 * Lookup project validator.
 *
 * Validates a {@link LoadedProject} in two phases:
 *
 * 1. **Schema validation** — Each raw YAML document is checked against
 *    its JSON Schema (via ajv): catalog entities, record files and the
 *    lookup configuration.
 * 2. **Cross-reference validation** — reference targets, record keys and
 *    ids, and every field the lookup configuration names.
 *
 * Results are returned as arrays of errors (blocking, should exit 1)
 * and warnings (non-blocking, informational).
 */
import { createRequire } from "node:module";
import { readFileSync, readdirSync } from "node:fs";
import { basename, extname, join } from "node:path";
import type { LoadedProject, SourceDocument } from "../../shared/loader.js";
import type { EntityDefinition } from "../../shared/types/lookup.js";
import { ID_FIELD, findField, resolveFieldPath } from "../../shared/catalog.js";
import { schemaDir as defaultSchemaDir } from "../../shared/paths.js";
import { isYamlMapping } from "../../shared/yaml.js";
import { fieldsToReturn, normalizeLookupConfig, validateLookupConfig } from "../config/lookup-config.js";

// ajv is a CJS package; use createRequire for clean interop
// under both tsc (NodeNext resolution) and tsx (ESM runtime).
const require = createRequire(import.meta.url);
const Ajv = require("ajv").default as typeof import("ajv").default;

// ── Types ─────────────────────────────────────────────────────────────

/** Severity of a validation finding. */
export type Severity = "error" | "warning";

/** A single validation finding. */
export interface ValidationIssue {
  /** error = blocking (fail), warning = informational. */
  severity: Severity;
  /** Human-readable problem description. */
  message: string;
  /** Location hint (e.g. "catalog:Account", "records:Contact", "lookup"). */
  path?: string;
}

/** Complete validation result. */
export interface ValidationResult {
  /** True when there are zero errors (warnings are OK). */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/** Options that control validator behaviour. */
export interface ValidatorOptions {
  /**
   * Absolute path to the schema directory.
   * Defaults to `<packageRoot>/tools/rlk/schema`.
   */
  schemaDir?: string;
}

type AjvInstance = InstanceType<typeof Ajv>;

// ── Schema bootstrap ──────────────────────────────────────────────────

/** Load all `*.schema.json` files from a directory into an Ajv instance. */
function buildAjv(dir: string): AjvInstance {
  const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });

  const files = readdirSync(dir).filter((f) => f.endsWith(".schema.json"));
  for (const file of files) {
    const schema = JSON.parse(readFileSync(join(dir, file), "utf-8"));
    ajv.addSchema(schema, schema.$id);
  }
  return ajv;
}

// ── Helper: push issue ────────────────────────────────────────────────

function err(issues: ValidationIssue[], message: string, path?: string): void {
  issues.push({ severity: "error", message, path });
}

function warn(issues: ValidationIssue[], message: string, path?: string): void {
  issues.push({ severity: "warning", message, path });
}

function stem(doc: SourceDocument): string {
  return basename(doc.file, extname(doc.file));
}

// ── Phase 1: Schema validation ────────────────────────────────────────

function validateSchemas(project: LoadedProject, ajv: AjvInstance, issues: ValidationIssue[]): void {
  function check(schemaId: string, data: unknown, path: string): void {
    const validate = ajv.getSchema(schemaId);
    if (!validate) {
      err(issues, `Schema "${schemaId}" not found in ajv`, path);
      return;
    }
    if (!validate(data)) {
      for (const e of validate.errors ?? []) {
        const loc = e.instancePath ? ` ${e.instancePath}` : "";
        err(issues, `Schema "${schemaId}"${loc}: ${e.message}`, path);
      }
    }
  }

  for (const doc of project.sources.catalog) {
    check("entity.schema.json", doc.data, `catalog:${stem(doc)}`);
  }
  for (const doc of project.sources.records) {
    check("records.schema.json", doc.data, `records:${stem(doc)}`);
  }
  if (project.sources.config) {
    check("lookup.schema.json", project.sources.config.data, "lookup");
  }
}

// ── Phase 2: Cross-reference validation ───────────────────────────────

function validateEntity(project: LoadedProject, entity: EntityDefinition, issues: ValidationIssue[]): void {
  const path = `catalog:${entity.name}`;
  const seen = new Set<string>();

  for (const field of entity.fields) {
    if (seen.has(field.name)) {
      err(issues, `Duplicate field "${field.name}" on ${entity.name}`, path);
    }
    seen.add(field.name);

    if (field.type !== "reference") continue;
    if (!field.referenceTo) {
      err(issues, `Reference field "${entity.name}.${field.name}" has no referenceTo`, path);
    } else if (!project.catalog.has(field.referenceTo)) {
      err(issues, `Field "${entity.name}.${field.name}" references unknown entity "${field.referenceTo}"`, path);
    }
  }

  if (entity.nameField && entity.nameField !== ID_FIELD && !findField(entity, entity.nameField)) {
    err(issues, `Name field "${entity.nameField}" is not a field of ${entity.name}`, path);
  }
}

function validateRecords(project: LoadedProject, issues: ValidationIssue[]): void {
  for (const [entityName, rows] of project.records) {
    const path = `records:${entityName}`;
    const entity = project.catalog.get(entityName);
    if (!entity) {
      err(issues, `Records for unknown entity "${entityName}"`, path);
      continue;
    }

    const ids = new Set<string>();
    for (const row of rows) {
      if (ids.has(row.Id)) {
        err(issues, `Duplicate record id "${row.Id}" in ${entityName}`, path);
      }
      ids.add(row.Id);

      for (const key of Object.keys(row)) {
        if (key === ID_FIELD || findField(entity, key)) continue;
        err(issues, `Record "${row.Id}" of ${entityName} has undeclared field "${key}"`, path);
      }
    }
  }
}

function validateLookup(project: LoadedProject, issues: ValidationIssue[]): void {
  if (!project.sources.config) return;

  const config = normalizeLookupConfig(project.rawConfig);
  for (const issue of validateLookupConfig(config)) {
    err(issues, issue.errorString, `lookup:${issue.key}`);
  }

  if (config.displayFormat === "datatable" && !config.allowMultipleSelection) {
    warn(issues, 'displayFormat "datatable" has no effect without allowMultipleSelection', "lookup:displayFormat");
  }

  if (!config.entityType) return;
  const entity = project.catalog.get(config.entityType);
  if (!entity) {
    err(issues, `Lookup entity "${config.entityType}" is not in the catalog`, "lookup:entityType");
    return;
  }

  for (const field of fieldsToReturn(config)) {
    if (!resolveFieldPath(project.catalog, entity, field)) {
      err(issues, `Lookup field "${field}" does not resolve on ${entity.name}`, "lookup");
    }
  }
}

function validateCrossRefs(project: LoadedProject, issues: ValidationIssue[]): void {
  // ─ 1. Entity names are unique across catalog files ─────────────────
  const fileOf = new Map<string, string>();
  for (const doc of project.sources.catalog) {
    const name = isYamlMapping(doc.data) && typeof doc.data.name === "string" ? doc.data.name : stem(doc);
    const first = fileOf.get(name);
    if (first) {
      err(issues, `Entity "${name}" is defined in both ${first} and ${basename(doc.file)}`, `catalog:${name}`);
    } else {
      fileOf.set(name, basename(doc.file));
    }
  }

  // ─ 2. Entity definitions ───────────────────────────────────────────
  for (const entity of project.catalog.values()) {
    validateEntity(project, entity, issues);
  }

  // ─ 3. Record fixtures ──────────────────────────────────────────────
  validateRecords(project, issues);

  // ─ 4. Lookup configuration ─────────────────────────────────────────
  validateLookup(project, issues);
}

// ── Public API ────────────────────────────────────────────────────────

/**
 * Validate a loaded lookup project.
 *
 * Runs JSON Schema validation first, then cross-reference checks.
 * Returns a {@link ValidationResult} with errors and warnings.
 */
export function validateProject(project: LoadedProject, options: ValidatorOptions = {}): ValidationResult {
  const issues: ValidationIssue[] = [];

  const ajv = buildAjv(options.schemaDir ?? defaultSchemaDir());
  validateSchemas(project, ajv, issues);
  validateCrossRefs(project, issues);

  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");

  return { valid: errors.length === 0, errors, warnings };
}
