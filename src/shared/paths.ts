/**
 * Path resolution utilities.
 *
 * Two resolution strategies:
 *
 * 1. **Project paths** (`repoRoot`, `catalogDir`, `recordsDir`, …) resolve
 *    from `process.cwd()` (or an explicit `--root` override). This is the
 *    user's project directory, where `.rlk/` lives.
 *
 * 2. **Package asset paths** (`packageRoot`, `schemaDir`, `templatesDir`)
 *    resolve from this module's URL relative to the package install.
 *    JSON Schemas and Handlebars templates ship with the package.
 */
import { resolve, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Resolve the package installation root.
 *
 * This module lives in `src/shared/` when run from source and in
 * `dist/shared/` when compiled; both are two levels below the root.
 */
export function packageRoot(): string {
  return resolve(fileURLToPath(new URL(".", import.meta.url)), "../..");
}

/**
 * Resolve the project root (where `.rlk/` lives).
 *
 * Defaults to `process.cwd()`; the `--root` CLI flag overrides it.
 */
export function repoRoot(override?: string): string {
  if (override) return resolve(override);
  return resolve(process.cwd());
}

/** Absolute path to the `.rlk/` directory. */
export function projectDir(root?: string): string {
  return join(repoRoot(root), ".rlk");
}

/** Absolute path to `.rlk/catalog/` (one YAML file per entity type). */
export function catalogDir(root?: string): string {
  return join(projectDir(root), "catalog");
}

/** Absolute path to `.rlk/records/` (one YAML file per entity type). */
export function recordsDir(root?: string): string {
  return join(projectDir(root), "records");
}

/** Absolute path to `.rlk/lookup.yml`. */
export function lookupConfigFile(root?: string): string {
  return join(projectDir(root), "lookup.yml");
}

/** Absolute path to the built SQLite store. */
export function storeFile(root?: string): string {
  return join(projectDir(root), "store", "records.db");
}

/** Absolute path to `tools/rlk/templates/` inside the package. */
export function templatesDir(): string {
  return join(packageRoot(), "tools", "rlk", "templates");
}

/** Absolute path to `tools/rlk/schema/` inside the package. */
export function schemaDir(): string {
  return join(packageRoot(), "tools", "rlk", "schema");
}
