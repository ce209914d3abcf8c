/**
 * Wiring for the CLI: a loaded project, its lookup configuration and a
 * {@link LookupService} over the SQLite record store.
 */
import { existsSync } from "node:fs";
import type { LookupConfig } from "../../shared/types/lookup.js";
import { loadLookupProject, type LoadedProject } from "../../shared/loader.js";
import { storeFile } from "../../shared/paths.js";
import { CatalogMetadataResolver, type MetadataResolver } from "../metadata/resolver.js";
import { SqliteRecordStore } from "../query/record-store.js";
import { buildStore } from "../pipeline/store-builder.js";
import { normalizeLookupConfig } from "../config/lookup-config.js";
import { LookupService } from "./lookup-service.js";

export interface LookupSession {
  project: LoadedProject;
  config: LookupConfig;
  resolver: MetadataResolver;
  service: LookupService;
  /** True when the record store was missing and has just been built. */
  built: boolean;
}

export interface SessionOptions {
  root?: string;
  /** Build a missing record store instead of failing (default: true). */
  autoBuild?: boolean;
  /** Override the configured entity type. */
  entityType?: string;
}

/**
 * Open a session for the project at `root`.
 *
 * @throws {Error} when the store is missing and `autoBuild` is false.
 */
export function openLookupSession(options: SessionOptions = {}): LookupSession {
  const project = loadLookupProject({ root: options.root });
  const dbPath = storeFile(options.root);

  let built = false;
  if (!existsSync(dbPath)) {
    if (options.autoBuild === false) {
      throw new Error(`Record store not found at ${dbPath}. Run 'rlk build' first.`);
    }
    buildStore(project, { dbPath });
    built = true;
  }

  const config = normalizeLookupConfig(
    options.entityType ? { ...project.rawConfig, entityType: options.entityType } : project.rawConfig,
  );
  const resolver = new CatalogMetadataResolver(project.catalog);
  const service = new LookupService({
    resolver,
    executor: new SqliteRecordStore({ dbPath, catalog: project.catalog }),
  });

  return { project, config, resolver, service, built };
}
