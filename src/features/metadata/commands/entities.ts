/**
 * `rlk entities` command — entity types offered for search.
 */
import type { Command as Cmd } from "commander";
import { loadLookupProject } from "../../../shared/loader.js";
import { CatalogMetadataResolver } from "../resolver.js";

/** Register the `entities` subcommand. */
export function registerEntities(program: Cmd): void {
  program
    .command("entities")
    .description("List searchable entity types, sorted by label")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((opts: { json?: boolean; root?: string }) => {
      const { catalog } = loadLookupProject({ root: opts.root });
      const entities = new CatalogMetadataResolver(catalog).listSearchableEntities();

      if (opts.json) {
        console.log(JSON.stringify(entities, null, 2));
        return;
      }
      if (entities.length === 0) {
        console.log("No searchable entity types.");
        return;
      }
      for (const e of entities) {
        console.log(`${e.value.padEnd(24)}${e.label}`);
      }
    });
}
