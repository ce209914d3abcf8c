/**
 * `rlk fields <entity>` command — searchable fields of an entity type.
 *
 * With `--all`, lists every field with its label instead; an unknown
 * entity type is then an error.
 */
import type { Command as Cmd } from "commander";
import { loadLookupProject } from "../../../shared/loader.js";
import { CatalogMetadataResolver } from "../resolver.js";

/** Register the `fields` subcommand. */
export function registerFields(program: Cmd): void {
  program
    .command("fields <entity>")
    .description("List searchable fields of an entity type, sorted by label")
    .option("--all", "List every field and its label")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((entity: string, opts: { all?: boolean; json?: boolean; root?: string }) => {
      const { catalog } = loadLookupProject({ root: opts.root });
      const resolver = new CatalogMetadataResolver(catalog);

      if (opts.all) {
        const labels = resolver.getFieldLabels(entity);
        if (opts.json) {
          console.log(JSON.stringify(labels, null, 2));
          return;
        }
        for (const [name, label] of Object.entries(labels)) {
          console.log(`${name.padEnd(24)}${label}`);
        }
        return;
      }

      const fields = resolver.listSearchableFields(entity);
      if (opts.json) {
        console.log(JSON.stringify(fields, null, 2));
        return;
      }
      if (fields.length === 0) {
        console.log(`No searchable fields for "${entity}".`);
        return;
      }
      for (const f of fields) {
        console.log(`${f.value.padEnd(24)}${f.label}`);
      }
    });
}
