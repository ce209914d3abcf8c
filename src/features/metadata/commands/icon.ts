/**
 * `rlk icon <entity>` command — icon identifier of an entity type.
 */
import type { Command as Cmd } from "commander";
import { loadLookupProject } from "../../../shared/loader.js";
import { CatalogMetadataResolver } from "../resolver.js";

/** Register the `icon` subcommand. */
export function registerIcon(program: Cmd): void {
  program
    .command("icon <entity>")
    .description("Print the icon identifier of an entity type")
    .option("-r, --root <path>", "Override repository root")
    .action((entity: string, opts: { root?: string }) => {
      const { catalog } = loadLookupProject({ root: opts.root });
      console.log(new CatalogMetadataResolver(catalog).getEntityIcon(entity));
    });
}
