/**
 * `rlk select <ids...>` command — select records by id and print the
 * selection output.
 *
 * Ids are selected in order: with single-select the last one wins, with
 * multi-select they accumulate.
 */
import type { Command as Cmd } from "commander";
import { isLookupError } from "../../../shared/errors.js";
import { renderSelection } from "../../display/renderer.js";
import { buildSelectionOutput, clearSelection, selectRecord } from "../../selection/selection.js";
import { describeLookupError } from "../lookup-service.js";
import { openLookupSession } from "../session.js";

/** Register the `select` subcommand. */
export function registerSelect(program: Cmd): void {
  program
    .command("select <ids...>")
    .description("Select records by id and print the selection output")
    .option("-m, --multiple", "Force multi-select regardless of configuration")
    .option("--json", "Output the selection output as JSON")
    .option("--no-auto-build", "Fail instead of auto-building a missing record store")
    .option("-r, --root <path>", "Override repository root")
    .action(async (ids: string[], opts: { multiple?: boolean; json?: boolean; autoBuild?: boolean; root?: string }) => {
      const session = openLookupSession({ root: opts.root, autoBuild: opts.autoBuild });
      if (session.built) process.stderr.write("Record store not found; built it.\n");

      const config = opts.multiple ? { ...session.config, allowMultipleSelection: true } : session.config;
      const multiple = config.allowMultipleSelection;

      try {
        const loaded = await session.service.loadRecords(config, ids);
        let selected = clearSelection();
        for (const record of loaded) {
          selected = selectRecord(selected, record, multiple);
        }

        if (opts.json) {
          console.log(JSON.stringify(buildSelectionOutput(selected, multiple), null, 2));
          return;
        }
        const icon = session.resolver.getEntityIcon(config.entityType);
        process.stdout.write(renderSelection(selected, config, icon));
      } catch (err: unknown) {
        if (!isLookupError(err)) throw err;
        console.error(`✗  ${describeLookupError(err, config.entityType)}`);
        process.exitCode = 1;
      }
    });
}
