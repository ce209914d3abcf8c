/**
 * `rlk search [term]` command — search records with the configured lookup.
 *
 * When the record store does not exist yet, the command builds it from
 * the project first (unless `--no-auto-build` is set). Lookup failures
 * are reported as one inline message.
 */
import type { Command as Cmd } from "commander";
import { isLookupError } from "../../../shared/errors.js";
import { parseFieldList } from "../../config/lookup-config.js";
import { renderResults } from "../../display/renderer.js";
import { describeLookupError } from "../lookup-service.js";
import { openLookupSession } from "../session.js";

interface SearchCommandOptions {
  entity?: string;
  limit?: string;
  filter?: string;
  exclude?: string;
  json?: boolean;
  autoBuild?: boolean;
  root?: string;
}

/** Register the `search` subcommand. */
export function registerSearch(program: Cmd): void {
  program
    .command("search [term]")
    .description("Search records of the configured entity type (auto-builds the store if needed)")
    .option("-e, --entity <type>", "Override the configured entity type")
    .option("--limit <n>", "Maximum results to return (1-50)", "10")
    .option("--filter <expr>", "Extra filter fragment, AND-ed with the search")
    .option("--exclude <ids>", "Comma-separated ids already selected")
    .option("--json", "Output as JSON")
    .option("--no-auto-build", "Fail instead of auto-building a missing record store")
    .option("-r, --root <path>", "Override repository root")
    .action(async (term: string | undefined, opts: SearchCommandOptions) => {
      const session = openLookupSession({ root: opts.root, autoBuild: opts.autoBuild, entityType: opts.entity });
      if (session.built) process.stderr.write("Record store not found; built it.\n");

      const searchTerm = term ?? "";
      try {
        const { query, records } = await session.service.search(session.config, searchTerm, {
          selectedIds: parseFieldList(opts.exclude),
          extraFilter: opts.filter,
          cap: parseInt(opts.limit ?? "10", 10),
        });

        if (opts.json) {
          console.log(JSON.stringify({ query: query.query, records }, null, 2));
          return;
        }
        process.stdout.write(renderResults({ entityType: query.entityType, term: searchTerm.trim(), records }));
      } catch (err: unknown) {
        if (!isLookupError(err)) throw err;
        console.error(`✗  ${describeLookupError(err, session.config.entityType)}`);
        process.exitCode = 1;
      }
    });
}
