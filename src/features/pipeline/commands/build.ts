/**
 * `rlk build` command — validate + rebuild the SQLite record store.
 */
import type { Command as Cmd } from "commander";
import { loadLookupProject } from "../../../shared/loader.js";
import { validateProject } from "../validator.js";
import { buildStore } from "../store-builder.js";
import { printIssues } from "./validate.js";

/** Register the `build` subcommand. */
export function registerBuild(program: Cmd): void {
  program
    .command("build")
    .description("Validate the project and rebuild the record store")
    .option("--skip-validation", "Skip schema + cross-ref validation")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((opts: { skipValidation?: boolean; json?: boolean; root?: string }) => {
      const project = loadLookupProject({ root: opts.root });

      if (!opts.skipValidation) {
        const result = validateProject(project);
        if (!opts.json) printIssues(result);

        if (!result.valid) {
          if (opts.json) {
            console.log(JSON.stringify({
              success: false,
              error: "Validation failed",
              validationErrors: result.errors.map((e) => ({ message: e.message, path: e.path ?? null })),
            }, null, 2));
          } else {
            console.error(`✗ Validation failed with ${result.errors.length} error(s). Fix errors before building.`);
          }
          process.exitCode = 1;
          return;
        }
      }

      const built = buildStore(project, { root: opts.root });

      if (opts.json) {
        console.log(JSON.stringify({ success: true, store: built.dbPath, tables: built.tables }, null, 2));
        return;
      }
      for (const [entity, rows] of Object.entries(built.tables)) {
        console.log(`  ${entity}: ${rows} record(s)`);
      }
      console.log(`✓ Record store written to ${built.dbPath}`);
    });
}
