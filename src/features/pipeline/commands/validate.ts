/**
 * `rlk validate` command — schema + cross-reference validation.
 *
 * Loads the lookup project, validates it against JSON Schemas and
 * cross-reference rules, and sets exit code 1 on errors.
 */
import type { Command as Cmd } from "commander";
import { loadLookupProject } from "../../../shared/loader.js";
import { validateProject, type ValidationIssue, type ValidationResult } from "../validator.js";

function issueJson(issue: ValidationIssue) {
  return { message: issue.message, path: issue.path ?? null };
}

/** Print warnings and errors, one per line. */
export function printIssues(result: ValidationResult): void {
  for (const w of result.warnings) {
    const loc = w.path ? ` (${w.path})` : "";
    console.warn(`⚠  ${w.message}${loc}`);
  }
  for (const e of result.errors) {
    const loc = e.path ? ` (${e.path})` : "";
    console.error(`✗  ${e.message}${loc}`);
  }
}

/** Register the `validate` subcommand. */
export function registerValidate(program: Cmd): void {
  program
    .command("validate")
    .description("Validate catalog, records and lookup configuration")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((opts: { json?: boolean; root?: string }) => {
      const project = loadLookupProject({ root: opts.root });
      const result = validateProject(project);

      if (opts.json) {
        console.log(JSON.stringify({
          valid: result.valid,
          errors: result.errors.map(issueJson),
          warnings: result.warnings.map(issueJson),
        }, null, 2));
        if (!result.valid) process.exitCode = 1;
        return;
      }

      printIssues(result);

      const warnCount = result.warnings.length;
      const errCount = result.errors.length;

      if (result.valid) {
        console.log(`✓ Validation passed.${warnCount > 0 ? ` (${warnCount} warning(s))` : ""}`);
      } else {
        console.error(`✗ Validation failed: ${errCount} error(s), ${warnCount} warning(s).`);
        process.exitCode = 1;
      }
    });
}
