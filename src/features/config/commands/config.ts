/**
 * `rlk config` command group — the lookup property editor.
 *
 *   rlk config                       show the effective configuration
 *   rlk config set <key> <value>     change one property, write lookup.yml
 *   rlk config choices <role>        field choices for secondary / tertiary
 */
import type { Command as Cmd } from "commander";
import { writeFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ConfigIssue, LookupConfig } from "../../../shared/types/lookup.js";
import { ValidationError } from "../../../shared/errors.js";
import { loadLookupProject } from "../../../shared/loader.js";
import { lookupConfigFile } from "../../../shared/paths.js";
import { stringifyYaml } from "../../../shared/yaml.js";
import { CatalogMetadataResolver } from "../../metadata/resolver.js";
import {
  applyConfigChange,
  fieldChoices,
  isConfigKey,
  normalizeLookupConfig,
  serializeLookupConfig,
  validateLookupConfig,
} from "../lookup-config.js";

function printConfig(config: LookupConfig, issues: ConfigIssue[], json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify({ config, issues }, null, 2));
    return;
  }
  process.stdout.write(stringifyYaml(serializeLookupConfig(config)));
  for (const issue of issues) {
    console.warn(`⚠  ${issue.errorString} (${issue.key})`);
  }
}

/** Register the `config` command group. */
export function registerConfig(program: Cmd): void {
  const configCmd = program
    .command("config")
    .description("Show or edit the lookup configuration (.rlk/lookup.yml)")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((opts: { json?: boolean; root?: string }) => {
      const { rawConfig } = loadLookupProject({ root: opts.root });
      const config = normalizeLookupConfig(rawConfig);
      printConfig(config, validateLookupConfig(config), opts.json);
    });

  configCmd
    .command("set <key> <value>")
    .description("Set one configuration property and write lookup.yml")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((key: string, value: string, opts: { json?: boolean; root?: string }) => {
      if (!isConfigKey(key)) {
        throw new ValidationError(`Unknown configuration key "${key}"`);
      }
      const { rawConfig } = loadLookupProject({ root: opts.root });
      const config = applyConfigChange(normalizeLookupConfig(rawConfig), key, value);

      const file = lookupConfigFile(opts.root);
      mkdirSync(dirname(file), { recursive: true });
      writeFileSync(file, stringifyYaml(serializeLookupConfig(config)), "utf-8");

      printConfig(config, validateLookupConfig(config), opts.json);
    });

  configCmd
    .command("choices <role>")
    .description("List field choices for the secondary or tertiary selector")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override repository root")
    .action((role: string, opts: { json?: boolean; root?: string }) => {
      if (role !== "secondary" && role !== "tertiary") {
        throw new ValidationError(`Role must be "secondary" or "tertiary", got "${role}"`);
      }
      const { catalog, rawConfig } = loadLookupProject({ root: opts.root });
      const config = normalizeLookupConfig(rawConfig);
      const options = new CatalogMetadataResolver(catalog).listSearchableFields(config.entityType);
      const choices = fieldChoices(options, config, role);

      if (opts.json) {
        console.log(JSON.stringify(choices, null, 2));
        return;
      }
      for (const c of choices) {
        console.log(`${(c.value || "-").padEnd(24)}${c.label}`);
      }
    });
}
