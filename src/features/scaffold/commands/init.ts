/**
 * `rlk init` command — scaffold a `.rlk/` project directory.
 *
 * Creates `catalog/`, `records/` and a default `lookup.yml`. With
 * `--example`, copies a small Account/User project instead. Existing
 * files are left alone unless `--force` is given.
 */
import type { Command as Cmd } from "commander";
import { cpSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { catalogDir, lookupConfigFile, packageRoot, projectDir, recordsDir } from "../../../shared/paths.js";
import { stringifyYaml } from "../../../shared/yaml.js";
import { DEFAULT_CONFIG, serializeLookupConfig } from "../../config/lookup-config.js";

/** Bundled example project. */
function exampleDir(): string {
  return join(packageRoot(), "tools", "rlk", "example");
}

/** Register the `init` subcommand. */
export function registerInit(program: Cmd): void {
  program
    .command("init")
    .description("Create a .rlk/ project directory with a default lookup configuration")
    .option("--example", "Copy a small example catalog and record set")
    .option("--force", "Overwrite existing files")
    .option("-r, --root <path>", "Override repository root")
    .action((opts: { example?: boolean; force?: boolean; root?: string }) => {
      const dir = projectDir(opts.root);
      const configPath = lookupConfigFile(opts.root);

      if (existsSync(configPath) && !opts.force) {
        console.log(`${dir} already initialized (use --force to overwrite).`);
        return;
      }

      mkdirSync(catalogDir(opts.root), { recursive: true });
      mkdirSync(recordsDir(opts.root), { recursive: true });

      if (opts.example) {
        cpSync(exampleDir(), dir, { recursive: true, force: true });
        console.log(`Created example project in ${dir}`);
        return;
      }

      writeFileSync(configPath, stringifyYaml(serializeLookupConfig({ ...DEFAULT_CONFIG })), "utf-8");
      console.log(`Created ${configPath}`);
    });
}
