/**
 * Commander program for the `rlk` CLI.
 *
 * Kept apart from `cli.ts` so tests can drive commands in-process.
 */
import { Command } from "commander";
import { registerInit } from "./features/scaffold/commands/init.js";
import { registerValidate } from "./features/pipeline/commands/validate.js";
import { registerBuild } from "./features/pipeline/commands/build.js";
import { registerEntities } from "./features/metadata/commands/entities.js";
import { registerFields } from "./features/metadata/commands/fields.js";
import { registerIcon } from "./features/metadata/commands/icon.js";
import { registerSearch } from "./features/lookup/commands/search.js";
import { registerSelect } from "./features/lookup/commands/select.js";
import { registerConfig } from "./features/config/commands/config.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("rlk")
    .description("Record lookup kit: search and select records by configuration")
    .version("0.1.0")
    // `config --root x` and `config set k v --root x` each keep their own options
    .enablePositionalOptions();

  // Project
  registerInit(program);
  registerValidate(program);
  registerBuild(program);

  // Metadata
  registerEntities(program);
  registerFields(program);
  registerIcon(program);

  // Lookup
  registerSearch(program);
  registerSelect(program);

  // Property editor
  registerConfig(program);

  return program;
}
