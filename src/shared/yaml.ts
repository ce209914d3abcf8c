/**
 * YAML parse / stringify helpers.
 *
 * Thin wrappers around js-yaml that pin options. Parsed documents come
 * back as `unknown`; callers narrow them or run them through the schema
 * validator.
 */
import yaml from "js-yaml";

/**
 * Parse a YAML string. `filename` is reported in parse errors.
 *
 * @throws {yaml.YAMLException} on malformed YAML.
 */
export function parseYaml(text: string, filename?: string): unknown {
  return yaml.load(text, { filename, schema: yaml.JSON_SCHEMA });
}

/** Stringify a value with block style and 2-space indent. */
export function stringifyYaml(value: unknown): string {
  return yaml.dump(value, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
  });
}

/** Narrow a parsed YAML value to a plain mapping. */
export function isYamlMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
