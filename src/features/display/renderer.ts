/**
 * Terminal renderer for lookup results and selections.
 *
 * Compiles Handlebars templates from `tools/rlk/templates/`:
 *
 *   results.txt.hbs          ← search results
 *   selection-pills.txt.hbs  ← selection as pills (single or multi)
 *   selection-table.md.hbs   ← multi-select datatable as a Markdown table
 */
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import Handlebars from "handlebars";
import type { DisplayRecord, LookupConfig } from "../../shared/types/lookup.js";
import { templatesDir } from "../../shared/paths.js";
import { roleConfigOf } from "../config/lookup-config.js";
import { displayText, pillItems, tableColumns, tableRows } from "./result-shaper.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface RendererOptions {
  /** Override templates directory. */
  templateDir?: string;
}

export interface ResultsView {
  entityType: string;
  term: string;
  records: DisplayRecord[];
}

// ── Handlebars setup ──────────────────────────────────────────────────

/** Register custom Handlebars helpers used across all templates. */
function registerHelpers(hbs: typeof Handlebars): void {
  /** Join an array of strings with a separator. */
  hbs.registerHelper("join", (arr: unknown, sep: unknown): string => {
    if (!Array.isArray(arr)) return "";
    return arr.map(String).join(typeof sep === "string" ? sep : ", ");
  });
}

registerHelpers(Handlebars);

function compile(name: string, options: RendererOptions): HandlebarsTemplateDelegate {
  const filePath = join(options.templateDir ?? templatesDir(), name);
  if (!existsSync(filePath)) {
    throw new Error(`Template not found: ${filePath}`);
  }
  return Handlebars.compile(readFileSync(filePath, "utf-8"), { noEscape: true });
}

/** Markdown table cells cannot contain a raw pipe or line break. */
function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

// ── Public API ────────────────────────────────────────────────────────

export function renderResults(view: ResultsView, options: RendererOptions = {}): string {
  return compile("results.txt.hbs", options)(view);
}

/**
 * Render the current selection. Multi-select with the `datatable` display
 * format renders a table; everything else renders pills.
 */
export function renderSelection(
  records: DisplayRecord[],
  config: LookupConfig,
  icon?: string,
  options: RendererOptions = {},
): string {
  const title = config.selectedRecordsTitle;

  if (config.allowMultipleSelection && config.displayFormat === "datatable") {
    const roles = roleConfigOf(config);
    const columns = tableColumns(roles);
    const rows = tableRows(records, roles).map((row) =>
      columns.map((column) => cell(displayText(row[column.fieldName]))),
    );
    return compile("selection-table.md.hbs", options)({
      title,
      labels: columns.map((c) => c.label),
      rows,
    });
  }

  return compile("selection-pills.txt.hbs", options)({ title, pills: pillItems(records, icon) });
}
