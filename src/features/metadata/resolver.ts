/**
 * Metadata resolver: which entity types and fields can be searched, their
 * labels, and the icon of an entity type.
 *
 * The query builder and result shaper never call the resolver; the lookup
 * service and the CLI do.
 */
import type { Catalog, EntityDefinition, EntityOption, FieldDefinition, FieldOption, FieldType } from "../../shared/types/lookup.js";
import { NotFoundError } from "../../shared/errors.js";
import { FALLBACK_ICON, nameFieldOf, relationshipNameOf } from "../../shared/catalog.js";
import { getLogger, type Logger } from "../../shared/logger.js";

// ── Contract ──────────────────────────────────────────────────────────

export interface MetadataResolver {
  /** Visible entity types, sorted by label. */
  listSearchableEntities(): EntityOption[];
  /**
   * Text-like fields of `entityType`, sorted by label. Empty for a blank or
   * unknown entity type; never throws.
   */
  listSearchableFields(entityType: string): FieldOption[];
  /** @throws {NotFoundError} for a blank or unknown entity type. */
  getFieldLabels(entityType: string): Record<string, string>;
  /** Icon identifier; {@link FALLBACK_ICON} on any failure. Never throws. */
  getEntityIcon(entityType: string): string;
}

// ── Constants ─────────────────────────────────────────────────────────

/** Icons for well-known entity types without an icon in the catalog. */
const DEFAULT_ICONS: ReadonlyMap<string, string> = new Map([
  ["Account", "standard:account"],
  ["Contact", "standard:contact"],
  ["Lead", "standard:lead"],
  ["Opportunity", "standard:opportunity"],
  ["Case", "standard:case"],
  ["Task", "standard:task"],
  ["Event", "standard:event"],
  ["User", "standard:user"],
  ["Product2", "standard:product"],
  ["Pricebook2", "standard:pricebook"],
  ["Campaign", "standard:campaign"],
  ["Contract", "standard:contract"],
  ["Order", "standard:orders"],
  ["Asset", "standard:asset"],
]);

/** Field types whose values can be substring-matched. */
const TEXT_LIKE_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  "string",
  "textarea",
  "email",
  "phone",
  "url",
  "picklist",
  "multipicklist",
  "reference",
]);

/** Platform bookkeeping entity types that are never offered for search. */
const HIDDEN_SUFFIXES = ["History", "Share", "Feed", "ChangeEvent"];

// ── Helpers ───────────────────────────────────────────────────────────

/** Case-sensitive code-unit order, so "Zeta" sorts before "alpha". */
function byLabel(a: { label: string }, b: { label: string }): number {
  if (a.label < b.label) return -1;
  if (a.label > b.label) return 1;
  return 0;
}

function isVisible(entity: EntityDefinition): boolean {
  if (entity.hidden) return false;
  return !HIDDEN_SUFFIXES.some((suffix) => entity.name.length > suffix.length && entity.name.endsWith(suffix));
}

/** "Owner ID" → "Owner". */
function relationshipLabel(field: FieldDefinition): string {
  return field.label.replace(/\s+ID$/i, "");
}

// ── Catalog-backed implementation ─────────────────────────────────────

/** {@link MetadataResolver} over a loaded {@link Catalog}. */
export class CatalogMetadataResolver implements MetadataResolver {
  private readonly catalog: Catalog;
  private readonly logger: Logger;

  constructor(catalog: Catalog, logger: Logger = getLogger()) {
    this.catalog = catalog;
    this.logger = logger;
  }

  listSearchableEntities(): EntityOption[] {
    return [...this.catalog.values()]
      .filter(isVisible)
      .map((e) => ({ label: e.label, value: e.name }))
      .sort(byLabel);
  }

  listSearchableFields(entityType: string): FieldOption[] {
    try {
      const entity = this.catalog.get(entityType.trim());
      if (!entity) return [];

      const options: FieldOption[] = [];
      for (const field of entity.fields) {
        if (!TEXT_LIKE_TYPES.has(field.type)) continue;
        if (field.type === "reference") {
          const option = this.referenceOption(field);
          if (option) options.push(option);
          continue;
        }
        options.push({ label: field.label, value: field.name });
      }
      return options.sort(byLabel);
    } catch (err: unknown) {
      this.logger.warn("listing searchable fields failed", { entityType, error: String(err) });
      return [];
    }
  }

  getFieldLabels(entityType: string): Record<string, string> {
    const name = entityType.trim();
    if (!name) throw new NotFoundError("Entity type is required");
    const entity = this.catalog.get(name);
    if (!entity) throw new NotFoundError(`Unknown entity type "${name}"`);

    const labels: Record<string, string> = {};
    for (const field of entity.fields) {
      labels[field.name] = field.label;
    }
    return labels;
  }

  getEntityIcon(entityType: string): string {
    const name = entityType.trim();
    const entity = this.catalog.get(name);
    return entity?.icon ?? DEFAULT_ICONS.get(name) ?? FALLBACK_ICON;
  }

  /**
   * Replace a reference field by the display-name field of its target,
   * one hop only (`OwnerId` → `Owner.Name`).
   */
  private referenceOption(field: FieldDefinition): FieldOption | null {
    if (!field.referenceTo) return null;
    const target = this.catalog.get(field.referenceTo);
    const nameField = target ? nameFieldOf(target) : "Name";
    return {
      label: relationshipLabel(field),
      value: `${relationshipNameOf(field)}.${nameField}`,
    };
  }
}
