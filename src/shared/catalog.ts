/**
 * Catalog lookups shared by the metadata resolver, the validator and the
 * SQLite record store.
 *
 * Field paths are either a direct field (`Industry`) or one relationship
 * hop (`Owner.Name`). Deeper paths are not resolved.
 */
import type { Catalog, EntityDefinition, FieldDefinition } from "./types/lookup.js";

/** Name of the identifier field every entity type carries. */
export const ID_FIELD = "Id";

/** Generic icon used when an entity type has none. */
export const FALLBACK_ICON = "standard:record";

/** A field path resolved against the catalog. */
export type ResolvedFieldPath =
  | { kind: "direct"; field: FieldDefinition }
  | {
      kind: "relationship";
      /** The reference field on the base entity (e.g. `OwnerId`). */
      reference: FieldDefinition;
      relationshipName: string;
      target: EntityDefinition;
      /** The field on the target entity (e.g. `Name`). */
      field: FieldDefinition;
    };

/**
 * Relationship name of a reference field: the explicit
 * `relationshipName`, else `Foo__c` → `Foo__r`, else `OwnerId` → `Owner`.
 */
export function relationshipNameOf(field: FieldDefinition): string {
  if (field.relationshipName) return field.relationshipName;
  if (field.name.endsWith("__c")) return `${field.name.slice(0, -3)}__r`;
  if (field.name.length > 2 && field.name.endsWith("Id")) return field.name.slice(0, -2);
  return field.name;
}

/** Field shown when the entity is referenced from another entity. */
export function nameFieldOf(entity: EntityDefinition): string {
  return entity.nameField ?? "Name";
}

export function findField(entity: EntityDefinition, name: string): FieldDefinition | undefined {
  return entity.fields.find((f) => f.name === name);
}

/** Find the reference field whose relationship name is `relationshipName`. */
export function findRelationship(
  entity: EntityDefinition,
  relationshipName: string,
): FieldDefinition | undefined {
  return entity.fields.find(
    (f) => f.type === "reference" && relationshipNameOf(f) === relationshipName,
  );
}

/**
 * Resolve `path` on `entity`. Returns `null` when any segment is unknown
 * or the path is more than one hop deep.
 */
export function resolveFieldPath(
  catalog: Catalog,
  entity: EntityDefinition,
  path: string,
): ResolvedFieldPath | null {
  const segments = path.split(".");
  if (segments.length === 1) {
    if (path === ID_FIELD) return { kind: "direct", field: { name: ID_FIELD, label: "Record ID", type: "id" } };
    const field = findField(entity, path);
    return field ? { kind: "direct", field } : null;
  }
  if (segments.length !== 2) return null;

  const [relationshipName, targetFieldName] = segments;
  const reference = findRelationship(entity, relationshipName);
  if (!reference?.referenceTo) return null;

  const target = catalog.get(reference.referenceTo);
  if (!target) return null;

  const field =
    targetFieldName === ID_FIELD
      ? { name: ID_FIELD, label: "Record ID", type: "id" as const }
      : findField(target, targetFieldName);
  if (!field) return null;

  return { kind: "relationship", reference, relationshipName, target, field };
}
