/**
 * Library entry point.
 */
export type * from "./shared/types/lookup.js";
export * from "./shared/errors.js";
export * from "./shared/logger.js";
export { ID_FIELD, FALLBACK_ICON, resolveFieldPath, relationshipNameOf } from "./shared/catalog.js";
export { loadLookupProject, type LoadedProject, type LoaderOptions } from "./shared/loader.js";

export * from "./features/query/dialect.js";
export * from "./features/query/query-builder.js";
export * from "./features/query/record-store.js";
export * from "./features/metadata/resolver.js";
export * from "./features/display/result-shaper.js";
export * from "./features/display/renderer.js";
export * from "./features/selection/selection.js";
export * from "./features/config/lookup-config.js";
export * from "./features/lookup/lookup-service.js";
export * from "./features/pipeline/validator.js";
export * from "./features/pipeline/store-builder.js";
