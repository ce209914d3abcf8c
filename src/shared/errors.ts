/**
 * Lookup error kinds and CLI error-formatting helpers.
 *
 * The core raises {@link ValidationError} for missing input,
 * {@link NotFoundError} for unknown entity types and fields, and
 * {@link ExecutionError} for anything the query executor reports.
 */

// ── Error kinds ───────────────────────────────────────────────────────

/** Discriminant carried by every {@link LookupError}. */
export type LookupErrorKind = "validation" | "not_found" | "execution";

/** Base class for all errors raised by the lookup core. */
export abstract class LookupError extends Error {
  abstract readonly kind: LookupErrorKind;
}

/** A required input (entity type, fields, ids) is missing or malformed. */
export class ValidationError extends LookupError {
  readonly kind = "validation";
  override readonly name = "ValidationError";
}

/** An entity type or field does not exist. */
export class NotFoundError extends LookupError {
  readonly kind = "not_found";
  override readonly name = "NotFoundError";
}

/**
 * The query executor failed. Wraps the original error in `cause` and
 * keeps its message.
 */
export class ExecutionError extends LookupError {
  readonly kind = "execution";
  override readonly name = "ExecutionError";
}

export function isLookupError(err: unknown): err is LookupError {
  return err instanceof LookupError;
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── CLI formatting ────────────────────────────────────────────────────

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 * Not all Error objects carry these, so we use a type guard.
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
  syscall?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * js-yaml YAMLException shape.
 * Detected by `name` so callers need not import js-yaml.
 */
interface YAMLExceptionLike extends Error {
  name: "YAMLException";
  reason?: string;
  mark?: { name?: string | null; line?: number; column?: number; snippet?: string };
}

export function isYAMLException(err: unknown): err is YAMLExceptionLike {
  return err instanceof Error && err.name === "YAMLException";
}

const KIND_PREFIX: Record<LookupErrorKind, string> = {
  validation: "Invalid input",
  not_found: "Not found",
  execution: "Query failed",
};

/**
 * Format an error into a one-line CLI message.
 *
 * - YAML parse errors  → "Failed to parse YAML" with location
 * - lookup errors      → kind prefix + message
 * - ENOENT / EACCES    → file-system message with path
 * - everything else    → the error message without a stack trace
 */
export function formatCliError(err: unknown): string {
  if (isYAMLException(err)) {
    const reason = err.reason ?? "invalid YAML syntax";
    const mark = err.mark;
    if (mark && mark.line != null) {
      const file = mark.name ? `${mark.name} ` : "";
      // js-yaml lines are 0-based
      const location = `line ${mark.line + 1}, column ${(mark.column ?? 0) + 1}`;
      return `Failed to parse YAML: ${reason} (${file}${location})`;
    }
    return `Failed to parse YAML: ${reason}`;
  }

  if (isLookupError(err)) {
    return `${KIND_PREFIX[err.kind]}: ${err.message}`;
  }

  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` "${err.path}"` : "";
    switch (err.code) {
      case "ENOENT":
        return `File not found:${filePath}. Run 'rlk init' or pass --root.`;
      case "EACCES":
      case "EPERM":
        return `Permission denied:${filePath}.`;
      case "EISDIR":
        return `Expected a file but found a directory:${filePath}.`;
      default:
        return `System error (${err.code}):${filePath} ${err.message}`;
    }
  }

  return errorMessage(err);
}
