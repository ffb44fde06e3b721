const PG_UNIQUE_VIOLATION = "23505";
const PG_FOREIGN_KEY_VIOLATION = "23503";

/**
 * Raised by repositories when an insert or update collides with a unique
 * constraint. Services turn it into a lookup of the existing row or a 409.
 */
export class UniqueViolationError extends Error {
  constructor(readonly constraint: string) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = "UniqueViolationError";
  }
}

/** Raised when a delete would orphan rows that reference the target. */
export class ReferencedRowError extends Error {
  constructor(readonly constraint: string) {
    super(`Row is still referenced: ${constraint}`);
    this.name = "ReferencedRowError";
  }
}

/**
 * Recognizes a pg unique violation, either thrown directly or wrapped as the
 * `cause` of a driver error.
 */
export function asUniqueViolation(error: unknown): UniqueViolationError | null {
  const constraint = findConstraint(error, PG_UNIQUE_VIOLATION);
  return constraint === null ? null : new UniqueViolationError(constraint);
}

export function asReferencedRow(error: unknown): ReferencedRowError | null {
  const constraint = findConstraint(error, PG_FOREIGN_KEY_VIOLATION);
  return constraint === null ? null : new ReferencedRowError(constraint);
}

function findConstraint(error: unknown, code: string): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current !== undefined; depth++) {
    if (readField(current, "code") === code) {
      const constraint = readField(current, "constraint");
      return typeof constraint === "string" ? constraint : "unknown";
    }
    current = readField(current, "cause");
  }
  return null;
}

function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}
