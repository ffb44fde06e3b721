export { DataModule } from "./data.module.js";
export { asReferencedRow, asUniqueViolation, ReferencedRowError, UniqueViolationError } from "./data.errors.js";
export * from "./data.tokens.js";
export type * from "./data.types.js";
export { REQUEST_STATUSES } from "./data.types.js";
export { createMemoryRepositories } from "./memory/memory.repositories.js";
export { isRowId } from "./row-id.js";
