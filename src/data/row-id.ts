import { z } from "zod";

const RowIdSchema = z.string().uuid();

/**
 * Primary keys are UUIDs. Lookups by anything else match no row and never
 * reach the database, where they would fail the uuid cast.
 */
export function isRowId(value: string): boolean {
  return RowIdSchema.safeParse(value).success;
}
