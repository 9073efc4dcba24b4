import { InsertResult } from 'typeorm';

/** Generated primary key of the first row of an INSERT. */
export function insertedId(result: InsertResult): number {
  const raw: unknown = result.identifiers[0]?.id;
  const id = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : raw;
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
    throw new Error(`INSERT did not return a generated id (got ${String(raw)})`);
  }
  return id;
}
