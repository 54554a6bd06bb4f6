import { PostgrestError } from '@supabase/supabase-js';
import { DuplicateValueError } from '../errors/catalog.errors';

export const UNIQUE_VIOLATION = '23505';
export const FOREIGN_KEY_VIOLATION = '23503';

type PostgrestErrorLike = Pick<PostgrestError, 'code' | 'message' | 'details'>;

export function isUniqueViolation(error: PostgrestErrorLike | null | undefined): boolean {
  return error?.code === UNIQUE_VIOLATION;
}

export function isForeignKeyViolation(error: PostgrestErrorLike | null | undefined): boolean {
  return error?.code === FOREIGN_KEY_VIOLATION;
}

/**
 * Postgres reports the offending key as `Key (slug)=(test-product) already exists.`
 * Composite keys come back as `Key (a, b)=(x, y)`; those are returned verbatim.
 */
export function parseDuplicateKey(error: PostgrestErrorLike): { field: string; value: string } | null {
  const match = /Key \(([^)]+)\)=\((.*)\) already exists/.exec(error.details ?? '');
  if (!match) {
    return null;
  }
  return { field: match[1], value: match[2] };
}

/** Foreign key failures read `Key (brand_id)=(...) is not present in table "brands".` */
export function parseMissingReference(error: PostgrestErrorLike): { field: string; value: string } | null {
  const match = /Key \(([^)]+)\)=\((.*)\) is not present in table/.exec(error.details ?? '');
  if (!match) {
    return null;
  }
  return { field: match[1], value: match[2] };
}

export function toDuplicateValueError(table: string, error: PostgrestErrorLike): DuplicateValueError {
  const key = parseDuplicateKey(error);
  return new DuplicateValueError(table, key?.field ?? null, key?.value ?? null);
}
