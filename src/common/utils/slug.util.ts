import { DuplicateValueError } from '../errors/catalog.errors';

const SEPARATOR = '-';
const FALLBACK_SLUG = 'item';

/**
 * URL-safe slug: camelCase boundaries split, diacritics stripped, lowercased,
 * every run of non-alphanumerics collapsed to a single '-', ends trimmed.
 */
export function slugify(text: string): string {
  const slug = text
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, SEPARATOR)
    .replace(/^-+|-+$/g, '');
  return slug || FALLBACK_SLUG;
}

/** `base` for the first attempt, then `base-1`, `base-2`, ... */
export function slugCandidate(base: string, attempt: number): string {
  return attempt === 0 ? base : `${base}${SEPARATOR}${attempt}`;
}

/**
 * Runs `write` with a slug that is free at write time. A derived slug that hits
 * the unique constraint is retried with a numeric suffix; an explicit one is not.
 */
export async function writeWithUniqueSlug<T>(
  base: string,
  derived: boolean,
  maxAttempts: number,
  write: (slug: string) => Promise<T>,
): Promise<T> {
  const attempts = derived ? maxAttempts : 1;
  let lastConflict: DuplicateValueError | undefined;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await write(slugCandidate(base, attempt));
    } catch (error) {
      if (!(error instanceof DuplicateValueError) || error.field !== 'slug') {
        throw error;
      }
      lastConflict = error;
    }
  }
  throw lastConflict ?? new DuplicateValueError('record', 'slug', base);
}
