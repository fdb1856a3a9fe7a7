/**
 * Path Utilities
 */

import { transliterate } from 'transliteration';

const MAX_NAME_LENGTH = 120;

/**
 * Turn a free-form title into a lowercase, hyphen-separated slug.
 *
 * Non-Latin scripts are transliterated and accents folded to their base
 * letter; every other run of characters outside [a-z0-9] becomes a single
 * hyphen.
 */
export function slugify(value: string, fallback = 'untitled'): string {
  const slug = transliterate(value.normalize('NFC'))
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .substring(0, MAX_NAME_LENGTH)
    .replace(/-+$/, '');

  return slug.length > 0 ? slug : fallback;
}

/**
 * Sanitize a filename component so it only contains [A-Za-z0-9._-]
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/\0/g, '')
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    // No leading dots (hidden files) and no trailing dots or hyphens
    .replace(/^[.-]+|[.-]+$/g, '')
    .substring(0, MAX_NAME_LENGTH);
}
