import type { ScannedEntry } from './types.js';

export const DIRECTORY_NAME_RE = /^(.+) v(\d{3}) c(\d{3}[a-z]?)$/;
export const ARCHIVE_NAME_RE = /^(.+) v(\d{3}) c(\d{3}[a-z]?)\.(cbz)$/;
export const PAGE_NAME_RE = /^(.+) v(\d{3}) c(\d{3}[a-z]?) p(\d{3}(?:-\d{3})?[a-z]?)\.(jpg|png|webp)$/;

/** Directories are chapters; anything else is a page or a chapter archive. */
export function conformsToConvention(entry: ScannedEntry) {
  if (entry.kind === 'directory') return DIRECTORY_NAME_RE.test(entry.name);
  return PAGE_NAME_RE.test(entry.name) || ARCHIVE_NAME_RE.test(entry.name);
}
