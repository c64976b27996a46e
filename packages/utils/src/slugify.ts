/**
 * Turns arbitrary text into a URL-safe path segment.
 */
export type Slugify = (text: string) => string

const COMBINING_MARKS = /[\u0300-\u036F]/g
const UNSAFE_RUN = /[^a-z0-9_]+/g
const EDGE_DASHES = /^-+|-+$/g

/**
 * Default slugify: strips diacritics, lowercases, and collapses every run of
 * characters outside `[a-z0-9_]` into a single dash.
 *
 * @example
 * slugify('Latest News') // 'latest-news'
 * slugify('C#')          // 'c'
 * slugify('Über')        // 'uber'
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(UNSAFE_RUN, '-')
    .replace(EDGE_DASHES, '')
}
