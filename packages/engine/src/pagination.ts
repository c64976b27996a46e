import { stripIndexFile } from '@sitekit/grouper-utils/url'
import { invalidPageError } from './errors'

export function pageCount(total: number, perPage: number): number {
  return Math.max(1, Math.ceil(total / perPage))
}

function lastSegment(slug: string): string {
  const trimmed = slug.replace(/\/+$/, '')
  return trimmed.slice(trimmed.lastIndexOf('/') + 1)
}

function isDirectorySlug(slug: string): boolean {
  if (slug === '' || slug.endsWith('/') || slug === 'index.html' || slug.endsWith('/index.html'))
    return true
  return !lastSegment(slug).includes('.')
}

/**
 * Slug of page `page` for a group slug.
 *
 * @example
 * pageSlug('tags/a/index.html', 2, 'page') // 'tags/a/page/2/index.html'
 * pageSlug('tags/a.html', 3, 'page')       // 'tags/apage3.html'
 */
export function pageSlug(slug: string, page: number, urlSuffix: string): string {
  if (page <= 1)
    return slug
  if (isDirectorySlug(slug)) {
    const stripped = stripIndexFile(slug)
    const base = stripped === '' || stripped.endsWith('/') ? stripped : `${stripped}/`
    return `${base}${urlSuffix}/${page}/index.html`
  }
  const dot = slug.lastIndexOf('.')
  return `${slug.slice(0, dot)}${urlSuffix}${page}${slug.slice(dot)}`
}

/**
 * One page of a paginated list.
 */
export class Pagination<T> {
  readonly pages: number

  constructor(
    private readonly all: readonly T[],
    readonly page: number,
    readonly perPage: number,
  ) {
    this.pages = pageCount(all.length, perPage)
    if (!Number.isInteger(page) || page < 1 || page > this.pages)
      throw invalidPageError(page, this.pages)
  }

  get total(): number {
    return this.all.length
  }

  get hasPrev(): boolean {
    return this.page > 1
  }

  get hasNext(): boolean {
    return this.page < this.pages
  }

  get prev(): number | null {
    return this.hasPrev ? this.page - 1 : null
  }

  get next(): number | null {
    return this.hasNext ? this.page + 1 : null
  }

  get items(): T[] {
    const start = (this.page - 1) * this.perPage
    return this.all.slice(start, start + this.perPage)
  }

  /**
   * Page numbers for navigation, e.g. `[1, 2, 3]`.
   */
  iterPages(): number[] {
    return Array.from({ length: this.pages }, (_, i) => i + 1)
  }
}
