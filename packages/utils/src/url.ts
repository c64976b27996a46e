const INDEX_FILE = 'index.html'

function hasExtension(segment: string): boolean {
  return segment.includes('.')
}

/**
 * Join URL pieces into an absolute URL path.
 *
 * Every piece is stripped of surrounding slashes; empty pieces are skipped.
 * A trailing slash is added unless the last segment looks like a file.
 *
 * @example
 * buildUrl(['/blog', 'tags/awesome/']) // '/blog/tags/awesome/'
 * buildUrl(['/', 'feed.xml'])          // '/feed.xml'
 */
export function buildUrl(pieces: ReadonlyArray<string | null | undefined>): string {
  const parts: string[] = []
  for (const piece of pieces) {
    if (piece == null)
      continue
    const stripped = piece.replace(/^\/+|\/+$/g, '')
    if (stripped)
      parts.push(stripped)
  }
  const last = parts[parts.length - 1]
  if (last === undefined)
    return '/'
  const url = `/${parts.join('/')}`
  return hasExtension(last) ? url : `${url}/`
}

/**
 * Drop a trailing `index.html`, keeping the directory slash.
 */
export function stripIndexFile(slug: string): string {
  if (slug === INDEX_FILE)
    return ''
  if (slug.endsWith(`/${INDEX_FILE}`))
    return slug.slice(0, -INDEX_FILE.length)
  return slug
}

/**
 * Canonical form used for URL lookups: absolute, no `index.html`, and a
 * trailing slash for directory-like paths.
 */
export function normalizeUrl(url: string): string {
  const [pathOnly = ''] = url.split(/[?#]/)
  return buildUrl([stripIndexFile(pathOnly.replace(/^\/+/, ''))])
}

/**
 * File name an artifact is written to: `/a/b/` becomes `a/b/index.html`.
 */
export function artifactName(url: string): string {
  const name = url.replace(/^\/+/, '')
  return name === '' || name.endsWith('/') ? `${name}${INDEX_FILE}` : name
}
