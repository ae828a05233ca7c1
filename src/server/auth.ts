export interface BasicCredentials {
  username: string
  password: string
}

/**
 * Parses an `Authorization: Basic ...` header. Returns null when the header is
 * absent, uses another scheme, or carries no password part.
 */
export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header) return null

  const [scheme, encoded] = header.trim().split(/\s+/, 2)
  if (scheme.toLowerCase() !== 'basic' || !encoded) return null

  const decoded = Buffer.from(encoded, 'base64').toString('utf-8')
  const idx = decoded.indexOf(':')
  if (idx === -1) return null

  return { username: decoded.slice(0, idx), password: decoded.slice(idx + 1) }
}

/**
 * Reads the session token from a request URL. The token is the raw query string
 * with every `token=` removed, so a URL without `?` carries no token at all and
 * any other query is looked up as-is.
 */
export function readSessionToken(url: string): string | undefined {
  const idx = url.indexOf('?')
  if (idx === -1) return undefined
  return url.slice(idx + 1).replaceAll('token=', '')
}
