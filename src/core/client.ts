const REQUEST_TIMEOUT_MS = 30_000

/** HTTP client for a running secrets server. */
export class SecretsClient {
  private readonly baseUrl: string

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '')
  }

  private async request(
    method: string,
    path: string,
    headers: Record<string, string> = {},
  ): Promise<string> {
    const url = `${this.baseUrl}${path}`

    let response: Response
    try {
      response = await fetch(url, {
        method,
        headers,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      })
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new Error('Request timed out after 30s. Is the server responding?')
      }
      if (err instanceof TypeError) {
        throw new Error(`Server not reachable at ${this.baseUrl}. Start with \`simple-secrets server start\``)
      }
      throw err
    }

    const body = await response.text()

    if (response.status === 401) {
      throw new Error(body ? `Unauthorized: ${body}` : 'Unauthorized')
    }

    if (!response.ok) {
      throw new Error(body || `Server error: ${String(response.status)} ${response.statusText}`)
    }

    return body
  }

  private static tokenQuery(token: string): string {
    return `?token=${encodeURIComponent(token)}`
  }

  async login(username: string, password: string): Promise<string> {
    const credentials = Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')
    return this.request('GET', '/login', { Authorization: `Basic ${credentials}` })
  }

  async get(name: string, token: string): Promise<string> {
    return this.request('GET', `/get/${encodeURIComponent(name)}${SecretsClient.tokenQuery(token)}`)
  }

  /** Returns the UUID the server derived for `name`. */
  async set(name: string, value: string, token: string): Promise<string> {
    return this.request(
      'POST',
      `/set/${encodeURIComponent(name)}/${encodeURIComponent(value)}${SecretsClient.tokenQuery(token)}`,
    )
  }
}
