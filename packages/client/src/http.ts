// ---------------------------------------------------------------------------
// HTTP transport shared by every endpoint group
// ---------------------------------------------------------------------------

/** Body of every non-2xx JSON response from the registry. */
export type ErrorBody = {
  error: string
  code: string
  details?: { field: string; message: string }[]
}

/**
 * Outcome of one call. Non-2xx statuses are data, not exceptions: `error` is
 * set and `data` is null. Only transport failures throw (see ApiError).
 */
export type ApiResponse<T> = {
  status: number
  data: T | null
  error: ErrorBody | null
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>

export interface TransportOptions {
  /** e.g. "http://localhost:3000"; a trailing slash is ignored. */
  baseUrl: string
  token?: string
  /** Authorization scheme placed before the token. */
  prefix?: string
  /** Abort each request after this many milliseconds. */
  timeoutMs?: number
  /** Defaults to the global fetch. */
  fetch?: FetchFn
}

export const DEFAULT_TIMEOUT_MS = 10_000

/** Thrown when no HTTP response was received at all. */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly code: 'TIMEOUT' | 'NETWORK_ERROR',
    public readonly status: number,
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

function isErrorBody(value: unknown): value is ErrorBody {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string' &&
    'code' in value &&
    typeof value.code === 'string'
  )
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export class HttpTransport {
  private readonly baseUrl: string
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number
  private readonly fetchFn: FetchFn

  constructor({ baseUrl, token, prefix = 'Bearer', timeoutMs = DEFAULT_TIMEOUT_MS, fetch: fetchFn }: TransportOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '')
    this.headers = { 'Content-Type': 'application/json' }
    if (token !== undefined) this.headers['Authorization'] = `${prefix} ${token}`
    this.timeoutMs = timeoutMs
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init))
  }

  /**
   * Sends one request. The success body is trusted to be a `T`; the server
   * is the one validating data.
   */
  async request<T>(method: string, path: string, body?: unknown): Promise<ApiResponse<T>> {
    const url = `${this.baseUrl}${path}`
    let res: Response
    try {
      res = await this.fetchFn(url, {
        method,
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      })
    } catch (err) {
      const name = typeof err === 'object' && err !== null && 'name' in err ? err.name : undefined
      if (name === 'TimeoutError' || name === 'AbortError') {
        throw new ApiError(`${method} ${url} timed out after ${this.timeoutMs}ms`, 'TIMEOUT', 0)
      }
      const reason = err instanceof Error ? err.message : String(err)
      throw new ApiError(`${method} ${url} failed: ${reason}`, 'NETWORK_ERROR', 0)
    }

    const text = await res.text()
    const json = text === '' ? null : parseJson(text)

    if (!res.ok) {
      const error = isErrorBody(json) ? json : { error: res.statusText || `HTTP ${res.status}`, code: 'HTTP_ERROR' }
      return { status: res.status, data: null, error }
    }
    return { status: res.status, data: (json ?? null) as T | null, error: null }
  }
}
